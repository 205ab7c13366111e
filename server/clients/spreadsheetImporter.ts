/**
 * Spreadsheet roster import.
 * connect() authorises the configured service account; importFromSpreadsheet() reads every row
 * of one worksheet and keeps the rows with both "Player" and "Characters".
 */

import { parseServiceAccount, type RaidConfig, type ServiceAccountCredentials } from '../config';
import { ConfigurationError, NotConnectedError, RemoteError, ValidationError } from '../errors';
import { mapRows, SPREADSHEET_ROW_FIELDS, type MappedRows } from '../roster/rosterOps';
import { log } from '../utils/log';

const TAG = 'Spreadsheet';

const SPREADSHEET_URL_RE = /\/spreadsheets\/d\/([a-zA-Z0-9_-]+)/;
const SPREADSHEET_ID_RE = /^[a-zA-Z0-9_-]+$/;

/** An authorised session with the spreadsheet service */
export interface SpreadsheetConnection {
  readonly clientEmail: string;
  readWorksheet(spreadsheetId: string, worksheetName: string): Promise<Record<string, unknown>[]>;
}

/** Transport seam; the google-spreadsheet implementation lives in googleSheetsGateway.ts */
export interface SpreadsheetGateway {
  connect(credentials: ServiceAccountCredentials): Promise<SpreadsheetConnection>;
}

export interface SpreadsheetImporter {
  connect(): Promise<SpreadsheetConnection>;
  importFromSpreadsheet(
    connection: SpreadsheetConnection | null,
    location: string,
    worksheetName: string
  ): Promise<MappedRows>;
}

export interface SpreadsheetImporterDeps {
  config: Pick<RaidConfig, 'spreadsheetCredentials'>;
  gateway: SpreadsheetGateway;
}

/**
 * Spreadsheet id from a share URL (/spreadsheets/d/<id>/...) or a bare id.
 */
export function extractSpreadsheetId(location: string): string | null {
  const trimmed = location.trim();
  const match = SPREADSHEET_URL_RE.exec(trimmed);
  if (match) return match[1];
  return SPREADSHEET_ID_RE.test(trimmed) ? trimmed : null;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createSpreadsheetImporter(deps: SpreadsheetImporterDeps): SpreadsheetImporter {
  const { config, gateway } = deps;

  return {
    async connect() {
      const raw = config.spreadsheetCredentials;
      if (!raw) {
        throw new ConfigurationError('Spreadsheet credentials are not configured');
      }
      const credentials = parseServiceAccount(raw);
      if (!credentials) {
        throw new ConfigurationError('Spreadsheet credentials are incomplete or not valid JSON');
      }
      try {
        const connection = await gateway.connect(credentials);
        log.info(TAG, `connected as ${connection.clientEmail}`);
        return connection;
      } catch (e) {
        throw new RemoteError(`Spreadsheet authorisation failed: ${errorText(e)}`);
      }
    },

    async importFromSpreadsheet(connection, location, worksheetName) {
      if (!connection) {
        throw new NotConnectedError();
      }
      const spreadsheetId = extractSpreadsheetId(location);
      if (!spreadsheetId) {
        throw new ValidationError('Enter a spreadsheet URL');
      }
      const worksheet = worksheetName.trim();
      if (!worksheet) {
        throw new ValidationError('Enter the worksheet name');
      }

      let rows: Record<string, unknown>[];
      try {
        rows = await connection.readWorksheet(spreadsheetId, worksheet);
      } catch (e) {
        if (e instanceof RemoteError) throw e;
        throw new RemoteError(`Spreadsheet import failed: ${errorText(e)}`);
      }
      const mapped = mapRows(rows, SPREADSHEET_ROW_FIELDS);
      log.info(TAG, `${worksheet}: ${mapped.records.length} players, ${mapped.skipped} rows skipped`);
      return mapped;
    },
  };
}
