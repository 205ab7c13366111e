/**
 * google-spreadsheet transport, authorised with a service-account JWT (read-only scope).
 */

import { JWT } from 'google-auth-library';
import { GoogleSpreadsheet } from 'google-spreadsheet';
import type { ServiceAccountCredentials } from '../config';
import { RemoteError } from '../errors';
import type { SpreadsheetConnection, SpreadsheetGateway } from './spreadsheetImporter';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets.readonly'];

export function createGoogleSheetsGateway(): SpreadsheetGateway {
  return {
    async connect(credentials: ServiceAccountCredentials): Promise<SpreadsheetConnection> {
      const auth = new JWT({
        email: credentials.client_email,
        key: credentials.private_key,
        keyId: credentials.private_key_id,
        scopes: SCOPES,
      });
      await auth.authorize();

      return {
        clientEmail: credentials.client_email,
        async readWorksheet(spreadsheetId, worksheetName) {
          const doc = new GoogleSpreadsheet(spreadsheetId, auth);
          await doc.loadInfo();
          const sheet = doc.sheetsByTitle[worksheetName];
          if (!sheet) {
            throw new RemoteError(`Worksheet "${worksheetName}" not found`);
          }
          const rows = await sheet.getRows();
          return rows.map((row) => row.toObject());
        },
      };
    },
  };
}
