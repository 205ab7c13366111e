/**
 * Roster <-> CSV (columns: name, characters). characters is one ", "-joined cell on disk.
 */

import { CsvError } from 'csv-parse';
import type { ImportOutcome, PlayerRecord } from '../../src/types/raid';
import { parseCsv, toCsv, type ParsedCsv } from '../../src/utils/csv';
import { ValidationError } from '../errors';
import { CSV_ROW_FIELDS, mapRows, replaceRoster, type RosterHolder } from './rosterOps';

export const ROSTER_CSV_HEADERS = [CSV_ROW_FIELDS.name, CSV_ROW_FIELDS.characters];
export const ROSTER_CSV_FILENAME = 'raid_roster.csv';

export function rosterToCsv(roster: readonly PlayerRecord[]): string {
  return toCsv(
    ROSTER_CSV_HEADERS,
    roster.map((p) => ({ name: p.name, characters: p.characters.join(', ') }))
  );
}

function readCsv(text: string): ParsedCsv {
  try {
    return parseCsv(text);
  } catch (e) {
    if (e instanceof CsvError) {
      throw new ValidationError(`CSV could not be read: ${e.message}`);
    }
    throw e;
  }
}

/**
 * Replace the roster from CSV text. A file that fails to parse or lacks a column leaves the roster as it was.
 */
export function importRosterCsv(holder: RosterHolder, text: string): ImportOutcome {
  const { headers, rows } = readCsv(text);
  if (!headers.includes(CSV_ROW_FIELDS.name) || !headers.includes(CSV_ROW_FIELDS.characters)) {
    throw new ValidationError('CSV needs "name" and "characters" columns');
  }
  return replaceRoster(holder, mapRows(rows, CSV_ROW_FIELDS));
}
