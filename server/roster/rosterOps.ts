/**
 * Roster commands (add / delete / replace).
 * Loose rows from CSV or spreadsheet are mapped to PlayerRecord here; nothing untyped goes further.
 */

import type { ImportOutcome, PlayerRecord } from '../../src/types/raid';
import { ValidationError } from '../errors';
import { splitNameList } from '../attendance/participants';

export interface RosterHolder {
  roster: PlayerRecord[];
}

/** Which columns hold the player name and the character list */
export interface RowFields {
  name: string;
  characters: string;
}

export const CSV_ROW_FIELDS: RowFields = { name: 'name', characters: 'characters' };
export const SPREADSHEET_ROW_FIELDS: RowFields = { name: 'Player', characters: 'Characters' };

function normalizeText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

/**
 * Characters as comma-separated text or as an array of such texts; each trimmed, empties dropped.
 */
export function normalizeCharacters(raw: unknown): string[] {
  const parts: unknown[] = Array.isArray(raw) ? raw : [raw];
  return parts.flatMap((part) => splitNameList(normalizeText(part)));
}

/**
 * Map one loosely typed row. null when the name or every character is missing.
 */
export function toPlayerRecord(row: Record<string, unknown>, fields: RowFields): PlayerRecord | null {
  const name = normalizeText(row[fields.name]);
  const characters = normalizeCharacters(row[fields.characters]);
  if (!name || characters.length === 0) return null;
  return { name, characters };
}

export function addPlayer(holder: RosterHolder, name: unknown, characters: unknown): PlayerRecord {
  const record = toPlayerRecord({ name, characters }, CSV_ROW_FIELDS);
  if (!record) {
    throw new ValidationError('Enter the player name and at least one character');
  }
  holder.roster.push(record);
  return record;
}

/**
 * Remove the record at index. A position that no longer exists is a no-op.
 */
export function deletePlayer(holder: RosterHolder, index: number): boolean {
  if (!Number.isInteger(index) || index < 0 || index >= holder.roster.length) {
    return false;
  }
  holder.roster.splice(index, 1);
  return true;
}

export interface MappedRows {
  records: PlayerRecord[];
  skipped: number;
}

export function mapRows(rows: readonly Record<string, unknown>[], fields: RowFields): MappedRows {
  const records: PlayerRecord[] = [];
  for (const row of rows) {
    const record = toPlayerRecord(row, fields);
    if (record) records.push(record);
  }
  return { records, skipped: rows.length - records.length };
}

/**
 * Replace the whole roster. Bad rows are dropped, the rest is committed,
 * even when that leaves the roster empty.
 */
export function replaceRoster(holder: RosterHolder, mapped: MappedRows): ImportOutcome {
  holder.roster = [...mapped.records];
  return { imported: mapped.records.length, skipped: mapped.skipped };
}
