/**
 * CSV encode / decode (roster import/export, attendance downloads).
 * Reading goes through csv-parse; a malformed file throws its CsvError.
 */

import { parse } from 'csv-parse/sync';

export type CsvCell = string | number | null | undefined;

export interface ParsedCsv {
  headers: string[];
  rows: Record<string, string>[];
}

const NEEDS_QUOTES = /[",\r\n]/;

function encodeCell(value: CsvCell): string {
  const text = value == null ? '' : String(value);
  return NEEDS_QUOTES.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}

function encodeLine(cells: readonly CsvCell[]): string {
  return cells.map(encodeCell).join(',');
}

/**
 * Header line plus one line per row (cells picked by header name), CRLF-separated.
 */
export function toCsv(headers: string[], rows: Record<string, CsvCell>[]): string {
  const lines = [encodeLine(headers)];
  for (const row of rows) {
    lines.push(encodeLine(headers.map((h) => row[h])));
  }
  return lines.join('\r\n');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Header-keyed rows. Header names are trimmed; missing trailing cells read as ''.
 */
export function parseCsv(text: string): ParsedCsv {
  let headers: string[] = [];
  const records: unknown = parse(text, {
    bom: true,
    columns: (line: string[]) => {
      headers = line.map((h) => h.trim());
      return headers;
    },
    skip_empty_lines: true,
    relax_column_count: true,
  });

  const rows: Record<string, string>[] = [];
  for (const record of Array.isArray(records) ? records : []) {
    if (!isRecord(record)) continue;
    const row: Record<string, string> = {};
    for (const h of headers) {
      const cell = record[h];
      row[h] = typeof cell === 'string' ? cell : '';
    }
    rows.push(row);
  }
  return { headers, rows };
}
