/**
 * Read side: display rows, CSV downloads and the session overview.
 * Handlers mutate session state; everything here only reads it.
 */

import type { AttendanceResult, HistoryEntry, PlayerRecord } from '../../src/types/raid';
import { toCsv } from '../../src/utils/csv';
import { summarizeAttendance } from '../attendance/computeAttendance';
import { isReportApiEnabled, isSpreadsheetEnabled, type RaidConfig } from '../config';
import { listHistory } from '../storage/historyLog';
import type { RaidSessionState } from '../storage/SessionStorage';

export const ATTENDANCE_CSV_HEADERS = [
  'Player',
  'Characters',
  'Attended',
  'Attended characters',
  'Character count',
] as const;

export type AttendanceRow = Record<(typeof ATTENDANCE_CSV_HEADERS)[number], string | number>;

export function toAttendanceRows(results: readonly AttendanceResult[]): AttendanceRow[] {
  return results.map((r) => ({
    Player: r.player,
    Characters: r.characters.join(', '),
    Attended: r.attended ? 'Yes' : 'No',
    'Attended characters': r.attendedCharacters.length > 0 ? r.attendedCharacters.join(', ') : '-',
    'Character count': r.count,
  }));
}

export function attendanceToCsv(results: readonly AttendanceResult[]): string {
  return toCsv([...ATTENDANCE_CSV_HEADERS], toAttendanceRows(results));
}

export function historyCsvFilename(entry: Pick<HistoryEntry, 'id'>): string {
  return `raid_attendance_${entry.id}.csv`;
}

export function toAttendanceView(entry: HistoryEntry, participantCount: number) {
  return {
    entry,
    rows: toAttendanceRows(entry.results),
    summary: summarizeAttendance(entry.results),
    participantCount,
  };
}

export interface RaidOverview {
  sessionId: string;
  roster: PlayerRecord[];
  history: HistoryEntry[];
  features: {
    reportsEnabled: boolean;
    spreadsheetEnabled: boolean;
    spreadsheetConnected: boolean;
  };
}

export function toOverview(state: RaidSessionState, config: RaidConfig): RaidOverview {
  return {
    sessionId: state.id,
    roster: state.roster,
    history: listHistory(state),
    features: {
      reportsEnabled: isReportApiEnabled(config),
      spreadsheetEnabled: isSpreadsheetEnabled(config),
      spreadsheetConnected: state.spreadsheet != null,
    },
  };
}
