/**
 * Roster / attendance types
 * Shared by the matcher, the session store, the routes and the CSV views
 */

export interface PlayerRecord {
  /** Guild member's real identity */
  name: string;
  /** In-game character names, in the order the officer entered them */
  characters: string[];
}

/** Character names extracted from one raid, lives only for one check */
export type ParticipantList = string[];

export interface AttendanceResult {
  player: string;
  characters: string[];
  attended: boolean;
  attendedCharacters: string[];
  count: number;
}

export interface AttendanceSummary {
  total: number;
  attended: number;
  absent: number;
}

export interface HistoryEntry {
  id: string;
  /** Local wall-clock time, minute resolution (YYYY-MM-DD HH:mm) */
  timestamp: string;
  createdAt: string;
  source: string;
  results: AttendanceResult[];
}

export interface ReportParticipants {
  participants: ParticipantList;
  title: string | null;
  /** "<zone> - <start time>" */
  context: string | null;
}

export interface ImportOutcome {
  imported: number;
  skipped: number;
}

/** Error codes (clients branch on code only) */
export type RaidErrorCode =
  | 'invalid'          // bad user input
  | 'not_found'
  | 'not_configured'   // credential missing
  | 'not_connected'    // spreadsheet import before connect
  | 'remote_error'     // the remote service reported a failure
  | 'network_error'    // timeout / transport failure
  | 'internal';

export interface RaidErrorInfo {
  code: RaidErrorCode;
  message: string;
}
