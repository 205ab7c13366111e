/**
 * Attendance history: append-only per session, newest first when listed, deletable by id.
 * No dedup and no cap.
 */

import { randomUUID } from 'crypto';
import type { AttendanceResult, HistoryEntry } from '../../src/types/raid';

export interface HistoryHolder {
  history: HistoryEntry[];
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local wall clock, "YYYY-MM-DD HH:mm" */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}`
  );
}

export function appendHistory(
  holder: HistoryHolder,
  source: string,
  results: AttendanceResult[],
  at: Date = new Date(),
  newId: () => string = randomUUID
): HistoryEntry {
  const entry: HistoryEntry = {
    id: newId(),
    timestamp: formatTimestamp(at),
    createdAt: at.toISOString(),
    source,
    results,
  };
  holder.history.push(entry);
  return entry;
}

export function listHistory(holder: HistoryHolder): HistoryEntry[] {
  return holder.history.slice().reverse();
}

export function findHistoryEntry(holder: HistoryHolder, id: string): HistoryEntry | null {
  return holder.history.find((e) => e.id === id) ?? null;
}

/** Unknown id is a no-op */
export function deleteHistoryEntry(holder: HistoryHolder, id: string): boolean {
  const idx = holder.history.findIndex((e) => e.id === id);
  if (idx === -1) return false;
  holder.history.splice(idx, 1);
  return true;
}
