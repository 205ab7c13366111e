/****
 * Per-session application state (roster + history + spreadsheet connection), kept in memory.
 * A session ends on request or after sessionTtlMs without use; its state is discarded.
 */

import { randomUUID } from 'crypto';
import type { HistoryEntry, PlayerRecord } from '../../src/types/raid';
import type { SpreadsheetConnection } from '../clients/spreadsheetImporter';

export interface RaidSessionState {
  id: string;
  roster: PlayerRecord[];
  history: HistoryEntry[];
  spreadsheet: SpreadsheetConnection | null;
  createdAt: number;
  lastSeenAt: number;
}

export interface SessionStorage {
  /** Existing live session for the id, or a new one */
  resolve(sessionId: string | undefined): RaidSessionState;
  get(sessionId: string): RaidSessionState | null;
  end(sessionId: string): boolean;
  size(): number;
}

export interface SessionStorageOptions {
  ttlMs: number;
  now?: () => number;
  newId?: () => string;
}

export function createSessionState(id: string, now: number): RaidSessionState {
  return {
    id,
    roster: [],
    history: [],
    spreadsheet: null,
    createdAt: now,
    lastSeenAt: now,
  };
}

export function createMemorySessionStorage(options: SessionStorageOptions): SessionStorage {
  const sessions = new Map<string, RaidSessionState>();
  const now = options.now ?? Date.now;
  const newId = options.newId ?? randomUUID;

  const evictExpired = (at: number) => {
    for (const [id, state] of sessions) {
      if (at - state.lastSeenAt > options.ttlMs) sessions.delete(id);
    }
  };

  return {
    resolve(sessionId) {
      const at = now();
      evictExpired(at);
      const existing = sessionId ? sessions.get(sessionId) : undefined;
      if (existing) {
        existing.lastSeenAt = at;
        return existing;
      }
      const state = createSessionState(newId(), at);
      sessions.set(state.id, state);
      return state;
    },
    get(sessionId) {
      evictExpired(now());
      return sessions.get(sessionId) ?? null;
    },
    end(sessionId) {
      return sessions.delete(sessionId);
    },
    size() {
      return sessions.size;
    },
  };
}
