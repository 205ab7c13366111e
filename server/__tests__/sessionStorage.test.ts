import { describe, it, expect, beforeEach } from 'vitest';
import type { AttendanceResult } from '../../src/types/raid';
import {
  appendHistory,
  deleteHistoryEntry,
  findHistoryEntry,
  formatTimestamp,
  listHistory,
  type HistoryHolder,
} from '../storage/historyLog';
import { createMemorySessionStorage } from '../storage/SessionStorage';

const results: AttendanceResult[] = [
  { player: 'Bob', characters: ['Arthas'], attended: true, attendedCharacters: ['Arthas'], count: 1 },
];

describe('history log', () => {
  let holder: HistoryHolder;
  let seq: number;
  const nextId = () => `entry-${++seq}`;

  beforeEach(() => {
    holder = { history: [] };
    seq = 0;
  });

  it('formats local time to the minute', () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 9, 7, 59))).toBe('2024-01-05 09:07');
  });

  it('appends one entry per check and lists newest first', () => {
    const at = new Date(2024, 2, 1, 20, 30);
    appendHistory(holder, 'Manual entry', results, at, nextId);
    appendHistory(holder, 'Week 3 - Naxxramas - 2024-03-01 19:00', results, at, nextId);

    expect(holder.history.map((e) => e.id)).toEqual(['entry-1', 'entry-2']);
    expect(listHistory(holder).map((e) => e.id)).toEqual(['entry-2', 'entry-1']);
    expect(holder.history[0]).toMatchObject({ timestamp: '2024-03-01 20:30', source: 'Manual entry' });
    expect(holder.history[0].createdAt).toBe(at.toISOString());
  });

  it('deletes only the targeted entry when two share a timestamp', () => {
    const at = new Date(2024, 2, 1, 20, 30);
    appendHistory(holder, 'Manual entry', results, at, nextId);
    appendHistory(holder, 'Manual entry', results, at, nextId);

    expect(deleteHistoryEntry(holder, 'entry-1')).toBe(true);
    expect(holder.history.map((e) => e.id)).toEqual(['entry-2']);
    expect(findHistoryEntry(holder, 'entry-1')).toBeNull();
    expect(findHistoryEntry(holder, 'entry-2')?.source).toBe('Manual entry');
  });

  it('deleting an unknown id is a no-op', () => {
    appendHistory(holder, 'Manual entry', results, new Date(), nextId);
    expect(deleteHistoryEntry(holder, 'missing')).toBe(false);
    expect(holder.history).toHaveLength(1);
  });
});

describe('createMemorySessionStorage', () => {
  let clock: number;
  let seq: number;

  beforeEach(() => {
    clock = 1_000;
    seq = 0;
  });

  const create = () =>
    createMemorySessionStorage({
      ttlMs: 500,
      now: () => clock,
      newId: () => `s-${++seq}`,
    });

  it('creates a session when none is given and returns it again by id', () => {
    const sessions = create();
    const first = sessions.resolve(undefined);
    expect(first.id).toBe('s-1');
    expect(first.roster).toEqual([]);
    expect(sessions.resolve('s-1')).toBe(first);
    expect(sessions.size()).toBe(1);
  });

  it('creates a fresh session for an unknown id', () => {
    const sessions = create();
    const state = sessions.resolve('made-up');
    expect(state.id).toBe('s-1');
    expect(sessions.get('made-up')).toBeNull();
  });

  it('ends a session and discards its state', () => {
    const sessions = create();
    const state = sessions.resolve(undefined);
    state.roster.push({ name: 'Bob', characters: ['Arthas'] });
    expect(sessions.end(state.id)).toBe(true);
    expect(sessions.get(state.id)).toBeNull();
    expect(sessions.resolve(state.id).roster).toEqual([]);
  });

  it('evicts sessions idle past the ttl', () => {
    const sessions = create();
    const idle = sessions.resolve(undefined);
    clock += 400;
    const active = sessions.resolve(undefined);
    clock += 200;
    expect(sessions.get(idle.id)).toBeNull();
    expect(sessions.get(active.id)).toBe(active);
  });
});
