import { describe, it, expect } from 'vitest';
import type { PlayerRecord } from '../../src/types/raid';
import { computeAttendance, summarizeAttendance } from '../attendance/computeAttendance';

const roster: PlayerRecord[] = [
  { name: 'Bob', characters: ['Arthas', 'Illidan'] },
  { name: 'Alice', characters: ['Jaina'] },
  { name: 'Carol', characters: ['Thrall', 'Sylvanas', 'Uther'] },
];

describe('computeAttendance', () => {
  it('matches a character regardless of case', () => {
    const [bob] = computeAttendance([roster[0]], ['arthas']);
    expect(bob).toEqual({
      player: 'Bob',
      characters: ['Arthas', 'Illidan'],
      attended: true,
      attendedCharacters: ['Arthas'],
      count: 1,
    });
  });

  it('upper-case participant matches too', () => {
    const [a] = computeAttendance([{ name: 'A', characters: ['Arthas'] }], ['ARTHAS']);
    expect(a.attended).toBe(true);
  });

  it('does not match substrings', () => {
    const [alice] = computeAttendance([roster[1]], ['Jain']);
    expect(alice.attended).toBe(false);
    expect(alice.count).toBe(0);
  });

  it('does not trim whitespace', () => {
    const [alice] = computeAttendance([roster[1]], [' Jaina']);
    expect(alice.attended).toBe(false);
  });

  it('keeps roster order and character order', () => {
    const results = computeAttendance(roster, ['uther', 'Thrall', 'Jaina']);
    expect(results.map((r) => r.player)).toEqual(['Bob', 'Alice', 'Carol']);
    expect(results[2].attendedCharacters).toEqual(['Thrall', 'Uther']);
    expect(results[2].count).toBe(2);
    expect(results[0].attended).toBe(false);
  });

  it('marks everyone absent for an empty participant list', () => {
    const results = computeAttendance(roster, []);
    expect(results).toHaveLength(3);
    for (const r of results) {
      expect(r.attended).toBe(false);
      expect(r.count).toBe(0);
      expect(r.attendedCharacters).toEqual([]);
    }
  });

  it('returns nothing for an empty roster', () => {
    expect(computeAttendance([], ['Arthas'])).toEqual([]);
  });

  it('matches a character shared by two players for both', () => {
    const shared: PlayerRecord[] = [
      { name: 'Bob', characters: ['Arthas'] },
      { name: 'Dave', characters: ['arthas', 'Kael'] },
    ];
    const results = computeAttendance(shared, ['Arthas']);
    expect(results.map((r) => r.attendedCharacters)).toEqual([['Arthas'], ['arthas']]);
  });

  it('gives the same output for the same input and leaves the input alone', () => {
    const snapshot = JSON.parse(JSON.stringify(roster));
    const first = computeAttendance(roster, ['Illidan', 'Sylvanas']);
    const second = computeAttendance(roster, ['Illidan', 'Sylvanas']);
    expect(second).toEqual(first);
    expect(roster).toEqual(snapshot);
    expect(first[0].characters).not.toBe(roster[0].characters);
  });
});

describe('summarizeAttendance', () => {
  it('counts attended and absent players', () => {
    const results = computeAttendance(roster, ['Illidan', 'Sylvanas']);
    expect(summarizeAttendance(results)).toEqual({ total: 3, attended: 2, absent: 1 });
  });
});
