/**
 * Attendance matching: roster x participant list -> per-player result.
 * Case-insensitive exact comparison; no trimming, no substring matches.
 */

import type { AttendanceResult, AttendanceSummary, ParticipantList, PlayerRecord } from '../../src/types/raid';

function matchKey(name: string): string {
  return name.toLowerCase();
}

export function computeAttendance(
  roster: readonly PlayerRecord[],
  participants: ParticipantList
): AttendanceResult[] {
  const present = new Set(participants.map(matchKey));

  return roster.map((player) => {
    const attendedCharacters = player.characters.filter((c) => present.has(matchKey(c)));
    return {
      player: player.name,
      characters: [...player.characters],
      attended: attendedCharacters.length > 0,
      attendedCharacters,
      count: attendedCharacters.length,
    };
  });
}

export function summarizeAttendance(results: readonly AttendanceResult[]): AttendanceSummary {
  const attended = results.filter((r) => r.attended).length;
  return {
    total: results.length,
    attended,
    absent: results.length - attended,
  };
}
