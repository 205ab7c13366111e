/**
 * Participant list input and history source labels
 */

import type { ParticipantList, ReportParticipants } from '../../src/types/raid';

export const MANUAL_SOURCE_LABEL = 'Manual entry';

/** "a, b,,c " -> ['a', 'b', 'c'] */
export function splitNameList(text: string): string[] {
  return text
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

/**
 * Manual input arrives either as comma-separated text or as a string array.
 * Anything else yields an empty list.
 */
export function parseManualParticipants(raw: unknown): ParticipantList {
  if (typeof raw === 'string') return splitNameList(raw);
  if (Array.isArray(raw)) {
    return raw
      .filter((v): v is string => typeof v === 'string')
      .map((v) => v.trim())
      .filter((v) => v.length > 0);
  }
  return [];
}

export function reportSourceLabel(report: Pick<ReportParticipants, 'title' | 'context'>): string {
  if (report.title && report.context) return `${report.title} - ${report.context}`;
  return report.title ?? report.context ?? MANUAL_SOURCE_LABEL;
}
