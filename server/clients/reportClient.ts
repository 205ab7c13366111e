/**
 * Combat-log analytics client (GraphQL, one POST per report).
 * Bearer credential from config. Timeout 15s by default. No retry.
 */

import type { ReportParticipants } from '../../src/types/raid';
import type { RaidConfig } from '../config';
import { ConfigurationError, NetworkError, RemoteError, ValidationError } from '../errors';
import { log } from '../utils/log';

const TAG = 'ReportClient';

/** Actor subType the log service uses for human-controlled characters */
export const PLAYER_ACTOR_SUBTYPE = 'Human';
export const UNKNOWN_ZONE = 'Unknown';

const REPORT_ID_RE = /^[a-zA-Z0-9]+$/;
const REPORT_URL_RE = /reports\/([a-zA-Z0-9]+)/;

export const REPORT_QUERY = `
  query ReportParticipants($code: String!) {
    reportData {
      report(code: $code) {
        masterData(translate: true) {
          actors(type: "player") {
            name
            subType
          }
        }
        startTime
        title
        zone {
          name
        }
      }
    }
  }
`;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ReportClient {
  fetchParticipants(reportId: string): Promise<ReportParticipants>;
}

export interface ReportClientDeps {
  config: Pick<RaidConfig, 'reportApiKey' | 'reportApiUrl' | 'reportTimeoutMs'>;
  fetchImpl?: FetchLike;
}

/**
 * Report code from a pasted URL: first alphanumeric run after "reports/".
 */
export function extractReportId(url: string): string | null {
  const match = REPORT_URL_RE.exec(url);
  return match ? match[1] : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Epoch ms -> "YYYY-MM-DD HH:mm" (UTC) */
export function formatReportStart(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 16).replace('T', ' ');
}

function firstErrorMessage(payload: Record<string, unknown>): string | null {
  const errors = payload.errors;
  if (!Array.isArray(errors) || errors.length === 0) return null;
  const first: unknown = errors[0];
  const message = isRecord(first) ? first.message : undefined;
  if (typeof message === 'string') return message;
  return 'The report service returned an error';
}

/**
 * Pull participants, title and context out of a successful payload.
 */
export function parseReportPayload(payload: Record<string, unknown>): ReportParticipants {
  const data = payload.data;
  const reportData = isRecord(data) ? data.reportData : undefined;
  const report = isRecord(reportData) ? reportData.report : undefined;
  if (!isRecord(report)) {
    throw new RemoteError('Report not found');
  }

  const masterData = report.masterData;
  const rawActors = isRecord(masterData) ? masterData.actors : undefined;
  const actors: unknown[] = Array.isArray(rawActors) ? rawActors : [];
  const participants: string[] = [];
  for (const actor of actors) {
    if (!isRecord(actor) || actor.subType !== PLAYER_ACTOR_SUBTYPE) continue;
    const name = actor.name;
    if (typeof name === 'string') participants.push(name);
  }

  const { title: rawTitle, zone: rawZone, startTime } = report;
  const title = typeof rawTitle === 'string' && rawTitle.length > 0 ? rawTitle : null;
  const zoneName = isRecord(rawZone) ? rawZone.name : undefined;
  const zone = typeof zoneName === 'string' ? zoneName : UNKNOWN_ZONE;
  const context =
    typeof startTime === 'number' && Number.isFinite(startTime)
      ? `${zone} - ${formatReportStart(startTime)}`
      : zone;

  return { participants, title, context };
}

interface RemoteReply {
  ok: boolean;
  status: number;
  payload: unknown;
}

async function postQuery(
  fetchImpl: FetchLike,
  url: string,
  apiKey: string,
  body: string,
  timeoutMs: number
): Promise<RemoteReply> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetchImpl(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body,
      signal: controller.signal,
    });
    const payload: unknown = await res.json();
    return { ok: res.ok, status: res.status, payload };
  } catch (e) {
    log.warn(TAG, 'request failed', e);
    throw new NetworkError(controller.signal.aborted ? 'The report service did not answer in time' : undefined);
  } finally {
    clearTimeout(timeoutId);
  }
}

export function createReportClient(deps: ReportClientDeps): ReportClient {
  const { config } = deps;
  const fetchImpl: FetchLike = deps.fetchImpl ?? ((input, init) => fetch(input, init));

  return {
    async fetchParticipants(reportId: string): Promise<ReportParticipants> {
      const apiKey = config.reportApiKey;
      if (!apiKey) {
        throw new ConfigurationError('Report API key is not configured');
      }
      if (!REPORT_ID_RE.test(reportId)) {
        throw new ValidationError('Invalid report code');
      }

      const reply = await postQuery(
        fetchImpl,
        config.reportApiUrl,
        apiKey,
        JSON.stringify({ query: REPORT_QUERY, variables: { code: reportId } }),
        config.reportTimeoutMs
      );
      const { payload } = reply;
      if (!isRecord(payload)) {
        throw new RemoteError('Unexpected response from the report service');
      }
      const remoteMessage = firstErrorMessage(payload);
      if (remoteMessage) {
        throw new RemoteError(remoteMessage);
      }
      if (!reply.ok) {
        throw new RemoteError(`Report service responded with status ${reply.status}`);
      }

      const result = parseReportPayload(payload);
      log.info(TAG, `${reportId}: ${result.participants.length} participants`);
      return result;
    },
  };
}
