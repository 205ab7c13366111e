/**
 * Runtime configuration from the environment.
 * Absent or malformed credentials disable the matching feature instead of failing startup.
 */

export interface ServiceAccountCredentials {
  type: string;
  project_id: string;
  private_key: string;
  client_email: string;
  /** Not read: the JWT client always exchanges at Google's own token endpoint */
  token_uri?: string;
  private_key_id?: string;
  client_id?: string;
  auth_uri?: string;
  auth_provider_x509_cert_url?: string;
  client_x509_cert_url?: string;
}

export interface RaidConfig {
  port: number;
  reportApiKey: string | null;
  reportApiUrl: string;
  reportTimeoutMs: number;
  /** Raw credential JSON; validated when the spreadsheet connection is opened */
  spreadsheetCredentials: string | null;
  sessionTtlMs: number;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_REPORT_API_URL = 'https://www.warcraftlogs.com/api/v2/client';
const DEFAULT_PORT = 3000;
const DEFAULT_REPORT_TIMEOUT_MS = 15_000;
const DEFAULT_SESSION_TTL_MINUTES = 240;

const REQUIRED_CREDENTIAL_FIELDS = ['type', 'project_id', 'private_key', 'client_email'] as const;
const OPTIONAL_CREDENTIAL_FIELDS = [
  'token_uri',
  'private_key_id',
  'client_id',
  'auth_uri',
  'auth_provider_x509_cert_url',
  'client_x509_cert_url',
] as const;

function normalizeText(raw: string | undefined): string | null {
  if (raw == null) return null;
  const s = raw.trim();
  return s.length === 0 ? null : s;
}

/**
 * Base URL without trailing slashes; null unless it is an http(s) URL.
 */
export function normalizeBaseUrl(raw: string | undefined): string | null {
  const url = normalizeText(raw)?.replace(/\/+$/, '');
  return url && /^https?:\/\//.test(url) ? url : null;
}

function parsePositiveInteger(raw: string | undefined, fallback: number): number {
  const s = normalizeText(raw);
  if (s == null || !/^\d+$/.test(s)) return fallback;
  const parsed = Number.parseInt(s, 10);
  return parsed > 0 ? parsed : fallback;
}

/**
 * Validate the service-account structure. Returns null when a required field is
 * missing or not a non-empty string.
 */
export function parseServiceAccount(raw: string): ServiceAccountCredentials | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  const fields = new Map<string, unknown>(Object.entries(value));

  const pick = (key: string): string | undefined => {
    const v = fields.get(key);
    return typeof v === 'string' && v.trim().length > 0 ? v : undefined;
  };

  const [type, projectId, privateKey, clientEmail] = REQUIRED_CREDENTIAL_FIELDS.map(pick);
  if (!type || !projectId || !privateKey || !clientEmail) return null;

  const creds: ServiceAccountCredentials = {
    type,
    project_id: projectId,
    // keys pasted into env files often carry literal "\n"
    private_key: privateKey.replace(/\\n/g, '\n'),
    client_email: clientEmail,
  };
  for (const key of OPTIONAL_CREDENTIAL_FIELDS) {
    const v = pick(key);
    if (v) creds[key] = v;
  }
  return creds;
}

export function loadConfig(env: Env = process.env): RaidConfig {
  return {
    port: parsePositiveInteger(env.PORT, DEFAULT_PORT),
    reportApiKey: normalizeText(env.WCL_API_KEY),
    reportApiUrl: normalizeBaseUrl(env.WCL_API_URL) ?? DEFAULT_REPORT_API_URL,
    reportTimeoutMs: parsePositiveInteger(env.WCL_TIMEOUT_MS, DEFAULT_REPORT_TIMEOUT_MS),
    spreadsheetCredentials: normalizeText(env.GOOGLE_SERVICE_ACCOUNT_JSON),
    sessionTtlMs: parsePositiveInteger(env.SESSION_TTL_MINUTES, DEFAULT_SESSION_TTL_MINUTES) * 60_000,
  };
}

export function isReportApiEnabled(config: RaidConfig): boolean {
  return config.reportApiKey != null;
}

export function isSpreadsheetEnabled(config: RaidConfig): boolean {
  return config.spreadsheetCredentials != null;
}
