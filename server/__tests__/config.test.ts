import { describe, it, expect } from 'vitest';
import {
  DEFAULT_REPORT_API_URL,
  isReportApiEnabled,
  isSpreadsheetEnabled,
  loadConfig,
  normalizeBaseUrl,
  parseServiceAccount,
} from '../config';
import { TEST_CREDENTIALS } from './fixtures';

describe('normalizeBaseUrl', () => {
  it('trims and strips trailing slashes', () => {
    expect(normalizeBaseUrl('  https://logs.test/api//  ')).toBe('https://logs.test/api');
  });

  it('rejects empty values and missing schemes', () => {
    expect(normalizeBaseUrl(undefined)).toBeNull();
    expect(normalizeBaseUrl('   ')).toBeNull();
    expect(normalizeBaseUrl('logs.test/api')).toBeNull();
    expect(normalizeBaseUrl('ftp://logs.test')).toBeNull();
    expect(normalizeBaseUrl('///')).toBeNull();
  });
});

describe('loadConfig', () => {
  it('uses defaults and disables features without credentials', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      port: 3000,
      reportApiKey: null,
      reportApiUrl: DEFAULT_REPORT_API_URL,
      reportTimeoutMs: 15_000,
      spreadsheetCredentials: null,
      sessionTtlMs: 240 * 60_000,
    });
    expect(isReportApiEnabled(config)).toBe(false);
    expect(isSpreadsheetEnabled(config)).toBe(false);
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      WCL_API_KEY: ' test-key ',
      WCL_API_URL: 'https://logs.test/graphql/',
      WCL_TIMEOUT_MS: '12000',
      GOOGLE_SERVICE_ACCOUNT_JSON: TEST_CREDENTIALS,
      SESSION_TTL_MINUTES: '30',
    });
    expect(config.port).toBe(8080);
    expect(config.reportApiKey).toBe('test-key');
    expect(config.reportApiUrl).toBe('https://logs.test/graphql');
    expect(config.reportTimeoutMs).toBe(12_000);
    expect(config.sessionTtlMs).toBe(30 * 60_000);
    expect(isReportApiEnabled(config)).toBe(true);
    expect(isSpreadsheetEnabled(config)).toBe(true);
  });

  it('falls back on unparsable numbers', () => {
    const config = loadConfig({ PORT: 'abc', WCL_TIMEOUT_MS: '0' });
    expect(config.port).toBe(3000);
    expect(config.reportTimeoutMs).toBe(15_000);
  });
});

describe('parseServiceAccount', () => {
  it('accepts the required fields and keeps optional ones', () => {
    const raw = JSON.stringify({
      ...JSON.parse(TEST_CREDENTIALS),
      private_key: 'line1\\nline2',
      client_id: '1234',
      extra: 'ignored',
    });
    expect(parseServiceAccount(raw)).toEqual({
      type: 'service_account',
      project_id: 'test-project',
      private_key: 'line1\nline2',
      client_email: 'roster-reader@test-project.iam.example',
      token_uri: 'https://oauth.example/token',
      client_id: '1234',
    });
  });

  it('accepts credentials without a token endpoint', () => {
    const raw = JSON.stringify({
      type: 'service_account',
      project_id: 'test-project',
      private_key: 'test-private-key',
      client_email: 'roster-reader@test-project.iam.example',
    });
    expect(parseServiceAccount(raw)).toEqual({
      type: 'service_account',
      project_id: 'test-project',
      private_key: 'test-private-key',
      client_email: 'roster-reader@test-project.iam.example',
    });
  });

  it('rejects bad JSON and missing fields', () => {
    expect(parseServiceAccount('{not json')).toBeNull();
    expect(parseServiceAccount('[]')).toBeNull();
    expect(parseServiceAccount(JSON.stringify({ type: 'service_account', project_id: 'p' }))).toBeNull();
  });
});
