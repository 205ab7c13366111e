import type { RaidConfig } from '../config';

export const TEST_CREDENTIALS = JSON.stringify({
  type: 'service_account',
  project_id: 'test-project',
  private_key: 'test-private-key',
  client_email: 'roster-reader@test-project.iam.example',
  token_uri: 'https://oauth.example/token',
});

export function testConfig(overrides: Partial<RaidConfig> = {}): RaidConfig {
  return {
    port: 0,
    reportApiKey: 'test-key',
    reportApiUrl: 'https://logs.test/api/v2/client',
    reportTimeoutMs: 1000,
    spreadsheetCredentials: TEST_CREDENTIALS,
    sessionTtlMs: 60_000,
    ...overrides,
  };
}
