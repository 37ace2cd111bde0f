import nock from 'nock';
import type { IntegrationSDK, InitConfig } from '../../src/sdk';
import type { TokenRecord } from '../../src/core/token/types';
import { providerConfig, TEST_ENCRYPTION_KEY } from '../helpers';

export const HUBSPOT_SCOPES = ['crm.objects.contacts.read', 'crm.objects.contacts.write'];
export const HUBSPOT_API = 'https://api.hubapi.com';

export const testConfig: InitConfig = {
  credentialStore: {
    backend: 'memory',
    encryption: { key: TEST_ENCRYPTION_KEY, algorithm: 'aes-256-gcm' },
  },
  http: { timeout: 2000, retry: { baseDelay: 1, maxDelay: 4, maxRetryAfter: 20 } },
  providers: {
    hubspot: providerConfig('hubspot', HUBSPOT_SCOPES),
    airtable: providerConfig('airtable', ['data.records:read', 'schema.bases:read']),
  },
  oauthTimeoutMs: 2000,
  logging: { level: 'error' },
};

export function stateOf(url: string): string {
  const state = new URL(url).searchParams.get('state');
  if (!state) throw new Error(`No state in ${url}`);
  return state;
}

/**
 * Runs a complete HubSpot authorization for `ownerContext` against a mocked
 * token endpoint returning `tokenResponse`.
 */
export async function connectHubSpot(
  sdk: IntegrationSDK,
  ownerContext: string,
  tokenResponse: Record<string, unknown>
): Promise<TokenRecord> {
  const url = await sdk.initiate('hubspot', ownerContext);
  nock(HUBSPOT_API)
    .post('/oauth/v1/token', (body) => body.grant_type === 'authorization_code')
    .reply(200, tokenResponse);

  return sdk.handleCallback('hubspot', new URLSearchParams({ code: 'test-code', state: stateOf(url) }));
}
