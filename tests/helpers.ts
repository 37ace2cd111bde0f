import { Logger } from '../src/observability/Logger';
import { MetricsCollector } from '../src/observability/MetricsCollector';
import { CredentialStore } from '../src/core/store/CredentialStore';
import { HttpCore } from '../src/core/http/HttpCore';
import type { AdapterDeps } from '../src/adapters/types';
import type { ProviderConfig } from '../src/core/auth/types';
import type { TokenRecord } from '../src/core/token/types';

export const TEST_ENCRYPTION_KEY = '0'.repeat(64);

export function createTestLogger(): Logger {
  // Suppress logs in tests
  return new Logger({ level: 'error' });
}

export function createAdapterDeps(): AdapterDeps {
  const logger = createTestLogger();
  const metrics = new MetricsCollector({}, logger);

  return {
    store: new CredentialStore({ backend: 'memory' }, logger),
    http: new HttpCore(
      { timeout: 2000, retry: { baseDelay: 1, maxDelay: 4, maxRetryAfter: 20 } },
      {},
      metrics,
      logger
    ),
    logger,
    metrics,
    oauthTimeoutMs: 2000,
  };
}

export function providerConfig(
  provider: string,
  scopes: string[],
  overrides: Partial<ProviderConfig> = {}
): ProviderConfig {
  return {
    clientId: 'test-client-id',
    clientSecret: 'test-secret',
    redirectUri: `http://localhost:8000/integrations/${provider}/oauth2callback`,
    scopes,
    ...overrides,
  };
}

export function tokenRecord(overrides: Partial<TokenRecord> = {}): TokenRecord {
  const now = Date.now();
  return {
    providerId: 'hubspot',
    ownerContext: 'user1',
    accessToken: 'test-access-token',
    refreshToken: 'test-refresh-token',
    expiresAt: new Date(now + 3600 * 1000),
    scopes: ['crm.objects.contacts.read'],
    updatedAt: new Date(now),
    ...overrides,
  };
}
