// src/adapters/types.ts

import type { ProviderId, IntegrationItem } from '../core/normalizer/types';
import type { TokenRecord } from '../core/token/types';
import type {
  AuthorizationRequest,
  AuthorizationState,
  ConnectOptions,
} from '../core/auth/types';
import type { HttpCore } from '../core/http/HttpCore';
import type { CredentialStore } from '../core/store/CredentialStore';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';

/**
 * Capability set every provider exposes. The orchestrator and the data
 * fetcher only ever talk to this interface.
 */
export interface ProviderAdapter<TRaw = unknown> {
  readonly providerId: ProviderId;

  buildAuthorizationUrl(ownerContext: string, opts?: ConnectOptions): Promise<AuthorizationRequest>;
  exchangeCode(code: string, state: AuthorizationState): Promise<TokenRecord>;
  refreshToken(record: TokenRecord): Promise<TokenRecord>;
  fetchItems(record: TokenRecord, params?: FetchParams): Promise<TRaw[]>;
  normalize(raw: TRaw): IntegrationItem;

  /** Provider-side revocation, where the provider offers one */
  revokeToken?(record: TokenRecord): Promise<void>;
}

export interface FetchParams {
  limit?: number; // Maximum number of raw records across pages
}

export interface AdapterDeps {
  store: CredentialStore;
  http: HttpCore;
  logger: Logger;
  metrics: MetricsCollector;
  oauthTimeoutMs: number;
}
