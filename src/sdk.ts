// src/sdk.ts

import { PROVIDER_IDS, type IntegrationItem, type ProviderId } from './core/normalizer/types';
import type { TokenRecord } from './core/token/types';
import type { CallbackParams, ConnectOptions, ProviderConfig } from './core/auth/types';
import type { AdapterDeps, FetchParams, ProviderAdapter } from './adapters/types';
import { CredentialStore } from './core/store/CredentialStore';
import { HttpCore } from './core/http/HttpCore';
import { Normalizer } from './core/normalizer/Normalizer';
import { AuthorizationOrchestrator } from './core/auth/AuthorizationOrchestrator';
import { RefreshCoordinator } from './core/token/RefreshCoordinator';
import { DistributedRefreshLock, type LockStatus } from './core/token/DistributedRefreshLock';
import { DataFetcher } from './core/fetch/DataFetcher';
import { HubSpotAdapter } from './adapters/hubspot/HubSpotAdapter';
import { AirtableAdapter } from './adapters/airtable/AirtableAdapter';
import { NotionAdapter } from './adapters/notion/NotionAdapter';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { validateConfig, type InitConfig, type ValidatedConfig } from './config/ConfigValidator';
import { OAuthConfigError } from './utils/errors';

export type { InitConfig } from './config/ConfigValidator';

const ADAPTER_FACTORIES: Record<ProviderId, (config: ProviderConfig, deps: AdapterDeps) => ProviderAdapter> =
  {
    hubspot: (config, deps) => new HubSpotAdapter(config, deps),
    airtable: (config, deps) => new AirtableAdapter(config, deps),
    notion: (config, deps) => new NotionAdapter(config, deps),
  };

export interface HealthStatus {
  providers: ProviderId[];
  distributedLocks: LockStatus;
}

interface CoreDeps {
  logger: Logger;
  metrics: MetricsCollector;
  store: CredentialStore;
  http: HttpCore;
  refreshLock: DistributedRefreshLock;
  orchestrator: AuthorizationOrchestrator;
  fetcher: DataFetcher;
}

/**
 * OAuth integration broker: authorizes principals against HubSpot, Airtable
 * and Notion, keeps their credentials fresh, and returns their provider data
 * as normalized items.
 */
export class IntegrationSDK {
  private adapters: Map<ProviderId, ProviderAdapter> = new Map();
  private core: CoreDeps;

  private constructor(config: ValidatedConfig) {
    // Build every dependency before wiring the orchestrator and fetcher
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics, logger);
    const store = new CredentialStore(config.credentialStore, logger);
    const http = new HttpCore(config.http ?? {}, config.rateLimits ?? {}, metrics, logger);
    const refreshLock = new DistributedRefreshLock(
      config.credentialStore.backend === 'redis' ? config.credentialStore.url : undefined,
      logger,
      config.refresh?.lockTtlMs
    );
    const lookup = (providerId: ProviderId): ProviderAdapter | undefined =>
      this.adapters.get(providerId);
    const refresh = new RefreshCoordinator(store, refreshLock, metrics, logger, config.refresh);

    this.core = {
      logger,
      metrics,
      store,
      http,
      refreshLock,
      orchestrator: new AuthorizationOrchestrator(lookup, store, metrics, logger),
      fetcher: new DataFetcher(lookup, store, refresh, new Normalizer(), metrics, logger),
    };

    const deps: AdapterDeps = {
      store,
      http,
      logger,
      metrics,
      oauthTimeoutMs: config.oauthTimeoutMs ?? 10000,
    };
    for (const providerId of PROVIDER_IDS) {
      const providerConfig = config.providers[providerId];
      if (providerConfig) {
        this.registerAdapter(ADAPTER_FACTORIES[providerId](providerConfig, deps));
      }
    }
  }

  /**
   * Validate configuration and build the broker. Must be awaited: the
   * distributed refresh lock connects to Redis here.
   *
   * @throws {z.ZodError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const broker = await IntegrationSDK.init({
   *   credentialStore: { backend: 'redis', url: process.env.REDIS_URL },
   *   providers: {
   *     hubspot: {
   *       clientId: process.env.HUBSPOT_CLIENT_ID,
   *       clientSecret: process.env.HUBSPOT_CLIENT_SECRET,
   *       redirectUri: 'http://localhost:8000/integrations/hubspot/oauth2callback',
   *       scopes: ['crm.objects.contacts.read'],
   *     },
   *   },
   * });
   * ```
   */
  static async init(config: InitConfig): Promise<IntegrationSDK> {
    const sdk = new IntegrationSDK(validateConfig(config));
    await sdk.core.refreshLock.initialize();

    sdk.core.logger.info('Integration broker initialized', {
      providers: Array.from(sdk.adapters.keys()),
    });
    return sdk;
  }

  /**
   * Start authorization for a principal. Redirect the user agent to the
   * returned URL; the embedded state is valid for one callback within the
   * authorization window.
   */
  async initiate(providerId: ProviderId, ownerContext: string, opts?: ConnectOptions): Promise<string> {
    return this.core.orchestrator.initiate(providerId, ownerContext, opts);
  }

  /**
   * Complete authorization from the provider's redirect.
   *
   * @throws {InvalidStateError} Unknown, consumed, expired or foreign state
   * @throws {OAuthDeniedError} The user or provider refused authorization
   * @throws {ExchangeFailedError} The code could not be exchanged
   */
  async handleCallback(
    providerId: ProviderId,
    params: URLSearchParams | CallbackParams
  ): Promise<TokenRecord> {
    const callback =
      params instanceof URLSearchParams
        ? {
            code: params.get('code') ?? undefined,
            state: params.get('state') ?? undefined,
            error: params.get('error') ?? undefined,
            errorDescription: params.get('error_description') ?? undefined,
          }
        : params;

    return this.core.orchestrator.handleCallback(providerId, callback);
  }

  /**
   * @throws {NotAuthorizedError} No credential stored for the principal
   * @throws {NoRefreshTokenError | RefreshFailedError} Credential could not be renewed
   * @throws {FetchFailedError} Provider data could not be retrieved
   */
  async loadItems(
    providerId: ProviderId,
    ownerContext: string,
    params?: FetchParams
  ): Promise<IntegrationItem[]> {
    return this.core.fetcher.loadItems(providerId, ownerContext, params);
  }

  /**
   * Revoke the credential with the provider where supported, then delete it.
   * Revocation is best-effort; the local record is always removed.
   */
  async disconnect(providerId: ProviderId, ownerContext: string): Promise<void> {
    const adapter = this.getAdapter(providerId);
    const record = await this.core.store.getToken(providerId, ownerContext);

    if (record && adapter.revokeToken) {
      try {
        await adapter.revokeToken(record);
      } catch (error: unknown) {
        this.core.logger.warn('Provider revocation failed, deleting credential anyway', {
          provider: providerId,
          ownerContext,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    await this.core.store.deleteToken(providerId, ownerContext);
  }

  async isConnected(providerId: ProviderId, ownerContext: string): Promise<boolean> {
    const record = await this.core.store.getToken(providerId, ownerContext);
    return record !== undefined;
  }

  getHealth(): HealthStatus {
    return {
      providers: Array.from(this.adapters.keys()),
      distributedLocks: this.core.refreshLock.getConnectionStatus(),
    };
  }

  /**
   * Prometheus exposition text for the host application's metrics endpoint
   */
  async getMetrics(): Promise<string> {
    return this.core.metrics.getMetrics();
  }

  registerAdapter(adapter: ProviderAdapter): void {
    this.adapters.set(adapter.providerId, adapter);
    this.core.logger.info('Adapter registered', { provider: adapter.providerId });
  }

  getAdapter(providerId: ProviderId): ProviderAdapter {
    const adapter = this.adapters.get(providerId);
    if (!adapter) {
      throw new OAuthConfigError(`Provider not configured: ${providerId}`, { provider: providerId });
    }
    return adapter;
  }

  async close(): Promise<void> {
    await this.core.refreshLock.disconnect();
    await this.core.store.disconnect();
  }
}
