// src/core/fetch/DataFetcher.ts

import type { FetchParams, ProviderAdapter } from '../../adapters/types';
import type { IntegrationItem, ProviderId } from '../normalizer/types';
import type { TokenRecord } from '../token/types';
import type { CredentialStore } from '../store/CredentialStore';
import type { RefreshCoordinator } from '../token/RefreshCoordinator';
import type { Normalizer } from '../normalizer/Normalizer';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { withSpan } from '../../observability/tracing';
import {
  FetchFailedError,
  NotAuthorizedError,
  OAuthConfigError,
  UnauthorizedError,
} from '../../utils/errors';

export type AdapterLookup = (providerId: ProviderId) => ProviderAdapter | undefined;

export class DataFetcher {
  constructor(
    private adapters: AdapterLookup,
    private store: CredentialStore,
    private refresh: RefreshCoordinator,
    private normalizer: Normalizer,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {}

  /**
   * Load and normalize a principal's items from one provider, refreshing the
   * stored credential first when it is expired or about to expire.
   */
  async loadItems(
    providerId: ProviderId,
    ownerContext: string,
    params?: FetchParams
  ): Promise<IntegrationItem[]> {
    const adapter = this.adapters(providerId);
    if (!adapter) {
      throw new OAuthConfigError(`Provider not configured: ${providerId}`, { provider: providerId });
    }

    return withSpan(
      'fetch.loadItems',
      async () => {
        const startTime = Date.now();

        let record = await this.store.getToken(providerId, ownerContext);
        if (!record) {
          throw new NotAuthorizedError('No stored credential for provider', {
            provider: providerId,
            ownerContext,
          });
        }

        if (this.refresh.needsRefresh(record)) {
          this.logger.info('Refreshing token before fetch', {
            provider: providerId,
            ownerContext,
            expiresAt: record.expiresAt.toISOString(),
          });
          record = await this.refresh.refresh(adapter, record);
        }

        const raw = await this.fetchWithReauthorization(adapter, record, params);
        const items = this.normalizer.normalize(providerId, raw, (entry) => adapter.normalize(entry));

        this.metrics.recordLatency('fetch_duration', Date.now() - startTime, { provider: providerId });
        this.metrics.recordGauge('items_fetched', items.length, { provider: providerId });
        this.logger.info('Items loaded', { provider: providerId, ownerContext, count: items.length });

        return items;
      },
      { 'provider.id': providerId }
    );
  }

  private async fetchWithReauthorization(
    adapter: ProviderAdapter,
    record: TokenRecord,
    params?: FetchParams
  ): Promise<unknown[]> {
    try {
      return await adapter.fetchItems(record, params);
    } catch (error: unknown) {
      if (!(error instanceof UnauthorizedError)) {
        throw this.fetchFailed(adapter.providerId, error);
      }
    }

    this.logger.warn('Access token rejected, forcing refresh', {
      provider: adapter.providerId,
      ownerContext: record.ownerContext,
    });
    const refreshed = await this.refresh.refresh(adapter, record, {
      rejectedAccessToken: record.accessToken,
    });

    try {
      return await adapter.fetchItems(refreshed, params);
    } catch (error: unknown) {
      throw this.fetchFailed(adapter.providerId, error);
    }
  }

  private fetchFailed(providerId: ProviderId, cause: unknown): FetchFailedError {
    this.logger.error('Fetch failed', {
      provider: providerId,
      error: cause instanceof Error ? cause.message : String(cause),
    });
    return new FetchFailedError(`Failed to fetch items from ${providerId}`, {
      provider: providerId,
      cause,
    });
  }
}
