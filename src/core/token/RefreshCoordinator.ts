// src/core/token/RefreshCoordinator.ts

import type { ProviderAdapter } from '../../adapters/types';
import type { ProviderId } from '../normalizer/types';
import type { RefreshConfig, RefreshOptions, TokenRecord } from './types';
import type { CredentialStore } from '../store/CredentialStore';
import type { DistributedRefreshLock } from './DistributedRefreshLock';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { NotAuthorizedError, RefreshFailedError } from '../../utils/errors';

/**
 * Single-flight token refresh. Concurrent callers for the same
 * `providerId:ownerContext` share one in-flight promise; across instances a
 * Redis lock serializes the provider call.
 */
export class RefreshCoordinator {
  private inFlight: Map<string, Promise<TokenRecord>> = new Map();
  private marginMs: number;
  private lockWaitMs: number;

  constructor(
    private store: CredentialStore,
    private lock: DistributedRefreshLock,
    private metrics: MetricsCollector,
    private logger: Logger,
    config: RefreshConfig = {}
  ) {
    this.marginMs = (config.marginSeconds ?? 300) * 1000;
    this.lockWaitMs = config.lockWaitMs ?? 5000;
  }

  /**
   * True when the record is expired or expires within the refresh margin.
   */
  needsRefresh(record: TokenRecord, now: number = Date.now()): boolean {
    return record.expiresAt.getTime() <= now + this.marginMs;
  }

  async refresh(
    adapter: ProviderAdapter,
    record: TokenRecord,
    opts: RefreshOptions = {}
  ): Promise<TokenRecord> {
    const key = `${adapter.providerId}:${record.ownerContext}`;

    const existing = this.inFlight.get(key);
    if (existing) {
      this.metrics.incrementCounter('token_refresh_dedup_local', { provider: adapter.providerId });
      this.logger.debug('Refresh already in progress, joining', {
        provider: adapter.providerId,
        ownerContext: record.ownerContext,
      });
      return existing;
    }

    const flight = this.runFlight(adapter, record.ownerContext, opts);
    this.inFlight.set(key, flight);

    try {
      return await flight;
    } finally {
      this.inFlight.delete(key);
    }
  }

  private async runFlight(
    adapter: ProviderAdapter,
    ownerContext: string,
    opts: RefreshOptions
  ): Promise<TokenRecord> {
    const { providerId } = adapter;

    const acquired = await this.lock.tryAcquire(providerId, ownerContext);
    if (!acquired) {
      this.metrics.incrementCounter('token_refresh_dedup_distributed', { provider: providerId });
      await this.lock.waitForRelease(providerId, ownerContext, this.lockWaitMs);

      const current = await this.loadCurrent(providerId, ownerContext);
      if (this.isUsable(current, opts)) {
        return current;
      }
      throw new RefreshFailedError('Refresh by another instance did not produce a usable token', {
        provider: providerId,
        ownerContext,
      });
    }

    try {
      const current = await this.loadCurrent(providerId, ownerContext);
      if (this.isUsable(current, opts)) {
        this.logger.debug('Stored token already refreshed', { provider: providerId, ownerContext });
        return current;
      }
      return await this.executeRefresh(adapter, current);
    } finally {
      await this.lock.release(providerId, ownerContext);
    }
  }

  private async executeRefresh(adapter: ProviderAdapter, record: TokenRecord): Promise<TokenRecord> {
    const { providerId } = adapter;
    const startTime = Date.now();

    try {
      const refreshed = await adapter.refreshToken(record);
      await this.store.saveToken(refreshed);

      this.metrics.recordLatency('token_refresh_duration', Date.now() - startTime, {
        provider: providerId,
        status: 'success',
      });
      this.metrics.incrementCounter('token_refresh_total', { provider: providerId, status: 'success' });
      this.logger.info('Token refreshed', {
        provider: providerId,
        ownerContext: record.ownerContext,
        expiresAt: refreshed.expiresAt.toISOString(),
      });

      return refreshed;
    } catch (error: unknown) {
      this.metrics.recordLatency('token_refresh_duration', Date.now() - startTime, {
        provider: providerId,
        status: 'failed',
      });
      this.metrics.incrementCounter('token_refresh_total', { provider: providerId, status: 'failed' });

      // The provider rejected the refresh token itself; the record is unusable
      if (error instanceof RefreshFailedError && error.revoked) {
        await this.store.deleteToken(providerId, record.ownerContext);
        this.logger.warn('Refresh token revoked, credential removed', {
          provider: providerId,
          ownerContext: record.ownerContext,
        });
      }
      throw error;
    }
  }

  private async loadCurrent(providerId: ProviderId, ownerContext: string): Promise<TokenRecord> {
    const current = await this.store.getToken(providerId, ownerContext);
    if (!current) {
      throw new NotAuthorizedError('No stored credential for provider', {
        provider: providerId,
        ownerContext,
      });
    }
    return current;
  }

  private isUsable(record: TokenRecord, opts: RefreshOptions): boolean {
    if (opts.rejectedAccessToken !== undefined && record.accessToken === opts.rejectedAccessToken) {
      return false;
    }
    return !this.needsRefresh(record);
  }
}
