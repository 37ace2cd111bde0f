// src/core/token/DistributedRefreshLock.ts

import { createClient } from 'redis';
import { v4 as uuidv4 } from 'uuid';
import type { ProviderId } from '../normalizer/types';
import type { Logger } from '../../observability/Logger';

type RedisClient = ReturnType<typeof createClient>;

// Delete the lock only while it still holds our token
const RELEASE_SCRIPT =
  "if redis.call('get', KEYS[1]) == ARGV[1] then return redis.call('del', KEYS[1]) else return 0 end";

export interface LockStatus {
  connected: boolean;
  mode: 'distributed' | 'local-only';
  healthy: boolean;
}

/**
 * Cross-instance guard around token refresh, built on Redis `SET NX PX`.
 * Without a Redis URL (or after a failed connect) every call succeeds
 * immediately and deduplication is in-process only.
 */
export class DistributedRefreshLock {
  private redis?: RedisClient;
  private ready: Promise<void>;
  private connected = false;
  private heldTokens: Map<string, string> = new Map();

  constructor(
    redisUrl: string | undefined,
    private logger: Logger,
    private lockTtlMs: number = 10000
  ) {
    if (!redisUrl) {
      this.ready = Promise.resolve();
      return;
    }

    const client = createClient({
      url: redisUrl,
      socket: {
        reconnectStrategy: (retries) => {
          if (retries > 10) {
            this.logger.error('Redis reconnect failed after 10 attempts');
            return new Error('Max reconnect attempts reached');
          }
          return Math.min(retries * 100, 3000);
        },
      },
    });
    this.redis = client;

    client.on('error', (err: Error) => {
      this.logger.error('Redis client error', { error: err.message });
      this.connected = false;
    });
    client.on('ready', () => {
      this.connected = true;
    });
    client.on('end', () => {
      this.connected = false;
    });

    this.ready = client
      .connect()
      .then(() => {
        this.connected = true;
        this.logger.info('Distributed refresh lock ready');
      })
      .catch((err: unknown) => {
        this.logger.warn('Distributed refresh lock unavailable, running in local-only mode', {
          error: err instanceof Error ? err.message : String(err),
        });
        this.redis = undefined;
      });
  }

  async initialize(): Promise<void> {
    await this.ready;
  }

  getConnectionStatus(): LockStatus {
    const distributed = this.redis !== undefined;
    return {
      connected: distributed && this.connected,
      mode: distributed ? 'distributed' : 'local-only',
      // Local-only mode is a supported configuration, not a fault
      healthy: distributed ? this.connected : true,
    };
  }

  /**
   * Returns false only when another instance currently holds the lock.
   * Redis failures degrade to "acquired".
   */
  async tryAcquire(providerId: ProviderId, ownerContext: string): Promise<boolean> {
    const redis = this.activeClient();
    if (!redis) return true;

    const key = this.lockKey(providerId, ownerContext);
    const token = uuidv4();

    try {
      const result = await redis.set(key, token, { PX: this.lockTtlMs, NX: true });
      const acquired = result === 'OK';

      if (acquired) {
        this.heldTokens.set(key, token);
      }
      this.logger.debug(acquired ? 'Acquired refresh lock' : 'Refresh lock held elsewhere', {
        provider: providerId,
        ownerContext,
      });
      return acquired;
    } catch (error: unknown) {
      this.logger.error('Failed to acquire refresh lock', {
        provider: providerId,
        ownerContext,
        error: error instanceof Error ? error.message : String(error),
      });
      return true;
    }
  }

  async waitForRelease(
    providerId: ProviderId,
    ownerContext: string,
    timeoutMs: number = 5000
  ): Promise<void> {
    const redis = this.activeClient();
    if (!redis) return;

    const key = this.lockKey(providerId, ownerContext);
    const startTime = Date.now();

    try {
      while (Date.now() - startTime < timeoutMs) {
        const exists = await redis.exists(key);
        if (!exists) return;

        await new Promise((resolve) => setTimeout(resolve, 100));
      }

      this.logger.warn('Timed out waiting for refresh lock release', {
        provider: providerId,
        ownerContext,
        timeoutMs,
      });
    } catch (error: unknown) {
      this.logger.error('Error waiting for refresh lock release', {
        provider: providerId,
        ownerContext,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async release(providerId: ProviderId, ownerContext: string): Promise<void> {
    const key = this.lockKey(providerId, ownerContext);
    const token = this.heldTokens.get(key);
    this.heldTokens.delete(key);

    const redis = this.activeClient();
    if (!redis || token === undefined) return;

    try {
      await redis.eval(RELEASE_SCRIPT, { keys: [key], arguments: [token] });
      this.logger.debug('Released refresh lock', { provider: providerId, ownerContext });
    } catch (error: unknown) {
      this.logger.error('Failed to release refresh lock', {
        provider: providerId,
        ownerContext,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async disconnect(): Promise<void> {
    const redis = this.redis;
    if (!redis || !this.connected) return;

    try {
      await redis.quit();
      this.connected = false;
    } catch (error: unknown) {
      this.logger.error('Error disconnecting refresh lock', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private activeClient(): RedisClient | undefined {
    if (!this.redis) return undefined;
    if (!this.connected) {
      this.logger.warn('Redis not connected, skipping distributed refresh lock');
      return undefined;
    }
    return this.redis;
  }

  private lockKey(providerId: ProviderId, ownerContext: string): string {
    return `refresh_lock:${providerId}:${ownerContext}`;
  }
}
