// src/core/store/CredentialStore.ts

import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import { EventEmitter } from 'events';
import { z } from 'zod';
import type { CredentialStoreConfig } from './types';
import type { AuthorizationState } from '../auth/types';
import type { TokenRecord } from '../token/types';
import { PROVIDER_IDS, type ProviderId } from '../normalizer/types';
import { CredentialEncryption } from './CredentialEncryption';
import type { Logger } from '../../observability/Logger';
import { withStoreSpan } from '../../observability/tracing';
import { StoreTimeoutError } from '../../utils/errors';

const ProviderIdSchema = z.enum(PROVIDER_IDS);

const AuthorizationStateSchema = z.object({
  stateToken: z.string().min(1),
  providerId: ProviderIdSchema,
  ownerContext: z.string(),
  createdAt: z.coerce.date(),
  ttlMs: z.number().int().positive(),
  codeVerifier: z.string().optional(),
});

const TokenRecordSchema = z.object({
  providerId: ProviderIdSchema,
  ownerContext: z.string(),
  accessToken: z.string().min(1),
  refreshToken: z.string().optional(),
  expiresAt: z.coerce.date(),
  scopes: z.array(z.string()),
  tokenType: z.string().optional(),
  updatedAt: z.coerce.date(),
});

/**
 * Volatile key-value store with per-key TTL.
 *
 * Holds two key spaces: `state:<token>` markers written with the
 * authorization-window TTL, and `token:<provider>:<owner>` records written
 * without a store-level TTL (the record's own `expiresAt` governs expiry).
 * Every call is bounded by `operationTimeoutMs`.
 */
export class CredentialStore extends EventEmitter {
  private store: Keyv<string>;
  private encryption?: CredentialEncryption;
  private logger: Logger;
  private operationTimeoutMs: number;
  readonly stateTtlMs: number;

  constructor(config: CredentialStoreConfig, logger: Logger) {
    super();
    this.logger = logger;
    this.operationTimeoutMs = config.operationTimeoutMs ?? 5000;
    this.stateTtlMs = (config.stateTtlSeconds ?? 600) * 1000;

    if (config.backend === 'redis') {
      if (!config.url) {
        throw new Error("Redis credential store requires 'url'");
      }
      this.store = new Keyv<string>({ store: new KeyvRedis(config.url), namespace: 'integrations' });
    } else {
      this.store = new Keyv<string>({ namespace: 'integrations' });
    }

    this.store.on('error', (error: unknown) => {
      this.logger.error('Credential store backend error', {
        error: error instanceof Error ? error.message : String(error),
      });
    });

    if (config.encryption) {
      this.encryption = new CredentialEncryption(
        config.encryption.key,
        config.encryption.previousKeys
      );
    }
  }

  // ---- Key-based contract -------------------------------------------------

  async put(key: string, value: string, ttlMs?: number): Promise<void> {
    await this.withTimeout('put', this.store.set(key, value, ttlMs));
  }

  async get(key: string): Promise<string | undefined> {
    return this.withTimeout('get', this.store.get(key));
  }

  /**
   * Atomic read-and-remove. Only the caller whose delete actually removed the
   * key receives the value, so concurrent consumers observe it at most once.
   */
  async getAndDelete(key: string): Promise<string | undefined> {
    const value = await this.get(key);
    if (value === undefined) return undefined;

    const removed = await this.delete(key);
    return removed ? value : undefined;
  }

  async delete(key: string): Promise<boolean> {
    return this.withTimeout('delete', this.store.delete(key));
  }

  // ---- Authorization state ------------------------------------------------

  async saveState(state: AuthorizationState): Promise<void> {
    return withStoreSpan('saveState', 'state', async () => {
      await this.put(this.stateKey(state.stateToken), this.serialize(state), state.ttlMs);
      this.logger.debug('Authorization state issued', {
        provider: state.providerId,
        ownerContext: state.ownerContext,
        ttlMs: state.ttlMs,
      });
      this.emit('stateIssued', { providerId: state.providerId, ownerContext: state.ownerContext });
    });
  }

  /**
   * Consume a state token. Returns undefined when it was never issued, was
   * already consumed, or outlived its TTL.
   */
  async consumeState(stateToken: string): Promise<AuthorizationState | undefined> {
    const raw = await this.getAndDelete(this.stateKey(stateToken));
    if (raw === undefined) return undefined;

    const state = this.deserialize(raw, AuthorizationStateSchema, 'state');
    if (state) {
      this.emit('stateConsumed', { providerId: state.providerId, ownerContext: state.ownerContext });
    }
    return state;
  }

  // ---- Token records ------------------------------------------------------

  async getToken(providerId: ProviderId, ownerContext: string): Promise<TokenRecord | undefined> {
    const raw = await this.get(this.tokenKey(providerId, ownerContext));
    if (raw === undefined) {
      this.logger.debug('Token not found', { provider: providerId, ownerContext });
      return undefined;
    }
    return this.deserialize(raw, TokenRecordSchema, 'token');
  }

  async saveToken(record: TokenRecord): Promise<void> {
    return withStoreSpan('saveToken', 'token', async () => {
      // No TTL: a refreshable credential must survive its access token's expiry
      await this.put(this.tokenKey(record.providerId, record.ownerContext), this.serialize(record));

      this.logger.info('Token saved', {
        provider: record.providerId,
        ownerContext: record.ownerContext,
        expiresAt: record.expiresAt.toISOString(),
        hasRefreshToken: record.refreshToken !== undefined,
      });
      this.emit('tokenSaved', { providerId: record.providerId, ownerContext: record.ownerContext });
    });
  }

  async deleteToken(providerId: ProviderId, ownerContext: string): Promise<boolean> {
    const removed = await this.delete(this.tokenKey(providerId, ownerContext));
    if (removed) {
      this.logger.info('Token deleted', { provider: providerId, ownerContext });
      this.emit('tokenDeleted', { providerId, ownerContext });
    }
    return removed;
  }

  async disconnect(): Promise<void> {
    await this.store.disconnect();
  }

  private stateKey(stateToken: string): string {
    return `state:${stateToken}`;
  }

  private tokenKey(providerId: ProviderId, ownerContext: string): string {
    return `token:${providerId}:${ownerContext}`;
  }

  private serialize(value: AuthorizationState | TokenRecord): string {
    const json = JSON.stringify(value);
    return this.encryption ? this.encryption.encrypt(json) : json;
  }

  private deserialize<S extends z.ZodTypeAny>(
    raw: string,
    schema: S,
    keySpace: 'state' | 'token'
  ): z.output<S> | undefined {
    try {
      const json = this.encryption ? this.encryption.decrypt(raw) : raw;
      const parsed = schema.safeParse(JSON.parse(json));
      if (parsed.success) {
        return parsed.data;
      }
      this.logger.error('Stored value failed validation', {
        keySpace,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    } catch (error) {
      this.logger.error('Stored value could not be read', {
        keySpace,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return undefined;
  }

  private async withTimeout<T>(operation: string, pending: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            new StoreTimeoutError(`Credential store ${operation} timed out`, {
              operation,
              timeoutMs: this.operationTimeoutMs,
            })
          ),
        this.operationTimeoutMs
      );
    });

    try {
      return await Promise.race([pending, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
