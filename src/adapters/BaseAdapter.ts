// src/adapters/BaseAdapter.ts

import type { TokenSet } from 'openid-client';
import type { ProviderAdapter, FetchParams, AdapterDeps } from './types';
import type { ProviderId, IntegrationItem } from '../core/normalizer/types';
import type { TokenRecord } from '../core/token/types';
import type {
  AuthorizationRequest,
  AuthorizationState,
  ConnectOptions,
  ProviderConfig,
} from '../core/auth/types';
import { OAuthClient, type OAuthEndpoints } from '../core/auth/OAuthClient';
import {
  ExchangeFailedError,
  InvalidStateError,
  NoRefreshTokenError,
  RefreshFailedError,
} from '../utils/errors';
import { withOAuthSpan } from '../observability/tracing';

/**
 * Shared authorization-code, exchange and refresh behaviour. Subclasses
 * supply their endpoints, default token lifetime, data fetching and
 * normalization.
 */
export abstract class BaseAdapter<TRaw> implements ProviderAdapter<TRaw> {
  abstract readonly providerId: ProviderId;

  protected abstract readonly endpoints: OAuthEndpoints;
  protected abstract readonly defaultTokenLifetimeSeconds: number;
  protected readonly pkceByDefault: boolean = false;
  protected readonly defaultFetchLimit: number = 500;

  private oauthClient?: OAuthClient;

  constructor(
    protected config: ProviderConfig,
    protected deps: AdapterDeps
  ) {}

  async buildAuthorizationUrl(
    ownerContext: string,
    opts?: ConnectOptions
  ): Promise<AuthorizationRequest> {
    return withOAuthSpan('authorize', this.providerId, ownerContext, async () => {
      const stateToken = this.oauth.generateState();
      const pkce = this.usesPKCE ? this.oauth.generatePKCE() : undefined;

      const state: AuthorizationState = {
        stateToken,
        providerId: this.providerId,
        ownerContext,
        createdAt: new Date(),
        ttlMs: this.deps.store.stateTtlMs,
        codeVerifier: pkce?.codeVerifier,
      };
      await this.deps.store.saveState(state);

      const url = this.oauth.authorizationUrl({
        state: stateToken,
        codeChallenge: pkce?.codeChallenge,
        loginHint: opts?.loginHint,
        extraParams: { ...this.authorizationParams(), ...opts?.extraParams },
      });

      this.deps.logger.info('Authorization URL built', {
        provider: this.providerId,
        ownerContext,
        pkce: pkce !== undefined,
      });
      return { url, stateToken };
    });
  }

  async exchangeCode(code: string, state: AuthorizationState): Promise<TokenRecord> {
    if (state.providerId !== this.providerId) {
      throw new InvalidStateError('State was issued for a different provider', {
        provider: this.providerId,
        stateProvider: state.providerId,
      });
    }

    return withOAuthSpan('exchange', this.providerId, state.ownerContext, async () => {
      const tokenSet = await this.oauth.exchangeCode(code, state.stateToken, state.codeVerifier);
      if (!tokenSet.access_token) {
        throw new ExchangeFailedError('Token response did not include an access token', {
          provider: this.providerId,
        });
      }
      return this.toTokenRecord(tokenSet.access_token, tokenSet, state.ownerContext);
    });
  }

  async refreshToken(record: TokenRecord): Promise<TokenRecord> {
    const { refreshToken } = record;
    if (!refreshToken) {
      throw new NoRefreshTokenError(undefined, {
        provider: this.providerId,
        ownerContext: record.ownerContext,
      });
    }

    return withOAuthSpan('refresh', this.providerId, record.ownerContext, async () => {
      const tokenSet = await this.oauth.refresh(refreshToken);
      if (!tokenSet.access_token) {
        throw new RefreshFailedError('Refresh response did not include an access token', {
          provider: this.providerId,
        });
      }
      return this.toTokenRecord(tokenSet.access_token, tokenSet, record.ownerContext, record);
    });
  }

  abstract fetchItems(record: TokenRecord, params?: FetchParams): Promise<TRaw[]>;

  abstract normalize(raw: TRaw): IntegrationItem;

  /**
   * Provider-specific authorization URL parameters
   */
  protected authorizationParams(): Record<string, string> {
    return {};
  }

  protected bearer(record: TokenRecord): Record<string, string> {
    return { Authorization: `Bearer ${record.accessToken}` };
  }

  protected fetchLimit(params?: FetchParams): number {
    return params?.limit ?? this.defaultFetchLimit;
  }

  protected get usesPKCE(): boolean {
    return this.config.usePKCE ?? this.pkceByDefault;
  }

  protected get oauth(): OAuthClient {
    // Built lazily: subclass endpoint fields are not assigned during super()
    if (!this.oauthClient) {
      this.oauthClient = new OAuthClient(
        this.providerId,
        this.config,
        this.endpoints,
        this.deps.logger,
        this.deps.oauthTimeoutMs
      );
    }
    return this.oauthClient;
  }

  /**
   * `expiresAt` is derived from the reported lifetime at write time; a
   * provider that reports none gets the adapter's default lifetime.
   */
  private toTokenRecord(
    accessToken: string,
    tokenSet: TokenSet,
    ownerContext: string,
    previous?: TokenRecord
  ): TokenRecord {
    const now = Date.now();
    const reported = tokenSet.expires_in;
    const lifetimeSeconds =
      typeof reported === 'number' && Number.isFinite(reported) && reported > 0
        ? reported
        : (this.config.defaultTokenLifetimeSeconds ?? this.defaultTokenLifetimeSeconds);

    return {
      providerId: this.providerId,
      ownerContext,
      accessToken,
      refreshToken: tokenSet.refresh_token ?? previous?.refreshToken,
      expiresAt: new Date(now + lifetimeSeconds * 1000),
      scopes: tokenSet.scope
        ? tokenSet.scope.split(/[\s,]+/).filter(Boolean)
        : (previous?.scopes ?? [...this.config.scopes]),
      tokenType: tokenSet.token_type,
      updatedAt: new Date(now),
    };
  }
}
