// src/core/auth/OAuthClient.ts

import { Issuer, Client, TokenSet, generators, custom, errors } from 'openid-client';
import type { ClientAuthMethod } from 'openid-client';
import type { ProviderConfig } from './types';
import type { ProviderId } from '../normalizer/types';
import type { Logger } from '../../observability/Logger';
import { ExchangeFailedError, RefreshFailedError } from '../../utils/errors';

export interface OAuthEndpoints {
  authorizationEndpoint: string;
  tokenEndpoint: string;
  tokenEndpointAuthMethod: ClientAuthMethod;
}

export interface PKCEChallenge {
  codeVerifier: string;
  codeChallenge: string;
  method: 'S256';
}

export interface AuthorizationUrlParams {
  state: string;
  codeChallenge?: string;
  loginHint?: string;
  extraParams?: Record<string, string>;
}

/**
 * Authorization-code client for one provider. Endpoint and client
 * authentication details come from the owning adapter.
 */
export class OAuthClient {
  private client: Client;

  constructor(
    readonly providerId: ProviderId,
    private config: ProviderConfig,
    endpoints: OAuthEndpoints,
    private logger: Logger,
    private timeoutMs: number
  ) {
    const issuer = new Issuer({
      issuer: providerId,
      authorization_endpoint: config.authorizationEndpoint ?? endpoints.authorizationEndpoint,
      token_endpoint: config.tokenEndpoint ?? endpoints.tokenEndpoint,
      token_endpoint_auth_methods_supported: [endpoints.tokenEndpointAuthMethod],
    });

    this.client = new issuer.Client({
      client_id: config.clientId,
      client_secret: config.clientSecret,
      redirect_uris: [config.redirectUri],
      response_types: ['code'],
      token_endpoint_auth_method: endpoints.tokenEndpointAuthMethod,
    });

    // Bound every authorization-server call
    this.client[custom.http_options] = (_url, options) => ({ ...options, timeout: this.timeoutMs });
  }

  generateState(): string {
    return generators.state();
  }

  generatePKCE(): PKCEChallenge {
    const codeVerifier = generators.codeVerifier();
    return {
      codeVerifier,
      codeChallenge: generators.codeChallenge(codeVerifier),
      method: 'S256',
    };
  }

  authorizationUrl(params: AuthorizationUrlParams): string {
    const scope = this.config.scopes.length > 0 ? this.config.scopes.join(' ') : undefined;

    return this.client.authorizationUrl({
      scope,
      state: params.state,
      code_challenge: params.codeChallenge,
      code_challenge_method: params.codeChallenge ? 'S256' : undefined,
      login_hint: params.loginHint,
      ...params.extraParams,
    });
  }

  /**
   * Authorization codes are single-use: a failure here is never retried.
   */
  async exchangeCode(code: string, state: string, codeVerifier?: string): Promise<TokenSet> {
    try {
      const tokenSet = await this.client.oauthCallback(
        this.config.redirectUri,
        { code, state },
        { state, code_verifier: codeVerifier, response_type: 'code' }
      );

      this.logger.debug('Token exchange successful', {
        provider: this.providerId,
        hasRefreshToken: tokenSet.refresh_token !== undefined,
        tokenType: tokenSet.token_type,
        expiresIn: tokenSet.expires_in,
      });

      return tokenSet;
    } catch (error: unknown) {
      const providerError = error instanceof errors.OPError ? error.error : undefined;
      this.logger.error('Token exchange failed', {
        provider: this.providerId,
        providerError,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ExchangeFailedError('Failed to exchange authorization code', {
        provider: this.providerId,
        providerError,
        cause: error,
      });
    }
  }

  async refresh(refreshToken: string): Promise<TokenSet> {
    try {
      return await this.client.refresh(refreshToken);
    } catch (error: unknown) {
      const providerError = error instanceof errors.OPError ? error.error : undefined;
      this.logger.error('Token refresh failed', {
        provider: this.providerId,
        providerError,
        error: error instanceof Error ? error.message : String(error),
      });

      throw new RefreshFailedError(
        'Failed to refresh token',
        { provider: this.providerId, providerError, cause: error },
        providerError === 'invalid_grant'
      );
    }
  }
}
