// src/core/auth/AuthorizationOrchestrator.ts

import type { ProviderAdapter } from '../../adapters/types';
import type { ProviderId } from '../normalizer/types';
import type { TokenRecord } from '../token/types';
import type { CredentialStore } from '../store/CredentialStore';
import type { AdapterLookup } from '../fetch/DataFetcher';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import type { AuthorizationPhase, CallbackParams, ConnectOptions } from './types';
import { addSpanEvent, withOAuthSpan } from '../../observability/tracing';
import {
  ExchangeFailedError,
  InvalidStateError,
  OAuthConfigError,
  OAuthDeniedError,
} from '../../utils/errors';

/**
 * Drives one authorization attempt:
 * INITIATED → CALLBACK_RECEIVED → STATE_VALIDATED → EXCHANGED | REJECTED.
 *
 * The state token is consumed before anything else happens on callback, so a
 * replayed or forged callback never reaches the provider.
 */
export class AuthorizationOrchestrator {
  constructor(
    private adapters: AdapterLookup,
    private store: CredentialStore,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {}

  async initiate(
    providerId: ProviderId,
    ownerContext: string,
    opts?: ConnectOptions
  ): Promise<string> {
    const adapter = this.adapterFor(providerId);
    const { url } = await adapter.buildAuthorizationUrl(ownerContext, opts);

    this.transition(providerId, 'INITIATED', { ownerContext });
    return url;
  }

  async handleCallback(providerId: ProviderId, params: CallbackParams): Promise<TokenRecord> {
    const adapter = this.adapterFor(providerId);
    this.transition(providerId, 'CALLBACK_RECEIVED');

    if (!params.state) {
      throw this.reject(providerId, new InvalidStateError('Callback is missing the state parameter'));
    }

    const state = await this.store.consumeState(params.state);
    if (!state) {
      throw this.reject(providerId, new InvalidStateError());
    }
    if (state.providerId !== providerId) {
      throw this.reject(
        providerId,
        new InvalidStateError('State was issued for a different provider', {
          provider: providerId,
          stateProvider: state.providerId,
        })
      );
    }

    const { ownerContext } = state;
    this.transition(providerId, 'STATE_VALIDATED', { ownerContext });

    if (params.error) {
      throw this.reject(
        providerId,
        new OAuthDeniedError(params.errorDescription ?? 'User denied authorization', {
          provider: providerId,
          providerError: params.error,
        }),
        ownerContext
      );
    }
    if (!params.code) {
      throw this.reject(
        providerId,
        new ExchangeFailedError('Callback is missing the authorization code', { provider: providerId }),
        ownerContext
      );
    }
    const { code } = params;

    return withOAuthSpan('callback', providerId, ownerContext, async () => {
      let record: TokenRecord;
      try {
        record = await adapter.exchangeCode(code, state);
      } catch (error: unknown) {
        this.transition(providerId, 'REJECTED', { ownerContext });
        throw error;
      }

      await this.store.saveToken(record);
      this.transition(providerId, 'EXCHANGED', { ownerContext });
      return record;
    });
  }

  private adapterFor(providerId: ProviderId): ProviderAdapter {
    const adapter = this.adapters(providerId);
    if (!adapter) {
      throw new OAuthConfigError(`Provider not configured: ${providerId}`, { provider: providerId });
    }
    return adapter;
  }

  private reject(providerId: ProviderId, error: Error, ownerContext?: string): Error {
    this.transition(providerId, 'REJECTED', { ownerContext, reason: error.message });
    return error;
  }

  private transition(
    providerId: ProviderId,
    phase: AuthorizationPhase,
    context: { ownerContext?: string; reason?: string } = {}
  ): void {
    this.metrics.incrementCounter('authorization_transitions', { provider: providerId, phase });
    addSpanEvent('authorization.phase', { 'provider.id': providerId, phase });

    const meta = { provider: providerId, phase, ...context };
    if (phase === 'REJECTED') {
      this.logger.warn('Authorization rejected', meta);
    } else {
      this.logger.info('Authorization phase', meta);
    }
  }
}
