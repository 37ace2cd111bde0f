// src/core/auth/types.ts

import type { ProviderId } from '../normalizer/types';

export interface ProviderConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scopes: string[];
  authorizationEndpoint?: string; // Override the adapter default
  tokenEndpoint?: string;
  usePKCE?: boolean;
  defaultTokenLifetimeSeconds?: number; // Used when the provider reports no expires_in
}

export interface AuthorizationState {
  stateToken: string;
  providerId: ProviderId;
  ownerContext: string;
  createdAt: Date;
  ttlMs: number;
  codeVerifier?: string; // PKCE
}

export interface AuthorizationRequest {
  url: string;
  stateToken: string;
}

export interface ConnectOptions {
  loginHint?: string;
  extraParams?: Record<string, string>;
}

export interface CallbackParams {
  code?: string;
  state?: string;
  error?: string;
  errorDescription?: string;
}

export type AuthorizationPhase =
  | 'INITIATED'
  | 'CALLBACK_RECEIVED'
  | 'STATE_VALIDATED'
  | 'EXCHANGED'
  | 'REJECTED';
