// src/core/token/types.ts

import type { ProviderId } from '../normalizer/types';

export interface TokenRecord {
  providerId: ProviderId;
  ownerContext: string;
  accessToken: string;
  refreshToken?: string;
  expiresAt: Date;
  scopes: string[];
  tokenType?: string;
  updatedAt: Date;
}

export interface RefreshConfig {
  marginSeconds?: number; // Refresh when expiring within this window (default: 300)
  lockTtlMs?: number; // Distributed lock lifetime (default: 10000)
  lockWaitMs?: number; // Max wait for another instance's refresh (default: 5000)
}

export interface RefreshOptions {
  /**
   * Access token the provider just rejected. Forces a refresh unless the
   * stored record already carries a different access token.
   */
  rejectedAccessToken?: string;
}
