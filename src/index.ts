// src/index.ts

export { IntegrationSDK } from './sdk';
export type { InitConfig, HealthStatus } from './sdk';
export { validateConfig, validateConfigSafe } from './config/ConfigValidator';
export { PROVIDER_IDS } from './core/normalizer/types';
export type { ProviderId, IntegrationItem } from './core/normalizer/types';
export type { TokenRecord } from './core/token/types';
export type {
  AuthorizationState,
  CallbackParams,
  ConnectOptions,
  ProviderConfig,
} from './core/auth/types';
export type { ProviderAdapter, FetchParams, AdapterDeps } from './adapters/types';
export { BaseAdapter } from './adapters/BaseAdapter';
export { RetryBudget } from './core/http/RetryHandler';
export { HubSpotAdapter } from './adapters/hubspot/HubSpotAdapter';
export { AirtableAdapter } from './adapters/airtable/AirtableAdapter';
export { NotionAdapter } from './adapters/notion/NotionAdapter';

// Error classes for error handling
export {
  SDKError,
  OAuthError,
  OAuthConfigError,
  OAuthDeniedError,
  InvalidStateError,
  ExchangeFailedError,
  TokenError,
  NotAuthorizedError,
  NoRefreshTokenError,
  RefreshFailedError,
  ApiError,
  UnauthorizedError,
  RateLimitedError,
  ProviderRequestError,
  TransientError,
  NetworkTimeoutError,
  StoreTimeoutError,
  FetchFailedError,
  NormalizationError,
} from './utils/errors';
