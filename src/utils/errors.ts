// src/utils/errors.ts

export class SDKError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// OAuth errors
export class OAuthError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'OAUTH_ERROR', details);
  }
}

export class OAuthConfigError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'OAUTH_CONFIG_ERROR';
  }
}

export class OAuthDeniedError extends OAuthError {
  constructor(message: string = 'User denied authorization', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'OAUTH_DENIED';
  }
}

/**
 * State token unknown, already consumed, expired, or issued for another
 * provider. The caller must restart authorization.
 */
export class InvalidStateError extends OAuthError {
  constructor(
    message: string = 'Invalid or expired state parameter',
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.code = 'INVALID_STATE';
  }
}

export class ExchangeFailedError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'EXCHANGE_FAILED';
  }
}

// Token errors
export class TokenError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TOKEN_ERROR', details);
  }
}

export class NotAuthorizedError extends TokenError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NOT_AUTHORIZED';
  }
}

export class NoRefreshTokenError extends TokenError {
  constructor(
    message: string = 'Token expired and no refresh token is available',
    details?: Record<string, unknown>
  ) {
    super(message, details);
    this.code = 'NO_REFRESH_TOKEN';
  }
}

export class RefreshFailedError extends TokenError {
  /**
   * `revoked` is set when the provider reported the refresh token itself as
   * invalid (`invalid_grant`); the stored credential is then unusable.
   */
  constructor(
    message: string,
    details?: Record<string, unknown>,
    public readonly revoked: boolean = false
  ) {
    super(message, details);
    this.code = 'REFRESH_FAILED';
  }
}

// API errors
export class ApiError extends SDKError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message: string = 'Access token rejected', details?: Record<string, unknown>) {
    super(message, 401, details);
    this.code = 'UNAUTHORIZED';
  }
}

export class RateLimitedError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfterMs?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfterMs });
    this.code = 'RATE_LIMITED';
  }
}

export class ProviderRequestError extends ApiError {
  constructor(message: string, status: number, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'PROVIDER_REQUEST_ERROR';
  }
}

// Transient errors (network, timeouts, provider 5xx)
export class TransientError extends SDKError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    public status?: number
  ) {
    super(message, 'TRANSIENT_ERROR', details);
  }
}

export class NetworkTimeoutError extends TransientError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class StoreTimeoutError extends TransientError {
  constructor(message: string = 'Credential store operation timed out', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'STORE_TIMEOUT';
  }
}

// Data errors
export class FetchFailedError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FETCH_FAILED', details);
  }
}

export class NormalizationError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NORMALIZATION_FAILED', details);
  }
}
