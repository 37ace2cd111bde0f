import { describe, it, expect } from 'vitest';
import {
  SDKError,
  OAuthError,
  InvalidStateError,
  ExchangeFailedError,
  OAuthDeniedError,
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
} from '../../src/utils/errors';

describe('errors', () => {
  it('should give InvalidStateError a default message and code', () => {
    const error = new InvalidStateError();

    expect(error).toBeInstanceOf(OAuthError);
    expect(error).toBeInstanceOf(SDKError);
    expect(error.message).toBe('Invalid or expired state parameter');
    expect(error.code).toBe('INVALID_STATE');
    expect(error.name).toBe('InvalidStateError');
  });

  it('should keep subclass codes for OAuth errors', () => {
    expect(new ExchangeFailedError('failed').code).toBe('EXCHANGE_FAILED');
    expect(new OAuthDeniedError().code).toBe('OAUTH_DENIED');
    expect(new OAuthDeniedError().message).toBe('User denied authorization');
  });

  it('should classify token errors', () => {
    expect(new NotAuthorizedError('none')).toBeInstanceOf(TokenError);
    expect(new NotAuthorizedError('none').code).toBe('NOT_AUTHORIZED');
    expect(new NoRefreshTokenError().code).toBe('NO_REFRESH_TOKEN');
    expect(new NoRefreshTokenError().message).toBe('Token expired and no refresh token is available');
  });

  it('should default RefreshFailedError to not revoked', () => {
    expect(new RefreshFailedError('failed').revoked).toBe(false);
    expect(new RefreshFailedError('failed', undefined, true).revoked).toBe(true);
    expect(new RefreshFailedError('failed').code).toBe('REFRESH_FAILED');
  });

  it('should carry status on API errors', () => {
    const unauthorized = new UnauthorizedError();
    expect(unauthorized).toBeInstanceOf(ApiError);
    expect(unauthorized.status).toBe(401);
    expect(unauthorized.code).toBe('UNAUTHORIZED');

    const notFound = new ProviderRequestError('Client error: 404', 404, { provider: 'notion' });
    expect(notFound.status).toBe(404);
    expect(notFound.details).toEqual({ provider: 'notion', status: 404 });
  });

  it('should carry the retry-after hint on RateLimitedError', () => {
    const error = new RateLimitedError('Rate limit exceeded', 1500, { provider: 'hubspot' });

    expect(error.code).toBe('RATE_LIMITED');
    expect(error.status).toBe(429);
    expect(error.retryAfterMs).toBe(1500);
    expect(error.details).toEqual({ provider: 'hubspot', retryAfterMs: 1500, status: 429 });
  });

  it('should treat timeouts as transient', () => {
    expect(new NetworkTimeoutError()).toBeInstanceOf(TransientError);
    expect(new NetworkTimeoutError().code).toBe('NETWORK_TIMEOUT');
    expect(new StoreTimeoutError()).toBeInstanceOf(TransientError);
    expect(new StoreTimeoutError().code).toBe('STORE_TIMEOUT');
    expect(new TransientError('Server error: 503', {}, 503).status).toBe(503);
  });

  it('should attach the cause to FetchFailedError', () => {
    const cause = new UnauthorizedError();
    const error = new FetchFailedError('Failed to fetch items from hubspot', { cause });

    expect(error.code).toBe('FETCH_FAILED');
    expect(error.details?.cause).toBe(cause);
  });
});
