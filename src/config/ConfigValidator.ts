// src/config/ConfigValidator.ts

import { z } from 'zod';

// Credential Store Configuration Schema
const CredentialStoreConfigSchema = z
  .object({
    backend: z.enum(['memory', 'redis'], {
      errorMap: () => ({ message: "Credential store backend must be 'memory' or 'redis'" }),
    }),
    url: z.string().url().optional(),
    encryption: z
      .object({
        key: z
          .string()
          .length(64, 'Encryption key must be exactly 64 characters')
          .regex(
            /^[0-9a-f]{64}$/i,
            'Encryption key must be a valid 32-byte hexadecimal string (0-9, a-f)'
          ),
        previousKeys: z.array(z.string().regex(/^[0-9a-f]{64}$/i)).optional(),
        algorithm: z.literal('aes-256-gcm'),
      })
      .optional(),
    operationTimeoutMs: z.number().int().positive().optional(),
    stateTtlSeconds: z.number().int().min(60).max(3600).optional(),
  })
  .refine((data) => data.backend === 'memory' || data.url !== undefined, {
    message: "Redis backend requires 'url' configuration",
    path: ['url'],
  });

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    maxTransientRetries: z.number().int().min(0).max(2).optional(),
    maxRateLimitRetries: z.number().int().min(0).max(1).optional(),
    baseDelay: z.number().positive().optional(),
    maxDelay: z.number().positive().optional(),
    maxRetryAfter: z.number().positive().optional(),
  })
  .refine(
    (data) =>
      data.baseDelay === undefined || data.maxDelay === undefined || data.maxDelay >= data.baseDelay,
    { message: 'maxDelay must be greater than or equal to baseDelay' }
  );

// Rate Limit Configuration Schema
const RateLimitConfigSchema = z.object({
  qps: z.number().positive(),
  concurrency: z.number().int().positive(),
});

// Provider Configuration Schema
const ProviderConfigSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  redirectUri: z.string().url(),
  scopes: z.array(z.string().min(1)),
  authorizationEndpoint: z.string().url().optional(),
  tokenEndpoint: z.string().url().optional(),
  usePKCE: z.boolean().optional(),
  defaultTokenLifetimeSeconds: z.number().int().positive().optional(),
});

const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

const RefreshConfigSchema = z
  .object({
    marginSeconds: z.number().int().min(0).max(3600).optional(),
    lockTtlMs: z.number().int().positive().optional(),
    lockWaitMs: z.number().int().positive().optional(),
  })
  .optional();

export const InitConfigSchema = z.object({
  credentialStore: CredentialStoreConfigSchema,
  http: z
    .object({
      timeout: z.number().positive().optional(),
      retry: RetryConfigSchema.optional(),
    })
    .optional(),
  rateLimits: z
    .object({
      hubspot: RateLimitConfigSchema.optional(),
      airtable: RateLimitConfigSchema.optional(),
      notion: RateLimitConfigSchema.optional(),
    })
    .optional(),
  providers: z
    .object({
      hubspot: ProviderConfigSchema.optional(),
      airtable: ProviderConfigSchema.optional(),
      notion: ProviderConfigSchema.optional(),
    })
    .refine((providers) => Object.values(providers).some((value) => value !== undefined), {
      message: 'At least one provider must be configured',
    }),
  refresh: RefreshConfigSchema,
  oauthTimeoutMs: z.number().int().positive().optional(),
  metrics: MetricsConfigSchema,
  logging: LoggerConfigSchema,
});

export type InitConfig = z.input<typeof InitConfigSchema>;
export type ValidatedConfig = z.output<typeof InitConfigSchema>;

/**
 * Validate broker initialization configuration
 *
 * @throws {z.ZodError} If configuration is invalid
 */
export function validateConfig(config: unknown): ValidatedConfig {
  return InitConfigSchema.parse(config);
}

export type ConfigValidationResult =
  | { success: true; data: ValidatedConfig }
  | { success: false; errors: string[] };

/**
 * Validate configuration and return readable errors instead of throwing
 */
export function validateConfigSafe(config: unknown): ConfigValidationResult {
  const result = InitConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
