// src/core/store/types.ts

export interface CredentialStoreConfig {
  backend: 'memory' | 'redis';
  url?: string;
  encryption?: {
    key: string;
    previousKeys?: string[];
    algorithm: 'aes-256-gcm';
  };
  operationTimeoutMs?: number; // Bound on every store call (default: 5000)
  stateTtlSeconds?: number; // Authorization window (default: 600)
}
