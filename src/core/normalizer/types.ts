// src/core/normalizer/types.ts

export const PROVIDER_IDS = ['hubspot', 'airtable', 'notion'] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

/**
 * Canonical, provider-agnostic record returned to the presentation layer.
 * Two items with the same provider and `id` refer to the same provider object.
 */
export interface IntegrationItem {
  id: string; // Provider-native identifier, stringified
  name: string;
  email?: string;
  type: string; // 'contact', 'base', 'table', 'page', 'database'
  metadata: Record<string, string>;
}
