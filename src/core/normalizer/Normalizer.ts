// src/core/normalizer/Normalizer.ts

import { z } from 'zod';
import type { IntegrationItem, ProviderId } from './types';
import { NormalizationError } from '../../utils/errors';

export const IntegrationItemSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  email: z.string().optional(),
  type: z.string().min(1),
  metadata: z.record(z.string()),
});

/**
 * Applies an adapter's `normalize` to every raw record and validates the
 * result against the canonical item shape. Output order follows input order.
 */
export class Normalizer {
  normalize<TRaw>(
    providerId: ProviderId,
    rawRecords: TRaw[],
    mapper: (raw: TRaw) => IntegrationItem
  ): IntegrationItem[] {
    return rawRecords.map((raw, index) => {
      const item = mapper(raw);

      const parsed = IntegrationItemSchema.safeParse(item);
      if (!parsed.success) {
        throw new NormalizationError(`Schema validation failed for ${providerId}`, {
          provider: providerId,
          index,
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
      }

      return item;
    });
  }
}
