// src/adapters/hubspot/types.ts

import { z } from 'zod';

const nullableString = z.string().nullish();

export const HubSpotContactSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    properties: z.record(nullableString).default({}),
    createdAt: z.string().optional(),
    updatedAt: z.string().optional(),
    archived: z.boolean().optional(),
  })
  .passthrough();

export const HubSpotContactsPageSchema = z.object({
  results: z.array(HubSpotContactSchema),
  paging: z
    .object({
      next: z.object({ after: z.string() }).passthrough().optional(),
    })
    .passthrough()
    .optional(),
});

export type HubSpotContact = z.infer<typeof HubSpotContactSchema>;
