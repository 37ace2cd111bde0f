// src/adapters/airtable/types.ts

import { z } from 'zod';

export const AirtableBaseSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    permissionLevel: z.string().optional(),
  })
  .passthrough();

export const AirtableBasesPageSchema = z.object({
  bases: z.array(AirtableBaseSchema),
  offset: z.string().optional(),
});

export const AirtableTableSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    primaryFieldId: z.string().optional(),
    description: z.string().optional(),
    fields: z.array(z.object({ id: z.string() }).passthrough()).optional(),
  })
  .passthrough();

export const AirtableTablesResponseSchema = z.object({
  tables: z.array(AirtableTableSchema),
});

export type AirtableBase = z.infer<typeof AirtableBaseSchema>;
export type AirtableTable = z.infer<typeof AirtableTableSchema>;

/**
 * Bases and tables come from different endpoints; each raw record carries
 * which one it is.
 */
export type AirtableRecord =
  | { kind: 'base'; base: AirtableBase }
  | { kind: 'table'; base: AirtableBase; table: AirtableTable };
