// src/adapters/notion/types.ts

import { z } from 'zod';

const RichTextSchema = z.object({ plain_text: z.string() }).passthrough();

const PropertySchema = z
  .object({
    type: z.string(),
    title: z.array(RichTextSchema).optional(),
  })
  .passthrough();

const ParentSchema = z
  .object({
    type: z.string(),
    page_id: z.string().optional(),
    database_id: z.string().optional(),
    block_id: z.string().optional(),
    workspace: z.boolean().optional(),
  })
  .passthrough();

export const NotionObjectSchema = z
  .object({
    object: z.enum(['page', 'database']),
    id: z.string(),
    url: z.string().optional(),
    created_time: z.string().optional(),
    last_edited_time: z.string().optional(),
    archived: z.boolean().optional(),
    parent: ParentSchema.optional(),
    // Databases carry their title at the top level, pages in a title-typed property
    title: z.array(RichTextSchema).optional(),
    properties: z.record(PropertySchema).optional(),
  })
  .passthrough();

export const NotionSearchPageSchema = z.object({
  results: z.array(NotionObjectSchema),
  has_more: z.boolean().optional(),
  next_cursor: z.string().nullish(),
});

export type NotionObject = z.infer<typeof NotionObjectSchema>;
export type NotionParent = z.infer<typeof ParentSchema>;
