/**
 * Metadata File Schema
 *
 * zod schemas for `index.meta.json`, checked on every load. The file is
 * JSON so it can be inspected by hand; it is only valid next to the
 * `index.vec` it was written with.
 */

import { z } from 'zod';

/** Bumped when either persisted file changes shape */
export const INDEX_FORMAT_VERSION = 2;

const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

export const ChunkMetadataSchema = z.object({
  sourceId: z.string(),
  documentType: z.enum(['code', 'sql', 'spreadsheet_sheet', 'generic_text', 'manual_note']),
  chunkId: z.string(),
  text: z.string(),
  tokenCount: z.number().int().nonnegative(),
  startOffset: z.number().int().nonnegative(),
  endOffset: z.number().int().nonnegative(),
  startLine: z.number().int().positive(),
  endLine: z.number().int().positive(),
  overlapLength: z.number().int().nonnegative(),
  attributes: z.record(AttributeValueSchema),
});

export const MetadataFileSchema = z.object({
  version: z.literal(INDEX_FORMAT_VERSION),
  /** Matches the id in the index.vec header written alongside */
  writeId: z.string().regex(/^[0-9a-f]{16}$/),
  model: z.string(),
  dimensions: z.number().int().positive(),
  entries: z.array(ChunkMetadataSchema),
});

export type MetadataFile = z.infer<typeof MetadataFileSchema>;
