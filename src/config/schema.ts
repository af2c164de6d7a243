/**
 * Configuration Schema
 *
 * Defines the shape of ~/.hix/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Embedding provider configuration
 */
export const EmbeddingConfigSchema = z.object({
  provider: z
    .enum(['ollama', 'openai'])
    .describe('Embedding provider (ollama for local models, openai for any OpenAI-compatible /embeddings API)'),
  model: z.string().min(1).describe('Embedding model name'),
  base_url: z
    .string()
    .url()
    .optional()
    .describe('Override the provider endpoint (defaults to OLLAMA_HOST / OPENAI_BASE_URL)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .default(120000)
    .describe('Timeout in milliseconds for one embedding request (1000-600000)'),
});

/**
 * Structural chunker budgets, in estimated tokens
 */
export const ChunkingConfigSchema = z.object({
  target_tokens: z
    .number()
    .int()
    .min(16)
    .max(8000)
    .describe('Target chunk size; no chunk exceeds twice this'),
  overlap_tokens: z
    .number()
    .int()
    .min(0)
    .max(4000)
    .describe('Trailing lines of a chunk repeated at the start of the next'),
});

/**
 * Embedding request batching
 */
export const BatchingConfigSchema = z.object({
  batch_token_budget: z
    .number()
    .int()
    .min(1)
    .describe('Estimated tokens per embedding request'),
  max_single_chunk_tokens: z
    .number()
    .int()
    .min(1)
    .describe('Chunks above this are truncated before embedding'),
});

/**
 * Retry policy for rate-limited and transient provider errors
 */
export const RetryConfigSchema = z.object({
  max_attempts: z.number().int().min(1).max(20).describe('Attempts per batch, including the first'),
  base_delay_ms: z.number().int().min(0).describe('First back-off delay; doubles per attempt'),
  max_delay_ms: z.number().int().min(0).describe('Upper bound for a single back-off delay'),
});

/**
 * Search configuration
 * Controls how hybrid search ranks chunks
 */
export const SearchConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100).describe('Number of results to return'),
  query_token_ceiling: z
    .number()
    .int()
    .min(1)
    .describe('Queries longer than this are truncated before embedding'),
  vector_weight: z.number().min(0).describe('Weight of the vector similarity score'),
  lexical_weight: z.number().min(0).describe('Weight of the BM25 score'),
  normalize_scores: z
    .boolean()
    .describe('Scale both scores to [0, 1] by their maximum before summing'),
});

/**
 * Indexing configuration
 * Where the index and checkpoints live, and what the scanner skips
 */
export const IndexingConfigSchema = z.object({
  index_dir: z.string().describe('Directory holding index.vec and index.meta.json'),
  checkpoint_dir: z.string().describe('Directory holding in-flight embedding checkpoints'),
  ignore_patterns: z
    .array(z.string())
    .optional()
    .describe('Additional gitignore-style patterns to ignore during indexing'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  embedding: EmbeddingConfigSchema,
  chunking: ChunkingConfigSchema,
  batching: BatchingConfigSchema,
  retry: RetryConfigSchema,
  search: SearchConfigSchema,
  indexing: IndexingConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
