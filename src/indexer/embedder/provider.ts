/**
 * Embedding Provider Factory
 *
 * Creates the provider named in the [embedding] section of config.toml:
 * - ollama: local server at OLLAMA_HOST (default localhost:11434)
 * - openai: any OpenAI-compatible /embeddings API at OPENAI_BASE_URL
 *
 * `embedding.base_url` overrides the environment for either provider.
 */

import { getEnv, getOllamaHost } from '../../config/env.js';
import { APIKeyError } from '../../errors/index.js';
import { OllamaEmbeddingProvider } from './ollama.js';
import { OpenAIEmbeddingProvider } from './openai.js';
import type { EmbeddingConfig, EmbeddingProvider, ProviderOptions } from './types.js';

/**
 * Create an embedding provider from configuration.
 *
 * No request is made here; an unreachable server surfaces on the first
 * batch, where the retry policy applies.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const provider = createEmbeddingProvider(config.embedding);
 * const [vector] = await provider.embedBatch(['Hello, world!']);
 * ```
 *
 * @throws APIKeyError if the openai provider is selected without OPENAI_API_KEY
 */
export function createEmbeddingProvider(
  config: EmbeddingConfig,
  options: ProviderOptions = {}
): EmbeddingProvider {
  switch (config.provider) {
    case 'ollama':
      return new OllamaEmbeddingProvider({
        model: config.model,
        baseUrl: config.base_url ?? getOllamaHost(),
        timeoutMs: config.timeout_ms,
        logger: options.logger,
        fetch: options.fetch,
      });

    case 'openai': {
      const apiKey = getEnv('OPENAI_API_KEY');
      if (!apiKey) {
        throw new APIKeyError('OpenAI');
      }
      return new OpenAIEmbeddingProvider({
        model: config.model,
        apiKey,
        baseUrl: config.base_url ?? getEnv('OPENAI_BASE_URL'),
        timeoutMs: config.timeout_ms,
        fetch: options.fetch,
      });
    }
  }
}
