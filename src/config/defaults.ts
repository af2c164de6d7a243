/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

/**
 * Default configuration
 * Local-first: Ollama embeddings, index under ~/.hix
 */
export const DEFAULT_CONFIG: Config = {
  embedding: {
    provider: 'ollama',
    model: 'nomic-embed-text',
    timeout_ms: 120000,
  },

  // ~500 tokens leaves room for several chunks in a prompt context
  chunking: {
    target_tokens: 500,
    overlap_tokens: 50,
  },

  batching: {
    batch_token_budget: 4000,
    max_single_chunk_tokens: 4500,
  },

  retry: {
    max_attempts: 5,
    base_delay_ms: 1000,
    max_delay_ms: 60000,
  },

  search: {
    top_k: 5,
    query_token_ceiling: 7000,
    vector_weight: 1,
    lexical_weight: 1,
    normalize_scores: true,
  },

  indexing: {
    index_dir: '~/.hix/index',
    checkpoint_dir: '~/.hix/checkpoints',
    ignore_patterns: [],
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.hix/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# Hybrid Index Configuration
# Location: ~/.hix/config.toml (set HIX_HOME to move it)

# Embedding Settings
# provider = "ollama" uses OLLAMA_HOST; provider = "openai" uses OPENAI_API_KEY
# and OPENAI_BASE_URL for any OpenAI-compatible /embeddings endpoint.
# An index must be queried with the model that built it.
[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}
# base_url = "http://localhost:11434"

# Chunking (estimated tokens)
[chunking]
target_tokens = ${DEFAULT_CONFIG.chunking.target_tokens}
overlap_tokens = ${DEFAULT_CONFIG.chunking.overlap_tokens}

# Embedding request batching (estimated tokens)
[batching]
batch_token_budget = ${DEFAULT_CONFIG.batching.batch_token_budget}
max_single_chunk_tokens = ${DEFAULT_CONFIG.batching.max_single_chunk_tokens}

# Retry policy for rate limits and transient provider errors
[retry]
max_attempts = ${DEFAULT_CONFIG.retry.max_attempts}
base_delay_ms = ${DEFAULT_CONFIG.retry.base_delay_ms}
max_delay_ms = ${DEFAULT_CONFIG.retry.max_delay_ms}

# Hybrid search
[search]
top_k = ${DEFAULT_CONFIG.search.top_k}
query_token_ceiling = ${DEFAULT_CONFIG.search.query_token_ceiling}
vector_weight = ${DEFAULT_CONFIG.search.vector_weight}
lexical_weight = ${DEFAULT_CONFIG.search.lexical_weight}
normalize_scores = ${DEFAULT_CONFIG.search.normalize_scores}

# Index and checkpoint locations
# Additional gitignore-style patterns are merged with .gitignore and built-in defaults
[indexing]
index_dir = "${DEFAULT_CONFIG.indexing.index_dir}"
checkpoint_dir = "${DEFAULT_CONFIG.indexing.checkpoint_dir}"
# ignore_patterns = ["*.tmp", "scratch/"]
`;
