/**
 * Environment Variable Handler
 *
 * Loads provider endpoints and API keys, and the HIX_HOME override.
 * Supports .env files for local development via dotenv.
 *
 * Keys are never logged or included in error messages; only their
 * presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Environment variable schema.
 * Keys are optional at load time; a provider checks for its key when created.
 */
export const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().default('https://api.openai.com/v1'),
  OLLAMA_HOST: z.string().default('http://localhost:11434'),
  HIX_HOME: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Cleared with _clearEnvCache() in tests.
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 * Empty strings count as unset.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const read = (key: keyof EnvVars): string | undefined => {
    const value = process.env[key]?.trim();
    return value ? value : undefined;
  };

  _envCache = EnvSchema.parse({
    OPENAI_API_KEY: read('OPENAI_API_KEY'),
    OPENAI_BASE_URL: read('OPENAI_BASE_URL'),
    OLLAMA_HOST: read('OLLAMA_HOST'),
    HIX_HOME: read('HIX_HOME'),
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check if the OpenAI API key is configured, without exposing it.
 */
export function hasApiKey(): boolean {
  return Boolean(loadEnv().OPENAI_API_KEY);
}

/**
 * Get the Ollama host URL (default http://localhost:11434).
 */
export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Provider-specific setup instructions, shown by `hix config check`
 * when the configured provider is missing something.
 */
export const SETUP_INSTRUCTIONS: Record<'ollama' | 'openai', string> = {
  ollama: `
To embed with Ollama (local models):

1. Install Ollama from https://ollama.com/ and start it:

   ollama serve

2. Pull the embedding model:

   ollama pull nomic-embed-text

3. (Optional) Point at another host:

   export OLLAMA_HOST="http://localhost:11434"
`.trim(),

  openai: `
To embed with an OpenAI-compatible API:

1. Set the API key (or put it in a .env file):

   export OPENAI_API_KEY="<your key>"

2. (Optional) Use another OpenAI-compatible endpoint:

   export OPENAI_BASE_URL="https://api.example.com/v1"

3. Choose the model:

   hix config set embedding.model text-embedding-3-small
`.trim(),
};
