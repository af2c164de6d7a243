/**
 * Environment Variable Handler Tests
 *
 * Uses vi.stubEnv() for safe environment variable mocking.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadEnv, getEnv, hasApiKey, getOllamaHost, _clearEnvCache } from '../env.js';

describe('Environment Variable Loading', () => {
  beforeEach(() => {
    _clearEnvCache();
    // Start from a known state regardless of the developer's shell or .env
    vi.stubEnv('OPENAI_API_KEY', '');
    vi.stubEnv('OPENAI_BASE_URL', '');
    vi.stubEnv('OLLAMA_HOST', '');
    vi.stubEnv('HIX_HOME', '');
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  describe('loadEnv()', () => {
    it('applies defaults for endpoints', () => {
      const env = loadEnv();

      expect(env.OLLAMA_HOST).toBe('http://localhost:11434');
      expect(env.OPENAI_BASE_URL).toBe('https://api.openai.com/v1');
      expect(env.OPENAI_API_KEY).toBeUndefined();
      expect(env.HIX_HOME).toBeUndefined();
    });

    it('uses values when set', () => {
      vi.stubEnv('OLLAMA_HOST', 'http://192.168.1.100:11434');
      vi.stubEnv('HIX_HOME', '/srv/hix');

      expect(getOllamaHost()).toBe('http://192.168.1.100:11434');
      expect(getEnv('HIX_HOME')).toBe('/srv/hix');
    });

    it('caches values after first load', () => {
      vi.stubEnv('OLLAMA_HOST', 'http://first:11434');
      loadEnv();
      vi.stubEnv('OLLAMA_HOST', 'http://second:11434');

      expect(getOllamaHost()).toBe('http://first:11434');

      _clearEnvCache();
      expect(getOllamaHost()).toBe('http://second:11434');
    });
  });

  describe('hasApiKey()', () => {
    it('returns true when the key exists', () => {
      vi.stubEnv('OPENAI_API_KEY', 'test-secret');

      expect(hasApiKey()).toBe(true);
    });

    it('returns false when missing or whitespace', () => {
      expect(hasApiKey()).toBe(false);

      _clearEnvCache();
      vi.stubEnv('OPENAI_API_KEY', '   ');
      expect(hasApiKey()).toBe(false);
    });
  });
});
