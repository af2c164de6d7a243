/**
 * Embedding provider tests
 *
 * fetch is replaced by a vi.fn() returning canned Responses; nothing
 * leaves the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';

import { OllamaEmbeddingProvider } from '../ollama.js';
import { OpenAIEmbeddingProvider } from '../openai.js';
import { createEmbeddingProvider } from '../provider.js';
import { parseRetryAfter } from '../http.js';
import { _clearEnvCache } from '../../../config/env.js';
import {
  APIKeyError,
  EmbeddingFatalError,
  EmbeddingRateLimitedError,
  EmbeddingTransientError,
} from '../../../errors/index.js';

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

function requestAt(fetchMock: Mock<typeof fetch>, call: number) {
  const [url, init] = fetchMock.mock.calls[call] ?? [];
  const body: unknown = JSON.parse(String(init?.body));
  return { url: String(url), body, headers: init?.headers };
}

describe('OllamaEmbeddingProvider', () => {
  let fetchMock: Mock<typeof fetch>;
  let provider: OllamaEmbeddingProvider;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    provider = new OllamaEmbeddingProvider({
      model: 'nomic-embed-text',
      baseUrl: 'http://localhost:11434/',
      timeoutMs: 5000,
      fetch: fetchMock,
    });
  });

  it('posts the batch to /api/embed', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ embeddings: [[1, 2], [3, 4]] }));

    await expect(provider.embedBatch(['a', 'b'])).resolves.toEqual([
      [1, 2],
      [3, 4],
    ]);
    expect(requestAt(fetchMock, 0)).toMatchObject({
      url: 'http://localhost:11434/api/embed',
      body: { model: 'nomic-embed-text', input: ['a', 'b'] },
    });
  });

  it('sends nothing for an empty batch', async () => {
    await expect(provider.embedBatch([])).resolves.toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('falls back to /api/embeddings when /api/embed is missing', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('404 page not found', { status: 404 }))
      .mockResolvedValueOnce(jsonResponse({ embedding: [1, 0] }))
      .mockResolvedValueOnce(jsonResponse({ embedding: [0, 1] }))
      .mockResolvedValueOnce(jsonResponse({ embedding: [1, 1] }));

    await expect(provider.embedBatch(['a', 'b'])).resolves.toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(requestAt(fetchMock, 1)).toMatchObject({
      url: 'http://localhost:11434/api/embeddings',
      body: { model: 'nomic-embed-text', prompt: 'a' },
    });

    // Later batches go straight to the legacy endpoint
    await expect(provider.embedBatch(['c'])).resolves.toEqual([[1, 1]]);
    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(requestAt(fetchMock, 3).url).toBe('http://localhost:11434/api/embeddings');
  });

  it('reports a missing model as fatal', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ error: 'model "nomic-embed-text" not found, try pulling it first' }, 404)
    );

    await expect(provider.embedBatch(['a'])).rejects.toThrow(
      "Ollama model 'nomic-embed-text' not found. Pull it first: ollama pull nomic-embed-text"
    );
  });

  it('maps 5xx to a transient error', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'overloaded' }, 503));

    const error = await provider.embedBatch(['a']).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(EmbeddingTransientError);
    expect(error).toHaveProperty('message', 'Ollama /api/embed failed (503): overloaded');
  });

  it('maps 429 to a rate-limited error with retry-after', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'busy' }, 429, { 'Retry-After': '3' }));

    const error = await provider.embedBatch(['a']).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(EmbeddingRateLimitedError);
    expect(error).toHaveProperty('retryAfterMs', 3000);
  });

  it('maps other 4xx to a fatal error', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'invalid input' }, 400));

    await expect(provider.embedBatch(['a'])).rejects.toBeInstanceOf(EmbeddingFatalError);
  });

  it('rejects a malformed response as fatal', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ embeddings: 'nope' }));

    const error = await provider.embedBatch(['a']).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(EmbeddingFatalError);
    expect(String(error)).toContain('Ollama /api/embed returned a malformed response');
  });

  it('maps a connection failure to a transient error', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    const error = await provider.embedBatch(['a']).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(EmbeddingTransientError);
    expect(error).toHaveProperty('message', 'Ollama /api/embed unreachable: fetch failed');
  });
});

describe('OpenAIEmbeddingProvider', () => {
  let fetchMock: Mock<typeof fetch>;
  let provider: OpenAIEmbeddingProvider;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    provider = new OpenAIEmbeddingProvider({
      model: 'text-embedding-3-small',
      apiKey: 'test-secret',
      baseUrl: 'https://api.example.test/v1',
      timeoutMs: 5000,
      fetch: fetchMock,
    });
  });

  it('authenticates and restores input order', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] },
        ],
      })
    );

    await expect(provider.embedBatch(['first', 'second'])).resolves.toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(requestAt(fetchMock, 0)).toEqual({
      url: 'https://api.example.test/v1/embeddings',
      body: { model: 'text-embedding-3-small', input: ['first', 'second'] },
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
    });
  });

  it('reads the nested error message', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: { message: 'Invalid API key' } }, 401));

    await expect(provider.embedBatch(['a'])).rejects.toThrow(
      'https://api.example.test/v1/embeddings failed (401): Invalid API key'
    );
  });

  it('rejects a response missing an input', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ data: [{ index: 0, embedding: [1] }] }));

    await expect(provider.embedBatch(['a', 'b'])).rejects.toThrow(
      'https://api.example.test/v1/embeddings returned no embedding for input 1'
    );
  });

  it('rejects an out-of-range index', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ data: [{ index: 5, embedding: [1] }] }));

    await expect(provider.embedBatch(['a'])).rejects.toBeInstanceOf(EmbeddingFatalError);
  });
});

describe('parseRetryAfter', () => {
  it('reads delta-seconds', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter('1.5')).toBe(1500);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:30 GMT', now)).toBe(30000);
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:27:00 GMT', now)).toBe(0);
  });

  it('ignores missing or unreadable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
    expect(parseRetryAfter('-1')).toBeUndefined();
  });
});

describe('createEmbeddingProvider', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.stubEnv('OPENAI_API_KEY', '');
    vi.stubEnv('OPENAI_BASE_URL', '');
    vi.stubEnv('OLLAMA_HOST', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  it('creates an Ollama provider against OLLAMA_HOST', async () => {
    vi.stubEnv('OLLAMA_HOST', 'http://gpu-box:11434');
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockResolvedValueOnce(jsonResponse({ embeddings: [[1]] }));

    const provider = createEmbeddingProvider(
      { provider: 'ollama', model: 'nomic-embed-text', timeout_ms: 1000 },
      { fetch: fetchMock }
    );
    await provider.embedBatch(['a']);

    expect(provider).toBeInstanceOf(OllamaEmbeddingProvider);
    expect(provider.model).toBe('nomic-embed-text');
    expect(requestAt(fetchMock, 0).url).toBe('http://gpu-box:11434/api/embed');
  });

  it('lets base_url override the environment', async () => {
    vi.stubEnv('OLLAMA_HOST', 'http://gpu-box:11434');
    const fetchMock = vi.fn<typeof fetch>();
    fetchMock.mockResolvedValueOnce(jsonResponse({ embeddings: [[1]] }));

    const provider = createEmbeddingProvider(
      {
        provider: 'ollama',
        model: 'nomic-embed-text',
        base_url: 'http://127.0.0.1:9999',
        timeout_ms: 1000,
      },
      { fetch: fetchMock }
    );
    await provider.embedBatch(['a']);

    expect(requestAt(fetchMock, 0).url).toBe('http://127.0.0.1:9999/api/embed');
  });

  it('requires OPENAI_API_KEY for the openai provider', () => {
    expect(() =>
      createEmbeddingProvider({ provider: 'openai', model: 'text-embedding-3-small', timeout_ms: 1000 })
    ).toThrow(APIKeyError);
  });

  it('creates an OpenAI provider when the key is set', () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');

    const provider = createEmbeddingProvider({
      provider: 'openai',
      model: 'text-embedding-3-small',
      timeout_ms: 1000,
    });

    expect(provider).toBeInstanceOf(OpenAIEmbeddingProvider);
    expect(provider.name).toBe('openai');
  });
});
