/**
 * Ollama embedding provider
 *
 * Uses the batch endpoint `/api/embed`. Servers older than 0.3 answer it
 * with 404; for those we fall back to `/api/embeddings`, one text per
 * request.
 */

import { z } from 'zod';

import { EmbeddingFatalError } from '../../errors/index.js';
import type { Logger } from '../../utils/index.js';
import { postJson, raiseForStatus, readJson } from './http.js';
import type { EmbeddingProvider } from './types.js';

const EmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

const LegacyEmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
});

export interface OllamaProviderOptions {
  model: string;
  /** Server root, e.g. http://localhost:11434 */
  baseUrl: string;
  timeoutMs: number;
  logger?: Logger;
  fetch?: typeof fetch;
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'ollama';
  readonly model: string;

  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private readonly fetchImpl?: typeof fetch;
  /** Set once the server has answered /api/embed with 404 */
  private legacyOnly = false;

  constructor(options: OllamaProviderOptions) {
    this.model = options.model;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.fetchImpl = options.fetch;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    if (this.legacyOnly) {
      return this.embedOneByOne(texts);
    }

    const response = await postJson(
      `${this.baseUrl}/api/embed`,
      { model: this.model, input: texts },
      { label: 'Ollama /api/embed', timeoutMs: this.timeoutMs, fetch: this.fetchImpl }
    );

    if (response.status === 404) {
      // Drain the body before switching endpoints
      const body = await response.text();
      if (/model .*not found/i.test(body)) {
        throw new EmbeddingFatalError(
          `Ollama model '${this.model}' not found. Pull it first: ollama pull ${this.model}`
        );
      }
      this.logger?.debug?.('Ollama /api/embed not available, using /api/embeddings');
      this.legacyOnly = true;
      return this.embedOneByOne(texts);
    }

    await raiseForStatus(response, 'Ollama /api/embed');
    const data = await readJson(response, EmbedResponseSchema, 'Ollama /api/embed');
    return data.embeddings;
  }

  private async embedOneByOne(texts: string[]): Promise<number[][]> {
    const output: number[][] = [];

    for (const text of texts) {
      const response = await postJson(
        `${this.baseUrl}/api/embeddings`,
        { model: this.model, prompt: text },
        { label: 'Ollama /api/embeddings', timeoutMs: this.timeoutMs, fetch: this.fetchImpl }
      );
      await raiseForStatus(response, 'Ollama /api/embeddings');
      const data = await readJson(
        response,
        LegacyEmbeddingResponseSchema,
        'Ollama /api/embeddings'
      );
      output.push(data.embedding);
    }

    return output;
  }
}
