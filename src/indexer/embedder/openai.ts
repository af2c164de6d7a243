/**
 * OpenAI-compatible embedding provider
 *
 * Talks to any server exposing POST {base}/embeddings with the OpenAI
 * request and response shape. Results are reordered by their `index`
 * field; the API does not promise input order.
 */

import { z } from 'zod';

import { EmbeddingFatalError } from '../../errors/index.js';
import { postJson, raiseForStatus, readJson } from './http.js';
import type { EmbeddingProvider } from './types.js';

const EmbeddingsResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    })
  ),
});

export interface OpenAIProviderOptions {
  model: string;
  apiKey: string;
  /** API root including the version, e.g. https://api.openai.com/v1 */
  baseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly model: string;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl?: typeof fetch;

  constructor(options: OpenAIProviderOptions) {
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const label = `${this.baseUrl}/embeddings`;
    const response = await postJson(
      `${this.baseUrl}/embeddings`,
      { model: this.model, input: texts },
      {
        label,
        timeoutMs: this.timeoutMs,
        headers: { Authorization: `Bearer ${this.apiKey}` },
        fetch: this.fetchImpl,
      }
    );
    await raiseForStatus(response, label);
    const { data } = await readJson(response, EmbeddingsResponseSchema, label);

    const ordered = new Array<number[] | undefined>(texts.length);
    for (const item of data) {
      if (item.index >= texts.length || ordered[item.index] !== undefined) {
        throw new EmbeddingFatalError(`${label} returned an unexpected index ${item.index}`);
      }
      ordered[item.index] = item.embedding;
    }

    return ordered.map((embedding, i) => {
      if (embedding === undefined) {
        throw new EmbeddingFatalError(`${label} returned no embedding for input ${i}`);
      }
      return embedding;
    });
  }
}
