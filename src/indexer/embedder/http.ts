/**
 * HTTP plumbing shared by the Ollama and OpenAI providers
 *
 * Maps transport failures and status codes onto the embedding error
 * classes the retry loop understands:
 * - connection failures, timeouts, 408, 5xx -> EmbeddingTransientError
 * - 429 -> EmbeddingRateLimitedError (with retry-after when sent)
 * - other non-2xx, unparseable bodies -> EmbeddingFatalError
 */

import { z } from 'zod';

import {
  EmbeddingFatalError,
  EmbeddingRateLimitedError,
  EmbeddingTransientError,
} from '../../errors/index.js';
import { safeJsonParse } from '../../utils/index.js';

/** Longest slice of a raw error body quoted in a message */
const MAX_BODY_EXCERPT = 200;

/** `{"error": "..."}` (Ollama) or `{"error": {"message": "..."}}` (OpenAI) */
const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]),
});

export interface PostJsonOptions {
  /** Provider label for error messages, e.g. "Ollama /api/embed" */
  label: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  fetch?: typeof fetch;
}

/**
 * POST a JSON body. Resolves with the response whatever its status;
 * rejects only when no response arrived.
 */
export async function postJson(
  url: string,
  body: Record<string, unknown>,
  options: PostJsonOptions
): Promise<Response> {
  const fetchImpl = options.fetch ?? fetch;

  try {
    return await fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...options.headers },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof Error && error.name === 'TimeoutError') {
      throw new EmbeddingTransientError(
        `${options.label} timed out after ${options.timeoutMs}ms`
      );
    }
    throw new EmbeddingTransientError(`${options.label} unreachable: ${message}`);
  }
}

/**
 * Milliseconds to wait according to a Retry-After header (delta-seconds
 * or HTTP date).
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null || value.trim() === '') {
    return undefined;
  }

  const seconds = Number(value.trim());
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? Math.round(seconds * 1000) : undefined;
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Pull a readable message out of an error response body.
 */
function describeErrorBody(text: string): string {
  const parsed = safeJsonParse(text, ErrorBodySchema, null);
  if (parsed !== null) {
    return typeof parsed.error === 'string' ? parsed.error : parsed.error.message;
  }
  const trimmed = text.trim();
  return trimmed.length > MAX_BODY_EXCERPT ? `${trimmed.slice(0, MAX_BODY_EXCERPT)}...` : trimmed;
}

/**
 * Throw the embedding error matching a non-2xx response. No-op for 2xx.
 */
export async function raiseForStatus(response: Response, label: string): Promise<void> {
  if (response.ok) {
    return;
  }

  const detail = describeErrorBody(await response.text());
  const message = `${label} failed (${response.status})${detail ? `: ${detail}` : ''}`;

  if (response.status === 429) {
    throw new EmbeddingRateLimitedError(
      message,
      parseRetryAfter(response.headers.get('retry-after'))
    );
  }
  if (response.status === 408 || response.status >= 500) {
    throw new EmbeddingTransientError(message);
  }
  throw new EmbeddingFatalError(message);
}

/**
 * Parse a 2xx response body against `schema`.
 *
 * @throws EmbeddingFatalError when the body is not JSON or has the wrong shape
 */
export async function readJson<S extends z.ZodTypeAny>(
  response: Response,
  schema: S,
  label: string
): Promise<z.infer<S>> {
  const text = await response.text();
  let problem = 'not JSON';

  const parsed = safeJsonParse(text, schema, null, (error) => {
    problem = error.message;
  });
  if (parsed === null) {
    throw new EmbeddingFatalError(`${label} returned a malformed response: ${problem}`);
  }
  return parsed;
}
