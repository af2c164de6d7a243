/**
 * JSON Utilities
 *
 * Schema-checked JSON parsing with fallback for corrupted or unexpected data.
 */

import type { z } from 'zod';

/**
 * Parse a JSON string and validate it against a zod schema, falling back on
 * either failure.
 *
 * Use this for JSON from external sources (provider error bodies, files)
 * where a bad payload should degrade rather than throw.
 *
 * @param json - The JSON string to parse (can be null/undefined)
 * @param schema - Shape the parsed value must have
 * @param fallback - Value to return if parsing or validation fails
 * @param onError - Optional callback for logging/reporting failures
 *
 * @example
 * ```typescript
 * const body = safeJsonParse(text, ErrorBodySchema, null, (err) => {
 *   logger.warn(`Unreadable error body: ${err.message}`);
 * });
 * ```
 */
export function safeJsonParse<S extends z.ZodTypeAny, F>(
  json: string | null | undefined,
  schema: S,
  fallback: F,
  onError?: (error: Error, rawValue: string) => void
): z.infer<S> | F {
  if (json === null || json === undefined) {
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    onError?.(new Error(result.error.issues.map((i) => i.message).join('; ')), json);
    return fallback;
  }
  return result.data;
}
