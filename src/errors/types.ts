/**
 * Error type definitions for the hybrid index
 *
 * Every error the library raises carries:
 * - An actionable recovery hint
 * - An exit code the CLI hands back to the shell
 *
 * Library callers can switch on `instanceof`; the CLI formats them with
 * `formatError()` from handler.ts.
 */

/**
 * Base class for all errors raised by this package.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Keeps `instanceof` working for subclasses after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: hix config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when an embedding provider needs an API key that isn't set.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (a .env file in the working directory works too)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

// ============================================================================
// Indexing errors
// ============================================================================

/**
 * A chunking strategy produced output that doesn't tile its input.
 *
 * The forced line/character split always terminates, so this only fires on
 * a programming error inside a strategy. It is surfaced, never swallowed.
 *
 * Exit code 6
 */
export class ChunkingFailureError extends CLIError {
  /** Source identifier of the document being chunked */
  public readonly sourceId: string;

  constructor(sourceId: string, detail: string) {
    super(
      `Failed to chunk ${sourceId}: ${detail}`,
      'Re-run with --verbose and report the document that triggered this',
      6
    );
    this.name = 'ChunkingFailureError';
    this.sourceId = sourceId;
  }
}

/**
 * The embedding provider asked us to slow down (HTTP 429).
 *
 * Retried by the batcher; only escapes as the `cause` of an
 * EmbeddingFatalError once the attempt budget is spent.
 *
 * Exit code 7
 */
export class EmbeddingRateLimitedError extends CLIError {
  /** Server-provided wait before the next attempt, if any */
  public readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number) {
    super(message, 'Lower batching.batch_token_budget or wait before retrying', 7);
    this.name = 'EmbeddingRateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * A recoverable provider failure: 5xx, timeout, dropped connection.
 *
 * Exit code 7
 */
export class EmbeddingTransientError extends CLIError {
  constructor(message: string) {
    super(message, 'Check that the embedding provider is reachable', 7);
    this.name = 'EmbeddingTransientError';
  }
}

/**
 * The embedding job cannot continue.
 *
 * Raised for non-retryable provider errors and for retryable ones once
 * `retry.max_attempts` is exhausted. Batches embedded before the failure
 * stay in the checkpoint at `checkpointPath`.
 *
 * Exit code 8
 */
export class EmbeddingFatalError extends CLIError {
  /** Checkpoint holding the batches embedded so far */
  public readonly checkpointPath?: string;

  /** The underlying provider error */
  public readonly cause?: Error;

  constructor(message: string, options: { checkpointPath?: string; cause?: Error } = {}) {
    super(
      message,
      options.checkpointPath
        ? `Checkpoint saved at ${options.checkpointPath}. Run the same command again to resume`
        : 'Check the embedding provider configuration: hix config list',
      8
    );
    this.name = 'EmbeddingFatalError';
    this.checkpointPath = options.checkpointPath;
    this.cause = options.cause;
  }

  /**
   * Copy of this error pointing at a checkpoint file.
   */
  withCheckpoint(checkpointPath: string): EmbeddingFatalError {
    return new EmbeddingFatalError(this.message, { checkpointPath, cause: this.cause });
  }
}

/**
 * Vector index and metadata store disagree (count or dimension).
 *
 * Never auto-repaired: rebuild the index.
 *
 * Exit code 9
 */
export class IndexMismatchError extends CLIError {
  constructor(message: string) {
    super(message, 'Rebuild the index: hix index <path>', 9);
    this.name = 'IndexMismatchError';
  }
}

/**
 * Reading or writing index or checkpoint files failed.
 *
 * Nothing partially written is trusted afterwards.
 *
 * Exit code 10
 */
export class PersistenceError extends CLIError {
  /** The original I/O or database error */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Check disk space and permissions for the index directory', 10);
    this.name = 'PersistenceError';
    this.cause = cause;
  }
}

/**
 * Indexing was cancelled via AbortSignal (Ctrl+C in the CLI).
 *
 * Cancellation is honoured between embedding batches, so the checkpoint
 * is always resumable.
 *
 * Exit code 130 (128 + SIGINT)
 */
export class IndexingCancelledError extends CLIError {
  /** Checkpoint holding the batches embedded before cancellation */
  public readonly checkpointPath?: string;

  constructor(checkpointPath?: string) {
    super(
      'Indexing cancelled',
      checkpointPath
        ? `Checkpoint saved at ${checkpointPath}. Run the same command again to resume`
        : undefined,
      130
    );
    this.name = 'IndexingCancelledError';
    this.checkpointPath = checkpointPath;
  }
}
