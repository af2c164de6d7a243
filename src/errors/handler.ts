/**
 * Turns whatever reached the top of the CLI into stderr text (or JSON
 * under --json) and an exit code. Failures that leave a checkpoint
 * behind name it, so the user knows the next run resumes.
 */

import chalk from 'chalk';
import { CLIError, EmbeddingFatalError, IndexingCancelledError } from './types.js';

export interface ErrorHandlerOptions {
  /** Include the stack trace */
  verbose?: boolean;
  json?: boolean;
}

/** Shape printed under --json */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  cause?: string;
  checkpoint?: string;
  stack?: string;
}

function checkpointOf(error: CLIError): string | undefined {
  if (error instanceof EmbeddingFatalError || error instanceof IndexingCancelledError) {
    return error.checkpointPath;
  }
  return undefined;
}

function toOutput(error: unknown, verbose: boolean): ErrorOutput {
  if (error instanceof CLIError) {
    return {
      error: error.message,
      code: error.code,
      hint: error.hint,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
      checkpoint: checkpointOf(error),
      stack: verbose ? error.stack : undefined,
    };
  }
  if (error instanceof Error) {
    return {
      error: error.message,
      code: 1,
      // Anything that isn't a CLIError is a bug; the stack is what helps
      hint: verbose ? undefined : 'Run with --verbose for more details',
      stack: verbose ? error.stack : undefined,
    };
  }
  return { error: String(error), code: 1 };
}

/**
 * Render an error for stderr. Separate from handleError() so tests can
 * call it without exiting.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const output = toOutput(error, options.verbose ?? false);

  if (options.json) {
    return JSON.stringify(output, null, 2);
  }

  const lines = [chalk.red('Error: ') + output.error];
  if (output.cause) lines.push(chalk.dim('Cause: ') + output.cause);
  if (output.hint) lines.push(chalk.dim('Hint: ') + output.hint);
  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }
  return lines.join('\n');
}

/** CLIError carries its own code; anything else exits 1 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/** For `uncaughtException` and `unhandledRejection` */
export function createGlobalErrorHandler(options: ErrorHandlerOptions = {}): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
