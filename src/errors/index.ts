/**
 * Error handling module
 *
 * This module exports:
 * - Custom error classes for configuration, embedding, index and persistence failures
 * - Error formatting and handling utilities
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: hix config list');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  ValidationError,
  ChunkingFailureError,
  EmbeddingRateLimitedError,
  EmbeddingTransientError,
  EmbeddingFatalError,
  IndexMismatchError,
  PersistenceError,
  IndexingCancelledError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
