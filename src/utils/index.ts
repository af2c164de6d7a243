/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Schema-checked JSON parsing
export { safeJsonParse } from './json.js';

// Logging
export { consoleLogger, silentLogger, type Logger } from './logger.js';
