/**
 * Indexer Types
 *
 * Documents going into the index, and the contract for discovering them
 * on disk.
 */

import type { Logger } from '../utils/index.js';

/**
 * Kind of source a document came from.
 * - code: source files (C#, TypeScript, JavaScript, markup)
 * - sql: SQL scripts
 * - spreadsheet_sheet: one sheet of tabular data (a CSV file)
 * - generic_text: prose and plain documents
 * - manual_note: text entered by an operator
 */
export type DocumentType = 'code' | 'sql' | 'spreadsheet_sheet' | 'generic_text' | 'manual_note';

export const DOCUMENT_TYPES: readonly DocumentType[] = [
  'code',
  'sql',
  'spreadsheet_sheet',
  'generic_text',
  'manual_note',
];

/**
 * Extra facts about a document, copied onto each of its chunks.
 * Spreadsheet sheets carry sheetName, rows, cols, headers and csvBytes;
 * split manual notes carry a title.
 */
export type ChunkAttributes = Record<string, string | number | boolean | string[]>;

/**
 * A unit of source material. Immutable once read.
 */
export interface Document {
  text: string;

  /** Relative path, sheet id or note id */
  sourceId: string;

  type: DocumentType;

  attributes?: ChunkAttributes;
}

// ============================================================================
// File discovery
// ============================================================================

/**
 * Metadata about a discovered file.
 */
export interface FileInfo {
  /** Absolute path to the file */
  path: string;

  /** Path relative to the scanned root directory */
  relativePath: string;

  /** File extension without the dot (e.g., 'ts', 'sql') */
  extension: string;

  /** Document type the file is loaded as */
  documentType: DocumentType;

  /** File size in bytes */
  size: number;

  /** Last modified timestamp (ISO 8601) */
  modifiedAt: string;
}

/**
 * Options for configuring the file scanner.
 */
export interface ScanOptions {
  /**
   * Maximum directory depth to traverse.
   * - 0: Only scan files in the root directory
   * - Infinity (default): No limit
   */
  maxDepth?: number;

  /**
   * Only include files with these extensions (without dot).
   * If not provided, uses DEFAULT_SUPPORTED_EXTENSIONS.
   */
  extensions?: string[];

  /**
   * Additional gitignore-style patterns (merged with .gitignore).
   * @example ['*.log', 'temp/']
   */
  additionalIgnorePatterns?: string[];

  /** @default false */
  followSymlinks?: boolean;

  /** Invoked for each discovered file */
  onFile?: (file: FileInfo) => void;

  /** Invoked when a file is skipped because it couldn't be read */
  onError?: (path: string, error: Error) => void;

  /** Told about an unreadable .gitignore */
  logger?: Logger;
}

/**
 * Statistics about a completed scan.
 */
export interface ScanStats {
  totalFiles: number;

  /** Total size of all files in bytes */
  totalSize: number;

  byType: Record<DocumentType, number>;

  errorsEncountered: number;

  scanDurationMs: number;
}

/**
 * Result of a directory scan.
 */
export interface ScanResult {
  /** Root directory that was scanned */
  rootPath: string;

  files: FileInfo[];

  stats: ScanStats;
}

/**
 * Extension to document type mapping (extensions without the dot).
 */
export const EXTENSION_TO_DOCUMENT_TYPE: Record<string, DocumentType> = {
  // C# and markup
  cs: 'code',
  cshtml: 'code',
  razor: 'code',
  config: 'code',
  html: 'code',
  htm: 'code',

  // TypeScript / JavaScript
  ts: 'code',
  tsx: 'code',
  mts: 'code',
  cts: 'code',
  js: 'code',
  jsx: 'code',
  mjs: 'code',
  cjs: 'code',

  sql: 'sql',

  csv: 'spreadsheet_sheet',

  md: 'generic_text',
  mdx: 'generic_text',
  txt: 'generic_text',
  rst: 'generic_text',
};

export const DEFAULT_SUPPORTED_EXTENSIONS = Object.keys(EXTENSION_TO_DOCUMENT_TYPE);

/**
 * Default patterns to ignore during scanning.
 * These are always applied in addition to .gitignore.
 */
export const DEFAULT_IGNORE_PATTERNS = [
  // Version control
  '.git',
  '.svn',

  // Dependencies
  'node_modules',
  'bower_components',
  'packages',

  // Build outputs
  'dist',
  'build',
  'out',
  'bin',
  'obj',
  '.next',
  '.cache',

  // IDE/Editor
  '.idea',
  '.vscode',
  '.vs',
  '*.swp',

  // OS files
  '.DS_Store',
  'Thumbs.db',

  'coverage',
  '*.log',

  // Environment
  '.env',
  '.env.*',

  // Generated
  '*.min.js',
  '*.designer.cs',
  'package-lock.json',
];

/**
 * Document type for a file extension, or undefined when unsupported.
 */
export function getDocumentTypeForExtension(extension: string): DocumentType | undefined {
  return EXTENSION_TO_DOCUMENT_TYPE[extension.toLowerCase()];
}

/**
 * An empty per-type counter.
 */
export function emptyTypeCounts(): Record<DocumentType, number> {
  return {
    code: 0,
    sql: 0,
    spreadsheet_sheet: 0,
    generic_text: 0,
    manual_note: 0,
  };
}
