/**
 * Document Loading
 *
 * Turns scanned files and operator notes into Documents for the chunker.
 * CSV files become spreadsheet_sheet documents carrying the sheet's shape
 * (headers, row and column counts) and its raw bytes as attributes.
 */

import { readFileSync } from 'node:fs';
import { basename, extname, sep } from 'node:path';

import type { Document, FileInfo } from './types.js';

// ============================================================================
// CSV
// ============================================================================

/**
 * Split CSV text into rows of fields.
 *
 * Handles quoted fields with embedded commas, doubled quotes and line
 * breaks, and both LF and CRLF row endings. A trailing newline does not
 * produce an empty row.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;

  const endField = (): void => {
    row.push(field);
    field = '';
  };
  const endRow = (): void => {
    endField();
    rows.push(row);
    row = [];
  };

  while (i < text.length) {
    const char = text[i];

    if (quoted) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i += 2;
        continue;
      }
      if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
      i++;
      continue;
    }

    if (char === '"' && field === '') {
      quoted = true;
    } else if (char === ',') {
      endField();
    } else if (char === '\n') {
      endRow();
    } else if (char === '\r' && text[i + 1] === '\n') {
      endRow();
      i++;
    } else {
      field += char;
    }
    i++;
  }

  if (field !== '' || row.length > 0) {
    endRow();
  }

  return rows;
}

/**
 * Build a spreadsheet_sheet document from CSV text.
 *
 * The first row is taken as the header row.
 */
export function sheetDocument(sourceId: string, sheetName: string, csvText: string): Document {
  const rows = parseCsv(csvText).filter((row) => row.some((cell) => cell.trim() !== ''));
  const headers = (rows[0] ?? []).map((header) => header.trim());

  return {
    text: csvText,
    sourceId,
    type: 'spreadsheet_sheet',
    attributes: {
      sheetName,
      rows: Math.max(0, rows.length - 1),
      cols: headers.length,
      headers,
      csvBytes: Buffer.from(csvText, 'utf-8').toString('base64'),
    },
  };
}

// ============================================================================
// Files and notes
// ============================================================================

/**
 * Source identifier for a scanned file: its path relative to the scan
 * root, with forward slashes on every platform.
 */
export function sourceIdFor(file: FileInfo): string {
  return sep === '\\' ? file.relativePath.split(sep).join('/') : file.relativePath;
}

/**
 * Read one scanned file as a Document.
 */
export function readDocument(file: FileInfo): Document {
  // Strip a UTF-8 BOM; editors on Windows like to add one to .cs and .sql files
  const text = readFileSync(file.path, 'utf-8').replace(/^\uFEFF/, '');
  const sourceId = sourceIdFor(file);

  if (file.documentType === 'spreadsheet_sheet') {
    return sheetDocument(sourceId, basename(file.path, extname(file.path)), text);
  }

  return { text, sourceId, type: file.documentType };
}

/**
 * Manual notes typed by the operator (`hix index --note`).
 */
export function manualNoteDocuments(notes: readonly string[]): Document[] {
  return notes
    .map((note) => note.trim())
    .filter((note) => note !== '')
    .map((note, i) => ({
      text: note,
      sourceId: `manual-note-${i + 1}`,
      type: 'manual_note' as const,
      attributes: { source: 'User Input' },
    }));
}

export interface LoadDocumentsOptions {
  /** Invoked after each file is read */
  onFile?: (file: FileInfo, processed: number, total: number) => void;
  /** Invoked when a file can't be read; the file is skipped */
  onError?: (file: FileInfo, error: Error) => void;
}

export interface LoadDocumentsResult {
  documents: Document[];
  /** `relativePath: message` for every skipped file */
  errors: string[];
}

/**
 * Read every scanned file, skipping (and reporting) unreadable ones.
 */
export function loadDocuments(
  files: readonly FileInfo[],
  options: LoadDocumentsOptions = {}
): LoadDocumentsResult {
  const documents: Document[] = [];
  const errors: string[] = [];

  files.forEach((file, i) => {
    try {
      documents.push(readDocument(file));
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      errors.push(`${file.relativePath}: ${error.message}`);
      options.onError?.(file, error);
    }
    options.onFile?.(file, i + 1, files.length);
  });

  return { documents, errors };
}
