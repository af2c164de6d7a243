/**
 * Index Store
 *
 * Builds, grows, persists and verifies an IndexHandle. The vector index
 * and the metadata array are only ever changed together, so position `i`
 * of one always describes position `i` of the other.
 *
 * On disk an index is two files, valid only as a pair:
 * - index.vec: `HIDX` magic, then uint32 LE version, dimensions and count,
 *   a 16-character hex write id, then `count` rows of little-endian float32
 * - index.meta.json: version, write id, model, dimensions and the ordered
 *   entries
 *
 * Each persist draws a fresh write id for both files; a load refuses a
 * pair whose ids differ.
 */

import { randomBytes } from 'node:crypto';

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { IndexMismatchError, PersistenceError } from '../errors/index.js';
import { consoleLogger, type Logger } from '../utils/index.js';
import { INDEX_FORMAT_VERSION, MetadataFileSchema, type MetadataFile } from './metadata.js';
import type { ChunkMetadata, IndexHandle, IndexPaths, IndexVerification } from './types.js';
import { FlatL2Index } from './vector-index.js';

const VECTORS_FILE = 'index.vec';
const METADATA_FILE = 'index.meta.json';
const MAGIC = 'HIDX';
const WRITE_ID_OFFSET = 16;
const WRITE_ID_LENGTH = 16;
const HEADER_BYTES = WRITE_ID_OFFSET + WRITE_ID_LENGTH;

/**
 * Paths of the two index files in `dir`.
 */
export function getIndexPaths(dir: string): IndexPaths {
  return {
    vectorsPath: join(dir, VECTORS_FILE),
    metadataPath: join(dir, METADATA_FILE),
  };
}

/**
 * Whether both index files exist in `dir`.
 */
export function indexExists(dir: string): boolean {
  const { vectorsPath, metadataPath } = getIndexPaths(dir);
  return existsSync(vectorsPath) && existsSync(metadataPath);
}

// ============================================================================
// Build and append
// ============================================================================

function assertSameLength(vectors: readonly Float32Array[], metadata: readonly ChunkMetadata[]): void {
  if (vectors.length !== metadata.length) {
    throw new IndexMismatchError(
      `Got ${vectors.length} vectors for ${metadata.length} metadata entries`
    );
  }
}

/**
 * Build a fresh index from a full vector set.
 *
 * @param model - Embedding model the vectors came from
 * @throws IndexMismatchError if the lengths differ, the set is empty or
 *   a vector's dimension differs from the first one's
 */
export function buildIndex(
  vectors: readonly Float32Array[],
  metadata: readonly ChunkMetadata[],
  model: string
): IndexHandle {
  assertSameLength(vectors, metadata);

  const first = vectors[0];
  if (first === undefined) {
    throw new IndexMismatchError('Cannot build an index from zero vectors');
  }

  const index = new FlatL2Index(first.length);
  index.add(vectors);

  return {
    vectors: index,
    metadata: [...metadata],
    model,
    revision: 0,
  };
}

/**
 * Grow an index in place. Existing positions keep their entries; the new
 * ones follow in order.
 *
 * Everything is validated before either side changes.
 *
 * @throws IndexMismatchError on a length or dimension mismatch, or when
 *   the handle is already inconsistent
 */
export function appendToIndex(
  handle: IndexHandle,
  vectors: readonly Float32Array[],
  metadata: readonly ChunkMetadata[]
): void {
  assertSameLength(vectors, metadata);
  assertIndexConsistent(handle);
  handle.vectors.assertDimensions(vectors);

  if (vectors.length === 0) {
    return;
  }

  // A loop, not push(...metadata): spreading a large array overflows the stack
  handle.vectors.add(vectors);
  for (const entry of metadata) {
    handle.metadata.push(entry);
  }
  handle.revision++;
}

// ============================================================================
// Verification
// ============================================================================

/**
 * Check that the vector count matches the metadata count.
 *
 * Logs a diagnostic when it doesn't. Never repairs anything.
 */
export function verifyIndex(handle: IndexHandle, logger: Logger = consoleLogger): IndexVerification {
  const vectorCount = handle.vectors.size;
  const metadataCount = handle.metadata.length;
  const issues: string[] = [];

  if (vectorCount !== metadataCount) {
    issues.push(
      `Vector index holds ${vectorCount} vectors but the metadata store holds ${metadataCount} entries`
    );
  }

  const consistent = issues.length === 0;
  if (!consistent) {
    logger.warn(`Index is inconsistent: ${issues.join('; ')}`);
  }

  return {
    consistent,
    vectorCount,
    metadataCount,
    dimensions: handle.vectors.dimensions,
    issues,
  };
}

/**
 * Throw unless the index is consistent.
 *
 * @throws IndexMismatchError listing the problems
 */
export function assertIndexConsistent(handle: IndexHandle): void {
  const vectorCount = handle.vectors.size;
  const metadataCount = handle.metadata.length;
  if (vectorCount !== metadataCount) {
    throw new IndexMismatchError(
      `Index is inconsistent: ${vectorCount} vectors, ${metadataCount} metadata entries`
    );
  }
}

// ============================================================================
// Persistence
// ============================================================================

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

interface DecodedVectors {
  index: FlatL2Index;
  writeId: string;
}

function encodeVectors(index: FlatL2Index, writeId: string): Buffer {
  const rows = index.rows();
  const buffer = Buffer.alloc(HEADER_BYTES + rows.length * 4);
  buffer.write(MAGIC, 0, 'ascii');
  buffer.writeUInt32LE(INDEX_FORMAT_VERSION, 4);
  buffer.writeUInt32LE(index.dimensions, 8);
  buffer.writeUInt32LE(index.size, 12);
  buffer.write(writeId, WRITE_ID_OFFSET, WRITE_ID_LENGTH, 'ascii');
  rows.forEach((value, i) => buffer.writeFloatLE(value, HEADER_BYTES + i * 4));
  return buffer;
}

function decodeVectors(buffer: Buffer, path: string): DecodedVectors {
  if (buffer.length < HEADER_BYTES || buffer.toString('ascii', 0, 4) !== MAGIC) {
    throw new PersistenceError(`${path} is not an index vector file`);
  }

  const version = buffer.readUInt32LE(4);
  if (version !== INDEX_FORMAT_VERSION) {
    throw new PersistenceError(
      `${path} has format version ${version}, expected ${INDEX_FORMAT_VERSION}`
    );
  }

  const dimensions = buffer.readUInt32LE(8);
  const count = buffer.readUInt32LE(12);
  const expectedBytes = HEADER_BYTES + count * dimensions * 4;
  if (dimensions === 0 || buffer.length !== expectedBytes) {
    throw new PersistenceError(
      `${path} is truncated or corrupt: ${buffer.length} bytes, expected ${expectedBytes}`
    );
  }

  const rows = new Float32Array(count * dimensions);
  for (let i = 0; i < rows.length; i++) {
    rows[i] = buffer.readFloatLE(HEADER_BYTES + i * 4);
  }
  return {
    index: FlatL2Index.fromRows(dimensions, rows),
    writeId: buffer.toString('ascii', WRITE_ID_OFFSET, HEADER_BYTES),
  };
}

/**
 * Write the index to `dir`.
 *
 * Both files are written to temporary names first and renamed into place
 * only after both writes succeeded.
 *
 * @throws IndexMismatchError if the handle is inconsistent
 * @throws PersistenceError on any I/O failure
 */
export function persistIndex(handle: IndexHandle, dir: string): IndexPaths {
  assertIndexConsistent(handle);

  const paths = getIndexPaths(dir);
  const suffix = `.tmp-${process.pid}`;
  const vectorsTmp = paths.vectorsPath + suffix;
  const metadataTmp = paths.metadataPath + suffix;
  const writeId = randomBytes(WRITE_ID_LENGTH / 2).toString('hex');

  const metadataFile: MetadataFile = {
    version: INDEX_FORMAT_VERSION,
    writeId,
    model: handle.model,
    dimensions: handle.vectors.dimensions,
    entries: handle.metadata,
  };

  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(vectorsTmp, encodeVectors(handle.vectors, writeId));
    writeFileSync(metadataTmp, JSON.stringify(metadataFile), 'utf-8');
    renameSync(vectorsTmp, paths.vectorsPath);
    renameSync(metadataTmp, paths.metadataPath);
  } catch (error) {
    for (const tmp of [vectorsTmp, metadataTmp]) {
      if (existsSync(tmp)) {
        rmSync(tmp, { force: true });
      }
    }
    const cause = toError(error);
    throw new PersistenceError(`Failed to write index to ${dir}: ${cause.message}`, cause);
  }

  return paths;
}

function readFile(path: string): Buffer {
  try {
    return readFileSync(path);
  } catch (error) {
    const cause = toError(error);
    throw new PersistenceError(`Failed to read ${path}: ${cause.message}`, cause);
  }
}

/**
 * Read an index written by persistIndex().
 *
 * A count mismatch between the files is loaded as is so verifyIndex()
 * can report it.
 *
 * @throws PersistenceError if either file is missing, unreadable or malformed
 * @throws IndexMismatchError if the files come from different writes or
 *   disagree on the vector dimension
 */
export function loadIndex(dir: string): IndexHandle {
  const { vectorsPath, metadataPath } = getIndexPaths(dir);

  for (const path of [vectorsPath, metadataPath]) {
    if (!existsSync(path)) {
      throw new PersistenceError(`Index file ${path} is missing; the index is only valid as a pair`);
    }
  }

  const { index: vectors, writeId } = decodeVectors(readFile(vectorsPath), vectorsPath);

  let raw: unknown;
  try {
    raw = JSON.parse(readFile(metadataPath).toString('utf-8'));
  } catch (error) {
    if (error instanceof PersistenceError) {
      throw error;
    }
    const cause = toError(error);
    throw new PersistenceError(`${metadataPath} is not valid JSON: ${cause.message}`, cause);
  }

  const parsed = MetadataFileSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PersistenceError(`${metadataPath} is malformed: ${problems}`);
  }

  // A persist interrupted between its two renames leaves such a pair
  if (parsed.data.writeId !== writeId) {
    throw new IndexMismatchError(
      `${vectorsPath} and ${metadataPath} were written by different saves (${writeId} vs ${parsed.data.writeId})`
    );
  }

  if (parsed.data.dimensions !== vectors.dimensions) {
    throw new IndexMismatchError(
      `${metadataPath} records ${parsed.data.dimensions} dimensions but ${vectorsPath} holds ${vectors.dimensions}`
    );
  }

  return {
    vectors,
    metadata: parsed.data.entries,
    model: parsed.data.model,
    revision: 0,
  };
}
