/**
 * Checkpoint Store
 *
 * An append-only log of embedded batches, one SQLite database per job
 * at `<dir>/<id>.checkpoint.db`. The `meta` table pins the fingerprint of
 * the job's input; a checkpoint written for different input is discarded
 * on load instead of being reused.
 *
 * Every save is its own transaction with `synchronous = FULL`, so a batch
 * that save() returned for survives a crash right after.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readdirSync, rmSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

import { PersistenceError, ValidationError } from '../../errors/index.js';
import { consoleLogger, type Logger } from '../../utils/index.js';
import type { CheckpointBatch, CheckpointInfo } from './types.js';

const CHECKPOINT_SUFFIX = '.checkpoint.db';
const VALID_ID = /^[A-Za-z0-9._-]+$/;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS batches (
    batch_index INTEGER PRIMARY KEY,
    start_position INTEGER NOT NULL,
    count INTEGER NOT NULL,
    dimensions INTEGER NOT NULL,
    vectors BLOB NOT NULL
  );
`;

// ============================================================================
// Row validation
// ============================================================================

const BatchRowSchema = z.object({
  batch_index: z.number().int().nonnegative(),
  start_position: z.number().int().nonnegative(),
  count: z.number().int().positive(),
  dimensions: z.number().int().positive(),
  // SQLite returns BLOBs as Buffers via better-sqlite3
  vectors: z.instanceof(Buffer),
});

const MetaRowSchema = z.object({ value: z.string() });

const CountRowSchema = z.object({
  batches: z.number().int(),
  vectors: z.number().int().nullable(),
});

// ============================================================================
// Blob conversion
// ============================================================================

/**
 * Pack a batch's vectors row after row into one BLOB.
 */
export function vectorsToBlob(vectors: readonly Float32Array[], dimensions: number): Buffer {
  const packed = new Float32Array(vectors.length * dimensions);
  vectors.forEach((vector, i) => packed.set(vector, i * dimensions));
  return Buffer.from(packed.buffer);
}

/**
 * Unpack a BLOB into `count` vectors.
 *
 * The bytes are copied first: a Buffer's offset into its backing store is
 * not guaranteed to be 4-byte aligned.
 */
export function blobToVectors(blob: Buffer, count: number, dimensions: number): Float32Array[] {
  const copy = new Uint8Array(blob);
  const flat = new Float32Array(copy.buffer, 0, copy.byteLength / 4);
  const vectors: Float32Array[] = [];
  for (let i = 0; i < count; i++) {
    vectors.push(flat.slice(i * dimensions, (i + 1) * dimensions));
  }
  return vectors;
}

// ============================================================================
// Store
// ============================================================================

export interface CheckpointStoreOptions {
  /** Receives the stale-checkpoint notice */
  logger?: Logger;
}

export class CheckpointStore {
  readonly dir: string;
  private readonly logger: Logger;
  private readonly connections = new Map<string, Database.Database>();

  constructor(dir: string, options: CheckpointStoreOptions = {}) {
    this.dir = dir;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * File path of a checkpoint, reported to the operator on failure.
   */
  pathFor(id: string): string {
    if (!VALID_ID.test(id)) {
      throw new ValidationError(`Invalid checkpoint id: ${id}`, [
        'Use letters, digits, dot, underscore and dash only',
      ]);
    }
    return join(this.dir, `${id}${CHECKPOINT_SUFFIX}`);
  }

  /**
   * Batches saved so far for a job, ordered by batch index.
   *
   * Opens (and creates) the checkpoint. If it was written for another
   * fingerprint it is reported, cleared and started afresh.
   */
  load(id: string, fingerprint: string): Map<number, CheckpointBatch> {
    const path = this.pathFor(id);

    return this.guard(id, 'load', () => {
      let db = this.open(id);
      const stored = this.readFingerprint(db);

      if (stored !== null && stored !== fingerprint) {
        this.logger.warn(
          `Discarding stale checkpoint ${path}: it was written for different input`
        );
        this.clear(id);
        db = this.open(id);
      }

      db.prepare('INSERT OR REPLACE INTO meta (key, value) VALUES (?, ?)').run(
        'fingerprint',
        fingerprint
      );

      const batches = new Map<number, CheckpointBatch>();
      const rows = db.prepare('SELECT * FROM batches ORDER BY batch_index').all();
      for (const row of rows) {
        const parsed = BatchRowSchema.safeParse(row);
        if (!parsed.success) {
          throw new PersistenceError(`Corrupted checkpoint row in ${path}: ${parsed.error.message}`);
        }
        const { batch_index, start_position, count, dimensions, vectors } = parsed.data;
        if (vectors.byteLength !== count * dimensions * 4) {
          throw new PersistenceError(
            `Corrupted checkpoint row in ${path}: batch ${batch_index} holds ${vectors.byteLength} bytes, expected ${count * dimensions * 4}`
          );
        }
        batches.set(batch_index, {
          index: batch_index,
          start: start_position,
          count,
          dimensions,
          vectors: blobToVectors(vectors, count, dimensions),
        });
      }
      return batches;
    });
  }

  /**
   * Append one batch. Returns after the transaction has committed.
   */
  save(id: string, batch: CheckpointBatch): void {
    if (batch.vectors.length !== batch.count) {
      throw new ValidationError(`Checkpoint batch ${batch.index} is inconsistent`, [
        `count is ${batch.count} but ${batch.vectors.length} vectors were given`,
      ]);
    }
    const wrongWidth = batch.vectors.findIndex((v) => v.length !== batch.dimensions);
    if (wrongWidth !== -1) {
      throw new ValidationError(`Checkpoint batch ${batch.index} is inconsistent`, [
        `vector ${wrongWidth} has ${batch.vectors[wrongWidth]?.length} dimensions, expected ${batch.dimensions}`,
      ]);
    }

    this.guard(id, 'save', () => {
      const db = this.open(id);
      const insert = db.prepare(
        `INSERT OR REPLACE INTO batches (batch_index, start_position, count, dimensions, vectors)
         VALUES (?, ?, ?, ?, ?)`
      );
      db.transaction(() => {
        insert.run(
          batch.index,
          batch.start,
          batch.count,
          batch.dimensions,
          vectorsToBlob(batch.vectors, batch.dimensions)
        );
      })();
    });
  }

  /**
   * Close and delete a checkpoint with its WAL and SHM files.
   * No-op when it doesn't exist.
   */
  clear(id: string): void {
    const path = this.pathFor(id);
    this.closeConnection(id);

    this.guard(id, 'clear', () => {
      for (const file of [path, `${path}-wal`, `${path}-shm`]) {
        rmSync(file, { force: true });
      }
    });
  }

  /**
   * Whether a checkpoint file exists for `id`.
   */
  exists(id: string): boolean {
    return existsSync(this.pathFor(id));
  }

  /**
   * Every checkpoint in the directory.
   */
  list(): CheckpointInfo[] {
    if (!existsSync(this.dir)) {
      return [];
    }

    const ids = readdirSync(this.dir)
      .filter((name) => name.endsWith(CHECKPOINT_SUFFIX))
      .map((name) => name.slice(0, -CHECKPOINT_SUFFIX.length))
      .filter((id) => VALID_ID.test(id))
      .sort();

    return ids.map((id) => this.describe(id));
  }

  /**
   * Close every open connection. Checkpoints stay on disk.
   */
  close(): void {
    for (const id of [...this.connections.keys()]) {
      this.closeConnection(id);
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private describe(id: string): CheckpointInfo {
    const path = this.pathFor(id);

    return this.guard(id, 'read', () => {
      const open = this.connections.get(id);
      const db = open ?? new Database(path, { fileMustExist: true });
      try {
        const counts = CountRowSchema.parse(
          db.prepare('SELECT COUNT(*) AS batches, SUM(count) AS vectors FROM batches').get()
        );
        return {
          id,
          path,
          fingerprint: this.readFingerprint(db),
          batches: counts.batches,
          vectors: counts.vectors ?? 0,
          updatedAt: statSync(path).mtime,
        };
      } finally {
        if (!open) {
          db.close();
        }
      }
    });
  }

  private open(id: string): Database.Database {
    const existing = this.connections.get(id);
    if (existing) {
      return existing;
    }

    if (!existsSync(this.dir)) {
      mkdirSync(this.dir, { recursive: true });
    }

    const db = new Database(this.pathFor(id));
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = FULL');
    db.exec(SCHEMA);
    this.connections.set(id, db);
    return db;
  }

  private closeConnection(id: string): void {
    const db = this.connections.get(id);
    if (db) {
      db.close();
      this.connections.delete(id);
    }
  }

  private readFingerprint(db: Database.Database): string | null {
    const row = db.prepare("SELECT value FROM meta WHERE key = 'fingerprint'").get();
    if (row === undefined) {
      return null;
    }
    return MetaRowSchema.parse(row).value;
  }

  /**
   * Run a database or file operation, turning failures into PersistenceError.
   */
  private guard<T>(id: string, action: string, operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      if (error instanceof PersistenceError || error instanceof ValidationError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new PersistenceError(`Failed to ${action} checkpoint ${id}: ${cause.message}`, cause);
    }
  }
}
