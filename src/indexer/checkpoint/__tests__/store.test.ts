/**
 * Checkpoint Store Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { CheckpointStore, blobToVectors, vectorsToBlob } from '../store.js';
import type { CheckpointBatch } from '../types.js';
import { ValidationError } from '../../../errors/index.js';
import { silentLogger } from '../../../utils/index.js';

function batch(index: number, start: number, rows: number[][]): CheckpointBatch {
  return {
    index,
    start,
    count: rows.length,
    dimensions: rows[0]?.length ?? 0,
    vectors: rows.map((row) => Float32Array.from(row)),
  };
}

function rowsOf(loaded: CheckpointBatch | undefined): number[][] {
  return (loaded?.vectors ?? []).map((v) => Array.from(v));
}

describe('blob conversion', () => {
  it('packs vectors row after row', () => {
    const blob = vectorsToBlob([Float32Array.from([1, 2]), Float32Array.from([3, 4])], 2);

    expect(blob.byteLength).toBe(16);
    expect(blobToVectors(blob, 2, 2).map((v) => Array.from(v))).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it('reads a blob at an unaligned offset', () => {
    const source = vectorsToBlob([Float32Array.from([0.5, -1.25])], 2);
    const shifted = Buffer.alloc(source.byteLength + 1);
    source.copy(shifted, 1);

    expect(Array.from(blobToVectors(shifted.subarray(1), 1, 2)[0] ?? [])).toEqual([0.5, -1.25]);
  });
});

describe('CheckpointStore', () => {
  let dir: string;
  let store: CheckpointStore;

  beforeEach(() => {
    dir = join(mkdtempSync(join(tmpdir(), 'hix-checkpoint-')), 'checkpoints');
    store = new CheckpointStore(dir, { logger: silentLogger });
  });

  afterEach(() => {
    store.close();
    rmSync(join(dir, '..'), { recursive: true, force: true });
  });

  it('names checkpoint files after their id', () => {
    expect(store.pathFor('build-abc')).toBe(join(dir, 'build-abc.checkpoint.db'));
  });

  it('rejects ids that are not plain file names', () => {
    expect(() => store.pathFor('../escape')).toThrow(ValidationError);
    expect(() => store.pathFor('a/b')).toThrow(ValidationError);
  });

  it('loads an empty map for a new job and creates the directory', () => {
    expect(store.load('job', 'fp-1').size).toBe(0);
    expect(existsSync(store.pathFor('job'))).toBe(true);
  });

  it('returns saved batches ordered by batch index', () => {
    store.load('job', 'fp-1');
    store.save('job', batch(2, 4, [[5, 6]]));
    store.save('job', batch(0, 0, [[1, 2], [3, 4]]));

    const loaded = store.load('job', 'fp-1');

    expect([...loaded.keys()]).toEqual([0, 2]);
    expect(loaded.get(0)).toMatchObject({ index: 0, start: 0, count: 2, dimensions: 2 });
    expect(rowsOf(loaded.get(0))).toEqual([
      [1, 2],
      [3, 4],
    ]);
    expect(rowsOf(loaded.get(2))).toEqual([[5, 6]]);
  });

  it('keeps batches across store instances', () => {
    store.load('job', 'fp-1');
    store.save('job', batch(0, 0, [[0.25, 0.5, 0.75]]));
    store.close();

    const reopened = new CheckpointStore(dir, { logger: silentLogger });
    try {
      expect(rowsOf(reopened.load('job', 'fp-1').get(0))).toEqual([[0.25, 0.5, 0.75]]);
    } finally {
      reopened.close();
    }
  });

  it('discards a checkpoint written for another fingerprint', () => {
    const logger = { warn: vi.fn() };
    store = new CheckpointStore(dir, { logger });
    store.load('job', 'fp-1');
    store.save('job', batch(0, 0, [[1, 2]]));

    expect(store.load('job', 'fp-2').size).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);

    // The new fingerprint now owns the file
    expect(store.load('job', 'fp-2').size).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('clears the database and its side files', () => {
    store.load('job', 'fp-1');
    store.save('job', batch(0, 0, [[1, 2]]));
    const path = store.pathFor('job');

    store.clear('job');

    expect(store.exists('job')).toBe(false);
    expect(existsSync(`${path}-wal`)).toBe(false);
    expect(existsSync(`${path}-shm`)).toBe(false);
    expect(() => store.clear('job')).not.toThrow();
  });

  it('lists checkpoints with their size', () => {
    store.load('build-a', 'fp-a');
    store.save('build-a', batch(0, 0, [[1], [2]]));
    store.save('build-a', batch(1, 2, [[3]]));
    store.load('append-b', 'fp-b');

    const listed = store.list();

    expect(listed.map((c) => [c.id, c.fingerprint, c.batches, c.vectors])).toEqual([
      ['append-b', 'fp-b', 0, 0],
      ['build-a', 'fp-a', 2, 3],
    ]);
    expect(listed[1]?.path).toBe(store.pathFor('build-a'));
  });

  it('lists nothing when the directory does not exist', () => {
    expect(store.list()).toEqual([]);
  });

  it('refuses a batch whose vectors disagree with its header', () => {
    expect(() =>
      store.save('job', { index: 0, start: 0, count: 2, dimensions: 2, vectors: [Float32Array.from([1, 2])] })
    ).toThrow(ValidationError);
    expect(() =>
      store.save('job', { index: 0, start: 0, count: 1, dimensions: 3, vectors: [Float32Array.from([1, 2])] })
    ).toThrow(ValidationError);
  });
});
