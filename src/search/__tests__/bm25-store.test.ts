/**
 * BM25StoreManager Tests
 *
 * Caching per index handle and invalidation on corpus change.
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  BM25StoreManager,
  getBM25StoreManager,
  resetBM25StoreManager,
} from '../bm25-store.js';
import { appendToIndex, buildIndex } from '../index-store.js';
import type { IndexHandle } from '../types.js';
import { makeChunk } from '../../test-utils/index.js';

function handleOf(...texts: string[]): IndexHandle {
  return buildIndex(
    texts.map((_, i) => Float32Array.from([i])),
    texts.map((text, i) => makeChunk(`doc-${i}`, text)),
    'fake-hash'
  );
}

describe('BM25StoreManager', () => {
  let manager: BM25StoreManager;

  beforeEach(() => {
    manager = new BM25StoreManager();
  });

  it('builds once per handle', () => {
    const handle = handleOf('alpha beta', 'gamma');

    const first = manager.getIndex(handle);
    const second = manager.getIndex(handle);

    expect(second).toBe(first);
    expect(manager.buildCount).toBe(1);
    expect(first.documentCount).toBe(2);
  });

  it('keeps separate indexes for separate handles', () => {
    const a = manager.getIndex(handleOf('alpha'));
    const b = manager.getIndex(handleOf('beta', 'gamma'));

    expect(a).not.toBe(b);
    expect(b.documentCount).toBe(2);
  });

  it('rebuilds after an append', () => {
    const handle = handleOf('alpha beta');
    const before = manager.getIndex(handle);

    appendToIndex(handle, [Float32Array.from([9])], [makeChunk('doc-9', 'delta')]);
    const after = manager.getIndex(handle);

    expect(after).not.toBe(before);
    expect(after.documentCount).toBe(2);
    expect(after.scores('delta')[1]).toBeGreaterThan(0);
    expect(manager.buildCount).toBe(2);
  });

  it('rebuilds for different BM25 parameters', () => {
    const handle = handleOf('alpha');

    manager.getIndex(handle);
    manager.getIndex(handle, { k1: 2 });

    expect(manager.buildCount).toBe(2);
  });

  it('rebuilds after invalidate() and clearAll()', () => {
    const handle = handleOf('alpha');

    manager.getIndex(handle);
    manager.invalidate(handle);
    manager.getIndex(handle);
    manager.clearAll();
    manager.getIndex(handle);

    expect(manager.buildCount).toBe(3);
  });
});

describe('singleton', () => {
  beforeEach(() => {
    resetBM25StoreManager();
  });

  it('returns the same manager until reset', () => {
    const first = getBM25StoreManager();
    expect(getBM25StoreManager()).toBe(first);

    resetBM25StoreManager();
    expect(getBM25StoreManager()).not.toBe(first);
  });
});
