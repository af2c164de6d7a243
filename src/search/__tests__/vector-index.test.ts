/**
 * FlatL2Index Tests
 */

import { describe, it, expect } from 'vitest';

import { FlatL2Index } from '../vector-index.js';
import { IndexMismatchError } from '../../errors/index.js';

function vectors(...rows: number[][]): Float32Array[] {
  return rows.map((row) => Float32Array.from(row));
}

describe('FlatL2Index', () => {
  it('returns nearest neighbours by squared distance', () => {
    const index = new FlatL2Index(2);
    index.add(vectors([0, 0], [1, 0], [0, 2]));

    expect(index.search(Float32Array.from([0, 0]), 2)).toEqual([
      { position: 0, distance: 0 },
      { position: 1, distance: 1 },
    ]);
  });

  it('breaks distance ties by position', () => {
    const index = new FlatL2Index(2);
    index.add(vectors([1, 0], [0, 1], [-1, 0]));

    expect(index.search(Float32Array.from([0, 0]), 3).map((n) => n.position)).toEqual([0, 1, 2]);
  });

  it('caps k at the index size', () => {
    const index = new FlatL2Index(1);
    index.add(vectors([3], [1]));

    expect(index.search(Float32Array.from([0]), 10)).toEqual([
      { position: 1, distance: 1 },
      { position: 0, distance: 9 },
    ]);
  });

  it('returns nothing for an empty index or k of 0', () => {
    const index = new FlatL2Index(2);
    expect(index.search(Float32Array.from([0, 0]), 5)).toEqual([]);

    index.add(vectors([1, 1]));
    expect(index.search(Float32Array.from([0, 0]), 0)).toEqual([]);
  });

  it('grows past its initial capacity without moving vectors', () => {
    const index = new FlatL2Index(1);
    for (let i = 0; i < 100; i++) {
      index.add(vectors([i]));
    }

    expect(index.size).toBe(100);
    expect(Array.from(index.vectorAt(0))).toEqual([0]);
    expect(Array.from(index.vectorAt(99))).toEqual([99]);
    expect(index.search(Float32Array.from([50.2]), 1)[0]?.position).toBe(50);
  });

  it('adds nothing when one vector has the wrong dimension', () => {
    const index = new FlatL2Index(2);
    index.add(vectors([1, 1]));

    expect(() => index.add(vectors([2, 2], [3, 3, 3]))).toThrow(IndexMismatchError);
    expect(index.size).toBe(1);
  });

  it('rejects a query of the wrong dimension', () => {
    const index = new FlatL2Index(2);
    index.add(vectors([1, 1]));

    expect(() => index.search(Float32Array.from([1]), 1)).toThrow(
      'Query has 1 dimensions, index has 2'
    );
  });

  it('rejects a non-positive dimension', () => {
    expect(() => new FlatL2Index(0)).toThrow(IndexMismatchError);
  });

  it('returns copies from vectorAt()', () => {
    const index = new FlatL2Index(2);
    index.add(vectors([1, 2]));

    const copy = index.vectorAt(0);
    copy[0] = 42;

    expect(Array.from(index.vectorAt(0))).toEqual([1, 2]);
    expect(() => index.vectorAt(1)).toThrow(RangeError);
  });

  it('rebuilds from packed rows', () => {
    const index = FlatL2Index.fromRows(2, Float32Array.from([1, 2, 3, 4]));

    expect(index.size).toBe(2);
    expect(Array.from(index.rows())).toEqual([1, 2, 3, 4]);
    expect(() => FlatL2Index.fromRows(2, Float32Array.from([1, 2, 3]))).toThrow(
      IndexMismatchError
    );
  });
});
