/**
 * Flat L2 Vector Index
 *
 * Exact nearest-neighbour search by squared Euclidean distance over a
 * single growable Float32Array. Positions are assigned in insertion order
 * and never change, so position `i` always pairs with `metadata[i]`.
 */

import { IndexMismatchError } from '../errors/index.js';

/** Initial capacity, in vectors */
const INITIAL_CAPACITY = 64;

/**
 * One nearest-neighbour hit.
 */
export interface Neighbor {
  /** Insertion position of the vector */
  position: number;
  /** Squared Euclidean distance to the query */
  distance: number;
}

/**
 * Squared Euclidean distance between a query and row `row` of `data`.
 */
function squaredDistance(
  query: Float32Array,
  data: Float32Array,
  row: number,
  dimensions: number
): number {
  const offset = row * dimensions;
  let sum = 0;
  for (let d = 0; d < dimensions; d++) {
    const diff = (query[d] ?? 0) - (data[offset + d] ?? 0);
    sum += diff * diff;
  }
  return sum;
}

export class FlatL2Index {
  readonly dimensions: number;

  private data: Float32Array;
  private count = 0;

  constructor(dimensions: number) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new IndexMismatchError(`Invalid vector dimension: ${dimensions}`);
    }
    this.dimensions = dimensions;
    this.data = new Float32Array(INITIAL_CAPACITY * dimensions);
  }

  /**
   * Rebuild an index from rows packed back to back.
   */
  static fromRows(dimensions: number, rows: Float32Array): FlatL2Index {
    if (rows.length % dimensions !== 0) {
      throw new IndexMismatchError(
        `Vector data of length ${rows.length} is not a whole number of ${dimensions}-dimensional rows`
      );
    }
    const index = new FlatL2Index(dimensions);
    const count = rows.length / dimensions;
    index.reserve(count);
    index.data.set(rows);
    index.count = count;
    return index;
  }

  /** Number of vectors held */
  get size(): number {
    return this.count;
  }

  /**
   * Throw unless every vector has this index's dimension.
   */
  assertDimensions(vectors: readonly Float32Array[]): void {
    vectors.forEach((vector, i) => {
      if (vector.length !== this.dimensions) {
        throw new IndexMismatchError(
          `Vector ${i} has ${vector.length} dimensions, index has ${this.dimensions}`
        );
      }
    });
  }

  /**
   * Append vectors at positions size .. size + vectors.length - 1.
   * Nothing is added unless every vector fits.
   */
  add(vectors: readonly Float32Array[]): void {
    this.assertDimensions(vectors);
    this.reserve(this.count + vectors.length);
    for (const vector of vectors) {
      this.data.set(vector, this.count * this.dimensions);
      this.count++;
    }
  }

  /**
   * Copy of the vector at `position`.
   */
  vectorAt(position: number): Float32Array {
    if (!Number.isInteger(position) || position < 0 || position >= this.count) {
      throw new RangeError(`Position ${position} is outside 0..${this.count - 1}`);
    }
    const start = position * this.dimensions;
    return this.data.slice(start, start + this.dimensions);
  }

  /**
   * The live rows, packed back to back (a view, not a copy).
   */
  rows(): Float32Array {
    return this.data.subarray(0, this.count * this.dimensions);
  }

  /**
   * The `k` nearest vectors, closest first. Equal distances keep
   * position order.
   */
  search(query: Float32Array, k: number): Neighbor[] {
    if (query.length !== this.dimensions) {
      throw new IndexMismatchError(
        `Query has ${query.length} dimensions, index has ${this.dimensions}`
      );
    }
    if (k <= 0 || this.count === 0) {
      return [];
    }

    const neighbors: Neighbor[] = [];
    for (let row = 0; row < this.count; row++) {
      neighbors.push({
        position: row,
        distance: squaredDistance(query, this.data, row, this.dimensions),
      });
    }

    neighbors.sort((a, b) => a.distance - b.distance || a.position - b.position);
    return neighbors.slice(0, k);
  }

  private reserve(count: number): void {
    const needed = count * this.dimensions;
    if (needed <= this.data.length) {
      return;
    }
    let capacity = this.data.length;
    while (capacity < needed) {
      capacity *= 2;
    }
    const grown = new Float32Array(capacity);
    grown.set(this.data.subarray(0, this.count * this.dimensions));
    this.data = grown;
  }
}
