/**
 * Checkpoint Module
 *
 * Durable per-job log of embedded batches, used to resume a failed or
 * cancelled embedding job without re-embedding finished batches.
 */

export { CheckpointStore, vectorsToBlob, blobToVectors } from './store.js';
export type { CheckpointStoreOptions } from './store.js';
export type { CheckpointBatch, CheckpointInfo } from './types.js';
