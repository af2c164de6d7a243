/**
 * Checkpoint Types
 */

/**
 * One embedded batch as stored in a checkpoint.
 *
 * `start` and `count` locate the batch in the job's text list; a batch is
 * only reused when both still match the current plan.
 */
export interface CheckpointBatch {
  /** 0-based batch number (primary key) */
  index: number;
  /** Position of the batch's first text in the job */
  start: number;
  /** Number of texts (and vectors) in the batch */
  count: number;
  /** Vector dimension */
  dimensions: number;
  vectors: Float32Array[];
}

/**
 * Summary of a checkpoint file, for `hix checkpoint list`.
 */
export interface CheckpointInfo {
  id: string;
  path: string;
  fingerprint: string | null;
  batches: number;
  vectors: number;
  /** Last modification of the database file */
  updatedAt: Date;
}
