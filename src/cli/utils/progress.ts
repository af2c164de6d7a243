/**
 * Progress Reporter
 *
 * Renders the index pipeline's callbacks. Three output modes:
 * - Interactive: one ora spinner per stage
 * - JSON: NDJSON events on stdout
 * - Text: one line per stage start and finish, for logs and CI
 *
 * Spinner updates are throttled to 100ms; the embedding stage can fire a
 * progress callback per batch and a large job has thousands of them.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

import {
  isIndexingStage,
  type IndexingStage,
  type IndexPipelineResult,
  type StageStats,
} from '../../indexer/stages.js';
import { DOCUMENT_TYPES } from '../../indexer/types.js';

const STAGE_LABELS: Record<IndexingStage, string> = {
  scanning: 'Scanning',
  chunking: 'Chunking',
  embedding: 'Embedding',
  storing: 'Storing',
};

export interface ProgressReporterOptions {
  json: boolean;

  /** Print warnings under a spinner and a per-stage timing breakdown */
  verbose: boolean;

  noColor: boolean;

  /** Whether stdout is a TTY (spinners need one) */
  isInteractive: boolean;

  /** Clock for update throttling, in milliseconds */
  now?: () => number;
}

export type ProgressEventType =
  | 'stage_start'
  | 'stage_progress'
  | 'stage_complete'
  | 'warning'
  | 'error'
  | 'complete';

/** One NDJSON line in --json mode */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: IndexingStage;
  data: Record<string, unknown>;
}

// ============================================================================
// Formatting
// ============================================================================

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function plural(count: number, noun: string, nouns = `${noun}s`): string {
  return `${count} ${count === 1 ? noun : nouns}`;
}

/**
 * One-line outcome of a finished stage.
 *
 * @example
 * describeStage({ stage: 'embedding', processed: 120, batches: 4, resumedBatches: 1, retries: 0, ... })
 * // '120 chunks in 4 batches, 1 resumed'
 */
export function describeStage(stats: StageStats): string {
  switch (stats.stage) {
    case 'scanning': {
      const types = DOCUMENT_TYPES.filter((type) => stats.byType[type] > 0).map(
        (type) => `${stats.byType[type]} ${type}`
      );
      const size = `${plural(stats.processed, 'file')}, ${formatBytes(stats.totalSize)}`;
      return types.length > 0 ? `${size} (${types.join(', ')})` : size;
    }
    case 'chunking': {
      const line = `${plural(stats.processed, 'chunk')} from ${plural(stats.documentsProcessed, 'document')}`;
      return stats.documentsFailed > 0 ? `${line}, ${stats.documentsFailed} failed` : line;
    }
    case 'embedding': {
      const parts = [`${plural(stats.processed, 'chunk')} in ${plural(stats.batches, 'batch', 'batches')}`];
      if (stats.resumedBatches > 0) parts.push(`${stats.resumedBatches} resumed`);
      if (stats.retries > 0) parts.push(plural(stats.retries, 'retry', 'retries'));
      return parts.join(', ');
    }
    case 'storing':
      return `index holds ${plural(stats.totalVectors, 'vector')}`;
  }
}

/** Spinner text while a stage runs; scanning has no total up front */
export function describeProgress(stage: IndexingStage, processed: number, total: number): string {
  if (total <= 0) {
    return stage === 'scanning' ? `${processed} files found` : `${processed}`;
  }
  const percentage = Math.round((processed / total) * 100);
  const unit = stage === 'embedding' || stage === 'storing' ? ' chunks' : '';
  return `${processed}/${total}${unit} (${percentage}%)`;
}

/** Keep the tail of a long path, which is the part that changes */
function truncatePath(path: string, max = 40): string {
  return path.length <= max ? path : '...' + path.slice(-(max - 3));
}

// ============================================================================
// Reporter
// ============================================================================

/**
 * Wire the pipeline callbacks straight to the matching methods:
 *
 * ```typescript
 * const reporter = createProgressReporter({ json: ctx.options.json });
 * const result = await runIndexPipeline({
 *   ...options,
 *   onStageStart: (stage, total) => reporter.startStage(stage, total),
 *   onProgress: (stage, processed, total, file) => reporter.updateProgress(processed, total, file),
 *   onStageComplete: (_stage, stats) => reporter.completeStage(stats),
 * });
 * reporter.showSummary(result);
 * ```
 */
export class ProgressReporter {
  private readonly options: ProgressReporterOptions;
  private readonly now: () => number;
  private spinner: Ora | null = null;
  private currentStage: IndexingStage | null = null;
  private lastUpdate = Number.NEGATIVE_INFINITY;

  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(options: ProgressReporterOptions) {
    this.options = options;
    this.now = options.now ?? (() => performance.now());

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  startStage(stage: IndexingStage, total = 0): void {
    this.currentStage = stage;
    this.lastUpdate = Number.NEGATIVE_INFINITY;

    if (this.options.json) {
      this.emit('stage_start', { total }, stage);
      return;
    }

    const label = STAGE_LABELS[stage];
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({ text: `${label}...`, prefixText: chalk.cyan(label.padEnd(10)) }).start();
    } else {
      console.log(`${label}...`);
    }
  }

  updateProgress(processed: number, total: number, currentFile?: string): void {
    if (this.currentStage === null) return;

    const now = this.now();
    if (now - this.lastUpdate < ProgressReporter.UPDATE_THROTTLE_MS) return;
    this.lastUpdate = now;

    if (this.options.json) {
      this.emit('stage_progress', { processed, total, currentFile }, this.currentStage);
      return;
    }

    // Text mode prints only stage boundaries
    if (this.spinner) {
      const text = describeProgress(this.currentStage, processed, total);
      this.spinner.text = currentFile ? `${text.padEnd(24)} ${chalk.dim(truncatePath(currentFile))}` : text;
    }
  }

  completeStage(stats: StageStats): void {
    if (this.options.json) {
      const { stage, ...data } = stats;
      this.emit('stage_complete', data, stage);
    } else if (this.spinner) {
      this.spinner.succeed(describeStage(stats));
    } else {
      console.log(`${STAGE_LABELS[stats.stage]}: ${describeStage(stats)}`);
    }

    this.currentStage = null;
    this.spinner = null;
  }

  warn(message: string, context?: string): void {
    if (this.options.json) {
      this.emit('warning', { message, context }, this.currentStage ?? undefined);
      return;
    }

    // A warning printed under a live spinner garbles it; the summary counts them anyway
    if (this.options.verbose || !this.options.isInteractive) {
      const suffix = context ? ` (${context})` : '';
      console.warn(chalk.yellow(`Warning: ${message}${suffix}`));
    }
  }

  error(message: string, context?: string): void {
    if (this.options.json) {
      this.emit('error', { message, context }, this.currentStage ?? undefined);
      return;
    }

    const suffix = context ? ` (${context})` : '';
    console.error(chalk.red(`Error: ${message}${suffix}`));
  }

  showSummary(result: IndexPipelineResult): void {
    if (this.options.json) {
      this.emit('complete', { result });
      return;
    }

    const notes = result.documentsIndexed - result.filesIndexed;
    const row = (label: string, value: string): void => {
      console.log(`  ${chalk.dim(label.padEnd(17))}${value}`);
    };

    console.log('');
    console.log(chalk.green.bold(result.mode === 'append' ? 'Index Updated ✓' : 'Index Complete ✓'));
    console.log('');
    row('Documents:', `${result.documentsIndexed} (${plural(result.filesIndexed, 'file')}, ${plural(notes, 'note')})`);
    row('Chunks stored:', `${result.chunksStored}`);
    row('Index vectors:', `${result.totalVectors}`);
    if (result.resumedBatches > 0) {
      row('Resumed batches:', `${result.resumedBatches}`);
    }
    row('Time elapsed:', formatDuration(result.totalDurationMs));
    row('Index size:', formatBytes(result.indexSizeBytes));
    row('Location:', result.indexDir);

    if (this.options.verbose) {
      const stages = Object.entries(result.stageDurations).filter(
        (entry): entry is [IndexingStage, number] => isIndexingStage(entry[0]) && entry[1] !== undefined
      );
      if (stages.length > 0) {
        console.log('');
        console.log(chalk.dim('  Breakdown:'));
        for (const [stage, durationMs] of stages) {
          console.log(`    ${chalk.dim(`${STAGE_LABELS[stage]}:`.padEnd(12))}${formatDuration(durationMs)}`);
        }
      }
    }

    if (result.errors.length > 0) {
      console.log('');
      console.log(chalk.red(`  ${plural(result.errors.length, 'document')} skipped`));
      for (const error of result.errors.slice(0, 5)) {
        console.log(chalk.dim(`    - ${error}`));
      }
    }

    if (result.warnings.length > 0) {
      console.log('');
      console.log(chalk.yellow(`  ${plural(result.warnings.length, 'warning')} during indexing`));
      if (this.options.verbose) {
        for (const warning of result.warnings.slice(0, 5)) {
          console.log(chalk.dim(`    - ${warning}`));
        }
        if (result.warnings.length > 5) {
          console.log(chalk.dim(`    ... and ${result.warnings.length - 5} more`));
        }
      }
    }

    console.log('');
  }

  private emit(type: ProgressEventType, data: Record<string, unknown>, stage?: IndexingStage): void {
    const event: ProgressEvent = { type, timestamp: new Date().toISOString(), stage, data };
    console.log(JSON.stringify(event));
  }
}

export function createProgressReporter(options: Partial<ProgressReporterOptions> = {}): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? Boolean(process.env.NO_COLOR),
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
    now: options.now,
  });
}
