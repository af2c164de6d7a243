/**
 * ProgressReporter Tests
 *
 * Covers the stage descriptions and the three output modes. Interactive
 * mode is only checked where it prints nothing, since ora owns the TTY.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ProgressReporter,
  createProgressReporter,
  describeProgress,
  describeStage,
  formatBytes,
  formatDuration,
  type ProgressReporterOptions,
} from '../progress.js';
import type { IndexPipelineResult } from '../../../indexer/stages.js';

const NO_TYPES = { code: 0, sql: 0, spreadsheet_sheet: 0, generic_text: 0, manual_note: 0 };

function pipelineResult(overrides: Partial<IndexPipelineResult> = {}): IndexPipelineResult {
  return {
    mode: 'build',
    indexDir: '/tmp/hix/index',
    filesIndexed: 3,
    documentsIndexed: 4,
    chunksCreated: 120,
    chunksStored: 120,
    totalVectors: 150,
    resumedBatches: 0,
    totalDurationMs: 1500,
    stageDurations: {},
    indexSizeBytes: 2048,
    warnings: [],
    errors: [],
    ...overrides,
  };
}

describe('formatting helpers', () => {
  it('formats durations', () => {
    expect(formatDuration(999)).toBe('999ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });

  it('formats byte sizes', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(2048)).toBe('2.0 KB');
    expect(formatBytes(3 * 1024 * 1024)).toBe('3.0 MB');
  });

  it('describes running progress', () => {
    expect(describeProgress('scanning', 12, 0)).toBe('12 files found');
    expect(describeProgress('embedding', 40, 160)).toBe('40/160 chunks (25%)');
    expect(describeProgress('chunking', 1, 3)).toBe('1/3 (33%)');
  });
});

describe('describeStage', () => {
  it('lists non-empty document types after a scan', () => {
    expect(
      describeStage({
        stage: 'scanning',
        processed: 3,
        total: 3,
        durationMs: 4,
        totalSize: 2048,
        byType: { ...NO_TYPES, code: 2, sql: 1 },
      })
    ).toBe('3 files, 2.0 KB (2 code, 1 sql)');

    expect(
      describeStage({ stage: 'scanning', processed: 1, total: 1, durationMs: 1, totalSize: 10, byType: NO_TYPES })
    ).toBe('1 file, 10 B');
  });

  it('mentions failed documents after chunking', () => {
    expect(
      describeStage({
        stage: 'chunking',
        processed: 7,
        total: 7,
        durationMs: 5,
        documentsProcessed: 3,
        documentsFailed: 1,
        byKind: { brace: 4, sql: 0, paragraph: 3 },
      })
    ).toBe('7 chunks from 3 documents, 1 failed');
  });

  it('counts batches, resumed batches and retries', () => {
    expect(
      describeStage({
        stage: 'embedding',
        processed: 120,
        total: 120,
        durationMs: 900,
        model: 'fake/fake-hash',
        batches: 4,
        resumedBatches: 1,
        retries: 0,
      })
    ).toBe('120 chunks in 4 batches, 1 resumed');

    expect(
      describeStage({
        stage: 'embedding',
        processed: 1,
        total: 1,
        durationMs: 900,
        model: 'fake/fake-hash',
        batches: 1,
        resumedBatches: 0,
        retries: 1,
      })
    ).toBe('1 chunk in 1 batch, 1 retry');
  });

  it('reports the index size after storing', () => {
    expect(
      describeStage({ stage: 'storing', processed: 20, total: 20, durationMs: 3, totalVectors: 150 })
    ).toBe('index holds 150 vectors');
  });
});

describe('ProgressReporter', () => {
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    stdout = [];
    stderr = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      stdout.push(args.map(String).join(' '));
    });
    vi.spyOn(console, 'warn').mockImplementation((...args: unknown[]) => {
      stderr.push(args.map(String).join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      stderr.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('JSON mode', () => {
    let clock: number;
    const jsonOptions = (): ProgressReporterOptions => ({
      json: true,
      verbose: false,
      noColor: true,
      isInteractive: false,
      now: () => clock,
    });

    beforeEach(() => {
      clock = 0;
    });

    function events(): Array<{ type: string; stage?: string; data: Record<string, unknown> }> {
      return stdout.map((line) => JSON.parse(line));
    }

    it('emits a stage_start event with the total', () => {
      const reporter = new ProgressReporter(jsonOptions());
      reporter.startStage('scanning', 0);

      expect(events()).toEqual([
        expect.objectContaining({ type: 'stage_start', stage: 'scanning', data: { total: 0 } }),
      ]);
    });

    it('throttles progress events to one per 100ms', () => {
      const reporter = new ProgressReporter(jsonOptions());
      reporter.startStage('embedding', 160);

      reporter.updateProgress(40, 160);
      clock = 50;
      reporter.updateProgress(80, 160);
      clock = 150;
      reporter.updateProgress(120, 160);

      const progress = events().filter((event) => event.type === 'stage_progress');
      expect(progress.map((event) => event.data.processed)).toEqual([40, 120]);
    });

    it('puts the stage stats in the stage_complete data', () => {
      const reporter = new ProgressReporter(jsonOptions());
      reporter.completeStage({
        stage: 'embedding',
        processed: 120,
        total: 120,
        durationMs: 900,
        model: 'fake/fake-hash',
        batches: 4,
        resumedBatches: 1,
        retries: 2,
      });

      const [event] = events();
      expect(event?.stage).toBe('embedding');
      expect(event?.data).toEqual({
        processed: 120,
        total: 120,
        durationMs: 900,
        model: 'fake/fake-hash',
        batches: 4,
        resumedBatches: 1,
        retries: 2,
      });
    });

    it('emits warnings and errors with their context', () => {
      const reporter = new ProgressReporter(jsonOptions());
      reporter.warn('Chunk truncated to fit the batch budget', 'src/Big.cs');
      reporter.error('Unterminated quote', 'data/orders.csv');

      expect(events().map((event) => [event.type, event.data])).toEqual([
        ['warning', { message: 'Chunk truncated to fit the batch budget', context: 'src/Big.cs' }],
        ['error', { message: 'Unterminated quote', context: 'data/orders.csv' }],
      ]);
      expect(stderr).toEqual([]);
    });

    it('emits the whole result on completion', () => {
      const reporter = new ProgressReporter(jsonOptions());
      reporter.showSummary(pipelineResult());

      const [event] = events();
      expect(event?.type).toBe('complete');
      expect(event?.data.result).toEqual(pipelineResult());
    });
  });

  describe('text mode', () => {
    const textOptions: ProgressReporterOptions = {
      json: false,
      verbose: false,
      noColor: true,
      isInteractive: false,
    };

    it('prints one line per stage boundary', () => {
      const reporter = new ProgressReporter(textOptions);
      reporter.startStage('chunking', 3);
      reporter.updateProgress(1, 3, 'src/Alpha.cs');
      reporter.completeStage({
        stage: 'chunking',
        processed: 7,
        total: 7,
        durationMs: 5,
        documentsProcessed: 3,
        documentsFailed: 1,
        byKind: { brace: 4, sql: 0, paragraph: 3 },
      });

      expect(stdout).toEqual(['Chunking...', 'Chunking: 7 chunks from 3 documents, 1 failed']);
    });

    it('prints warnings and errors to stderr', () => {
      const reporter = new ProgressReporter(textOptions);
      reporter.warn('Stale checkpoint discarded');
      reporter.error('Unterminated quote', 'data/orders.csv');

      expect(stderr).toEqual([
        'Warning: Stale checkpoint discarded',
        'Error: Unterminated quote (data/orders.csv)',
      ]);
    });

    it('prints the summary rows', () => {
      const reporter = new ProgressReporter(textOptions);
      reporter.showSummary(
        pipelineResult({
          mode: 'append',
          resumedBatches: 2,
          warnings: ['a', 'b'],
          errors: ['data/orders.csv: Unterminated quote'],
        })
      );

      expect(stdout).toEqual([
        '',
        'Index Updated ✓',
        '',
        '  Documents:       4 (3 files, 1 note)',
        '  Chunks stored:   120',
        '  Index vectors:   150',
        '  Resumed batches: 2',
        '  Time elapsed:    1.5s',
        '  Index size:      2.0 KB',
        '  Location:        /tmp/hix/index',
        '',
        '  1 document skipped',
        '    - data/orders.csv: Unterminated quote',
        '',
        '  2 warnings during indexing',
        '',
      ]);
    });

    it('adds the stage breakdown and warning list when verbose', () => {
      const reporter = new ProgressReporter({ ...textOptions, verbose: true });
      reporter.showSummary(
        pipelineResult({ stageDurations: { scanning: 12, embedding: 1500 }, warnings: ['retrying batch 2'] })
      );

      expect(stdout).toContain('    Scanning:   12ms');
      expect(stdout).toContain('    Embedding:  1.5s');
      expect(stdout).toContain('    - retrying batch 2');
    });
  });

  it('holds warnings back under a spinner unless verbose', () => {
    const reporter = new ProgressReporter({ json: false, verbose: false, noColor: true, isInteractive: true });
    reporter.warn('Stale checkpoint discarded');

    expect(stderr).toEqual([]);
  });

  it('createProgressReporter fills in defaults', () => {
    expect(createProgressReporter()).toBeInstanceOf(ProgressReporter);
    expect(createProgressReporter({ json: true, verbose: true })).toBeInstanceOf(ProgressReporter);
  });
});
