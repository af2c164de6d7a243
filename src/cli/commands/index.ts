/**
 * Index Command
 *
 * Builds (or grows) the hybrid index from a directory and manual notes.
 *
 * Usage:
 *   hix index <path>                   Index a directory
 *   hix index . --note "Deploys on Fridays are frozen"
 *   hix index ./more-docs --append     Grow the existing index
 *   hix index . --index-dir ./.hix     Write the index somewhere else
 *   hix index . --json                 Output progress as NDJSON
 *
 * The indexing pipeline:
 * 1. Scanning - Discover files matching supported extensions
 * 2. Chunking - Split documents into structure-aware chunks
 * 3. Embedding - Embed chunks in checkpointed batches
 * 4. Storing - Write index.vec and index.meta.json
 *
 * Ctrl+C stops between batches; running the same command again resumes
 * from the checkpoint.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import { existsSync, statSync } from 'node:fs';

import type { ContextFactory } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import {
  batchingOptionsFrom,
  chunkOptionsFrom,
  resolveIndexLocation,
  retryOptionsFrom,
} from '../utils/settings.js';
import { runIndexPipeline } from '../../indexer/index.js';
import { createEmbeddingProvider } from '../../indexer/embedder/index.js';
import { loadConfig } from '../../config/index.js';
import { CLIError } from '../../errors/index.js';

/**
 * Command-specific options.
 */
interface IndexCommandOptions {
  note: string[];
  append?: boolean;
  indexDir?: string;
}

/** Commander collector for a repeatable option */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create the index command.
 *
 * @param getContext - Factory function to get the command context
 * @returns Configured Commander command
 */
export function createIndexCommand(getContext: ContextFactory): Command {
  return new Command('index')
    .argument('[path]', 'Directory to index (omit to index --note text only)')
    .description('Build the hybrid index from a directory and manual notes')
    .option('--note <text>', 'Index a manual note (repeatable)', collect, [])
    .option('--append', 'Add to the existing index instead of replacing it', false)
    .option('--index-dir <dir>', 'Index directory (defaults to indexing.index_dir)')
    .action(async (path: string | undefined, cmdOptions: IndexCommandOptions) => {
      const ctx = getContext();

      let rootPath: string | undefined;
      if (path !== undefined) {
        rootPath = resolve(path);

        if (!existsSync(rootPath)) {
          throw new CLIError(`Path does not exist: ${rootPath}`, 'Check the path and try again');
        }
        if (!statSync(rootPath).isDirectory()) {
          throw new CLIError(
            `Path is not a directory: ${rootPath}`,
            'hix index requires a directory path, not a file'
          );
        }
      } else if (cmdOptions.note.length === 0) {
        throw new CLIError(
          'Nothing to index',
          'Pass a directory, one or more --note values, or both'
        );
      }

      const config = loadConfig();
      const { indexDir, checkpointDir } = resolveIndexLocation(config, cmdOptions.indexDir);

      if (rootPath) ctx.debug(`Indexing path: ${rootPath}`);
      ctx.debug(`Manual notes: ${cmdOptions.note.length}`);
      ctx.debug(`Index directory: ${indexDir}`);
      ctx.debug(`Embedding: ${config.embedding.model} (${config.embedding.provider})`);

      const embeddingProvider = createEmbeddingProvider(config.embedding, { logger: ctx });

      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
        noColor: !!process.env.NO_COLOR,
        isInteractive: process.stdout.isTTY ?? false,
      });

      // First Ctrl+C stops at the next batch boundary; a second one kills
      const controller = new AbortController();
      const onSigint = (): void => {
        reporter.warn('Stopping after the current batch (Ctrl+C again to force quit)');
        controller.abort();
      };
      process.once('SIGINT', onSigint);

      try {
        const result = await runIndexPipeline({
          rootPath,
          notes: cmdOptions.note,
          indexDir,
          checkpointDir,
          append: cmdOptions.append,
          ignorePatterns: config.indexing.ignore_patterns,
          embeddingProvider,
          chunkOptions: chunkOptionsFrom(config),
          batching: batchingOptionsFrom(config),
          retry: retryOptionsFrom(config),
          signal: controller.signal,

          // Wire up progress callbacks to the reporter
          onStageStart: (stage, total) => {
            reporter.startStage(stage, total);
          },
          onProgress: (_stage, processed, total, currentFile) => {
            reporter.updateProgress(processed, total, currentFile);
          },
          onStageComplete: (_stage, stats) => {
            reporter.completeStage(stats);
          },
          onWarning: (message, context) => {
            reporter.warn(message, context);
          },
          onError: (error, context) => {
            reporter.error(error.message, context);
          },
        });

        reporter.showSummary(result);
      } finally {
        process.removeListener('SIGINT', onSigint);
      }
    });
}
