/**
 * Verify Command
 *
 * Health check for the persisted index:
 *   hix verify          - Show verification results
 *   hix verify --json   - Output as JSON (for scripts)
 *
 * Checks performed:
 * 1. Both index files load (missing or corrupt files fail with exit code 10)
 * 2. Vector count matches metadata count (exit code 9 if not)
 * 3. Embedding model matches current config (warning if mismatch)
 * 4. No interrupted job left a checkpoint for this index (warning)
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { ContextFactory } from '../types.js';
import { resolveIndexLocation } from '../utils/settings.js';
import { loadConfig } from '../../config/index.js';
import { checkpointIdFor, CheckpointStore } from '../../indexer/index.js';
import { indexExists, loadIndex, verifyIndex } from '../../search/index.js';
import { CLIError } from '../../errors/index.js';
import { silentLogger } from '../../utils/index.js';

// ============================================================================
// Types
// ============================================================================

interface VerifyIssue {
  severity: 'error' | 'warning';
  message: string;
  hint: string;
}

interface VerifyResultJSON {
  consistent: boolean;
  indexDir: string;
  model: string;
  dimensions: number;
  vectorCount: number;
  metadataCount: number;
  issues: VerifyIssue[];
}

/** Same code an IndexMismatchError exits with */
const MISMATCH_EXIT_CODE = 9;

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the verify command
 */
export function createVerifyCommand(getContext: ContextFactory): Command {
  return new Command('verify')
    .description('Check that the vector index and metadata store agree')
    .option('--index-dir <dir>', 'Index directory (defaults to indexing.index_dir)')
    .action((cmdOptions: { indexDir?: string }) => {
      const ctx = getContext();
      const config = loadConfig();
      const { indexDir, checkpointDir } = resolveIndexLocation(config, cmdOptions.indexDir);

      ctx.debug(`Verifying index in ${indexDir}`);

      if (!indexExists(indexDir)) {
        throw new CLIError(`No index found in ${indexDir}`, 'Run: hix index <path>  to build one');
      }

      const handle = loadIndex(indexDir);
      const verification = verifyIndex(handle, silentLogger);

      const issues: VerifyIssue[] = verification.issues.map((message) => ({
        severity: 'error',
        message,
        hint: 'Rebuild the index: hix index <path>',
      }));

      if (handle.model !== config.embedding.model) {
        issues.push({
          severity: 'warning',
          message: `Embedding model mismatch: index uses "${handle.model}", config uses "${config.embedding.model}"`,
          hint: 'Rebuild the index or change embedding.model to match',
        });
      }

      const store = new CheckpointStore(checkpointDir, { logger: ctx });
      try {
        for (const append of [false, true]) {
          const id = checkpointIdFor(indexDir, append);
          if (store.exists(id)) {
            issues.push({
              severity: 'warning',
              message: `An interrupted ${append ? 'append' : 'build'} left checkpoint ${id}`,
              hint: `Resume with the same hix index command, or run: hix checkpoint clear ${id}`,
            });
          }
        }
      } finally {
        store.close();
      }

      if (!verification.consistent) {
        process.exitCode = MISMATCH_EXIT_CODE;
      }

      // JSON output
      if (ctx.options.json) {
        const output: VerifyResultJSON = {
          consistent: verification.consistent,
          indexDir,
          model: handle.model,
          dimensions: verification.dimensions,
          vectorCount: verification.vectorCount,
          metadataCount: verification.metadataCount,
          issues,
        };
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      // Text output
      const lines: string[] = [];

      lines.push(
        chalk.bold(`Index: ${indexDir}`) +
          (verification.consistent ? chalk.green(' (consistent)') : chalk.red(' (inconsistent)'))
      );
      lines.push(chalk.dim('─'.repeat(40)));
      lines.push(`${chalk.cyan('Vectors:')}     ${verification.vectorCount}`);
      lines.push(`${chalk.cyan('Metadata:')}    ${verification.metadataCount}`);
      lines.push(`${chalk.cyan('Dimensions:')}  ${verification.dimensions}`);
      lines.push(`${chalk.cyan('Embedding:')}   ${handle.model}`);

      if (issues.length > 0) {
        lines.push('');
        lines.push(chalk.bold('Issues:'));
        for (const issue of issues) {
          const icon = issue.severity === 'error' ? chalk.red('✗') : chalk.yellow('⚠');
          lines.push(`  ${icon} ${issue.message}`);
          lines.push(chalk.dim(`    ${issue.hint}`));
        }
      } else {
        lines.push('');
        lines.push(chalk.green('No issues found. Index is ready for queries.'));
      }

      ctx.log(lines.join('\n'));
    });
}
