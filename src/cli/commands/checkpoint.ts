/**
 * Checkpoint Command
 *
 * Inspects and removes embedding checkpoints left by failed or cancelled
 * index runs:
 *   hix checkpoint list              - Show every checkpoint
 *   hix checkpoint clear <id>        - Delete one checkpoint
 *   hix checkpoint clear --force     - Delete all of them
 *
 * A checkpoint is resumed automatically by running the same `hix index`
 * command again; clearing it makes the next run start from scratch.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext, ContextFactory } from '../types.js';
import { resolveIndexLocation } from '../utils/settings.js';
import { loadConfig } from '../../config/index.js';
import { CheckpointStore, type CheckpointInfo } from '../../indexer/index.js';
import { CLIError } from '../../errors/index.js';

interface ClearOptions {
  force?: boolean;
}

/**
 * Format a date relative to now ("5 minutes ago").
 */
export function formatRelativeTime(date: Date, now: Date = new Date()): string {
  const seconds = Math.max(0, Math.floor((now.getTime() - date.getTime()) / 1000));

  if (seconds < 60) return 'just now';
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes} minute${minutes === 1 ? '' : 's'} ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours} hour${hours === 1 ? '' : 's'} ago`;
  const days = Math.floor(hours / 24);
  return `${days} day${days === 1 ? '' : 's'} ago`;
}

function openStore(ctx: CommandContext): CheckpointStore {
  const { checkpointDir } = resolveIndexLocation(loadConfig());
  ctx.debug(`Checkpoint directory: ${checkpointDir}`);
  return new CheckpointStore(checkpointDir, { logger: ctx });
}

function toJSON(info: CheckpointInfo): Record<string, unknown> {
  return {
    id: info.id,
    path: info.path,
    batches: info.batches,
    vectors: info.vectors,
    updatedAt: info.updatedAt.toISOString(),
  };
}

/**
 * Create the checkpoint command with its subcommands
 */
export function createCheckpointCommand(getContext: ContextFactory): Command {
  const checkpointCmd = new Command('checkpoint').description(
    'Inspect or clear embedding checkpoints'
  );

  // hix checkpoint list
  checkpointCmd
    .command('list')
    .alias('ls')
    .description('List checkpoints left by interrupted index runs')
    .action(() => {
      const ctx = getContext();
      const store = openStore(ctx);

      let checkpoints: CheckpointInfo[];
      try {
        checkpoints = store.list();
      } finally {
        store.close();
      }

      if (ctx.options.json) {
        console.log(
          JSON.stringify({ count: checkpoints.length, checkpoints: checkpoints.map(toJSON) }, null, 2)
        );
        return;
      }

      if (checkpoints.length === 0) {
        ctx.log(chalk.dim('No checkpoints. Every index run finished.'));
        return;
      }

      for (const info of checkpoints) {
        ctx.log(
          `${chalk.cyan(info.id)}  ${info.batches} batch${info.batches === 1 ? '' : 'es'}, ` +
            `${info.vectors} vector${info.vectors === 1 ? '' : 's'}  ` +
            chalk.dim(formatRelativeTime(info.updatedAt))
        );
      }
      ctx.log('');
      ctx.log(chalk.dim('Run the same hix index command again to resume.'));
    });

  // hix checkpoint clear [id]
  checkpointCmd
    .command('clear [id]')
    .description('Delete one checkpoint, or all of them with --force')
    .option('-f, --force', 'Confirm deleting every checkpoint')
    .action((id: string | undefined, options: ClearOptions) => {
      const ctx = getContext();
      const store = openStore(ctx);

      try {
        if (id !== undefined) {
          if (!store.exists(id)) {
            throw new CLIError(
              `Checkpoint not found: ${id}`,
              'Run: hix checkpoint list  to see available checkpoints'
            );
          }
          store.clear(id);

          if (ctx.options.json) {
            console.log(JSON.stringify({ success: true, cleared: [id] }));
          } else {
            ctx.log(`${chalk.green('✓')} Cleared checkpoint ${chalk.cyan(id)}`);
          }
          return;
        }

        const ids = store.list().map((info) => info.id);

        if (!options.force && !ctx.options.json) {
          ctx.log(chalk.yellow(`This will delete ${ids.length} checkpoint(s).`));
          ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
          process.exitCode = 1;
          return;
        }

        for (const checkpointId of ids) {
          store.clear(checkpointId);
        }

        if (ctx.options.json) {
          console.log(JSON.stringify({ success: true, cleared: ids }));
        } else {
          ctx.log(`${chalk.green('✓')} Cleared ${ids.length} checkpoint(s)`);
        }
      } finally {
        store.close();
      }
    });

  return checkpointCmd;
}
