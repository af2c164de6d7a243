#!/usr/bin/env node
/**
 * hix CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';

import type { GlobalOptions, CommandContext } from './types.js';
import { createCheckpointCommand } from './commands/checkpoint.js';
import { createConfigCommand } from './commands/config.js';
import { createIndexCommand } from './commands/index.js';
import { createSearchCommand } from './commands/search.js';
import { createVerifyCommand } from './commands/verify.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

/**
 * Version from package.json, which sits two levels above both
 * src/cli and dist/cli.
 */
function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
  );
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

// Create the root program
const program = new Command();

program
  .name('hix')
  .description('Structure-aware indexing and hybrid vector + keyword search for documents and code')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('hix index ./my-solution')}                 Build the index from a directory
  ${chalk.cyan('hix index --append --note "..."')}         Add a manual note to the index
  ${chalk.cyan('hix search "user authentication"')}        Search the index
  ${chalk.cyan('hix verify')}                              Check index and metadata agree
  ${chalk.cyan('hix checkpoint list')}                     Show interrupted index runs
  ${chalk.cyan('hix config set chunking.target_tokens 400')} Change a setting
`);

/**
 * Create a command context with logging utilities.
 * This is passed to all command handlers and doubles as their Logger.
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

// ============================================================================
// COMMANDS
// ============================================================================

program.addCommand(createIndexCommand(getContext));
program.addCommand(createSearchCommand(getContext));
program.addCommand(createVerifyCommand(getContext));
program.addCommand(createCheckpointCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: hix --help  to see available commands');
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
