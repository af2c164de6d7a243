/**
 * CLI command test harness
 *
 * Points HIX_HOME at a temp directory so config, index and checkpoints
 * never touch ~/.hix, and captures everything the command prints.
 */

import { vi } from 'vitest';
import { Command } from 'commander';
import { mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { CommandContext } from '../../types.js';
import { _clearEnvCache } from '../../../config/env.js';
import { resetAll } from '../../../test-utils/index.js';

export interface CliHarness {
  /** Temp directory holding everything below */
  root: string;
  /** HIX_HOME */
  home: string;
  /** Default index directory under HIX_HOME */
  indexDir: string;
  /** Default checkpoint directory under HIX_HOME */
  checkpointDir: string;
  logs: string[];
  warnings: string[];
  errors: string[];
  /** Lines written straight to stdout (JSON output, progress) */
  stdout: string[];
  context: CommandContext;
  run: (command: Command, args: string[]) => Promise<void>;
  cleanup: () => void;
}

export function createHarness(options: { json?: boolean; verbose?: boolean } = {}): CliHarness {
  const root = mkdtempSync(join(tmpdir(), 'hix-cli-'));
  const home = join(root, 'home');
  mkdirSync(home);

  vi.stubEnv('HIX_HOME', home);
  _clearEnvCache();
  resetAll();

  const logs: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];
  const stdout: string[] = [];

  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    stdout.push(args.map(String).join(' '));
  });
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});

  const context: CommandContext = {
    options: { verbose: options.verbose ?? false, json: options.json ?? false },
    log: (message) => logs.push(message),
    debug: () => {},
    warn: (message) => warnings.push(message),
    error: (message) => errors.push(message),
  };

  return {
    root,
    home,
    indexDir: join(home, 'index'),
    checkpointDir: join(home, 'checkpoints'),
    logs,
    warnings,
    errors,
    stdout,
    context,
    run: async (command, args) => {
      const program = new Command();
      program.exitOverride();
      program.addCommand(command);
      await program.parseAsync(['node', 'hix', ...args]);
    },
    cleanup: () => {
      vi.restoreAllMocks();
      vi.unstubAllEnvs();
      _clearEnvCache();
      process.exitCode = undefined;
      rmSync(root, { recursive: true, force: true });
    },
  };
}
