/**
 * `hix config`: read and edit ~/.hix/config.toml.
 *
 *   hix config get chunking.target_tokens
 *   hix config set search.top_k 10
 *   hix config list
 *   hix config path
 *   hix config reset --force
 *   hix config check
 *
 * `set` validates against the config schema before anything is written.
 * Failures set exit code 1 rather than throwing, so a script piping
 * `--json` output still gets a parseable error object.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import {
  getConfigPath,
  getConfigValue,
  getEnv,
  getOllamaHost,
  hasApiKey,
  listConfig,
  loadConfig,
  resetConfig,
  setConfigValue,
  SETUP_INSTRUCTIONS,
  type Config,
} from '../../config/index.js';
import type { CommandContext, ContextFactory } from '../types.js';

function printJson(value: unknown, pretty = false): void {
  console.log(pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value));
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function fail(ctx: CommandContext, message: string): void {
  if (ctx.options.json) {
    console.error(JSON.stringify({ error: message }));
  } else {
    ctx.error(message);
  }
  process.exitCode = 1;
}

/** Run a subcommand body, turning loader and validation errors into exit code 1 */
function guarded(getContext: ContextFactory, body: (ctx: CommandContext) => void) {
  return (): void => {
    const ctx = getContext();
    try {
      body(ctx);
    } catch (error) {
      fail(ctx, error instanceof Error ? error.message : String(error));
    }
  };
}

// ============================================================================
// Provider check
// ============================================================================

interface ProviderCheck {
  ok: boolean;
  provider: Config['embedding']['provider'];
  model: string;
  endpoint?: string;
  problems: string[];
}

function checkProvider(embedding: Config['embedding']): ProviderCheck {
  const problems: string[] = [];
  if (embedding.provider === 'openai' && !hasApiKey()) {
    problems.push('OPENAI_API_KEY is not set');
  }

  const endpoint =
    embedding.base_url ?? (embedding.provider === 'ollama' ? getOllamaHost() : getEnv('OPENAI_BASE_URL'));

  return { ok: problems.length === 0, provider: embedding.provider, model: embedding.model, endpoint, problems };
}

// ============================================================================
// Command
// ============================================================================

export function createConfigCommand(getContext: ContextFactory): Command {
  const configCmd = new Command('config').description('Read and edit configuration');

  configCmd
    .command('get <key>')
    .description('Print one value, e.g. hix config get chunking.target_tokens')
    .action((key: string) =>
      guarded(getContext, (ctx) => {
        const value = getConfigValue(key);
        if (value === undefined) {
          fail(ctx, `Unknown config key: ${key}`);
          ctx.log(`Run ${chalk.cyan('hix config list')} to see every key.`);
          return;
        }
        if (ctx.options.json) printJson({ key, value });
        else ctx.log(formatValue(value));
      })()
    );

  configCmd
    .command('set <key> <value>')
    .description('Validate and write one value, e.g. hix config set search.top_k 10')
    .action((key: string, value: string) =>
      guarded(getContext, (ctx) => {
        setConfigValue(key, value);
        if (ctx.options.json) printJson({ success: true, key, value: getConfigValue(key) });
        else ctx.log(`${chalk.green('✓')} ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
      })()
    );

  configCmd
    .command('list')
    .alias('ls')
    .description('Print every value, grouped by section')
    .action(
      guarded(getContext, (ctx) => {
        const entries = listConfig();
        if (ctx.options.json) {
          printJson(Object.fromEntries(entries), true);
          return;
        }

        let section: string | undefined;
        for (const [key, value] of entries) {
          const [head = ''] = key.split('.');
          if (head !== section) {
            ctx.log(section === undefined ? chalk.bold(`[${head}]`) : `\n${chalk.bold(`[${head}]`)}`);
            section = head;
          }
          ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
        }
        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
      })
    );

  configCmd
    .command('path')
    .description('Print the config file location')
    .action(
      guarded(getContext, (ctx) => {
        const path = getConfigPath();
        if (ctx.options.json) printJson({ path });
        else ctx.log(path);
      })
    );

  configCmd
    .command('reset')
    .description('Overwrite the config file with the default template')
    .option('-f, --force', 'Required; there is no prompt')
    .action((options: { force?: boolean }) =>
      guarded(getContext, (ctx) => {
        if (!options.force && !ctx.options.json) {
          ctx.log(chalk.yellow(`This overwrites ${getConfigPath()} with the defaults.`));
          ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
          process.exitCode = 1;
          return;
        }
        const path = resetConfig();
        if (ctx.options.json) printJson({ success: true, path });
        else ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
      })()
    );

  configCmd
    .command('check')
    .description('Check that the configured embedding provider is usable')
    .action(
      guarded(getContext, (ctx) => {
        const result = checkProvider(loadConfig().embedding);
        if (!result.ok) process.exitCode = 1;

        if (ctx.options.json) {
          printJson(result);
          return;
        }

        ctx.log(`${chalk.cyan('Provider:')} ${result.provider}`);
        ctx.log(`${chalk.cyan('Model:')}    ${result.model}`);
        ctx.log(`${chalk.cyan('Endpoint:')} ${result.endpoint ?? '(provider default)'}`);
        ctx.log('');

        if (result.ok) {
          ctx.log(`${chalk.green('✓')} Embedding provider is configured`);
          return;
        }
        for (const problem of result.problems) {
          ctx.log(`${chalk.red('✗')} ${problem}`);
        }
        ctx.log('');
        ctx.log(SETUP_INSTRUCTIONS[result.provider]);
      })
    );

  return configCmd;
}
