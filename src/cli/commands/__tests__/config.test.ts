/**
 * Tests for config command
 *
 * HIX_HOME points at a temp directory, so every subcommand works on a
 * real config.toml there.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { createConfigCommand } from '../config.js';
import { createHarness, type CliHarness } from './harness.js';
import { _clearEnvCache, CONFIG_TEMPLATE } from '../../../config/index.js';

describe('createConfigCommand', () => {
  let h: CliHarness;
  let configPath: string;

  beforeEach(() => {
    h = createHarness();
    configPath = join(h.home, 'config.toml');
  });

  afterEach(() => {
    h.cleanup();
  });

  it('has all subcommands', () => {
    const cmd = createConfigCommand(() => h.context);

    expect(cmd.commands.map((c) => c.name())).toEqual([
      'get',
      'set',
      'list',
      'path',
      'reset',
      'check',
    ]);
  });

  describe('get / set', () => {
    it('prints a default value and creates the config file', async () => {
      await h.run(createConfigCommand(() => h.context), ['config', 'get', 'chunking.target_tokens']);

      expect(h.logs).toEqual(['500']);
      expect(existsSync(configPath)).toBe(true);
    });

    it('writes a validated value', async () => {
      await h.run(createConfigCommand(() => h.context), ['config', 'set', 'search.top_k', '12']);
      await h.run(createConfigCommand(() => h.context), ['config', 'get', 'search.top_k']);

      expect(h.logs[h.logs.length - 1]).toBe('12');
    });

    it('reports an invalid value without writing it', async () => {
      await h.run(createConfigCommand(() => h.context), ['config', 'set', 'search.top_k', '0']);

      expect(process.exitCode).toBe(1);
      expect(h.errors[0]?.startsWith("Invalid value for 'search.top_k':")).toBe(true);
    });

    it('reports an unknown key', async () => {
      await h.run(createConfigCommand(() => h.context), ['config', 'get', 'search.colour']);

      expect(process.exitCode).toBe(1);
      expect(h.errors).toEqual(['Unknown config key: search.colour']);
    });
  });

  it('prints the config path', async () => {
    await h.run(createConfigCommand(() => h.context), ['config', 'path']);

    expect(h.logs).toEqual([configPath]);
  });

  it('lists flattened keys', async () => {
    await h.run(createConfigCommand(() => h.context), ['config', 'list']);

    const output = h.logs.join('\n');
    expect(output).toContain('embedding.provider');
    expect(output).toContain('indexing.checkpoint_dir');
  });

  describe('reset', () => {
    it('needs --force', async () => {
      writeFileSync(configPath, '[search]\ntop_k = 9\n');

      await h.run(createConfigCommand(() => h.context), ['config', 'reset']);

      expect(process.exitCode).toBe(1);
      expect(readFileSync(configPath, 'utf-8')).toBe('[search]\ntop_k = 9\n');
    });

    it('restores the template with --force', async () => {
      writeFileSync(configPath, '[search]\ntop_k = 9\n');

      await h.run(createConfigCommand(() => h.context), ['config', 'reset', '--force']);

      expect(readFileSync(configPath, 'utf-8')).toBe(CONFIG_TEMPLATE);
    });
  });

  describe('check', () => {
    it('passes for the default ollama provider', async () => {
      await h.run(createConfigCommand(() => h.context), ['config', 'check']);

      expect(process.exitCode).toBeUndefined();
      expect(h.logs[h.logs.length - 1]).toContain('Embedding provider is configured');
    });

    it('fails for openai without an API key', async () => {
      writeFileSync(configPath, '[embedding]\nprovider = "openai"\nmodel = "text-embedding-3-small"\n');
      vi.stubEnv('OPENAI_API_KEY', '');
      _clearEnvCache();

      await h.run(createConfigCommand(() => h.context), ['config', 'check']);

      expect(process.exitCode).toBe(1);
      expect(h.logs.some((line) => line.includes('OPENAI_API_KEY is not set'))).toBe(true);
    });
  });
});
