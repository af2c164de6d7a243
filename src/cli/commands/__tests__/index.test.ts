/**
 * Tests for index command
 *
 * Runs the real pipeline against temp directories; only the embedding
 * provider is replaced with the in-process fake.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { createIndexCommand } from '../index.js';
import { createHarness, type CliHarness } from './harness.js';
import { createEmbeddingProvider } from '../../../indexer/embedder/index.js';
import { CLIError, EmbeddingFatalError } from '../../../errors/index.js';
import { indexExists, loadIndex } from '../../../search/index.js';
import { FakeEmbeddingProvider } from '../../../test-utils/index.js';

vi.mock('../../../indexer/embedder/index.js', async (importOriginal) => {
  const original = await importOriginal<typeof import('../../../indexer/embedder/index.js')>();
  return {
    ...original,
    createEmbeddingProvider: vi.fn(),
  };
});

describe('createIndexCommand', () => {
  let h: CliHarness;
  let sourceDir: string;
  let provider: FakeEmbeddingProvider;

  beforeEach(() => {
    h = createHarness();
    sourceDir = join(h.root, 'solution');
    mkdirSync(join(sourceDir, 'src'), { recursive: true });
    writeFileSync(join(sourceDir, 'src', 'Alpha.cs'), 'public class Alpha { }\n');
    writeFileSync(join(sourceDir, 'users.sql'), 'SELECT id, name FROM users;\n');

    provider = new FakeEmbeddingProvider();
    vi.mocked(createEmbeddingProvider).mockReturnValue(provider);
  });

  afterEach(() => {
    h.cleanup();
  });

  describe('command structure', () => {
    it('creates command with correct name and options', () => {
      const cmd = createIndexCommand(() => h.context);

      expect(cmd.name()).toBe('index');
      expect(cmd.registeredArguments[0]?.required).toBe(false);
      expect(cmd.options.map((o) => o.long)).toEqual(['--note', '--append', '--index-dir']);
    });
  });

  describe('building', () => {
    it('indexes a directory and notes into the configured index directory', async () => {
      await h.run(createIndexCommand(() => h.context), [
        'index',
        sourceDir,
        '--note',
        'Remember the token rotation schedule',
      ]);

      const handle = loadIndex(h.indexDir);
      expect(handle.metadata.map((m) => m.sourceId)).toEqual([
        'src/Alpha.cs',
        'users.sql',
        'manual-note-1',
      ]);
      expect(handle.model).toBe('fake-hash');
      expect(h.stdout.some((line) => line.includes('Index Complete'))).toBe(true);
    });

    it('indexes repeated --note values without a directory', async () => {
      await h.run(createIndexCommand(() => h.context), [
        'index',
        '--note',
        'first note',
        '--note',
        'second note',
      ]);

      expect(loadIndex(h.indexDir).metadata.map((m) => m.text)).toEqual(['first note', 'second note']);
    });

    it('writes to --index-dir when given', async () => {
      const custom = join(h.root, 'custom-index');

      await h.run(createIndexCommand(() => h.context), ['index', sourceDir, '--index-dir', custom]);

      expect(indexExists(custom)).toBe(true);
      expect(indexExists(h.indexDir)).toBe(false);
    });

    it('appends with --append', async () => {
      await h.run(createIndexCommand(() => h.context), ['index', sourceDir]);
      await h.run(createIndexCommand(() => h.context), ['index', '--append', '--note', 'Added later']);

      const handle = loadIndex(h.indexDir);
      expect(handle.metadata).toHaveLength(3);
      expect(handle.metadata[2]?.text).toBe('Added later');
      expect(h.stdout.some((line) => line.includes('Index Updated'))).toBe(true);
    });

    it('removes its SIGINT listener when done', async () => {
      const before = process.listenerCount('SIGINT');

      await h.run(createIndexCommand(() => h.context), ['index', sourceDir]);

      expect(process.listenerCount('SIGINT')).toBe(before);
    });
  });

  describe('errors', () => {
    it('requires a directory or a note', async () => {
      const failure = await h
        .run(createIndexCommand(() => h.context), ['index'])
        .catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(CLIError);
      expect(failure).toHaveProperty('message', 'Nothing to index');
    });

    it('rejects a missing path', async () => {
      const missing = join(h.root, 'missing');

      await expect(h.run(createIndexCommand(() => h.context), ['index', missing])).rejects.toThrow(
        `Path does not exist: ${missing}`
      );
    });

    it('rejects a file path', async () => {
      const file = join(sourceDir, 'users.sql');

      await expect(h.run(createIndexCommand(() => h.context), ['index', file])).rejects.toThrow(
        `Path is not a directory: ${file}`
      );
    });

    it('surfaces a fatal embedding error with its exit code and keeps the checkpoint', async () => {
      provider.failNext(new EmbeddingFatalError('Embedding request rejected (400)'));

      const failure = await h
        .run(createIndexCommand(() => h.context), ['index', sourceDir])
        .catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(EmbeddingFatalError);
      expect(failure).toHaveProperty('code', 8);
      expect(indexExists(h.indexDir)).toBe(false);
      expect(failure).toHaveProperty('hint', expect.stringContaining(h.checkpointDir));
    });
  });
});
