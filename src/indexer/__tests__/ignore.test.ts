/**
 * Tests for gitignore pattern handling
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { loadGitignoreFile, parseGitignoreContent, createIgnoreFilter } from '../ignore.js';

// Mock fs module
vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

describe('parseGitignoreContent', () => {
  it('drops blank lines and comments', () => {
    const content = `
# build output
bin/

obj/
`;
    expect(parseGitignoreContent(content)).toEqual(['bin/', 'obj/']);
  });

  it('keeps negation patterns', () => {
    expect(parseGitignoreContent('*.sql\n!schema.sql')).toEqual(['*.sql', '!schema.sql']);
  });

  it('trims whitespace and CRLF endings', () => {
    expect(parseGitignoreContent('  *.user  \r\nTestResults/\r\n')).toEqual([
      '*.user',
      'TestResults/',
    ]);
  });
});

describe('loadGitignoreFile', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns empty array if file does not exist', () => {
    vi.mocked(existsSync).mockReturnValue(false);

    expect(loadGitignoreFile('/repo/.gitignore')).toEqual([]);
    expect(readFileSync).not.toHaveBeenCalled();
  });

  it('reads and parses the file', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('bin/\nobj/\n');

    expect(loadGitignoreFile('/repo/.gitignore')).toEqual(['bin/', 'obj/']);
    expect(readFileSync).toHaveBeenCalledWith('/repo/.gitignore', 'utf-8');
  });

  it('warns and returns empty array on read error', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockImplementation(() => {
      throw new Error('Permission denied');
    });
    const logger = { warn: vi.fn() };

    expect(loadGitignoreFile('/repo/.gitignore', logger)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      'Ignoring unreadable /repo/.gitignore: Permission denied'
    );
  });
});

describe('createIgnoreFilter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(existsSync).mockReturnValue(false); // No .gitignore by default
  });

  it('ignores build output and tooling folders by default', () => {
    const filter = createIgnoreFilter({ rootPath: '/repo' });

    expect(filter('src/Web/bin/Debug/App.dll.config')).toBe(true);
    expect(filter('src/Web/obj/project.assets.json')).toBe(true);
    expect(filter('.vs/config/applicationhost.config')).toBe(true);
    expect(filter('node_modules/zod/index.js')).toBe(true);
    expect(filter('src/Web/Forms/Main.designer.cs')).toBe(true);
    expect(filter('src/Web/Controllers/HomeController.cs')).toBe(false);
    expect(filter('db/procs/GetUser.sql')).toBe(false);
  });

  it('respects useDefaults: false', () => {
    const filter = createIgnoreFilter({ rootPath: '/repo', useDefaults: false });

    expect(filter('bin/App.config')).toBe(false);
    expect(filter('node_modules/zod/index.js')).toBe(false);
  });

  it('applies additional patterns', () => {
    const filter = createIgnoreFilter({
      rootPath: '/repo',
      additionalPatterns: ['*.generated.cs', 'scratch/'],
      useDefaults: false,
    });

    expect(filter('Models/User.generated.cs')).toBe(true);
    expect(filter('scratch/notes.md')).toBe(true);
    expect(filter('Models/User.cs')).toBe(false);
  });

  it('loads patterns from .gitignore', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('migrations/\n*.bak.sql');

    const filter = createIgnoreFilter({ rootPath: '/repo', useDefaults: false });

    expect(filter('migrations/001_init.sql')).toBe(true);
    expect(filter('procs/GetUser.bak.sql')).toBe(true);
    expect(filter('procs/GetUser.sql')).toBe(false);
  });

  it('lets later layers override earlier ones', () => {
    vi.mocked(existsSync).mockReturnValue(true);
    vi.mocked(readFileSync).mockReturnValue('*.sql');

    const filter = createIgnoreFilter({
      rootPath: '/repo',
      additionalPatterns: ['!schema.sql'],
      useDefaults: false,
    });

    expect(filter('seed.sql')).toBe(true);
    expect(filter('schema.sql')).toBe(false);
  });

  it('handles absolute paths by converting to relative', () => {
    const filter = createIgnoreFilter({ rootPath: '/repo' });

    expect(filter('/repo/node_modules/zod/index.js')).toBe(true);
    expect(filter('/repo/src/index.ts')).toBe(false);
  });

  it('never ignores the root or paths outside it', () => {
    const filter = createIgnoreFilter({ rootPath: '/repo' });

    expect(filter('')).toBe(false);
    expect(filter('/repo')).toBe(false);
    expect(filter('/elsewhere/bin/tool.config')).toBe(false);
  });
});
