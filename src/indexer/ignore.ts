/**
 * Skip rules for the scanner, in gitignore syntax. Matching is delegated
 * to the `ignore` package.
 */

import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join, relative, sep } from 'node:path';
import ignore from 'ignore';

import type { Logger } from '../utils/index.js';
import { DEFAULT_IGNORE_PATTERNS } from './types.js';

export interface IgnoreFilterOptions {
  /** Directory being scanned; its .gitignore is read */
  rootPath: string;

  /** `indexing.ignore_patterns` from config */
  additionalPatterns?: string[];

  /** Start from DEFAULT_IGNORE_PATTERNS (bin/, obj/, node_modules/, ...). @default true */
  useDefaults?: boolean;

  logger?: Logger;
}

/** True when the path should be skipped */
export type IgnoreFilter = (filePath: string) => boolean;

/** Pattern lines of a .gitignore file. `!` negations survive. */
export function parseGitignoreContent(content: string): string[] {
  const patterns: string[] = [];
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (line && !line.startsWith('#')) patterns.push(line);
  }
  return patterns;
}

/**
 * Patterns from one .gitignore. A missing file is normal; an unreadable
 * one is warned about and treated as empty.
 */
export function loadGitignoreFile(gitignorePath: string, logger?: Logger): string[] {
  if (!existsSync(gitignorePath)) return [];

  try {
    return parseGitignoreContent(readFileSync(gitignorePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger?.warn(`Ignoring unreadable ${gitignorePath}: ${reason}`);
    return [];
  }
}

/**
 * Build the skip filter for a scan root. Rules are layered defaults,
 * then the root .gitignore, then config patterns, so a later `!rule`
 * can re-include something an earlier layer excluded.
 *
 * @example
 * ```ts
 * const skip = createIgnoreFilter({ rootPath: '/src/Shop', additionalPatterns: ['*.Designer.cs'] });
 * skip('obj/Debug/Shop.AssemblyInfo.cs'); // true
 * skip('Forms/Main.Designer.cs');          // true
 * ```
 */
export function createIgnoreFilter(options: IgnoreFilterOptions): IgnoreFilter {
  const { rootPath, additionalPatterns = [], useDefaults = true, logger } = options;

  const rules = ignore.default()
    .add(useDefaults ? DEFAULT_IGNORE_PATTERNS : [])
    .add(loadGitignoreFile(join(rootPath, '.gitignore'), logger))
    .add(additionalPatterns);

  return (filePath: string): boolean => {
    const rel = isAbsolute(filePath) ? relative(rootPath, filePath) : filePath;
    // `ignore` wants root-relative POSIX paths and throws on anything else
    const posix = sep === '\\' ? rel.split(sep).join('/') : rel;
    if (posix === '' || posix.startsWith('..')) return false;
    return rules.ignores(posix);
  };
}
