/**
 * Centralized Path Definitions
 *
 * Single source of truth for the hix directory layout.
 * All modules should import from here instead of computing paths locally.
 *
 * Directory structure (HIX_HOME, default ~/.hix):
 * ~/.hix/
 * ├── config.toml      (User configuration)
 * ├── index/           (index.vec + index.meta.json)
 * └── checkpoints/     (<id>.checkpoint.db while a job is in flight)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

import { getEnv } from './env.js';

/**
 * Get the hix directory path (HIX_HOME or ~/.hix)
 */
export function getHixDir(): string {
  return getEnv('HIX_HOME') ?? join(homedir(), '.hix');
}

/**
 * Get the config file path (~/.hix/config.toml)
 */
export function getConfigPath(): string {
  return join(getHixDir(), 'config.toml');
}

/**
 * Expand a leading `~` and the default `~/.hix` prefix in configured paths.
 *
 * `~/.hix/...` follows HIX_HOME so a relocated home keeps its index beside it.
 */
export function resolveConfigPath(path: string): string {
  if (path === '~/.hix' || path.startsWith('~/.hix/')) {
    return join(getHixDir(), path.slice('~/.hix'.length));
  }
  if (path === '~' || path.startsWith('~/')) {
    return join(homedir(), path.slice(1));
  }
  return path;
}
