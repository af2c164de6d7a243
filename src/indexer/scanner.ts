/**
 * Directory scanning: fast-glob finds candidate files by extension, the
 * ignore filter drops build output and gitignored paths, and each
 * survivor is stat'ed into a FileInfo.
 */

import { existsSync, statSync } from 'node:fs';
import { extname, relative, resolve } from 'node:path';
import fg from 'fast-glob';

import { FileNotFoundError } from '../errors/index.js';
import { createIgnoreFilter } from './ignore.js';
import {
  DEFAULT_SUPPORTED_EXTENSIONS,
  emptyTypeCounts,
  getDocumentTypeForExtension,
  type FileInfo,
  type ScanOptions,
  type ScanResult,
  type ScanStats,
} from './types.js';

export type { ScanResult, ScanStats };

/**
 * Find the indexable files under `rootPath`.
 *
 * Files come back sorted by path, so two scans of an unchanged tree
 * yield the same documents in the same order and an interrupted build
 * can resume from its checkpoint.
 *
 * @throws FileNotFoundError when rootPath is not a directory
 *
 * @example
 * ```ts
 * const { files, stats } = await scanDirectory('./src/Shop', {
 *   additionalIgnorePatterns: ['*.Designer.cs'],
 * });
 * console.log(`${stats.byType.sql} SQL scripts`);
 * ```
 */
export async function scanDirectory(rootPath: string, options: ScanOptions = {}): Promise<ScanResult> {
  const startTime = performance.now();
  const root = resolve(rootPath);

  if (!existsSync(root) || !statSync(root).isDirectory()) {
    throw new FileNotFoundError(root);
  }

  // Unknown extensions would only be globbed to be thrown away
  const extensions = (options.extensions ?? DEFAULT_SUPPORTED_EXTENSIONS).filter(
    (ext) => getDocumentTypeForExtension(ext) !== undefined
  );

  const skip = createIgnoreFilter({
    rootPath: root,
    additionalPatterns: options.additionalIgnorePatterns,
    logger: options.logger,
  });

  const stats: ScanStats = {
    totalFiles: 0,
    totalSize: 0,
    byType: emptyTypeCounts(),
    errorsEncountered: 0,
    scanDurationMs: 0,
  };
  const files: FileInfo[] = [];

  const candidates =
    extensions.length === 0
      ? []
      : await fg(globFor(extensions), {
          cwd: root,
          absolute: true,
          dot: false,
          onlyFiles: true,
          caseSensitiveMatch: false,
          followSymbolicLinks: options.followSymlinks ?? false,
          deep: options.maxDepth ?? Infinity,
          suppressErrors: true,
        });

  for (const path of candidates.sort()) {
    if (skip(relative(root, path))) continue;

    let file: FileInfo | undefined;
    try {
      file = describeFile(path, root);
    } catch (caught) {
      stats.errorsEncountered++;
      options.onError?.(path, caught instanceof Error ? caught : new Error(String(caught)));
      continue;
    }
    if (!file) continue;

    files.push(file);
    stats.totalFiles++;
    stats.totalSize += file.size;
    stats.byType[file.documentType]++;
    options.onFile?.(file);
  }

  stats.scanDurationMs = Math.round(performance.now() - startTime);

  return { rootPath: root, files, stats };
}

/** `**\/*.{cs,sql,...}`, or `**\/*.cs` for a single extension */
function globFor(extensions: string[]): string[] {
  return extensions.length === 1 ? [`**/*.${extensions[0]}`] : [`**/*.{${extensions.join(',')}}`];
}

/** undefined when the extension maps to no document type */
function describeFile(path: string, root: string): FileInfo | undefined {
  const extension = extname(path).slice(1).toLowerCase();
  const documentType = getDocumentTypeForExtension(extension);
  if (documentType === undefined) return undefined;

  const stat = statSync(path);
  return {
    path,
    relativePath: relative(root, path),
    extension,
    documentType,
    size: stat.size,
    modifiedAt: stat.mtime.toISOString(),
  };
}
