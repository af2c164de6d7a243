/**
 * Search Command
 *
 * Hybrid search over the persisted index: vector similarity plus BM25,
 * fused into one ranking.
 *
 *   hix search "user authentication"
 *   hix search "invoice totals" --top 10 --json
 *
 * When the query cannot be embedded (provider unconfigured or down, wrong
 * dimension) the ranking falls back to BM25 alone and says so.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext, ContextFactory } from '../types.js';
import { resolveIndexLocation, retrieverOptionsFrom } from '../utils/settings.js';
import { loadConfig, type Config } from '../../config/index.js';
import { createEmbeddingProvider, type EmbeddingProvider } from '../../indexer/embedder/index.js';
import {
  HybridRetriever,
  assertIndexConsistent,
  formatResults,
  formatResultsJSON,
  indexExists,
  loadIndex,
} from '../../search/index.js';
import { CLIError } from '../../errors/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command-specific options parsed from CLI arguments.
 */
interface SearchCommandOptions {
  /** Number of results to return (defaults to search.top_k, max: 100) */
  top?: string;
  indexDir?: string;
}

// ============================================================================
// Constants
// ============================================================================

const MAX_TOP_K = 100;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse and validate the --top option.
 *
 * @throws CLIError if invalid
 */
export function parseTopK(topStr: string): number {
  const topK = Number(topStr);

  if (!Number.isInteger(topK) || topK < 1) {
    throw new CLIError(
      `Invalid --top value: "${topStr}"`,
      `Must be a positive integer (1-${MAX_TOP_K})`
    );
  }

  if (topK > MAX_TOP_K) {
    throw new CLIError(`--top value too large: ${topK}`, `Maximum allowed is ${MAX_TOP_K}`);
  }

  return topK;
}

/**
 * The configured provider, or null when it can't be built (a missing API
 * key, say). BM25 needs no provider, so search carries on without one.
 */
function queryProvider(ctx: CommandContext, config: Config): EmbeddingProvider | null {
  try {
    return createEmbeddingProvider(config.embedding, { logger: ctx });
  } catch (error) {
    if (!(error instanceof CLIError)) {
      throw error;
    }
    ctx.warn(`Embedding provider unavailable, using keyword ranking only: ${error.message}`);
    return null;
  }
}

/**
 * Display empty results message with helpful tips.
 */
function displayEmptyResults(ctx: CommandContext, query: string): void {
  ctx.log(chalk.yellow(`No results found for "${query}"`));
  ctx.log('');
  ctx.log(chalk.dim('Tips:'));
  ctx.log(chalk.dim('  - Try different keywords or phrasing'));
  ctx.log(chalk.dim('  - Check that the index covers the documents you expect'));
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the search command.
 *
 * @param getContext - Factory to get command context with global options
 * @returns Configured Commander command
 */
export function createSearchCommand(getContext: ContextFactory): Command {
  return new Command('search')
    .argument('<query>', 'Search query text')
    .description('Search the index with vector and keyword ranking combined')
    .option('-k, --top <number>', 'Number of results to return (1-100)')
    .option('--index-dir <dir>', 'Index directory (defaults to indexing.index_dir)')
    .action(async (query: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();

      const trimmedQuery = query.trim();
      if (!trimmedQuery) {
        throw new CLIError(
          'Search query cannot be empty',
          'Provide a search term, e.g.: hix search "authentication"'
        );
      }

      const config = loadConfig();
      const topK = cmdOptions.top !== undefined ? parseTopK(cmdOptions.top) : config.search.top_k;
      const { indexDir } = resolveIndexLocation(config, cmdOptions.indexDir);

      ctx.debug(`Query: "${trimmedQuery}"`);
      ctx.debug(`Top-K: ${topK}`);
      ctx.debug(`Index directory: ${indexDir}`);

      if (!indexExists(indexDir)) {
        throw new CLIError(`No index found in ${indexDir}`, 'Run: hix index <path>  to build one');
      }

      const handle = loadIndex(indexDir);
      assertIndexConsistent(handle);

      if (handle.model !== config.embedding.model) {
        ctx.warn(
          `Index was built with ${handle.model} but embedding.model is ${config.embedding.model}`
        );
      }

      const retriever = new HybridRetriever(handle, queryProvider(ctx, config), {
        ...retrieverOptionsFrom(config),
        logger: ctx,
      });

      const response = await retriever.query(trimmedQuery, topK);
      const { results } = response;

      ctx.debug(`Found ${results.length} results in ${response.searchTimeMs.toFixed(1)}ms`);

      if (ctx.options.json) {
        const jsonOutput = {
          query: trimmedQuery,
          mode: response.mode,
          queryTruncated: response.queryTruncated,
          count: results.length,
          results: formatResultsJSON(results),
        };
        console.log(JSON.stringify(jsonOutput, null, 2));
        return;
      }

      if (results.length === 0) {
        displayEmptyResults(ctx, trimmedQuery);
        return;
      }

      const modeNote = response.mode === 'lexical' ? ' (keyword ranking only)' : '';
      ctx.log(
        chalk.bold(`Found ${results.length} result${results.length === 1 ? '' : 's'}`) +
          chalk.dim(` for "${trimmedQuery}"${modeNote}`)
      );
      ctx.log('');
      ctx.log(formatResults(results, { snippetLength: 200 }));
    });
}
