import type { CrawlEvents, CrawlGraphConfig, CrawlResult } from '../types.js';

/**
 * Output verbosity level for the CLI.
 */
export type Verbosity = 'normal' | 'verbose' | 'quiet';

type ProgressCallbacks = Required<
  Pick<CrawlEvents, 'onNodeVisited' | 'onFetchError' | 'onSeedCrawled' | 'onSeedSkipped'>
>;

/**
 * Create crawl event callbacks that report progress on stderr, keeping
 * stdout free for the serialized graph.
 *
 * - quiet: nothing
 * - normal: one line per visited page, fetch errors, skipped seeds
 * - verbose: also the admitted links of each page and per-seed totals
 */
export function createProgressCallbacks(verbosity: Verbosity): ProgressCallbacks {
  let visitedCount = 0;

  if (verbosity === 'quiet') {
    return {
      onNodeVisited: () => { visitedCount++; },
      onFetchError: () => {},
      onSeedCrawled: () => {},
      onSeedSkipped: () => {},
    };
  }

  return {
    onNodeVisited: (node, neighbors) => {
      visitedCount++;
      process.stderr.write(`[${visitedCount}] ${node.id} (${neighbors.length} links)\n`);
      if (verbosity === 'verbose') {
        for (const neighbor of neighbors) {
          process.stderr.write(`    -> ${neighbor.id}\n`);
        }
      }
    },

    onFetchError: (url, error) => {
      process.stderr.write(`  Error: ${url} - ${error.message}\n`);
    },

    onSeedCrawled: (url, subgraph) => {
      if (verbosity === 'verbose') {
        process.stderr.write(
          `Seed ${url}: ${subgraph.nodeCount} nodes, ${subgraph.edgeCount} edges\n`,
        );
      }
    },

    onSeedSkipped: (url, reason) => {
      process.stderr.write(`  Skipped seed: ${url} (${reason})\n`);
    },
  };
}

/**
 * Print a summary of the crawl to stderr.
 */
export function printSummary(result: CrawlResult, verbosity: Verbosity): void {
  if (verbosity === 'quiet') {
    return;
  }

  const { stats } = result;
  const durationSec = (stats.duration / 1000).toFixed(1);

  process.stderr.write('\n');
  process.stderr.write(
    `Done! ${stats.totalNodes} nodes, ${stats.totalEdges} edges from ${stats.seedsCrawled} seeds`,
  );
  if (stats.seedsSkipped > 0) {
    process.stderr.write(`, skipped ${stats.seedsSkipped}`);
  }
  if (stats.fetchErrors > 0) {
    process.stderr.write(`, ${stats.fetchErrors} fetch errors`);
  }
  process.stderr.write(` in ${durationSec}s\n`);

  if (result.outputPath) {
    process.stderr.write(`Output: ${result.outputPath}\n`);
  }
}

/**
 * Print what a crawl would do, without fetching anything.
 */
export function printDryRun(config: CrawlGraphConfig): void {
  process.stderr.write('\n--- Dry Run ---\n');
  process.stderr.write(`Seeds: ${config.urls.join(', ')}\n`);
  process.stderr.write(`Max depth: ${config.maxDepth}\n`);
  process.stderr.write(`Max results: ${config.maxResults ?? 'unlimited'}\n`);
  process.stderr.write(`Restrict to seed domain: ${config.restrictToDomain}\n`);
  if (config.allowedDomains.length > 0) {
    process.stderr.write(`Allowed domains: ${config.allowedDomains.join(', ')}\n`);
  }
  process.stderr.write(`Canonicalize URLs: ${config.canonicalizeUrls}\n`);
  if (config.includePatterns && config.includePatterns.length > 0) {
    process.stderr.write(`Include patterns: ${config.includePatterns.join(', ')}\n`);
  }
  if (config.excludePatterns && config.excludePatterns.length > 0) {
    process.stderr.write(`Exclude patterns: ${config.excludePatterns.join(', ')}\n`);
  }
  process.stderr.write(`Output: ${config.outputFile ?? 'stdout'} (${config.outputFormat})\n`);
  if (config.markdownDir !== undefined) {
    process.stderr.write(`Markdown pages: ${config.markdownDir}\n`);
  }
  process.stderr.write('--- No pages will be fetched ---\n');
}
