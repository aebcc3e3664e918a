import type { CrawlGraphConfig, CrawlResult } from '../types.js';
import { createPageFetcher } from '../fetcher/index.js';
import type { FetchedPage, PageFetcher } from '../fetcher/index.js';
import { WebCrawler } from '../crawler/web-crawler.js';
import { exactUrl, normalizeUrl } from '../crawler/base.js';
import { MarkdownWriter, writeGraph } from '../output/index.js';
import { MarkdownConverter } from '../converter/index.js';
import { validateAndMergeConfig, type UserCrawlGraphConfig } from './config.js';

/**
 * Counters collected from crawl events for the result stats.
 */
interface CrawlCounters {
  seedsCrawled: number;
  seedsSkipped: number;
  fetchErrors: number;
}

/**
 * Create a WebCrawler for the config, forwarding every event to the
 * user's callbacks after counting it.
 */
function createCrawler(
  config: CrawlGraphConfig,
  fetcher: PageFetcher,
  counters: CrawlCounters,
): WebCrawler {
  return new WebCrawler(config.allowedDomains, {
    fetcher,
    restrictToDomain: config.restrictToDomain,
    canonicalize: config.canonicalizeUrls ? normalizeUrl : exactUrl,
    onNodeDiscovered: config.onNodeDiscovered,
    onNodeVisited: config.onNodeVisited,
    onFetchError: (url, error) => {
      counters.fetchErrors++;
      config.onFetchError?.(url, error);
    },
    onSeedCrawled: (url, subgraph) => {
      counters.seedsCrawled++;
      config.onSeedCrawled?.(url, subgraph);
    },
    onSeedSkipped: (url, reason) => {
      counters.seedsSkipped++;
      config.onSeedSkipped?.(url, reason);
    },
  });
}

/**
 * Build the fetcher's page hook for content capture, or undefined when
 * neither `markdownDir` nor `onPageContent` is set.
 */
function createPageCapture(
  config: CrawlGraphConfig,
): ((page: FetchedPage) => Promise<void>) | undefined {
  const { markdownDir, onPageContent } = config;
  if (markdownDir === undefined && onPageContent === undefined) {
    return undefined;
  }
  const converter = new MarkdownConverter();
  const writer = markdownDir === undefined ? undefined : new MarkdownWriter(markdownDir);

  return async (page) => {
    const markdown = converter.convert(page.html);
    onPageContent?.(page.url, markdown);
    await writer?.writePage(page, markdown);
  };
}

/**
 * Crawl the web graph reachable from the configured seed URLs.
 *
 * This is the main SDK entry point. It validates the configuration,
 * creates the page fetcher and crawler, crawls every seed into one merged
 * graph and, when `outputFile` is set, writes the graph there. When
 * `markdownDir` is set each fetched page is also saved there as Markdown.
 *
 * @param userConfig - Partial config with at least `urls` specified.
 *   All other fields have defaults (see CONFIG_DEFAULTS).
 * @returns The merged graph, the output path if one was written, and stats
 *
 * @example
 * ```typescript
 * const result = await crawlGraph({
 *   urls: ['https://example.com'],
 *   maxDepth: 2,
 *   maxResults: 100,
 *   outputFile: './graph.json',
 * });
 * console.log(result.stats.totalNodes);
 * ```
 */
export async function crawlGraph(userConfig: UserCrawlGraphConfig): Promise<CrawlResult> {
  const config = validateAndMergeConfig(userConfig);
  const startTime = Date.now();
  const counters: CrawlCounters = { seedsCrawled: 0, seedsSkipped: 0, fetchErrors: 0 };

  const fetcher = createPageFetcher({ ...config, onPage: createPageCapture(config) });
  try {
    const crawler = createCrawler(config, fetcher, counters);
    const graph = await crawler.crawlMultipleUrls(
      config.urls,
      config.maxDepth,
      config.maxResults,
    );

    const outputPath = config.outputFile
      ? await writeGraph(graph, config.outputFile, config.outputFormat)
      : undefined;

    return {
      graph,
      outputPath,
      stats: {
        totalNodes: graph.nodeCount,
        totalEdges: graph.edgeCount,
        ...counters,
        duration: Date.now() - startTime,
      },
    };
  } finally {
    fetcher.close();
  }
}

export default crawlGraph;

// Re-export building blocks for advanced usage
export { createPageFetcher, FetchError } from '../fetcher/index.js';
export type { PageFetcher, FetchedPage } from '../fetcher/index.js';
export { WebCrawler } from '../crawler/web-crawler.js';
export type { WebCrawlerOptions } from '../crawler/web-crawler.js';
export { normalizeUrl } from '../crawler/base.js';
export type { SessionConfig } from '../crawler/session.js';
export { WebGraph, WebNode, domainOf } from '../graph/index.js';
export type { GraphEdge, SerializedGraph } from '../graph/index.js';
export { createGraphWriter, serializeGraph, writeGraph, MarkdownWriter } from '../output/index.js';
export { MarkdownConverter, createTurndownService } from '../converter/index.js';
export type { GraphWriter } from '../output/index.js';
export { CONFIG_DEFAULTS } from '../types.js';
export type { CrawlGraphConfig, CrawlResult, CrawlEvents, OutputFormat } from '../types.js';
export { validateAndMergeConfig } from './config.js';
export type { UserCrawlGraphConfig } from './config.js';

// Export internal helpers for testing
export { createCrawler, createPageCapture };
