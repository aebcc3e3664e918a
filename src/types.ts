import type { WebNode } from './graph/node.js';
import type { WebGraph } from './graph/graph.js';

/**
 * Serialization formats for the result graph.
 */
export type OutputFormat = 'json' | 'dot';

/**
 * Callbacks fired while a crawl runs. All are optional.
 */
export interface CrawlEvents {
  /** A node was added to a seed's graph for the first time. */
  onNodeDiscovered?: (node: WebNode, depth: number) => void;
  /** A node's page was fetched and its admitted neighbors resolved. */
  onNodeVisited?: (node: WebNode, neighbors: WebNode[]) => void;
  /** Fetching a node's page failed; the node is treated as a dead end. */
  onFetchError?: (url: string, error: Error) => void;
  /** A seed finished crawling; `subgraph` is its graph before merging. */
  onSeedCrawled?: (url: string, subgraph: WebGraph) => void;
  /** A seed was not crawled (budget exhausted or the crawl failed). */
  onSeedSkipped?: (url: string, reason: string) => void;
}

/**
 * Full configuration interface for webgraph-crawler.
 */
export interface CrawlGraphConfig extends CrawlEvents {
  // Required
  urls: string[];

  // Scope
  allowedDomains: string[];
  restrictToDomain: boolean;
  maxDepth: number;
  maxResults?: number;
  canonicalizeUrls: boolean;
  includePatterns?: string[];
  excludePatterns?: string[];

  // Output
  outputFile?: string;
  outputFormat: OutputFormat;
  /** Save every fetched page as Markdown under this directory. */
  markdownDir?: string;
  /**
   * Called with each fetched page converted to Markdown. Setting this or
   * `markdownDir` turns content capture on. `url` is the final URL after
   * redirects.
   */
  onPageContent?: (url: string, markdown: string) => void;

  // Fetching
  delay: number;
  concurrency: number;
  timeout: number;
  adaptiveRateLimit: boolean;
  headers?: Record<string, string>;
}

/**
 * Result returned from a graph crawl.
 */
export interface CrawlResult {
  graph: WebGraph;
  outputPath?: string;
  stats: {
    totalNodes: number;
    totalEdges: number;
    seedsCrawled: number;
    seedsSkipped: number;
    fetchErrors: number;
    duration: number;
  };
}

/**
 * Config fields that always have a value after defaults are merged.
 */
export type ConfigDefaults = Pick<
  CrawlGraphConfig,
  | 'allowedDomains'
  | 'restrictToDomain'
  | 'maxDepth'
  | 'canonicalizeUrls'
  | 'outputFormat'
  | 'delay'
  | 'concurrency'
  | 'timeout'
  | 'adaptiveRateLimit'
>;

/**
 * Default configuration values. Applied when merging user-provided
 * partial config into a full CrawlGraphConfig.
 */
export const CONFIG_DEFAULTS: ConfigDefaults = {
  allowedDomains: [],
  restrictToDomain: true,
  maxDepth: 1,
  canonicalizeUrls: false,
  outputFormat: 'json',
  delay: 200,
  concurrency: 3,
  timeout: 30_000,
  adaptiveRateLimit: true,
};
