import type { CrawlEvents } from '../types.js';
import type { PageFetcher } from '../fetcher/index.js';
import { toError } from '../fetcher/errors.js';
import { WebNode } from '../graph/node.js';
import { WebGraph } from '../graph/graph.js';
import { assertCrawlBounds, exactUrl } from './base.js';
import { createSession, isAllowedBySession, type SessionConfig } from './session.js';

/**
 * Options for a WebCrawler.
 */
export interface WebCrawlerOptions extends CrawlEvents {
  /** Source of page links. */
  fetcher: Pick<PageFetcher, 'fetchHyperlinks'>;
  /** Restrict each seed's crawl to the seed's own domain. Defaults to true. */
  restrictToDomain?: boolean;
  /** Maps a URL to its node id. Defaults to the exact URL string. */
  canonicalize?: (url: string) => string;
}

/**
 * Crawls the web graph reachable from seed URLs, within domain allow-lists.
 *
 * `allowedDomains` apply to every crawl. Each crawl also starts a session
 * that may add the seed's own domain. An empty combined allow-list means
 * any URL is admitted.
 *
 * @example
 * ```typescript
 * const crawler = new WebCrawler(['example.com'], { fetcher });
 * const graph = await crawler.crawlMultipleUrls(
 *   ['https://example.com', 'https://example.com/blog'],
 *   2,
 *   50,
 * );
 * ```
 */
export class WebCrawler {
  readonly baseAllowedDomains: readonly string[];
  private readonly fetcher: Pick<PageFetcher, 'fetchHyperlinks'>;
  private readonly restrictToDomain: boolean;
  private readonly canonicalize: (url: string) => string;
  private readonly events: CrawlEvents;
  private session: SessionConfig;

  constructor(allowedDomains: string[] = [], options: WebCrawlerOptions) {
    const { fetcher, restrictToDomain, canonicalize, ...events } = options;
    this.baseAllowedDomains = Object.freeze([...allowedDomains]);
    this.fetcher = fetcher;
    this.restrictToDomain = restrictToDomain ?? true;
    this.canonicalize = canonicalize ?? exactUrl;
    this.events = events;
    this.session = createSession(this.baseAllowedDomains, '', false);
  }

  /** The session started most recently. */
  get currentSession(): SessionConfig {
    return this.session;
  }

  get sessionAllowedDomains(): readonly string[] {
    return this.session.sessionAllowedDomains;
  }

  /** Resolve a URL to its node. */
  getNode(url: string): WebNode {
    return new WebNode(this.canonicalize(url), this.fetcher);
  }

  /**
   * Start a new session at `startId`, replacing the previous session.
   *
   * @returns A graph holding only the start node
   */
  startNewCrawlingSession(startId: string, restrictToDomain = true): WebGraph {
    const startNode = this.getNode(startId);
    this.session = createSession(this.baseAllowedDomains, startNode.domain, restrictToDomain);

    const graph = new WebGraph();
    graph.addNode(startNode);
    return graph;
  }

  /** Whether `url` passes the current session's allow-lists. */
  inAllowedDomain(url: string): boolean {
    return isAllowedBySession(this.session, url);
  }

  /**
   * Fetch a node's page and return its admitted neighbors, in link order.
   *
   * A failed fetch is reported through `onFetchError` and yields no
   * neighbors, so the node becomes a dead end.
   *
   * @param session - Allow-lists to admit against; the current session by default
   */
  async visitNodeNeighborhood(
    node: WebNode,
    session: SessionConfig = this.session,
  ): Promise<WebNode[]> {
    let links: string[];
    try {
      links = await node.fetchConnectedHyperlinks();
    } catch (error) {
      this.events.onFetchError?.(node.id, toError(error));
      return [];
    }

    const neighbors = links
      .filter((link) => isAllowedBySession(session, link))
      .map((link) => this.getNode(link));
    this.events.onNodeVisited?.(node, neighbors);
    return neighbors;
  }

  /**
   * Breadth-first crawl from a single seed.
   *
   * Nodes up to `maxDepth` hops away are collected; nodes at `maxDepth` are
   * not expanded. Once the graph holds `maxResults` nodes no new node is
   * added, though links between nodes already present are still recorded.
   * Fetches within one depth level run together through the fetcher.
   */
  async crawl(url: string, maxDepth = 1, maxResults?: number): Promise<WebGraph> {
    assertCrawlBounds('crawl', maxDepth, maxResults);

    const graph = this.startNewCrawlingSession(url, this.restrictToDomain);
    const session = this.session;
    const budgetReached = (): boolean =>
      maxResults !== undefined && graph.nodeCount >= maxResults;

    let frontier = graph.allNodes();
    for (const seed of frontier) {
      this.events.onNodeDiscovered?.(seed, 0);
    }

    for (let depth = 0; depth < maxDepth && frontier.length > 0 && !budgetReached(); depth++) {
      const neighborhoods = await Promise.all(
        frontier.map((node) => this.visitNodeNeighborhood(node, session)),
      );

      const next: WebNode[] = [];
      frontier.forEach((node, index) => {
        for (const neighbor of neighborhoods[index]) {
          if (!graph.hasNode(neighbor.id)) {
            if (budgetReached()) {
              continue;
            }
            graph.addNode(neighbor);
            next.push(neighbor);
            this.events.onNodeDiscovered?.(neighbor, depth + 1);
          }
          graph.addEdge(node, neighbor);
        }
      });
      frontier = next;
    }

    return graph;
  }

  /**
   * Crawl several seeds in order and merge their graphs into one.
   *
   * Each seed gets the part of `maxResults` not yet used by earlier seeds.
   * Once the merged graph holds `maxResults` nodes the remaining seeds are
   * skipped. A finished seed's graph is never trimmed.
   */
  async crawlMultipleUrls(
    urls: string[],
    maxDepth = 1,
    maxResults?: number,
  ): Promise<WebGraph> {
    assertCrawlBounds('crawlMultipleUrls', maxDepth, maxResults);

    const merged = new WebGraph();

    for (const [index, url] of urls.entries()) {
      const remainingResults =
        maxResults === undefined ? undefined : maxResults - merged.nodeCount;
      if (remainingResults !== undefined && remainingResults <= 0) {
        for (const skipped of urls.slice(index)) {
          this.events.onSeedSkipped?.(skipped, `Result budget exhausted (${maxResults})`);
        }
        break;
      }

      let subgraph: WebGraph;
      try {
        subgraph = await this.crawl(url, maxDepth, remainingResults);
      } catch (error) {
        this.events.onSeedSkipped?.(url, toError(error).message);
        continue;
      }

      merged.merge(subgraph);
      this.events.onSeedCrawled?.(url, subgraph);
    }

    return merged;
  }
}
