import type { CrawlGraphConfig } from '../types.js';
import { FetchError, toError } from './errors.js';
import { extractLinks } from './link-extractor.js';
import { FetchQueue } from './queue.js';

/**
 * A fetched HTML page.
 */
export interface FetchedPage {
  /** Final URL after redirects. */
  url: string;
  html: string;
  statusCode: number;
  headers: Record<string, string>;
  fetchedAt: Date;
}

/**
 * The page fetcher the crawler delegates to. Retries, rate limiting,
 * redirects and parsing are its concern; the crawler only sees link URLs
 * or a rejection.
 */
export interface PageFetcher {
  /** Fetch a URL and return the raw page. */
  fetchPage(url: string): Promise<FetchedPage>;
  /** Fetch a URL and return the outbound hyperlinks it contains. */
  fetchHyperlinks(url: string): Promise<string[]>;
  /** Drop queued requests. */
  close(): void;
}

/**
 * The configuration subset the default fetcher reads.
 */
export type FetcherOptions = Pick<
  CrawlGraphConfig,
  | 'delay'
  | 'concurrency'
  | 'timeout'
  | 'adaptiveRateLimit'
  | 'headers'
  | 'includePatterns'
  | 'excludePatterns'
> & {
  /**
   * Called with every page fetchHyperlinks fetches, before its links are
   * extracted. A rejection fails that fetchHyperlinks call.
   */
  onPage?: (page: FetchedPage) => Promise<void>;
};

export const DEFAULT_USER_AGENT = 'webgraph-crawler/1.0';

const MAX_REDIRECTS = 5;

/** Retries for 5xx responses. */
const DEFAULT_MAX_RETRIES = 3;

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

/**
 * Build the request headers: a default User-Agent, overridable by the
 * configured headers.
 */
export function buildRequestHeaders(
  headers: Record<string, string> = {},
): Record<string, string> {
  const hasUserAgent = Object.keys(headers).some(
    (key) => key.toLowerCase() === 'user-agent',
  );
  return hasUserAgent ? { ...headers } : { 'User-Agent': DEFAULT_USER_AGENT, ...headers };
}

/**
 * Create the default PageFetcher.
 *
 * Requests run through a FetchQueue, which caps concurrency and adapts the
 * delay between requests to 429 and 5xx responses.
 */
export function createPageFetcher(options: FetcherOptions): PageFetcher {
  const requestHeaders = buildRequestHeaders(options.headers);
  const queue = new FetchQueue({
    delay: options.delay,
    concurrency: options.concurrency,
    maxRetries: DEFAULT_MAX_RETRIES,
    adaptiveRateLimit: options.adaptiveRateLimit,
  });

  async function request(url: string): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeout);
    try {
      return await fetch(url, {
        headers: requestHeaders,
        signal: controller.signal,
        redirect: 'manual',
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new FetchError(`Request timed out after ${options.timeout}ms: ${url}`, url);
      }
      throw new FetchError(`Network error fetching ${url}: ${toError(error).message}`, url);
    } finally {
      clearTimeout(timer);
    }
  }

  async function rawFetch(url: string): Promise<FetchedPage> {
    let currentUrl = url;
    let response = await request(currentUrl);

    for (let redirects = 0; response.status >= 300 && response.status < 400; redirects++) {
      const location = response.headers.get('location');
      if (!location) {
        throw new FetchError(
          `Redirect response missing Location header: ${currentUrl}`,
          url,
          response.status,
        );
      }
      if (redirects === MAX_REDIRECTS) {
        throw new FetchError(`Too many redirects (max ${MAX_REDIRECTS}): ${url}`, url, response.status);
      }
      currentUrl = new URL(location, currentUrl).href;
      response = await request(currentUrl);
    }

    if (!response.ok) {
      throw new FetchError(
        `HTTP ${response.status} for ${currentUrl}`,
        url,
        response.status,
        headersToRecord(response.headers),
      );
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (!HTML_CONTENT_TYPES.some((type) => contentType.toLowerCase().includes(type))) {
      throw new FetchError(
        `Non-HTML content type (${contentType}): ${currentUrl}`,
        url,
        response.status,
      );
    }

    return {
      url: currentUrl,
      html: await response.text(),
      statusCode: response.status,
      headers: headersToRecord(response.headers),
      fetchedAt: new Date(),
    };
  }

  const fetchPage = (url: string): Promise<FetchedPage> => queue.add(() => rawFetch(url));

  return {
    fetchPage,

    async fetchHyperlinks(url: string): Promise<string[]> {
      const page = await fetchPage(url);
      await options.onPage?.(page);
      return extractLinks(page.html, page.url, {
        includePatterns: options.includePatterns,
        excludePatterns: options.excludePatterns,
      });
    },

    close(): void {
      queue.clear();
    },
  };
}

export { FetchError, toError } from './errors.js';
export { AdaptiveRateLimiter, parseRetryAfter } from './rate-limiter.js';
export type { RateLimiterConfig } from './rate-limiter.js';
export { FetchQueue } from './queue.js';
export type { FetchQueueConfig } from './queue.js';
export { extractLinks, globToRegex } from './link-extractor.js';
export type { ExtractLinksOptions } from './link-extractor.js';
