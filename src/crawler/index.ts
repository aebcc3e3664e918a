export { WebCrawler } from './web-crawler.js';
export type { WebCrawlerOptions } from './web-crawler.js';
export { createSession, isAllowedBySession } from './session.js';
export type { SessionConfig } from './session.js';
export { normalizeUrl, exactUrl, assertCrawlBounds } from './base.js';
