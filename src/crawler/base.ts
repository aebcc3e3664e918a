/**
 * Canonicalize a URL before it is used as a node id.
 *
 * - Lowercases scheme and hostname
 * - Strips the fragment
 * - Strips a trailing slash from the pathname (unless the path is just "/")
 * - Keeps the query string, which often selects a different page
 *
 * This makes `https://Example.com/docs/` and `https://example.com/docs#intro`
 * the same node. Unparseable input is returned unchanged.
 */
export function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  parsed.hash = '';
  if (parsed.pathname.length > 1 && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.slice(0, -1);
  }

  return parsed.href;
}

/**
 * Identity canonicalization: node ids are the URL strings exactly as found.
 */
export function exactUrl(url: string): string {
  return url;
}

/**
 * Check a crawl bound, throwing a descriptive error when it is invalid.
 */
export function assertCrawlBounds(
  caller: string,
  maxDepth: number,
  maxResults: number | undefined,
): void {
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new Error(`${caller}: "maxDepth" must be a non-negative integer, got ${maxDepth}`);
  }
  if (maxResults !== undefined && (!Number.isInteger(maxResults) || maxResults < 1)) {
    throw new Error(`${caller}: "maxResults" must be a positive integer, got ${maxResults}`);
  }
}
