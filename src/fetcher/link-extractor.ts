import { JSDOM } from 'jsdom';

/**
 * Options for filtering extracted links.
 */
export interface ExtractLinksOptions {
  /** Glob patterns; only URLs whose pathname matches one of them are kept. */
  includePatterns?: string[];
  /** Glob patterns; URLs whose pathname matches any of them are dropped. */
  excludePatterns?: string[];
}

/** Schemes that never lead to a crawlable page. */
const EXCLUDED_SCHEMES = ['mailto:', 'javascript:', 'tel:', 'data:'];

const REGEX_SPECIAL = '.+^${}()|[]\\';

/**
 * Convert a glob pattern into an anchored RegExp over a URL pathname.
 *
 * `**` matches across `/`, `*` matches within one segment and `?` matches
 * one non-slash character.
 */
export function globToRegex(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '*' && pattern[i + 1] === '*') {
      i++;
      // "/**/x" also matches "/x"
      if (pattern[i + 1] === '/') {
        source += '(?:.*/)?';
        i++;
      } else {
        source += '.*';
      }
    } else if (char === '*') {
      source += '[^/]*';
    } else if (char === '?') {
      source += '[^/]';
    } else if (REGEX_SPECIAL.includes(char)) {
      source += '\\' + char;
    } else {
      source += char;
    }
  }
  return new RegExp('^' + source + '$');
}

function compilePatterns(patterns: string[] | undefined): RegExp[] {
  return (patterns ?? []).map(globToRegex);
}

/**
 * Resolve an href against the page URL, returning undefined for anything
 * that is not an http(s) link to another document.
 */
function resolveHref(href: string, pageUrl: string): URL | undefined {
  const trimmed = href.trim();
  if (trimmed === '' || trimmed.startsWith('#')) {
    return undefined;
  }

  const lower = trimmed.toLowerCase();
  if (EXCLUDED_SCHEMES.some((scheme) => lower.startsWith(scheme))) {
    return undefined;
  }

  let resolved: URL;
  try {
    resolved = new URL(trimmed, pageUrl);
  } catch {
    return undefined;
  }

  if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
    return undefined;
  }

  resolved.hash = '';
  return resolved;
}

/**
 * Extract the outbound hyperlinks of an HTML page.
 *
 * Relative hrefs are resolved against `pageUrl`; fragments are dropped,
 * query strings kept. The result is deduplicated, keeping document order
 * of first occurrence. No domain filtering happens here.
 *
 * @param html - The raw HTML string
 * @param pageUrl - The URL the HTML was served from
 * @returns Absolute link URLs
 */
export function extractLinks(
  html: string,
  pageUrl: string,
  options: ExtractLinksOptions = {},
): string[] {
  try {
    new URL(pageUrl);
  } catch {
    return [];
  }

  const include = compilePatterns(options.includePatterns);
  const exclude = compilePatterns(options.excludePatterns);

  const { document } = new JSDOM(html, { url: pageUrl }).window;
  const seen = new Set<string>();
  const links: string[] = [];

  for (const anchor of document.querySelectorAll('a[href]')) {
    const href = anchor.getAttribute('href');
    const resolved = href === null ? undefined : resolveHref(href, pageUrl);
    if (!resolved) {
      continue;
    }

    const { pathname } = resolved;
    if (include.length > 0 && !include.some((re) => re.test(pathname))) {
      continue;
    }
    if (exclude.some((re) => re.test(pathname))) {
      continue;
    }

    const url = resolved.href;
    if (!seen.has(url)) {
      seen.add(url);
      links.push(url);
    }
  }

  return links;
}
