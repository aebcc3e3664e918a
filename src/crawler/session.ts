/**
 * The domain allow-lists in force for one crawl. Built once when a session
 * starts and never mutated afterwards.
 */
export interface SessionConfig {
  readonly baseAllowedDomains: readonly string[];
  readonly sessionAllowedDomains: readonly string[];
}

/**
 * Build the session for a crawl starting at a node with `startDomain`.
 *
 * When `restrictToDomain` is set the session is limited to the start
 * domain. A start node without a domain contributes no restriction.
 */
export function createSession(
  baseAllowedDomains: readonly string[],
  startDomain: string,
  restrictToDomain: boolean,
): SessionConfig {
  return Object.freeze({
    baseAllowedDomains,
    sessionAllowedDomains: restrictToDomain && startDomain !== '' ? [startDomain] : [],
  });
}

/**
 * Admission check: true when no domain is allowed-listed at all, or when
 * `url` contains one of the allowed domains as a substring.
 *
 * Substring containment admits subdomains, and also lookalikes such as
 * `example.com.evil.com` for `example.com`.
 */
export function isAllowedBySession(session: SessionConfig, url: string): boolean {
  const allowed = [...session.baseAllowedDomains, ...session.sessionAllowedDomains];
  return allowed.length === 0 || allowed.some((domain) => url.includes(domain));
}
