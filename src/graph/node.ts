import type { PageFetcher } from '../fetcher/index.js';

/**
 * The part of a page fetcher a node needs to discover its outbound links.
 */
export type HyperlinkSource = Pick<PageFetcher, 'fetchHyperlinks'>;

/**
 * Derive the domain (URL host, including any port) of a URL.
 *
 * Returns an empty string for anything that does not parse as an
 * absolute URL.
 */
export function domainOf(id: string): string {
  try {
    return new URL(id).host;
  } catch {
    return '';
  }
}

/**
 * A page in the web graph, identified by its URL.
 *
 * Nodes carry no mutable state: two nodes with the same `id` are
 * interchangeable wherever graph membership is concerned.
 */
export class WebNode {
  readonly domain: string;

  constructor(
    readonly id: string,
    private readonly source: HyperlinkSource,
  ) {
    this.domain = domainOf(id);
  }

  /**
   * Fetch the page and return the raw outbound hyperlink URLs it contains.
   * Rejects when the underlying fetch fails.
   */
  fetchConnectedHyperlinks(): Promise<string[]> {
    return this.source.fetchHyperlinks(this.id);
  }

  equals(other: WebNode): boolean {
    return this.id === other.id;
  }
}
