import { describe, it, expect, vi } from "vitest";
import { WebCrawler, type WebCrawlerOptions } from "../crawler/web-crawler.js";
import { normalizeUrl } from "../crawler/base.js";
import { createSession } from "../crawler/session.js";
import type { WebGraph } from "../graph/graph.js";
import type { WebNode } from "../graph/node.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Create a mock fetcher serving predetermined link lists per URL. */
function createMockFetcher(pages: Record<string, string[] | Error>) {
  return {
    fetchHyperlinks: vi.fn(async (url: string): Promise<string[]> => {
      const page = pages[url];
      if (page === undefined) {
        throw new Error(`No mock page for URL: ${url}`);
      }
      if (page instanceof Error) {
        throw page;
      }
      return page;
    }),
  };
}

function makeCrawler(
  pages: Record<string, string[] | Error>,
  allowedDomains: string[] = [],
  options: Omit<WebCrawlerOptions, "fetcher"> = {},
) {
  const fetcher = createMockFetcher(pages);
  const crawler = new WebCrawler(allowedDomains, { fetcher, ...options });
  return { crawler, fetcher };
}

function ids(graph: WebGraph): string[] {
  return graph.allNodes().map((n) => n.id);
}

function edges(graph: WebGraph): string[] {
  return graph.allEdges().map((e) => `${e.from} -> ${e.to}`);
}

/** A star: `root` links to `count - 1` pages on the same host. */
function star(host: string, count: number): Record<string, string[]> {
  const links = Array.from({ length: count - 1 }, (_, i) => `http://${host}/${i + 1}`);
  return { [`http://${host}/0`]: links };
}

/** Small site used by the traversal tests. */
const SITE: Record<string, string[]> = {
  "http://a.com/": ["http://a.com/1", "http://a.com/2", "http://b.com/x"],
  "http://a.com/1": ["http://a.com/3", "http://a.com/"],
  "http://a.com/2": ["http://a.com/3"],
  "http://a.com/3": ["http://a.com/4"],
  "http://a.com/4": [],
};

// ---------------------------------------------------------------------------
// 1. visitNodeNeighborhood
// ---------------------------------------------------------------------------
describe("WebCrawler.visitNodeNeighborhood", () => {
  it("should keep only neighbors in the allowed domains", async () => {
    const { crawler } = makeCrawler(
      { "http://a.com/start": ["http://a.com/1", "http://b.com/2"] },
      ["a.com"],
    );

    const neighbors = await crawler.visitNodeNeighborhood(crawler.getNode("http://a.com/start"));

    expect(neighbors).toHaveLength(1);
    expect(neighbors[0].id).toBe("http://a.com/1");
  });

  it("should keep fetch order and not deduplicate", async () => {
    const { crawler } = makeCrawler({
      "http://a.com/": ["http://a.com/2", "http://a.com/1", "http://a.com/2"],
    });

    const neighbors = await crawler.visitNodeNeighborhood(crawler.getNode("http://a.com/"));

    expect(neighbors.map((n) => n.id)).toEqual([
      "http://a.com/2",
      "http://a.com/1",
      "http://a.com/2",
    ]);
  });

  it("should treat a failed fetch as a dead end and report it", async () => {
    const onFetchError = vi.fn();
    const failure = new Error("HTTP 500");
    const { crawler } = makeCrawler({ "http://a.com/": failure }, [], { onFetchError });

    const neighbors = await crawler.visitNodeNeighborhood(crawler.getNode("http://a.com/"));

    expect(neighbors).toEqual([]);
    expect(onFetchError).toHaveBeenCalledWith("http://a.com/", failure);
  });

  it("should wrap a non-Error rejection", async () => {
    const onFetchError = vi.fn();
    const crawler = new WebCrawler([], {
      fetcher: {
        fetchHyperlinks: async () => {
          throw "connection reset";
        },
      },
      onFetchError,
    });

    await crawler.visitNodeNeighborhood(crawler.getNode("http://a.com/"));

    const error: unknown = onFetchError.mock.calls[0][1];
    expect(error).toBeInstanceOf(Error);
    expect(error instanceof Error && error.message).toBe("connection reset");
  });

  it("should admit against an explicit session when given one", async () => {
    const { crawler } = makeCrawler({
      "http://a.com/": ["http://a.com/1", "http://b.com/1"],
    });

    const neighbors = await crawler.visitNodeNeighborhood(
      crawler.getNode("http://a.com/"),
      createSession([], "b.com", true),
    );

    expect(neighbors.map((n) => n.id)).toEqual(["http://b.com/1"]);
  });

  it("should fire onNodeVisited with the admitted neighbors", async () => {
    const onNodeVisited = vi.fn();
    const { crawler } = makeCrawler(
      { "http://a.com/": ["http://a.com/1", "http://b.com/1"] },
      ["a.com"],
      { onNodeVisited },
    );

    await crawler.visitNodeNeighborhood(crawler.getNode("http://a.com/"));

    expect(onNodeVisited).toHaveBeenCalledTimes(1);
    const [node, neighbors] = onNodeVisited.mock.calls[0];
    expect(node.id).toBe("http://a.com/");
    expect(neighbors.map((n: WebNode) => n.id)).toEqual(["http://a.com/1"]);
  });
});

// ---------------------------------------------------------------------------
// 2. crawl (single seed)
// ---------------------------------------------------------------------------
describe("WebCrawler.crawl", () => {
  describe("depth bound", () => {
    it("should return the seed alone for maxDepth 0 without fetching", async () => {
      const { crawler, fetcher } = makeCrawler(SITE);

      const graph = await crawler.crawl("http://a.com/", 0);

      expect(ids(graph)).toEqual(["http://a.com/"]);
      expect(fetcher.fetchHyperlinks).not.toHaveBeenCalled();
    });

    it("should collect direct neighbors for the default depth of 1", async () => {
      const { crawler, fetcher } = makeCrawler(SITE);

      const graph = await crawler.crawl("http://a.com/");

      expect(ids(graph)).toEqual(["http://a.com/", "http://a.com/1", "http://a.com/2"]);
      expect(edges(graph)).toEqual([
        "http://a.com/ -> http://a.com/1",
        "http://a.com/ -> http://a.com/2",
      ]);
      expect(fetcher.fetchHyperlinks).toHaveBeenCalledTimes(1);
    });

    it("should expand level by level up to maxDepth", async () => {
      const { crawler, fetcher } = makeCrawler(SITE);

      const graph = await crawler.crawl("http://a.com/", 2);

      expect(ids(graph)).toEqual([
        "http://a.com/",
        "http://a.com/1",
        "http://a.com/2",
        "http://a.com/3",
      ]);
      expect(edges(graph)).toEqual([
        "http://a.com/ -> http://a.com/1",
        "http://a.com/ -> http://a.com/2",
        "http://a.com/1 -> http://a.com/3",
        "http://a.com/1 -> http://a.com/",
        "http://a.com/2 -> http://a.com/3",
      ]);
      expect(fetcher.fetchHyperlinks.mock.calls.map(([url]) => url)).toEqual([
        "http://a.com/",
        "http://a.com/1",
        "http://a.com/2",
      ]);
    });

    it("should not expand nodes at maxDepth", async () => {
      const { crawler, fetcher } = makeCrawler(SITE);

      const graph = await crawler.crawl("http://a.com/", 3);

      expect(ids(graph)).toContain("http://a.com/4");
      expect(fetcher.fetchHyperlinks).not.toHaveBeenCalledWith("http://a.com/4");
    });

    it("should stop early when the frontier runs dry", async () => {
      const { crawler, fetcher } = makeCrawler(SITE);

      const graph = await crawler.crawl("http://a.com/", 10);

      expect(graph.nodeCount).toBe(5);
      expect(fetcher.fetchHyperlinks).toHaveBeenCalledTimes(5);
    });
  });

  describe("result bound", () => {
    it("should stop adding nodes once maxResults is reached", async () => {
      const { crawler, fetcher } = makeCrawler(SITE);

      const graph = await crawler.crawl("http://a.com/", 2, 2);

      expect(ids(graph)).toEqual(["http://a.com/", "http://a.com/1"]);
      expect(edges(graph)).toEqual(["http://a.com/ -> http://a.com/1"]);
      expect(fetcher.fetchHyperlinks).toHaveBeenCalledTimes(1);
    });

    it("should still record edges to nodes already present once full", async () => {
      const { crawler } = makeCrawler({
        "http://a.com/": ["http://a.com/1", "http://a.com/2", "http://a.com/"],
      });

      const graph = await crawler.crawl("http://a.com/", 2, 2);

      expect(ids(graph)).toEqual(["http://a.com/", "http://a.com/1"]);
      expect(edges(graph)).toEqual([
        "http://a.com/ -> http://a.com/1",
        "http://a.com/ -> http://a.com/",
      ]);
    });

    it("should return only the seed for maxResults 1", async () => {
      const { crawler, fetcher } = makeCrawler(SITE);

      const graph = await crawler.crawl("http://a.com/", 3, 1);

      expect(ids(graph)).toEqual(["http://a.com/"]);
      expect(fetcher.fetchHyperlinks).not.toHaveBeenCalled();
    });
  });

  describe("domain scope", () => {
    it("should restrict to the seed domain by default", async () => {
      const { crawler } = makeCrawler(SITE);

      const graph = await crawler.crawl("http://a.com/");

      expect(ids(graph)).not.toContain("http://b.com/x");
      expect(crawler.sessionAllowedDomains).toEqual(["a.com"]);
    });

    it("should follow other domains when restrictToDomain is false", async () => {
      const { crawler } = makeCrawler(SITE, [], { restrictToDomain: false });

      const graph = await crawler.crawl("http://a.com/");

      expect(ids(graph)).toEqual([
        "http://a.com/",
        "http://a.com/1",
        "http://a.com/2",
        "http://b.com/x",
      ]);
    });

    it("should keep admitting against the session the crawl started with", async () => {
      let crawler: WebCrawler | undefined;
      const fetcher = {
        fetchHyperlinks: async (): Promise<string[]> => {
          crawler?.startNewCrawlingSession("http://z.com/", false);
          return ["http://a.com/1", "http://b.com/1"];
        },
      };
      crawler = new WebCrawler([], { fetcher });

      const graph = await crawler.crawl("http://a.com/");

      expect(ids(graph)).toEqual(["http://a.com/", "http://a.com/1"]);
      expect(crawler.sessionAllowedDomains).toEqual([]);
    });
  });

  describe("identity", () => {
    it("should record a self-link without adding a node", async () => {
      const { crawler } = makeCrawler({ "http://a.com/": ["http://a.com/"] });

      const graph = await crawler.crawl("http://a.com/");

      expect(graph.nodeCount).toBe(1);
      expect(edges(graph)).toEqual(["http://a.com/ -> http://a.com/"]);
    });

    it("should treat differently formatted URLs as different nodes by default", async () => {
      const { crawler } = makeCrawler({
        "http://a.com/": ["http://a.com/x", "http://a.com/x/"],
      });

      const graph = await crawler.crawl("http://a.com/");

      expect(graph.nodeCount).toBe(3);
    });

    it("should collapse URLs through the canonicalize hook", async () => {
      const { crawler, fetcher } = makeCrawler(
        { "http://a.com/": ["http://a.com/x/", "http://a.com/x#top", "http://a.com/x"] },
        [],
        { canonicalize: normalizeUrl },
      );

      const graph = await crawler.crawl("http://a.com");

      expect(ids(graph)).toEqual(["http://a.com/", "http://a.com/x"]);
      expect(graph.edgeCount).toBe(1);
      expect(fetcher.fetchHyperlinks).toHaveBeenCalledWith("http://a.com/");
    });
  });

  describe("ordering and events", () => {
    it("should apply results in frontier order even when fetches finish out of order", async () => {
      const delays: Record<string, number> = { "http://a.com/1": 30, "http://a.com/2": 0 };
      const pages: Record<string, string[]> = {
        "http://a.com/": ["http://a.com/1", "http://a.com/2"],
        "http://a.com/1": ["http://a.com/5"],
        "http://a.com/2": ["http://a.com/6"],
      };
      const crawler = new WebCrawler([], {
        fetcher: {
          fetchHyperlinks: async (url: string): Promise<string[]> => {
            await new Promise((resolve) => setTimeout(resolve, delays[url] ?? 0));
            return pages[url] ?? [];
          },
        },
      });

      const graph = await crawler.crawl("http://a.com/", 2);

      expect(ids(graph)).toEqual([
        "http://a.com/",
        "http://a.com/1",
        "http://a.com/2",
        "http://a.com/5",
        "http://a.com/6",
      ]);
    });

    it("should fire onNodeDiscovered with hop depths", async () => {
      const onNodeDiscovered = vi.fn();
      const { crawler } = makeCrawler(SITE, [], { onNodeDiscovered });

      await crawler.crawl("http://a.com/", 2);

      expect(onNodeDiscovered.mock.calls.map(([node, depth]) => [node.id, depth])).toEqual([
        ["http://a.com/", 0],
        ["http://a.com/1", 1],
        ["http://a.com/2", 1],
        ["http://a.com/3", 2],
      ]);
    });

    it("should return a one-node graph when the seed cannot be fetched", async () => {
      const onFetchError = vi.fn();
      const { crawler } = makeCrawler({}, [], { onFetchError });

      const graph = await crawler.crawl("http://down.com/");

      expect(ids(graph)).toEqual(["http://down.com/"]);
      expect(onFetchError).toHaveBeenCalledTimes(1);
      expect(onFetchError.mock.calls[0][0]).toBe("http://down.com/");
    });
  });

  describe("argument validation", () => {
    it("should reject a negative maxDepth", async () => {
      const { crawler } = makeCrawler(SITE);
      await expect(crawler.crawl("http://a.com/", -1)).rejects.toThrow(
        'crawl: "maxDepth" must be a non-negative integer, got -1',
      );
    });

    it("should reject a maxResults of 0", async () => {
      const { crawler } = makeCrawler(SITE);
      await expect(crawler.crawl("http://a.com/", 1, 0)).rejects.toThrow(
        'crawl: "maxResults" must be a positive integer, got 0',
      );
    });
  });
});

// ---------------------------------------------------------------------------
// 3. crawlMultipleUrls
// ---------------------------------------------------------------------------
describe("WebCrawler.crawlMultipleUrls", () => {
  const threeStars = { ...star("a.com", 5), ...star("b.com", 5), ...star("c.com", 5) };
  const seeds = ["http://a.com/0", "http://b.com/0", "http://c.com/0"];

  it("should return an empty graph for no seeds", async () => {
    const { crawler, fetcher } = makeCrawler(threeStars);

    const graph = await crawler.crawlMultipleUrls([]);

    expect(graph.nodeCount).toBe(0);
    expect(graph.edgeCount).toBe(0);
    expect(fetcher.fetchHyperlinks).not.toHaveBeenCalled();
  });

  it("should merge every seed's graph when there is no budget", async () => {
    const { crawler } = makeCrawler(threeStars);

    const graph = await crawler.crawlMultipleUrls(seeds);

    expect(graph.nodeCount).toBe(15);
    expect(graph.edgeCount).toBe(12);
  });

  it("should bound later seeds by the remaining budget and skip the rest", async () => {
    const onSeedSkipped = vi.fn();
    const { crawler, fetcher } = makeCrawler(threeStars, [], { onSeedSkipped });
    const crawlSpy = vi.spyOn(crawler, "crawl");

    const graph = await crawler.crawlMultipleUrls(seeds, 1, 8);

    expect(graph.nodeCount).toBe(8);
    expect(crawlSpy.mock.calls).toEqual([
      ["http://a.com/0", 1, 8],
      ["http://b.com/0", 1, 3],
    ]);
    expect(ids(graph)).toEqual([
      "http://a.com/0",
      "http://a.com/1",
      "http://a.com/2",
      "http://a.com/3",
      "http://a.com/4",
      "http://b.com/0",
      "http://b.com/1",
      "http://b.com/2",
    ]);
    expect(fetcher.fetchHyperlinks).not.toHaveBeenCalledWith("http://c.com/0");
    expect(onSeedSkipped).toHaveBeenCalledWith("http://c.com/0", "Result budget exhausted (8)");
  });

  it("should skip all later seeds when the first fills the budget exactly", async () => {
    const onSeedSkipped = vi.fn();
    const { crawler } = makeCrawler(threeStars, [], { onSeedSkipped });

    const graph = await crawler.crawlMultipleUrls(seeds, 1, 5);

    expect(graph.nodeCount).toBe(5);
    expect(onSeedSkipped.mock.calls.map(([url]) => url)).toEqual([
      "http://b.com/0",
      "http://c.com/0",
    ]);
  });

  it("should not duplicate nodes reached from several seeds", async () => {
    const { crawler } = makeCrawler({
      "http://a.com/": ["http://a.com/1"],
      "http://a.com/1": ["http://a.com/"],
    });

    const graph = await crawler.crawlMultipleUrls(["http://a.com/", "http://a.com/1"]);

    expect(ids(graph)).toEqual(["http://a.com/", "http://a.com/1"]);
    expect(edges(graph)).toEqual([
      "http://a.com/ -> http://a.com/1",
      "http://a.com/1 -> http://a.com/",
    ]);
  });

  it("should restrict each seed to its own domain", async () => {
    const { crawler } = makeCrawler({
      "http://a.com/0": ["http://b.com/0", "http://a.com/1"],
      "http://b.com/0": ["http://a.com/0", "http://b.com/1"],
    });

    const graph = await crawler.crawlMultipleUrls(["http://a.com/0", "http://b.com/0"]);

    expect(ids(graph)).toEqual([
      "http://a.com/0",
      "http://a.com/1",
      "http://b.com/0",
      "http://b.com/1",
    ]);
    expect(graph.hasEdge("http://a.com/0", "http://b.com/0")).toBe(false);
    expect(crawler.sessionAllowedDomains).toEqual(["b.com"]);
  });

  it("should continue past a seed whose fetch fails", async () => {
    const onFetchError = vi.fn();
    const { crawler } = makeCrawler(
      { "http://down.com/": new Error("timeout"), ...star("a.com", 3) },
      [],
      { onFetchError },
    );

    const graph = await crawler.crawlMultipleUrls(["http://down.com/", "http://a.com/0"]);

    expect(ids(graph)).toEqual([
      "http://down.com/",
      "http://a.com/0",
      "http://a.com/1",
      "http://a.com/2",
    ]);
    expect(onFetchError).toHaveBeenCalledTimes(1);
  });

  it("should report a seed whose crawl throws and carry on", async () => {
    const onSeedSkipped = vi.fn();
    const { crawler } = makeCrawler(star("a.com", 2), [], {
      onSeedSkipped,
      canonicalize: (url) => {
        if (url.includes("bad")) {
          throw new Error("cannot canonicalize");
        }
        return url;
      },
    });

    const graph = await crawler.crawlMultipleUrls(["http://bad.com/", "http://a.com/0"]);

    expect(ids(graph)).toEqual(["http://a.com/0", "http://a.com/1"]);
    expect(onSeedSkipped).toHaveBeenCalledWith("http://bad.com/", "cannot canonicalize");
  });

  it("should fire onSeedCrawled with each seed's own subgraph", async () => {
    const onSeedCrawled = vi.fn();
    const { crawler } = makeCrawler(threeStars, [], { onSeedCrawled });

    await crawler.crawlMultipleUrls(seeds.slice(0, 2), 1);

    expect(
      onSeedCrawled.mock.calls.map(([url, subgraph]) => [url, subgraph.nodeCount]),
    ).toEqual([
      ["http://a.com/0", 5],
      ["http://b.com/0", 5],
    ]);
  });

  it("should reject an invalid maxResults", async () => {
    const { crawler } = makeCrawler(threeStars);
    await expect(crawler.crawlMultipleUrls(seeds, 1, -3)).rejects.toThrow(
      'crawlMultipleUrls: "maxResults" must be a positive integer, got -3',
    );
  });
});
