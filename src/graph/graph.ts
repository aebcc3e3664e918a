import type { WebNode } from './node.js';

/** A directed edge between two node ids. */
export interface GraphEdge {
  from: string;
  to: string;
}

/**
 * Plain-object form of a graph, suitable for JSON serialization.
 */
export interface SerializedGraph {
  nodes: Array<{ id: string; domain: string }>;
  edges: GraphEdge[];
}

/**
 * A directed graph of web pages keyed by node id.
 *
 * Nodes are unique by id and each node's neighbors form a set, so adding
 * the same node or edge twice has no effect. Iteration follows insertion
 * order.
 */
export class WebGraph {
  private readonly nodes = new Map<string, WebNode>();
  private readonly edges = new Map<string, Set<string>>();

  /**
   * Add a node. A node whose id is already present is ignored.
   *
   * @returns true if the node was new
   */
  addNode(node: WebNode): boolean {
    if (this.nodes.has(node.id)) {
      return false;
    }
    this.nodes.set(node.id, node);
    return true;
  }

  /**
   * Add a directed edge, adding either endpoint that is not yet a member.
   */
  addEdge(from: WebNode, to: WebNode): void {
    this.addNode(from);
    this.addNode(to);
    this.linkIds(from.id, to.id);
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getNode(id: string): WebNode | undefined {
    return this.nodes.get(id);
  }

  hasEdge(from: string, to: string): boolean {
    return this.edges.get(from)?.has(to) ?? false;
  }

  /** All nodes, in insertion order. */
  allNodes(): WebNode[] {
    return [...this.nodes.values()];
  }

  /** Ids of the nodes `id` links to, in insertion order. */
  neighbors(id: string): string[] {
    return [...(this.edges.get(id) ?? [])];
  }

  /** All edges, grouped by source node in insertion order. */
  allEdges(): GraphEdge[] {
    const result: GraphEdge[] = [];
    for (const [from, targets] of this.edges) {
      for (const to of targets) {
        result.push({ from, to });
      }
    }
    return result;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    let count = 0;
    for (const targets of this.edges.values()) {
      count += targets.size;
    }
    return count;
  }

  /**
   * Merge another graph into this one, in place.
   *
   * Nodes are united by id (a node already present here is kept) and each
   * source node's neighbor set is united with the other graph's. Merging
   * the same graph twice, or merging graphs in a different order, yields
   * the same node and edge sets.
   *
   * @returns this graph
   */
  merge(other: WebGraph): this {
    for (const node of other.nodes.values()) {
      this.addNode(node);
    }
    for (const [from, targets] of other.edges) {
      for (const to of targets) {
        this.linkIds(from, to);
      }
    }
    return this;
  }

  toJSON(): SerializedGraph {
    return {
      nodes: this.allNodes().map((node) => ({ id: node.id, domain: node.domain })),
      edges: this.allEdges(),
    };
  }

  private linkIds(from: string, to: string): void {
    let targets = this.edges.get(from);
    if (!targets) {
      targets = new Set();
      this.edges.set(from, targets);
    }
    targets.add(to);
  }
}
