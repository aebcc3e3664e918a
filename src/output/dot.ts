import type { WebGraph } from '../graph/graph.js';
import { quoteDotId, writeTextFile } from './utils.js';

/**
 * Graphviz DOT output writer, for rendering the graph with `dot -Tsvg`.
 *
 * Every node is declared (so isolated pages still render), followed by
 * every edge.
 */
export class DotWriter {
  readonly format = 'dot';
  readonly extension = '.dot';

  serialize(graph: WebGraph): string {
    const lines = ['digraph webgraph {'];
    for (const node of graph.allNodes()) {
      lines.push(`  ${quoteDotId(node.id)};`);
    }
    for (const edge of graph.allEdges()) {
      lines.push(`  ${quoteDotId(edge.from)} -> ${quoteDotId(edge.to)};`);
    }
    lines.push('}');
    return lines.join('\n') + '\n';
  }

  async write(graph: WebGraph, filePath: string): Promise<string> {
    return writeTextFile(filePath, this.serialize(graph));
  }
}
