import type { WebGraph } from '../graph/graph.js';
import { writeTextFile } from './utils.js';

/**
 * JSON output writer.
 *
 * Produces `{ "nodes": [{ "id", "domain" }], "edges": [{ "from", "to" }] }`
 * with two-space indentation and a trailing newline.
 */
export class JsonWriter {
  readonly format = 'json';
  readonly extension = '.json';

  serialize(graph: WebGraph): string {
    return JSON.stringify(graph.toJSON(), null, 2) + '\n';
  }

  async write(graph: WebGraph, filePath: string): Promise<string> {
    return writeTextFile(filePath, this.serialize(graph));
  }
}
