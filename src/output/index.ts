export { JsonWriter } from './json.js';
export { DotWriter } from './dot.js';
export { writeTextFile, quoteDotId } from './utils.js';
export { MarkdownWriter, pageFileName, sanitizeFilename, addFrontMatter } from './markdown.js';

import type { OutputFormat } from '../types.js';
import type { WebGraph } from '../graph/graph.js';
import { JsonWriter } from './json.js';
import { DotWriter } from './dot.js';

/**
 * Common interface for graph writers.
 */
export interface GraphWriter {
  readonly format: OutputFormat;
  readonly extension: string;
  serialize(graph: WebGraph): string;
  write(graph: WebGraph, filePath: string): Promise<string>;
}

/**
 * Factory function that returns the writer for an output format.
 */
export function createGraphWriter(format: OutputFormat): GraphWriter {
  switch (format) {
    case 'json':
      return new JsonWriter();
    case 'dot':
      return new DotWriter();
    default: {
      const _exhaustive: never = format;
      throw new Error(`Unknown output format: ${_exhaustive}`);
    }
  }
}

/**
 * Serialize a graph in the given format.
 */
export function serializeGraph(graph: WebGraph, format: OutputFormat): string {
  return createGraphWriter(format).serialize(graph);
}

/**
 * Write a graph to `filePath` in the given format.
 *
 * @returns The path that was written
 */
export function writeGraph(
  graph: WebGraph,
  filePath: string,
  format: OutputFormat,
): Promise<string> {
  return createGraphWriter(format).write(graph, filePath);
}
