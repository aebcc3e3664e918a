export { WebNode, domainOf } from './node.js';
export type { HyperlinkSource } from './node.js';
export { WebGraph } from './graph.js';
export type { GraphEdge, SerializedGraph } from './graph.js';
