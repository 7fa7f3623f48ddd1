/**
 * Relationship graph storage, construction and traversal
 */

export { AncestryGraph, compareIds } from './ancestryGraph.js';
export { buildGraph } from './buildGraph.js';
export { pathShortest } from './pathShortest.js';
export type { Graph } from './types.js';
