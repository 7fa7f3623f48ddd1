/**
 * Builders for relationship records and graphs used across unit tests
 */

import type { RelationshipRecord } from '@heritage-pathfind/shared';
import { buildGraph, type AncestryGraph } from '../../server/src/lib/graph/index.js';

let nextLine = 2;

export const record = (
  sourceId: string,
  kind: string,
  targetId: string,
  extra: Partial<RelationshipRecord> = {}
): RelationshipRecord => ({
  line: nextLine++,
  sourceId,
  kind,
  targetId,
  ...extra,
});

export const resetLines = (): void => {
  nextLine = 2;
};

// Helper to create a parent → children graph, as the path tests describe it
export const createTestGraph = (
  nodes: Array<{ id: string; name: string; children: string[] }>
): AncestryGraph => {
  const names = new Map(nodes.map((n) => [n.id, n.name] as const));
  const records: RelationshipRecord[] = [];
  for (const node of nodes) {
    for (const child of node.children) {
      records.push(
        record(node.id, 'Father', child, { sourceName: node.name, targetName: names.get(child) })
      );
    }
  }
  return buildGraph(records);
};

/**
 * Person ids visited by a list of edge indices, starting at the first edge's source
 */
export const pathIds = (graph: AncestryGraph, edges: number[]): string[] => {
  if (!edges.length) return [];
  const ids = [graph.person(graph.edge(edges[0]).source).id];
  for (const idx of edges) ids.push(graph.person(graph.edge(idx).target).id);
  return ids;
};

export const catchError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
};
