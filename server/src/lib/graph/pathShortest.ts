/**
 * Find the shortest directed path between two nodes using BFS.
 *
 * Returns the edge indices from source to target, `[]` when they are the same
 * node, or `null` when target is unreachable. Adjacency lists are in canonical
 * order and each node keeps the first edge that reached it, so equal-length
 * alternatives always resolve the same way.
 */

import type { Graph } from './types.js';

export const pathShortest = (
  graph: Graph,
  source: number,
  target: number
): number[] | null => {
  if (source === target) return [];

  const queue: number[] = [source];
  const visited = new Uint8Array(graph.nodeCount);
  const via = new Int32Array(graph.nodeCount).fill(-1);
  visited[source] = 1;

  for (let head = 0; head < queue.length; head++) {
    const edges = graph.outgoing(queue[head]);

    for (let i = 0, len = edges.length; i < len; i++) {
      const child = graph.edge(edges[i]).target;
      // another parent may have already been traversed to this child
      if (visited[child]) {
        continue;
      }
      visited[child] = 1;
      via[child] = edges[i];
      if (child === target) {
        const path: number[] = [];
        for (let node = target; node !== source; ) {
          const edge = via[node];
          path.push(edge);
          node = graph.edge(edge).source;
        }
        return path.reverse();
      }
      queue.push(child);
    }
  }
  return null;
};

export default pathShortest;
