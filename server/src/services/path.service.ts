import type { AncestryPath, PathQuery, PathStep } from '@heritage-pathfind/shared';
import { pathShortest, type Graph } from '../lib/graph/index.js';
import { NoPathFoundError, UnknownIdentifierError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

const toStep = (graph: Graph, node: number, kind?: string): PathStep => {
  const { id, name, age } = graph.person(node);
  const step: PathStep = { id };
  if (name !== undefined) step.name = name;
  if (age !== undefined) step.age = age;
  if (kind !== undefined) step.kind = kind;
  return step;
};

export const pathService = {
  /**
   * Shortest directed path from the ancestor down to the descendant.
   * Throws UnknownIdentifierError or NoPathFoundError; never returns a partial path.
   */
  findPath(graph: Graph, query: PathQuery): AncestryPath {
    const { ancestorId, descendantId } = query;

    const source = graph.indexOf(ancestorId);
    if (source === undefined) throw new UnknownIdentifierError(ancestorId, 'ancestor');
    const target = graph.indexOf(descendantId);
    if (target === undefined) throw new UnknownIdentifierError(descendantId, 'descendant');

    const edges = pathShortest(graph, source, target);
    if (edges === null) throw new NoPathFoundError(ancestorId, descendantId);

    const steps = edges.map((idx) => {
      const edge = graph.edge(idx);
      return toStep(graph, edge.source, edge.kind);
    });
    steps.push(toStep(graph, target));

    logger.path('path', `${ancestorId} → ${descendantId}: ${edges.length} hops`);
    return { steps, hops: edges.length };
  },
};
