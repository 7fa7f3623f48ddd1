/**
 * Fold parsed relationship records into a frozen AncestryGraph
 */

import type { PersonId, RelationshipRecord } from '@heritage-pathfind/shared';
import { ConflictingPersonDataError } from '../errors.js';
import { AncestryGraph } from './ancestryGraph.js';

function mergePerson(
  graph: AncestryGraph,
  id: PersonId,
  name: string | undefined,
  age: number | undefined,
  line: number
): number {
  const idx = graph.addPersonIfAbsent(id);
  const known = graph.person(idx);

  // first occurrence wins; a later, different value is a data error
  if (name !== undefined && known.name !== undefined && known.name !== name) {
    throw new ConflictingPersonDataError(line, id, 'name', known.name, name);
  }
  if (age !== undefined && known.age !== undefined && known.age !== age) {
    throw new ConflictingPersonDataError(line, id, 'age', String(known.age), String(age));
  }
  graph.updatePerson(idx, {
    name: known.name === undefined ? name : undefined,
    age: known.age === undefined ? age : undefined,
  });
  return idx;
}

export function buildGraph(records: Iterable<RelationshipRecord>): AncestryGraph {
  const graph = new AncestryGraph();

  for (const record of records) {
    const source = mergePerson(graph, record.sourceId, record.sourceName, record.sourceAge, record.line);
    const target = mergePerson(graph, record.targetId, record.targetName, record.targetAge, record.line);
    graph.addEdge(source, target, record.kind, record.line);
  }

  return graph.freeze();
}

export default buildGraph;
