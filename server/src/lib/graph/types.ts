/**
 * Read-only view of the relationship graph used by traversal algorithms
 */

import type { Person, PersonId, RelationshipEdge } from '@heritage-pathfind/shared';

export interface Graph {
  readonly nodeCount: number;
  readonly edgeCount: number;
  indexOf(id: PersonId): number | undefined;
  person(index: number): Readonly<Person>;
  edge(index: number): Readonly<RelationshipEdge>;
  // Outgoing edge indices, ordered by target id then insertion
  outgoing(index: number): readonly number[];
}
