/**
 * Arena-backed directed multigraph of people and their relationships.
 *
 * Nodes live in insertion order and are addressed by integer index; edges keep
 * the input line that produced them. `freeze()` orders every adjacency list
 * canonically and rejects any later mutation.
 */

import type { Person, PersonId, RelationshipEdge } from '@heritage-pathfind/shared';
import type { Graph } from './types.js';

const INTEGER = /^-?\d+$/;

/**
 * Canonical identifier order: integers first and numerically, then everything
 * else by code unit
 */
export const compareIds = (a: PersonId, b: PersonId): number => {
  const aInt = INTEGER.test(a);
  const bInt = INTEGER.test(b);
  if (aInt !== bInt) return aInt ? -1 : 1;
  if (aInt) {
    const aNum = BigInt(a);
    const bNum = BigInt(b);
    if (aNum !== bNum) return aNum < bNum ? -1 : 1;
  }
  if (a === b) return 0;
  return a < b ? -1 : 1;
};

export class AncestryGraph implements Graph {
  private readonly people: Person[] = [];
  private readonly edges: RelationshipEdge[] = [];
  private readonly adjacency: number[][] = [];
  private readonly index = new Map<PersonId, number>();
  private frozen = false;

  get nodeCount(): number {
    return this.people.length;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  indexOf(id: PersonId): number | undefined {
    return this.index.get(id);
  }

  person(index: number): Readonly<Person> {
    const person = this.people[index];
    if (!person) throw new RangeError(`no person at node index ${index}`);
    return person;
  }

  edge(index: number): Readonly<RelationshipEdge> {
    const edge = this.edges[index];
    if (!edge) throw new RangeError(`no relationship at edge index ${index}`);
    return edge;
  }

  outgoing(index: number): readonly number[] {
    return this.adjacency[index] ?? [];
  }

  /**
   * Return the node index for `id`, creating a bare node the first time it is seen
   */
  addPersonIfAbsent(id: PersonId): number {
    this.assertMutable();
    const existing = this.index.get(id);
    if (existing !== undefined) return existing;
    const idx = this.people.length;
    this.people.push({ id });
    this.adjacency.push([]);
    this.index.set(id, idx);
    return idx;
  }

  /**
   * Fill in attributes of a node; callers decide what counts as a conflict
   */
  updatePerson(index: number, attributes: Pick<Person, 'name' | 'age'>): void {
    this.assertMutable();
    const person = this.people[index];
    if (!person) throw new RangeError(`no person at node index ${index}`);
    if (attributes.name !== undefined) person.name = attributes.name;
    if (attributes.age !== undefined) person.age = attributes.age;
  }

  addEdge(source: number, target: number, kind: string, line: number): number {
    this.assertMutable();
    if (!this.people[source] || !this.people[target]) {
      throw new RangeError(`edge ${source} -> ${target} references a missing node`);
    }
    const idx = this.edges.length;
    this.edges.push({ index: idx, source, target, kind, line });
    this.adjacency[source].push(idx);
    return idx;
  }

  freeze(): this {
    if (this.frozen) return this;
    for (const list of this.adjacency) {
      // Array.prototype.sort is stable, so parallel edges keep insertion order
      list.sort((a, b) =>
        compareIds(this.people[this.edges[a].target].id, this.people[this.edges[b].target].id)
      );
    }
    this.frozen = true;
    return this;
  }

  private assertMutable(): void {
    if (this.frozen) throw new Error('AncestryGraph is frozen');
  }
}
