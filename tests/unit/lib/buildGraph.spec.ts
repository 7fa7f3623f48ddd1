/**
 * Unit tests for lib/graph/buildGraph and the AncestryGraph store
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AncestryGraph, buildGraph, compareIds } from '../../../server/src/lib/graph/index.js';
import { ConflictingPersonDataError } from '../../../server/src/lib/errors.js';
import { catchError, record, resetLines } from '../../utils/records.js';

const targetsOf = (graph: AncestryGraph, id: string): string[] => {
  const idx = graph.indexOf(id);
  if (idx === undefined) return [];
  return graph.outgoing(idx).map((e) => graph.person(graph.edge(e).target).id);
};

describe('buildGraph', () => {
  beforeEach(() => resetLines());

  describe('construction', () => {
    it('creates one node per distinct identifier and one edge per record', () => {
      const graph = buildGraph([
        record('20', 'Father', '6', { sourceName: 'Name A' }),
        record('6', 'Father', '1', { sourceName: 'Name B' }),
        record('20', 'Father', '6', { sourceName: 'Name A' }),
        record('7', 'Mother', '1'),
      ]);

      expect(graph.nodeCount).toBe(4);
      expect(graph.edgeCount).toBe(4);
    });

    it('keeps duplicate relationships as distinct edges', () => {
      const graph = buildGraph([
        record('1', 'Father', '2'),
        record('1', 'Father', '2'),
      ]);

      expect(graph.edgeCount).toBe(2);
      expect(graph.edge(0)).toEqual({ index: 0, source: 0, target: 1, kind: 'Father', line: 2 });
      expect(graph.edge(1)).toEqual({ index: 1, source: 0, target: 1, kind: 'Father', line: 3 });
    });

    it('assigns node indices in order of first appearance', () => {
      const graph = buildGraph([
        record('20', 'Father', '6'),
        record('6', 'Father', '1'),
      ]);

      expect(graph.indexOf('20')).toBe(0);
      expect(graph.indexOf('6')).toBe(1);
      expect(graph.indexOf('1')).toBe(2);
      expect(graph.indexOf('99')).toBeUndefined();
    });

    it('returns an empty graph for no records', () => {
      const graph = buildGraph([]);
      expect(graph.nodeCount).toBe(0);
      expect(graph.edgeCount).toBe(0);
    });
  });

  describe('person attributes', () => {
    it('records name and age from the source and target columns', () => {
      const graph = buildGraph([
        record('30', 'Mother', '20', { sourceName: 'Name E', sourceAge: 71, targetName: 'Name A', targetAge: 45 }),
      ]);

      expect(graph.person(0)).toEqual({ id: '30', name: 'Name E', age: 71 });
      expect(graph.person(1)).toEqual({ id: '20', name: 'Name A', age: 45 });
    });

    it('fills in attributes a later record supplies', () => {
      const graph = buildGraph([
        record('6', 'Father', '1', { sourceName: 'Name B' }),
        record('1', 'Father', '2', { sourceName: 'Name C', sourceAge: 12 }),
      ]);

      expect(graph.person(1)).toEqual({ id: '1', name: 'Name C', age: 12 });
      expect(graph.person(2)).toEqual({ id: '2' });
    });

    it('accepts a person restated with the same attributes', () => {
      const graph = buildGraph([
        record('20', 'Father', '6', { sourceName: 'Name A', sourceAge: 50 }),
        record('20', 'Father', '7', { sourceName: 'Name A', sourceAge: 50 }),
      ]);

      expect(graph.person(0)).toEqual({ id: '20', name: 'Name A', age: 50 });
    });

    it('rejects a conflicting name', () => {
      const err = catchError(() =>
        buildGraph([
          record('20', 'Father', '6', { sourceName: 'Name A' }),
          record('7', 'Mother', '20', { targetName: 'Someone Else' }),
        ])
      );

      expect(err).toBeInstanceOf(ConflictingPersonDataError);
      expect(err).toMatchObject({
        code: 'ConflictingPersonData',
        line: 3,
        personId: '20',
        field: 'name',
        existing: 'Name A',
        incoming: 'Someone Else',
      });
    });

    it('rejects a conflicting age', () => {
      const err = catchError(() =>
        buildGraph([
          record('20', 'Father', '6', { sourceAge: 50 }),
          record('20', 'Father', '7', { sourceAge: 51 }),
        ])
      );

      expect(err).toMatchObject({ field: 'age', existing: '50', incoming: '51', line: 3 });
    });
  });

  describe('immutability', () => {
    it('freezes the graph once built', () => {
      const graph = buildGraph([record('1', 'Father', '2')]);

      expect(graph.isFrozen).toBe(true);
      expect(() => graph.addEdge(0, 1, 'Father', 9)).toThrow('AncestryGraph is frozen');
      expect(() => graph.addPersonIfAbsent('3')).toThrow('AncestryGraph is frozen');
    });

    it('rejects edges to nodes that do not exist', () => {
      const graph = new AncestryGraph();
      graph.addPersonIfAbsent('1');

      expect(() => graph.addEdge(0, 5, 'Father', 2)).toThrow(RangeError);
    });
  });

  describe('adjacency order', () => {
    it('orders outgoing edges by target identifier', () => {
      const graph = buildGraph([
        record('1', 'Father', '10'),
        record('1', 'Father', 'x'),
        record('1', 'Father', '9'),
        record('1', 'Father', '2'),
      ]);

      expect(targetsOf(graph, '1')).toEqual(['2', '9', '10', 'x']);
    });

    it('keeps parallel edges in insertion order', () => {
      const graph = buildGraph([
        record('1', 'Father', '2'),
        record('1', 'Parent', '2'),
      ]);

      const kinds = graph.outgoing(0).map((e) => graph.edge(e).kind);
      expect(kinds).toEqual(['Father', 'Parent']);
    });
  });
});

describe('compareIds', () => {
  it('compares integer identifiers numerically', () => {
    expect(compareIds('2', '10')).toBe(-1);
    expect(compareIds('10', '2')).toBe(1);
    expect(compareIds('-1', '0')).toBe(-1);
  });

  it('keeps integers beyond double precision in numeric order', () => {
    expect(compareIds('018014398509481985', '18014398509481984')).toBe(1);
    expect(compareIds('18014398509481984', '018014398509481985')).toBe(-1);
    expect(compareIds('99999999999999999999', '100000000000000000000')).toBe(-1);
  });

  it('falls back to code unit order', () => {
    expect(compareIds('a', 'b')).toBe(-1);
    expect(compareIds('b', '10')).toBe(1);
    expect(compareIds('01', '1')).toBe(-1);
    expect(compareIds('x', 'x')).toBe(0);
  });
});
