// Shared data model for the relationship graph and query results

export type PersonId = string;

export interface Person {
  id: PersonId;
  name?: string;
  age?: number;                // Non-negative integer years
}

// Logical columns of the relationship dataset
export type ColumnKey =
  | 'sourceId'
  | 'sourceName'
  | 'age'
  | 'kind'
  | 'targetId'
  | 'targetName'
  | 'targetAge';

// Header name for every logical column
export type ColumnMapping = Record<ColumnKey, string>;

// Field index for every logical column present in the header
export interface ResolvedColumns {
  count: number;               // Number of fields in the header row
  indexOf: Partial<Record<ColumnKey, number>>;
}

export interface SourceLine {
  line: number;                // 1-based physical line number
  text: string;
}

// One parsed data row, before it becomes graph structure
export interface RelationshipRecord {
  line: number;
  sourceId: PersonId;
  sourceName?: string;
  sourceAge?: number;
  kind: string;                // "Father", "Mother"... without a trailing "of"
  targetId: PersonId;
  targetName?: string;
  targetAge?: number;
}

export interface RelationshipEdge {
  index: number;
  source: number;              // Node index of the ancestor side
  target: number;              // Node index of the descendant side
  kind: string;
  line: number;
}

export interface PathQuery {
  ancestorId: PersonId;
  descendantId: PersonId;
}

export interface PathStep extends Person {
  kind?: string;               // Relationship to the next step, absent on the last one
}

export interface AncestryPath {
  steps: PathStep[];
  hops: number;
}
