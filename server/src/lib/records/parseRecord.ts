/**
 * Turn dataset lines into validated relationship records.
 * Fail-fast: the first bad line throws and nothing after it is parsed.
 */

import type {
  ColumnKey,
  ColumnMapping,
  RelationshipRecord,
  ResolvedColumns,
  SourceLine,
} from '@heritage-pathfind/shared';
import { InvalidMetadataError, MalformedRecordError, MissingFieldError } from '../errors.js';
import { resolveColumns } from './columns.js';
import { splitFields } from './splitFields.js';

// "Father of" and "Father" are the same kind; the renderer adds "of"
const TRAILING_OF = /\s+of$/i;
const NON_NEGATIVE_INT = /^\d+$/;

export const normalizeKind = (kind: string): string => kind.trim().replace(TRAILING_OF, '');

export function parseRecord(
  fields: string[],
  columns: ResolvedColumns,
  mapping: ColumnMapping,
  line: number
): RelationshipRecord {
  if (fields.length !== columns.count) {
    throw new MalformedRecordError(line, `expected ${columns.count} fields, found ${fields.length}`);
  }

  const read = (column: ColumnKey): string | undefined => {
    const index = columns.indexOf[column];
    if (index === undefined) return undefined;
    const value = fields[index].trim();
    return value || undefined;
  };

  const required = (column: ColumnKey): string => {
    const value = read(column);
    if (!value) throw new MissingFieldError(line, mapping[column]);
    return value;
  };

  const age = (column: ColumnKey): number | undefined => {
    const value = read(column);
    if (value === undefined) return undefined;
    if (!NON_NEGATIVE_INT.test(value)) {
      throw new InvalidMetadataError(line, mapping[column], value);
    }
    return Number(value);
  };

  const sourceId = required('sourceId');
  const kind = normalizeKind(required('kind'));
  const targetId = required('targetId');
  if (sourceId === targetId) {
    throw new MalformedRecordError(line, `person ${sourceId} cannot be related to themselves`);
  }

  return {
    line,
    sourceId,
    sourceName: read('sourceName'),
    sourceAge: age('age'),
    kind,
    targetId,
    targetName: read('targetName'),
    targetAge: age('targetAge'),
  };
}

export interface ParseRecordsOptions {
  delimiter: string;
  columns: ColumnMapping;
}

/**
 * Parse a header line followed by data lines. Blank lines are skipped.
 */
export function* parseRecords(
  lines: Iterable<SourceLine>,
  options: ParseRecordsOptions
): Generator<RelationshipRecord> {
  let columns: ResolvedColumns | undefined;

  for (const { line, text } of lines) {
    if (!text.trim()) continue;
    const fields = splitFields(text, options.delimiter, line);
    if (!columns) {
      columns = resolveColumns(fields, options.columns, line);
      continue;
    }
    yield parseRecord(fields, columns, options.columns, line);
  }
}
