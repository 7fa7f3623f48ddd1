import type { ColumnKey, ColumnMapping, ResolvedColumns } from '@heritage-pathfind/shared';
import { MalformedRecordError, MissingFieldError } from '../errors.js';

export const REQUIRED_COLUMNS: readonly ColumnKey[] = ['sourceId', 'sourceName', 'kind', 'targetId'];
export const OPTIONAL_COLUMNS: readonly ColumnKey[] = ['age', 'targetName', 'targetAge'];

/**
 * Locate every logical column in the header row. Header names match case-insensitively.
 */
export function resolveColumns(
  header: string[],
  mapping: ColumnMapping,
  line: number
): ResolvedColumns {
  const positions = new Map<string, number>();
  header.forEach((name, i) => {
    const key = name.toLowerCase();
    if (!key) return;
    if (positions.has(key)) {
      throw new MalformedRecordError(line, `duplicate header "${name}"`);
    }
    positions.set(key, i);
  });

  const indexOf: ResolvedColumns['indexOf'] = {};
  for (const column of REQUIRED_COLUMNS) {
    const index = positions.get(mapping[column].toLowerCase());
    if (index === undefined) throw new MissingFieldError(line, mapping[column]);
    indexOf[column] = index;
  }
  for (const column of OPTIONAL_COLUMNS) {
    const index = positions.get(mapping[column].toLowerCase());
    if (index !== undefined) indexOf[column] = index;
  }

  return { count: header.length, indexOf };
}
