/**
 * Reading and validating relationship datasets
 */

export { readLines } from './readLines.js';
export { splitFields } from './splitFields.js';
export { resolveColumns, REQUIRED_COLUMNS, OPTIONAL_COLUMNS } from './columns.js';
export { parseRecord, parseRecords, normalizeKind } from './parseRecord.js';
export type { ParseRecordsOptions } from './parseRecord.js';
