/**
 * Split a raw dataset buffer into numbered UTF-8 lines
 */

import type { SourceLine } from '@heritage-pathfind/shared';
import { MalformedRecordError } from '../errors.js';

const LF = 0x0a;
const CR = 0x0d;
const BOM = '\uFEFF';

export function* readLines(buffer: Uint8Array): Generator<SourceLine> {
  // fatal: invalid byte sequences throw instead of becoming U+FFFD
  const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  let start = 0;
  let line = 0;

  while (start < buffer.length) {
    let end = buffer.indexOf(LF, start);
    const next = end === -1 ? buffer.length : end + 1;
    if (end === -1) end = buffer.length;
    if (end > start && buffer[end - 1] === CR) end--;
    line++;

    let text: string;
    try {
      text = decoder.decode(buffer.subarray(start, end));
    } catch {
      throw new MalformedRecordError(line, 'invalid UTF-8 byte sequence');
    }
    if (line === 1 && text.startsWith(BOM)) text = text.slice(BOM.length);

    yield { line, text };
    start = next;
  }
}
