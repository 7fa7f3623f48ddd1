import { MalformedRecordError } from '../errors.js';

const QUOTE = '"';

/**
 * Split one delimited line into trimmed fields.
 * A field may be wrapped in double quotes; `""` inside quotes is a literal quote.
 */
export function splitFields(text: string, delimiter: string, line: number): string[] {
  const fields: string[] = [];
  // a blank delimiter (tab, space) is never padding
  const isPadding = (ch: string | undefined): boolean => (ch === ' ' || ch === '\t') && ch !== delimiter;
  let i = 0;

  for (;;) {
    while (isPadding(text[i])) i++;

    let field: string;
    if (text[i] === QUOTE) {
      field = '';
      i++;
      for (;;) {
        const close = text.indexOf(QUOTE, i);
        if (close === -1) {
          throw new MalformedRecordError(line, 'unterminated quoted field');
        }
        field += text.slice(i, close);
        i = close + 1;
        if (text[i] !== QUOTE) break;
        field += QUOTE;
        i++;
      }
      while (isPadding(text[i])) i++;
      if (i < text.length && text[i] !== delimiter) {
        throw new MalformedRecordError(line, `unexpected text after quoted field ${fields.length + 1}`);
      }
    } else {
      const end = text.indexOf(delimiter, i);
      const stop = end === -1 ? text.length : end;
      field = text.slice(i, stop).trim();
      if (field.includes(QUOTE)) {
        throw new MalformedRecordError(line, `stray quote in field ${fields.length + 1}`);
      }
      i = stop;
    }

    fields.push(field);
    if (i >= text.length) return fields;
    i++; // delimiter
  }
}
