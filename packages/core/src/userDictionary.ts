/**
 * User dictionary support - compiling CSV entries and overlaying them on a tokenizer
 *
 * Two row formats are accepted:
 *   surface,pos,reading                           (simple)
 *   surface,leftId,rightId,cost,<schema fields>    (detailed)
 */

import { parse } from 'csv-parse/sync';
import { UserDictionaryError, describeError } from './errors.js';
import { NOT_APPLICABLE, SCHEMA_WIDTH, type SchemaKind } from './schema.js';
import { offsetTokens, type MorphToken, type MorphTokenizer } from './tokenizer.js';
import { dp } from './debug.js';
import { startTimer } from './profiling.js';

export interface UserDictionaryEntry {
  surface: string;
  details: string[];
}

export interface UserDictionary {
  schema: SchemaKind;
  /** Later rows replace earlier rows with the same surface */
  entries: ReadonlyMap<string, UserDictionaryEntry>;
  /** Length of the longest surface, in UTF-16 code units */
  maxLength: number;
}

const DETAILED_PREFIX = 4;

function simpleDetails(schema: SchemaKind, [surface, pos, reading]: string[]): string[] {
  const details = new Array<string>(SCHEMA_WIDTH[schema]).fill(NOT_APPLICABLE);
  details[0] = pos;
  if (schema === 'ipadic') {
    details[6] = surface;
    details[7] = reading;
  } else {
    details[6] = reading;
    details[7] = surface;
    details[8] = surface;
  }
  return details;
}

function isIntegerField(value: string): boolean {
  return /^-?\d+$/.test(value.trim());
}

function readRows(csv: string): string[][] {
  let records: unknown;
  try {
    records = parse(csv, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
      skip_records_with_empty_values: true,
      trim: true
    });
  } catch (error) {
    throw new UserDictionaryError(`Failed to build user dictionary: ${describeError(error)}`, { cause: error });
  }

  if (!Array.isArray(records)) {
    throw new UserDictionaryError('Failed to build user dictionary: unreadable CSV');
  }

  return records.map((record: unknown) =>
    Array.isArray(record) ? record.map((field: unknown) => String(field)) : []
  );
}

function entryFromRow(schema: SchemaKind, row: string[], rowNumber: number): UserDictionaryEntry {
  const width = SCHEMA_WIDTH[schema];
  const fail = (reason: string) =>
    new UserDictionaryError(`Failed to build user dictionary: row ${rowNumber}: ${reason}`);

  const surface = row[0] ?? '';
  if (!surface) {
    throw fail('empty surface');
  }

  if (row.length === 3) {
    return { surface, details: simpleDetails(schema, row) };
  }

  if (row.length === DETAILED_PREFIX + width) {
    const [, leftId, rightId, cost] = row;
    for (const value of [leftId, rightId, cost]) {
      if (!isIntegerField(value)) {
        throw fail(`expected an integer, got "${value}"`);
      }
    }
    return { surface, details: row.slice(DETAILED_PREFIX) };
  }

  throw fail(`expected 3 or ${DETAILED_PREFIX + width} columns for ${schema}, got ${row.length}`);
}

export function buildUserDictionary(schema: SchemaKind, csv: string): UserDictionary {
  const stop = startTimer('buildUserDictionary');
  try {
    const entries = new Map<string, UserDictionaryEntry>();
    let maxLength = 0;

    readRows(csv).forEach((row, index) => {
      const entry = entryFromRow(schema, row, index + 1);
      entries.set(entry.surface, entry);
      maxLength = Math.max(maxLength, entry.surface.length);
    });

    dp(`user dictionary: ${entries.size} entries (${schema})`);
    return { schema, entries, maxLength };
  } finally {
    stop();
  }
}

function longestMatch(dictionary: UserDictionary, text: string, start: number): UserDictionaryEntry | undefined {
  const limit = Math.min(dictionary.maxLength, text.length - start);
  for (let length = limit; length > 0; length--) {
    const entry = dictionary.entries.get(text.slice(start, start + length));
    if (entry) return entry;
  }
  return undefined;
}

/**
 * Wrap a tokenizer so user entries claim their spans first. At each
 * position the longest entry wins; text between matches goes to the base
 * tokenizer.
 */
export function withUserDictionary(base: MorphTokenizer, dictionary: UserDictionary): MorphTokenizer {
  if (dictionary.schema !== base.schema) {
    throw new UserDictionaryError(
      `Failed to build user dictionary: compiled for ${dictionary.schema}, tokenizer uses ${base.schema}`
    );
  }

  return {
    schema: base.schema,
    tokenize(text: string): MorphToken[] {
      const tokens: MorphToken[] = [];
      let pending = 0;
      let position = 0;

      const flush = (end: number) => {
        if (end > pending) {
          tokens.push(...offsetTokens(base.tokenize(text.slice(pending, end)), pending));
        }
      };

      while (position < text.length) {
        const entry = longestMatch(dictionary, text, position);
        if (!entry) {
          position++;
          continue;
        }

        flush(position);
        const end = position + entry.surface.length;
        tokens.push({ surface: entry.surface, start: position, end, details: [...entry.details] });
        position = end;
        pending = end;
      }

      flush(text.length);
      return tokens;
    }
  };
}
