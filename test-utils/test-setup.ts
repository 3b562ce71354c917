// Shared test utilities: an in-memory dictionary tokenizer and fixtures
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { MorphToken, MorphTokenizer, SchemaKind, TokenAnnotation } from '@rubify/core';

const __dirname = dirname(fileURLToPath(import.meta.url));

export interface TableEntry {
  surface: string;
  details: string[];
}

/** Details the table tokenizer gives characters it has no entry for */
export const UNKNOWN_DETAILS = ['UNK'];

function isTableEntry(value: unknown): value is TableEntry {
  if (typeof value !== 'object' || value === null || !('surface' in value) || !('details' in value)) return false;
  const { surface, details } = value;
  return typeof surface === 'string' && Array.isArray(details) && details.every((d) => typeof d === 'string');
}

export function loadFixture(schema: SchemaKind): TableEntry[] {
  const parsed: unknown = JSON.parse(readFileSync(join(__dirname, 'data', `${schema}.json`), 'utf-8'));
  if (!Array.isArray(parsed) || !parsed.every(isTableEntry)) {
    throw new Error(`Malformed ${schema} fixture`);
  }
  return parsed;
}

/**
 * Longest-match tokenizer over a fixed word table. Whitespace is left
 * untokenized so callers see gaps; anything else without an entry becomes
 * a one-character unknown token.
 */
export function createTableTokenizer(schema: SchemaKind, entries: readonly TableEntry[] = loadFixture(schema)): MorphTokenizer {
  const table = new Map(entries.map((entry) => [entry.surface, entry]));
  const maxLength = Math.max(0, ...entries.map((entry) => entry.surface.length));

  return {
    schema,
    tokenize(text: string): MorphToken[] {
      const tokens: MorphToken[] = [];
      let position = 0;

      while (position < text.length) {
        const char = String.fromCodePoint(text.codePointAt(position) ?? 0);
        if (/\s/.test(char)) {
          position += char.length;
          continue;
        }

        let match: TableEntry | undefined;
        for (let length = Math.min(maxLength, text.length - position); length > 0 && !match; length--) {
          match = table.get(text.slice(position, position + length));
        }

        const surface = match ? match.surface : char;
        const details = match ? [...match.details] : [...UNKNOWN_DETAILS];
        tokens.push({ surface, start: position, end: position + surface.length, details });
        position += surface.length;
      }

      return tokens;
    }
  };
}

/** A tokenizer whose tokenize always throws */
export function createFailingTokenizer(schema: SchemaKind, message = 'dictionary unavailable'): MorphTokenizer {
  return {
    schema,
    tokenize(): MorphToken[] {
      throw new Error(message);
    }
  };
}

// Surfaces in order, with gaps marked
export function extractSurfaces(annotations: readonly TokenAnnotation[]): string[] {
  return annotations.map((annotation) => (annotation.gap ? `:gap(${annotation.surface})` : annotation.surface));
}
