// rubify/tokenizer - Contract with the morphological tokenizer

import type { SchemaKind } from './schema.js';

export interface MorphToken {
  surface: string;
  /** UTF-16 offsets into the analyzed text */
  start: number;
  end: number;
  /** Positional part-of-speech fields in the tokenizer's schema */
  details: string[];
}

/**
 * Anything that splits text into dictionary tokens. Offsets must be in
 * order, must not overlap, and must slice back to each token's surface.
 */
export interface MorphTokenizer {
  readonly schema: SchemaKind;
  tokenize(text: string): MorphToken[];
}

/**
 * Check the offset contract, returning a description of the first
 * violation or null.
 */
export function findTokenViolation(text: string, tokens: readonly MorphToken[]): string | null {
  let cursor = 0;
  for (const [index, token] of tokens.entries()) {
    if (token.start < cursor || token.end > text.length || token.start >= token.end) {
      return `token ${index} has invalid range [${token.start}, ${token.end})`;
    }
    if (text.slice(token.start, token.end) !== token.surface) {
      return `token ${index} surface "${token.surface}" does not match text at [${token.start}, ${token.end})`;
    }
    cursor = token.end;
  }
  return null;
}

/** Shift every token's offsets by a fixed amount */
export function offsetTokens(tokens: readonly MorphToken[], shift: number): MorphToken[] {
  return tokens.map((token) => ({ ...token, start: token.start + shift, end: token.end + shift }));
}
