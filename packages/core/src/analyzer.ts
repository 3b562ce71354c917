// rubify/analyzer - Whole-document furigana analysis over an injected tokenizer

import { LRUCache } from 'lru-cache';
import { dp } from './debug.js';
import { AnalysisError, TokenizationError, describeError } from './errors.js';
import { annotateToken } from './furigana.js';
import { startTimer } from './profiling.js';
import {
  decodeRequest,
  encodeError,
  encodeText,
  serializeTokens,
  type AnalyzeRequest,
  type TokenAnnotation,
  type TokenLayout
} from './protocol.js';
import { plainSegment } from './ruby.js';
import { decodeFeatures, gapDetails, type SchemaKind } from './schema.js';
import { findTokenViolation, type MorphToken, type MorphTokenizer } from './tokenizer.js';
import { buildUserDictionary, withUserDictionary, type UserDictionary } from './userDictionary.js';

export type AnalysisResult =
  | { ok: true; tokens: TokenAnnotation[] }
  | { ok: false; error: AnalysisError };

export interface AnalyzerOptions {
  tokenizer: MorphTokenizer;
  /** Wire layout used by analyzeBytes (default: details) */
  layout?: TokenLayout;
  /** Compiled user dictionaries kept per analyzer (default: 32) */
  userDictionaryCacheSize?: number;
}

export function gapAnnotation(schema: SchemaKind, text: string): TokenAnnotation {
  const details = gapDetails(schema);
  return {
    surface: text,
    details,
    features: decodeFeatures(schema, details),
    rubySegments: [plainSegment(text)],
    gap: true
  };
}

export function tokenAnnotation(schema: SchemaKind, token: MorphToken): TokenAnnotation {
  const features = decodeFeatures(schema, token.details);
  return {
    surface: token.surface,
    details: [...token.details],
    features,
    rubySegments: annotateToken(token.surface, features),
    gap: false
  };
}

/**
 * Annotate tokens in surface order, synthesizing a gap annotation for every
 * stretch of text no token covers.
 */
export function annotateTokens(schema: SchemaKind, text: string, tokens: readonly MorphToken[]): TokenAnnotation[] {
  const stop = startTimer('annotate');
  const annotations: TokenAnnotation[] = [];
  let cursor = 0;

  for (const token of tokens) {
    if (token.start > cursor) {
      annotations.push(gapAnnotation(schema, text.slice(cursor, token.start)));
    }
    annotations.push(tokenAnnotation(schema, token));
    cursor = token.end;
  }

  if (cursor < text.length) {
    annotations.push(gapAnnotation(schema, text.slice(cursor)));
  }

  stop();
  return annotations;
}

export class FuriganaAnalyzer {
  readonly tokenizer: MorphTokenizer;
  readonly layout: TokenLayout;
  private readonly userDictionaries: LRUCache<string, UserDictionary>;

  constructor(options: AnalyzerOptions) {
    this.tokenizer = options.tokenizer;
    this.layout = options.layout ?? 'details';
    this.userDictionaries = new LRUCache({ max: options.userDictionaryCacheSize ?? 32 });
  }

  get schema(): SchemaKind {
    return this.tokenizer.schema;
  }

  private userDictionary(csv: string): UserDictionary {
    const key = `${this.schema}\u0000${csv}`;
    let dictionary = this.userDictionaries.get(key);
    if (!dictionary) {
      dictionary = buildUserDictionary(this.schema, csv);
      this.userDictionaries.set(key, dictionary);
    }
    return dictionary;
  }

  private runTokenizer(tokenizer: MorphTokenizer, text: string): MorphToken[] {
    const stop = startTimer('tokenize');
    try {
      return tokenizer.tokenize(text);
    } catch (error) {
      throw new TokenizationError(`Tokenization failed: ${describeError(error)}`, { cause: error });
    } finally {
      stop();
    }
  }

  private tokenize(tokenizer: MorphTokenizer, text: string): MorphToken[] {
    const tokens = this.runTokenizer(tokenizer, text);
    const violation = findTokenViolation(text, tokens);
    if (violation) {
      throw new TokenizationError(`Tokenization failed: ${violation}`);
    }
    return tokens;
  }

  /**
   * Analyze one document. Failures come back as the error arm of the
   * result; nothing partial is returned.
   */
  analyze(request: AnalyzeRequest): AnalysisResult {
    const stop = startTimer('analyze');
    try {
      const tokenizer = request.userDictCsv === undefined
        ? this.tokenizer
        : withUserDictionary(this.tokenizer, this.userDictionary(request.userDictCsv));

      const tokens = this.tokenize(tokenizer, request.text);
      dp(`tokenized ${request.text.length} chars into ${tokens.length} tokens`);

      return { ok: true, tokens: annotateTokens(this.schema, request.text, tokens) };
    } catch (error) {
      if (error instanceof AnalysisError) {
        return { ok: false, error };
      }
      throw error;
    } finally {
      stop();
    }
  }

  /**
   * Byte-level entry point: a JSON request in, either a JSON token list or
   * an "Error: ..." string out.
   */
  analyzeBytes(requestBytes: Uint8Array): Uint8Array {
    let request: AnalyzeRequest;
    try {
      request = decodeRequest(requestBytes);
    } catch (error) {
      if (error instanceof AnalysisError) return encodeError(error);
      throw error;
    }

    const result = this.analyze(request);
    if (!result.ok) return encodeError(result.error);

    try {
      return encodeText(serializeTokens(result.tokens, this.layout));
    } catch (error) {
      if (error instanceof AnalysisError) return encodeError(error);
      throw error;
    }
  }
}

/**
 * One-shot form of {@link FuriganaAnalyzer.analyzeBytes}, with no user
 * dictionary cache carried between calls.
 */
export function analyze(requestBytes: Uint8Array, tokenizer: MorphTokenizer, layout?: TokenLayout): Uint8Array {
  return new FuriganaAnalyzer({ tokenizer, layout }).analyzeBytes(requestBytes);
}
