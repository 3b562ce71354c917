// rubify/protocol - Request decoding and response encoding for the byte channel

import { InvalidRequestError, SerializationError, describeError, type AnalysisError } from './errors.js';
import type { RubySegment } from './ruby.js';
import { namedFields, type PartOfSpeech } from './schema.js';

export interface AnalyzeRequest {
  text: string;
  userDictCsv?: string;
}

export interface TokenAnnotation {
  surface: string;
  /** Fields as the tokenizer emitted them, or the gap placeholder list */
  details: string[];
  features: PartOfSpeech;
  rubySegments: RubySegment[];
  gap: boolean;
}

export type TokenLayout = 'details' | 'named';

export const TOKEN_LAYOUTS: readonly TokenLayout[] = ['details', 'named'];

export function isTokenLayout(value: string): value is TokenLayout {
  return value === 'details' || value === 'named';
}

export type WireToken =
  | { surface: string; details: string[]; ruby_segments: RubySegment[] }
  | { surface: string; pos: string; sub_pos: string; reading: string; base: string; ruby_segments: RubySegment[] };

export const ERROR_PREFIX = 'Error: ';

const decoder = new TextDecoder('utf-8', { fatal: true });
const encoder = new TextEncoder();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed JSON body. Unknown fields are ignored and a null
 * user_dict_csv counts as absent.
 */
export function toAnalyzeRequest(body: unknown): AnalyzeRequest {
  if (!isRecord(body)) {
    throw new InvalidRequestError('Invalid request: expected a JSON object');
  }

  const { text, user_dict_csv: userDictCsv } = body;
  if (typeof text !== 'string') {
    throw new InvalidRequestError('Invalid request: missing required field: text');
  }
  if (userDictCsv === undefined || userDictCsv === null) {
    return { text };
  }
  if (typeof userDictCsv !== 'string') {
    throw new InvalidRequestError('Invalid request: user_dict_csv must be a string');
  }
  return { text, userDictCsv };
}

/** Parse a UTF-8 JSON body; malformed bytes or JSON are an invalid request */
export function decodeJson(bytes: Uint8Array): unknown {
  try {
    return JSON.parse(decoder.decode(bytes));
  } catch (error) {
    throw new InvalidRequestError(`Invalid JSON: ${describeError(error)}`, { cause: error });
  }
}

export function decodeRequest(bytes: Uint8Array): AnalyzeRequest {
  return toAnalyzeRequest(decodeJson(bytes));
}

export function toWireToken(token: TokenAnnotation, layout: TokenLayout): WireToken {
  const rubySegments = token.rubySegments.map(({ text, ruby }) => ({ text, ruby }));

  if (layout === 'details') {
    return { surface: token.surface, details: [...token.details], ruby_segments: rubySegments };
  }

  const named = namedFields(token.features);
  return {
    surface: token.surface,
    pos: named.pos,
    sub_pos: named.subPos,
    reading: named.reading,
    base: named.base,
    ruby_segments: rubySegments
  };
}

export function serializeTokens(tokens: readonly TokenAnnotation[], layout: TokenLayout): string {
  try {
    return JSON.stringify(tokens.map((token) => toWireToken(token, layout)));
  } catch (error) {
    throw new SerializationError(`Serialization failed: ${describeError(error)}`, { cause: error });
  }
}

export function encodeText(text: string): Uint8Array {
  return encoder.encode(text);
}

export function encodeError(error: AnalysisError): Uint8Array {
  return encoder.encode(`${ERROR_PREFIX}${error.message}`);
}
