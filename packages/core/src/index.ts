// @rubify/core - Furigana alignment, analysis and rendering

// Script classification
export {
  LONG_VOWEL_MARK,
  codePoints,
  isHiragana,
  isKanji,
  containsKanji,
  toKatakana,
  toHiragana,
  hiraganaToKatakana,
  katakanaToHiragana
} from './characters.js';

// Part-of-speech schemas
export {
  NOT_APPLICABLE,
  GAP_MARKER,
  SCHEMA_KINDS,
  SCHEMA_WIDTH,
  isSchemaKind,
  decodeFeatures,
  decodeIpadic,
  decodeUnidic,
  gapDetails,
  namedFields,
  type SchemaKind,
  type IpadicFeatures,
  type UnidicFeatures,
  type PartOfSpeech,
  type NamedFields
} from './schema.js';

// Alignment
export { selectReading, selectReadingFromDetails, type ReadingChoice, type ReadingField } from './readings.js';
export { reconstructOrthography } from './orthography.js';
export { buildRubySegments, plainSegment, type RubySegment } from './ruby.js';
export { annotateToken } from './furigana.js';

// Analysis
export {
  FuriganaAnalyzer,
  analyze,
  annotateTokens,
  gapAnnotation,
  tokenAnnotation,
  type AnalysisResult,
  type AnalyzerOptions
} from './analyzer.js';
export {
  ERROR_PREFIX,
  TOKEN_LAYOUTS,
  isTokenLayout,
  toAnalyzeRequest,
  decodeJson,
  decodeRequest,
  toWireToken,
  serializeTokens,
  encodeText,
  encodeError,
  type AnalyzeRequest,
  type TokenAnnotation,
  type TokenLayout,
  type WireToken
} from './protocol.js';
export {
  AnalysisError,
  InvalidRequestError,
  TokenizationError,
  UserDictionaryError,
  SerializationError,
  describeError,
  type AnalysisErrorKind
} from './errors.js';

// Tokenizers
export { findTokenViolation, offsetTokens, type MorphToken, type MorphTokenizer } from './tokenizer.js';
export {
  buildUserDictionary,
  withUserDictionary,
  type UserDictionary,
  type UserDictionaryEntry
} from './userDictionary.js';
export {
  createKuromojiTokenizer,
  defaultDictionaryPath,
  ipadicDetails,
  loadKuromoji,
  loadKuromojiTokenizer,
  type KuromojiTokenizer
} from './kuromoji.js';

// Rendering
export { render, renderBracketed, renderHtml, escapeHtml, type RenderFormat, type RenderOptions } from './render.js';

// Ambient
export { getConfigFromEnv, type RubifyConfig } from './config.js';
export { setDebug, isDebug, dp } from './debug.js';
export { printPerfCountersAndReset, resetPerfCounters, startTimer, isProfilingEnabled } from './profiling.js';
