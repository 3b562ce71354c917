// rubify/characters - Script classification and kana conversion

// Offset between a hiragana letter and its katakana counterpart
const KANA_SHIFT = 0x60;

export const LONG_VOWEL_MARK = 'ー';

/**
 * Split a string into code points. Surrogate pairs (CJK Extension B and
 * beyond) stay a single element.
 */
export function codePoints(text: string): string[] {
  return Array.from(text);
}

function codeOf(char: string): number {
  return char.codePointAt(0) ?? -1;
}

export function isHiragana(char: string): boolean {
  const code = codeOf(char);
  return code >= 0x3040 && code <= 0x309f;
}

/**
 * Convert a letter-forming hiragana (U+3041–U+3096) to katakana.
 * Iteration marks and other code points come back unchanged.
 */
export function toKatakana(char: string): string {
  const code = codeOf(char);
  if (code >= 0x3041 && code <= 0x3096) {
    return String.fromCodePoint(code + KANA_SHIFT);
  }
  return char;
}

/** Inverse of {@link toKatakana}, for U+30A1–U+30F6. */
export function toHiragana(char: string): string {
  const code = codeOf(char);
  if (code >= 0x30a1 && code <= 0x30f6) {
    return String.fromCodePoint(code - KANA_SHIFT);
  }
  return char;
}

/**
 * CJK Unified Ideographs, Extension A and Extension B. Rarer extensions
 * are not recognized.
 */
export function isKanji(char: string): boolean {
  const code = codeOf(char);
  return (
    (code >= 0x4e00 && code <= 0x9fff) ||
    (code >= 0x3400 && code <= 0x4dbf) ||
    (code >= 0x20000 && code <= 0x2a6df)
  );
}

export function containsKanji(text: string): boolean {
  return codePoints(text).some(isKanji);
}

export function hiraganaToKatakana(text: string): string {
  return codePoints(text).map(toKatakana).join('');
}

export function katakanaToHiragana(text: string): string {
  return codePoints(text).map(toHiragana).join('');
}
