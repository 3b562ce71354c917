// rubify/orthography - Aligning a phonetic reading's tail with the surface spelling

import { LONG_VOWEL_MARK, codePoints, isHiragana, isKanji, toKatakana } from './characters.js';

/**
 * Rewrite the kana tail of a phonetic reading so it spells what the surface
 * spells, e.g. 行こう / イコー becomes イコウ.
 *
 * Both strings are walked from the end. A surface kana is accepted when its
 * katakana form equals the phonetic character, or when the phonetic
 * character is the long vowel mark and the surface character is hiragana.
 * The walk stops at the first kanji or the first mismatch, and the
 * unvisited phonetic head is kept as is.
 */
export function reconstructOrthography(surface: string, phonetic: string): string {
  const surfaceChars = codePoints(surface);
  const phoneticChars = codePoints(phonetic);

  let s = surfaceChars.length - 1;
  let p = phoneticChars.length - 1;
  const tail: string[] = [];

  while (s >= 0 && p >= 0) {
    const surfaceChar = surfaceChars[s];
    const phoneticChar = phoneticChars[p];

    if (isKanji(surfaceChar)) break;

    const katakana = toKatakana(surfaceChar);
    const exact = katakana === phoneticChar;
    const longVowel = phoneticChar === LONG_VOWEL_MARK && isHiragana(surfaceChar);
    if (!exact && !longVowel) break;

    tail.unshift(katakana);
    s--;
    p--;
  }

  const head = p >= 0 ? phoneticChars.slice(0, p + 1).join('') : '';
  return head + tail.join('');
}
