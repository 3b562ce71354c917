// rubify/ruby - Splitting a (surface, reading) pair into ruby segments

import { codePoints, toKatakana } from './characters.js';
import { NOT_APPLICABLE } from './schema.js';

export interface RubySegment {
  text: string;
  /** Empty when the text renders without annotation */
  ruby: string;
}

export function plainSegment(text: string): RubySegment {
  return { text, ruby: '' };
}

/**
 * Align a katakana reading against the surface.
 *
 * Hiragana letters in the surface are anchors: the first place the letter's
 * katakana form occurs in the unread reading ends the reading of the kanji
 * run before it. Characters that do not anchor are buffered, and the buffer
 * takes whatever reading is left at the end.
 *
 * The anchor search takes the first occurrence, so a reading that repeats
 * the anchor's sound inside the kanji run (聞き手 / キキテ) splits early.
 */
export function buildRubySegments(surface: string, reading: string): RubySegment[] {
  if (reading === NOT_APPLICABLE || surface === reading) {
    return [plainSegment(surface)];
  }

  const readingChars = codePoints(reading);
  const segments: RubySegment[] = [];
  let buffer = '';
  let r = 0;

  for (const char of codePoints(surface)) {
    const katakana = toKatakana(char);
    const anchor = katakana !== char;

    if (anchor && r < readingChars.length) {
      const offset = readingChars.slice(r).indexOf(katakana);

      if (offset !== -1) {
        if (buffer) {
          const end = r + offset;
          const ruby = end <= readingChars.length ? readingChars.slice(r, end).join('') : '';
          segments.push({ text: buffer, ruby });
          buffer = '';
        }

        segments.push(plainSegment(char));
        r += offset + 1;
        continue;
      }
    }

    buffer += char;
  }

  if (buffer) {
    const rest = r < readingChars.length ? readingChars.slice(r).join('') : '';
    segments.push({ text: buffer, ruby: rest });
  }

  return segments;
}
