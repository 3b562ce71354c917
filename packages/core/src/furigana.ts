// rubify/furigana - Ruby segments for a single token

import { containsKanji } from './characters.js';
import { reconstructOrthography } from './orthography.js';
import { selectReading } from './readings.js';
import { buildRubySegments, plainSegment, type RubySegment } from './ruby.js';
import type { PartOfSpeech } from './schema.js';

/**
 * Kana-only words never get ruby, whatever reading the dictionary supplies.
 */
export function annotateToken(surface: string, features: PartOfSpeech): RubySegment[] {
  if (!containsKanji(surface)) {
    return [plainSegment(surface)];
  }

  const choice = selectReading(features);
  if (choice.kind === 'none') {
    return [plainSegment(surface)];
  }

  const reading = choice.inflected
    ? reconstructOrthography(surface, choice.reading)
    : choice.reading;

  return buildRubySegments(surface, reading);
}
