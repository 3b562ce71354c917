// rubify/readings - Choosing which reading field of a token to trust

import { NOT_APPLICABLE, decodeFeatures, type IpadicFeatures, type PartOfSpeech, type SchemaKind, type UnidicFeatures } from './schema.js';

export type ReadingField = 'reading' | 'lemmaReading' | 'pronunciation';

export type ReadingChoice =
  | {
      kind: 'reading';
      reading: string;
      field: ReadingField;
      /** Inflected words get their phonetic tail repaired against the surface */
      inflected: boolean;
    }
  | { kind: 'none' };

const NO_READING: ReadingChoice = { kind: 'none' };

function present(value: string): boolean {
  return value !== NOT_APPLICABLE && value !== '';
}

function selectIpadic(features: IpadicFeatures): ReadingChoice {
  if (!present(features.reading)) return NO_READING;
  return { kind: 'reading', reading: features.reading, field: 'reading', inflected: false };
}

/**
 * Inflected words take the phonological surface (the pronounced conjugated
 * form); everything else keeps the lemma reading and its standard spelling.
 * Either way an unavailable field falls back to the lemma reading.
 */
function selectUnidic(features: UnidicFeatures): ReadingChoice {
  const inflected = present(features.conjugationType);
  const preferred: 'pronunciation' | 'lemmaReading' = inflected ? 'pronunciation' : 'lemmaReading';

  if (present(features[preferred])) {
    return { kind: 'reading', reading: features[preferred], field: preferred, inflected };
  }
  if (present(features.lemmaReading)) {
    return { kind: 'reading', reading: features.lemmaReading, field: 'lemmaReading', inflected };
  }
  return NO_READING;
}

export function selectReading(features: PartOfSpeech): ReadingChoice {
  switch (features.kind) {
    case 'ipadic':
      return selectIpadic(features);
    case 'unidic':
      return selectUnidic(features);
  }
}

export function selectReadingFromDetails(schema: SchemaKind, details: readonly string[]): ReadingChoice {
  return selectReading(decodeFeatures(schema, details));
}
