// rubify/schema - Part-of-speech field layouts per dictionary variant

/** Value a dictionary writes into a field that does not apply */
export const NOT_APPLICABLE = '*';

/** Field 0 of a synthesized gap token */
export const GAP_MARKER = 'Whitespace';

export type SchemaKind = 'ipadic' | 'unidic';

export const SCHEMA_KINDS: readonly SchemaKind[] = ['ipadic', 'unidic'];

export interface IpadicFeatures {
  kind: 'ipadic';
  pos: string;
  posDetail1: string;
  posDetail2: string;
  posDetail3: string;
  conjugationType: string;
  conjugationForm: string;
  baseForm: string;
  reading: string;
  pronunciation: string;
}

export interface UnidicFeatures {
  kind: 'unidic';
  pos1: string;
  pos2: string;
  pos3: string;
  pos4: string;
  conjugationType: string;
  conjugationForm: string;
  lemmaReading: string;
  lemma: string;
  orthography: string;
  /** Phonological surface form: how the inflected word is actually pronounced */
  pronunciation: string;
  orthographyBase: string;
  pronunciationBase: string;
  wordOrigin: string;
  initialChangeType: string;
  initialChangeForm: string;
  finalChangeType: string;
  finalChangeForm: string;
}

export type PartOfSpeech = IpadicFeatures | UnidicFeatures;

/** Number of detail fields each variant emits per token */
export const SCHEMA_WIDTH: Record<SchemaKind, number> = {
  ipadic: 9,
  unidic: 17
};

export function isSchemaKind(value: string): value is SchemaKind {
  return value === 'ipadic' || value === 'unidic';
}

function fieldReader(details: readonly string[]): (index: number) => string {
  return (index) => details[index] ?? NOT_APPLICABLE;
}

export function decodeIpadic(details: readonly string[]): IpadicFeatures {
  const at = fieldReader(details);
  return {
    kind: 'ipadic',
    pos: at(0),
    posDetail1: at(1),
    posDetail2: at(2),
    posDetail3: at(3),
    conjugationType: at(4),
    conjugationForm: at(5),
    baseForm: at(6),
    reading: at(7),
    pronunciation: at(8)
  };
}

export function decodeUnidic(details: readonly string[]): UnidicFeatures {
  const at = fieldReader(details);
  return {
    kind: 'unidic',
    pos1: at(0),
    pos2: at(1),
    pos3: at(2),
    pos4: at(3),
    conjugationType: at(4),
    conjugationForm: at(5),
    lemmaReading: at(6),
    lemma: at(7),
    orthography: at(8),
    pronunciation: at(9),
    orthographyBase: at(10),
    pronunciationBase: at(11),
    wordOrigin: at(12),
    initialChangeType: at(13),
    initialChangeForm: at(14),
    finalChangeType: at(15),
    finalChangeForm: at(16)
  };
}

/**
 * Decode a positional detail list into named fields.
 * Short lists (unknown words) read as "*" past their end.
 */
export function decodeFeatures(schema: SchemaKind, details: readonly string[]): PartOfSpeech {
  return schema === 'ipadic' ? decodeIpadic(details) : decodeUnidic(details);
}

/** Details of a gap token: every field "*" except the marker in field 0 */
export function gapDetails(schema: SchemaKind): string[] {
  const details = new Array<string>(SCHEMA_WIDTH[schema]).fill(NOT_APPLICABLE);
  details[0] = GAP_MARKER;
  return details;
}

/**
 * The four fields the named wire layout exposes.
 */
export interface NamedFields {
  pos: string;
  subPos: string;
  reading: string;
  base: string;
}

export function namedFields(features: PartOfSpeech): NamedFields {
  switch (features.kind) {
    case 'ipadic':
      return {
        pos: features.pos,
        subPos: features.posDetail1,
        reading: features.reading,
        base: features.baseForm
      };
    case 'unidic':
      return {
        pos: features.pos1,
        subPos: features.pos2,
        reading: features.lemmaReading,
        base: features.lemma
      };
  }
}
