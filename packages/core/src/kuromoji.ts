// rubify/kuromoji - IPADIC tokenizer backed by kuromoji

import path from 'path';
import { createRequire } from 'module';
import kuromoji from 'kuromoji';
import type { IpadicFeatures, Tokenizer } from 'kuromoji';
import { NOT_APPLICABLE } from './schema.js';
import type { MorphToken, MorphTokenizer } from './tokenizer.js';
import { dp } from './debug.js';
import { startTimer } from './profiling.js';

export type KuromojiTokenizer = Pick<Tokenizer<IpadicFeatures>, 'tokenize'>;

/** The dictionary directory shipped inside the kuromoji package */
export function defaultDictionaryPath(): string {
  const require = createRequire(import.meta.url);
  return path.join(path.dirname(require.resolve('kuromoji/package.json')), 'dict');
}

/**
 * Build a kuromoji tokenizer. Loading the dictionary takes a moment, so
 * callers load it once and share the result.
 */
export async function loadKuromoji(dicPath: string = defaultDictionaryPath()): Promise<KuromojiTokenizer> {
  const stop = startTimer('loadKuromoji');
  dp(`loading kuromoji dictionary from ${dicPath}`);

  try {
    return await new Promise<KuromojiTokenizer>((resolve, reject) => {
      kuromoji.builder({ dicPath }).build((error, tokenizer) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(tokenizer);
      });
    });
  } finally {
    stop();
  }
}

function field(value: string | undefined): string {
  return value === undefined || value === '' ? NOT_APPLICABLE : value;
}

/** kuromoji's features in IPADIC field order */
export function ipadicDetails(token: IpadicFeatures): string[] {
  return [
    field(token.pos),
    field(token.pos_detail_1),
    field(token.pos_detail_2),
    field(token.pos_detail_3),
    field(token.conjugated_type),
    field(token.conjugated_form),
    field(token.basic_form),
    field(token.reading),
    field(token.pronunciation)
  ];
}

/**
 * Adapt kuromoji to the tokenizer contract. Offsets are found by locating
 * each surface from the end of the previous token, which also leaves
 * anything kuromoji drops to the gap logic.
 */
export function createKuromojiTokenizer(tokenizer: KuromojiTokenizer): MorphTokenizer {
  return {
    schema: 'ipadic',
    tokenize(text: string): MorphToken[] {
      const tokens: MorphToken[] = [];
      let cursor = 0;

      for (const token of tokenizer.tokenize(text)) {
        const surface = token.surface_form;
        const start = text.indexOf(surface, cursor);
        if (!surface || start === -1) {
          throw new Error(`kuromoji token "${surface}" not found after offset ${cursor}`);
        }
        const end = start + surface.length;
        tokens.push({ surface, start, end, details: ipadicDetails(token) });
        cursor = end;
      }

      return tokens;
    }
  };
}

export async function loadKuromojiTokenizer(dicPath?: string): Promise<MorphTokenizer> {
  return createKuromojiTokenizer(await loadKuromoji(dicPath));
}
