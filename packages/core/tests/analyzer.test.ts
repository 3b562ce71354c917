// Document analysis tests over the in-memory table tokenizer
import { describe, test, expect } from 'vitest';
import { createFailingTokenizer, createTableTokenizer, extractSurfaces } from '@rubify/testing';
import { FuriganaAnalyzer, analyze } from '../src/analyzer.js';
import { InvalidRequestError, TokenizationError, UserDictionaryError } from '../src/errors.js';
import type { MorphTokenizer } from '../src/tokenizer.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function requestBytes(body: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(body));
}

function responseText(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

describe('FuriganaAnalyzer.analyze', () => {
  const analyzer = new FuriganaAnalyzer({ tokenizer: createTableTokenizer('ipadic') });

  test('annotates tokens and synthesizes gaps', () => {
    const text = '私は ラーメンを食べた。\n';
    const result = analyzer.analyze({ text });
    if (!result.ok) throw result.error;

    expect(extractSurfaces(result.tokens)).toEqual([
      '私', 'は', ':gap( )', 'ラーメン', 'を', '食べ', 'た', '。', ':gap(\n)'
    ]);
    expect(result.tokens.map((token) => token.surface).join('')).toBe(text);

    expect(result.tokens[0].rubySegments).toEqual([{ text: '私', ruby: 'ワタシ' }]);
    expect(result.tokens[3].rubySegments).toEqual([{ text: 'ラーメン', ruby: '' }]);
    expect(result.tokens[5].rubySegments).toEqual([
      { text: '食', ruby: 'タ' },
      { text: 'べ', ruby: '' }
    ]);
  });

  test('gap tokens carry the whitespace marker and plain text', () => {
    const result = analyzer.analyze({ text: '  漢字' });
    if (!result.ok) throw result.error;

    const [gap, word] = result.tokens;
    expect(gap).toEqual({
      surface: '  ',
      details: ['Whitespace', '*', '*', '*', '*', '*', '*', '*', '*'],
      features: {
        kind: 'ipadic',
        pos: 'Whitespace',
        posDetail1: '*',
        posDetail2: '*',
        posDetail3: '*',
        conjugationType: '*',
        conjugationForm: '*',
        baseForm: '*',
        reading: '*',
        pronunciation: '*'
      },
      rubySegments: [{ text: '  ', ruby: '' }],
      gap: true
    });
    expect(word.rubySegments).toEqual([{ text: '漢字', ruby: 'カンジ' }]);
  });

  test('every token\'s segments cover its surface', () => {
    const result = analyzer.analyze({ text: 'お母さんは東京 を食べた' });
    if (!result.ok) throw result.error;
    for (const token of result.tokens) {
      expect(token.rubySegments.map((segment) => segment.text).join('')).toBe(token.surface);
    }
  });

  test('empty text gives no tokens', () => {
    expect(analyzer.analyze({ text: '' })).toEqual({ ok: true, tokens: [] });
  });

  test('UniDic tokens go through reading selection and reconstruction', () => {
    const unidic = new FuriganaAnalyzer({ tokenizer: createTableTokenizer('unidic') });
    const result = unidic.analyze({ text: '東京へ行こう' });
    if (!result.ok) throw result.error;

    expect(result.tokens.map((token) => token.rubySegments)).toEqual([
      [{ text: '東京', ruby: 'トウキョウ' }],
      [{ text: 'へ', ruby: '' }],
      [
        { text: '行', ruby: 'イ' },
        { text: 'こ', ruby: '' },
        { text: 'う', ruby: '' }
      ]
    ]);
  });

  test('tokenizer failures become tokenization errors', () => {
    const failing = new FuriganaAnalyzer({ tokenizer: createFailingTokenizer('ipadic') });
    const result = failing.analyze({ text: '漢字' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(TokenizationError);
    expect(result.error.kind).toBe('tokenization');
    expect(result.error.message).toBe('Tokenization failed: dictionary unavailable');
  });

  test('tokens that do not match the text are rejected', () => {
    const misaligned: MorphTokenizer = {
      schema: 'ipadic',
      tokenize: () => [{ surface: '字', start: 0, end: 1, details: [] }]
    };
    const result = new FuriganaAnalyzer({ tokenizer: misaligned }).analyze({ text: '漢字' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Tokenization failed: token 0 surface "字" does not match text at [0, 1)');
  });

  test('user dictionary entries take precedence', () => {
    const result = analyzer.analyze({
      text: '東京スカイツリー',
      userDictCsv: '東京スカイツリー,カスタム名詞,トウキョウスカイツリー'
    });
    if (!result.ok) throw result.error;

    expect(result.tokens).toHaveLength(1);
    expect(result.tokens[0].details).toEqual([
      'カスタム名詞', '*', '*', '*', '*', '*', '東京スカイツリー', 'トウキョウスカイツリー', '*'
    ]);
    expect(result.tokens[0].rubySegments).toEqual([{ text: '東京スカイツリー', ruby: 'トウキョウスカイツリー' }]);
  });

  test('a broken user dictionary fails the request', () => {
    const result = analyzer.analyze({ text: '漢字', userDictCsv: 'broken' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UserDictionaryError);
    expect(result.error.message).toBe('Failed to build user dictionary: row 1: expected 3 or 13 columns for ipadic, got 1');
  });
});

describe('FuriganaAnalyzer.analyzeBytes', () => {
  const analyzer = new FuriganaAnalyzer({ tokenizer: createTableTokenizer('ipadic') });

  test('encodes tokens in the details layout', () => {
    const output = JSON.parse(responseText(analyzer.analyzeBytes(requestBytes({ text: '漢字 を' }))));

    expect(output).toEqual([
      {
        surface: '漢字',
        details: ['名詞', '一般', '*', '*', '*', '*', '漢字', 'カンジ', 'カンジ'],
        ruby_segments: [{ text: '漢字', ruby: 'カンジ' }]
      },
      {
        surface: ' ',
        details: ['Whitespace', '*', '*', '*', '*', '*', '*', '*', '*'],
        ruby_segments: [{ text: ' ', ruby: '' }]
      },
      {
        surface: 'を',
        details: ['助詞', '格助詞', '一般', '*', '*', '*', 'を', 'ヲ', 'ヲ'],
        ruby_segments: [{ text: 'を', ruby: '' }]
      }
    ]);
  });

  test('encodes tokens in the named layout', () => {
    const named = new FuriganaAnalyzer({ tokenizer: createTableTokenizer('ipadic'), layout: 'named' });
    const output = JSON.parse(responseText(named.analyzeBytes(requestBytes({ text: '漢字 ' }))));

    expect(output).toEqual([
      { surface: '漢字', pos: '名詞', sub_pos: '一般', reading: 'カンジ', base: '漢字', ruby_segments: [{ text: '漢字', ruby: 'カンジ' }] },
      { surface: ' ', pos: 'Whitespace', sub_pos: '*', reading: '*', base: '*', ruby_segments: [{ text: ' ', ruby: '' }] }
    ]);
  });

  test('a null user dictionary is the same as none', () => {
    const output = JSON.parse(responseText(analyzer.analyzeBytes(requestBytes({ text: '私', user_dict_csv: null }))));
    expect(output).toEqual([
      {
        surface: '私',
        details: ['名詞', '代名詞', '一般', '*', '*', '*', '私', 'ワタシ', 'ワタシ'],
        ruby_segments: [{ text: '私', ruby: 'ワタシ' }]
      }
    ]);
  });

  test('malformed JSON comes back as an error string', () => {
    const output = responseText(analyzer.analyzeBytes(encoder.encode('{not json')));
    expect(output.startsWith('Error: Invalid JSON: ')).toBe(true);
  });

  test('invalid UTF-8 comes back as an error string', () => {
    const output = responseText(analyzer.analyzeBytes(new Uint8Array([0x7b, 0xff, 0x7d])));
    expect(output.startsWith('Error: Invalid JSON: ')).toBe(true);
  });

  test('a request without text is rejected', () => {
    expect(responseText(analyzer.analyzeBytes(requestBytes({})))).toBe('Error: Invalid request: missing required field: text');
    expect(responseText(analyzer.analyzeBytes(requestBytes([])))).toBe('Error: Invalid request: expected a JSON object');
    expect(responseText(analyzer.analyzeBytes(requestBytes({ text: '漢字', user_dict_csv: 3 })))).toBe(
      'Error: Invalid request: user_dict_csv must be a string'
    );
  });

  test('tokenizer and dictionary failures use the same channel', () => {
    const failing = new FuriganaAnalyzer({ tokenizer: createFailingTokenizer('ipadic', 'boom') });
    expect(responseText(failing.analyzeBytes(requestBytes({ text: '漢字' })))).toBe('Error: Tokenization failed: boom');
    expect(responseText(analyzer.analyzeBytes(requestBytes({ text: '漢字', user_dict_csv: 'a,b' })))).toBe(
      'Error: Failed to build user dictionary: row 1: expected 3 or 13 columns for ipadic, got 2'
    );
  });

  test('identical requests give identical bytes', () => {
    const body = requestBytes({ text: 'お母さんは 東京を食べた。', user_dict_csv: '東京,名詞,トウキョウ' });
    const first = analyzer.analyzeBytes(body);
    const second = analyzer.analyzeBytes(body);
    const fresh = analyze(body, createTableTokenizer('ipadic'));

    expect(responseText(second)).toBe(responseText(first));
    expect(responseText(fresh)).toBe(responseText(first));
  });

  test('surfaces of the response reproduce the input', () => {
    const text = ' 私は\tお母さん。 ';
    const output: unknown = JSON.parse(responseText(analyze(requestBytes({ text }), createTableTokenizer('unidic'))));
    expect(Array.isArray(output)).toBe(true);
    if (!Array.isArray(output)) return;
    expect(output.map((token: { surface: string }) => token.surface).join('')).toBe(text);
  });
});

describe('error classes', () => {
  test('carry their kind and name', () => {
    const error = new InvalidRequestError('Invalid request: nope');
    expect(error.kind).toBe('invalid-request');
    expect(error.name).toBe('InvalidRequestError');
    expect(error).toBeInstanceOf(Error);
  });
});
