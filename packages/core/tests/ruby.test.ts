// Ruby segmenter tests
import { describe, test, expect } from 'vitest';
import { buildRubySegments } from '../src/ruby.js';

function joined(surface: string, reading: string): string {
  return buildRubySegments(surface, reading).map((segment) => segment.text).join('');
}

describe('buildRubySegments', () => {
  test('reading equal to surface needs no ruby', () => {
    expect(buildRubySegments('漢字', '漢字')).toEqual([{ text: '漢字', ruby: '' }]);
    expect(buildRubySegments('ラーメン', 'ラーメン')).toEqual([{ text: 'ラーメン', ruby: '' }]);
  });

  test('the no-reading sentinel gives a plain segment', () => {
    expect(buildRubySegments('漢字', '*')).toEqual([{ text: '漢字', ruby: '' }]);
    expect(buildRubySegments('たべる', '*')).toEqual([{ text: 'たべる', ruby: '' }]);
  });

  test('食べた (タベタ)', () => {
    expect(buildRubySegments('食べた', 'タベタ')).toEqual([
      { text: '食', ruby: 'タ' },
      { text: 'べ', ruby: '' },
      { text: 'た', ruby: '' }
    ]);
  });

  test('お母さん (オカアサン) - leading kana anchor', () => {
    expect(buildRubySegments('お母さん', 'オカアサン')).toEqual([
      { text: 'お', ruby: '' },
      { text: '母', ruby: 'カア' },
      { text: 'さ', ruby: '' },
      { text: 'ん', ruby: '' }
    ]);
  });

  test('雨がふる (アメガフル) - kanji run flushed at the first anchor', () => {
    expect(buildRubySegments('雨がふる', 'アメガフル')).toEqual([
      { text: '雨', ruby: 'アメ' },
      { text: 'が', ruby: '' },
      { text: 'ふ', ruby: '' },
      { text: 'る', ruby: '' }
    ]);
  });

  test('東京 (トウキョウ) - kanji-only word takes the whole reading', () => {
    expect(buildRubySegments('東京', 'トウキョウ')).toEqual([{ text: '東京', ruby: 'トウキョウ' }]);
  });

  test('katakana in the surface is not an anchor', () => {
    expect(buildRubySegments('ドイツ語', 'ドイツゴ')).toEqual([{ text: 'ドイツ語', ruby: 'ドイツゴ' }]);
  });

  test('𠮟る (シカル) - extension B kanji', () => {
    expect(buildRubySegments('𠮟る', 'シカル')).toEqual([
      { text: '𠮟', ruby: 'シカ' },
      { text: 'る', ruby: '' }
    ]);
  });

  test('聞き手 (キキテ) - first occurrence wins, so the run splits early', () => {
    expect(buildRubySegments('聞き手', 'キキテ')).toEqual([
      { text: '聞', ruby: '' },
      { text: 'き', ruby: '' },
      { text: '手', ruby: 'キテ' }
    ]);
  });

  test('a reading that runs out leaves later runs without ruby', () => {
    expect(buildRubySegments('見た', 'タ')).toEqual([
      { text: '見', ruby: '' },
      { text: 'た', ruby: '' }
    ]);
    expect(buildRubySegments('見物', 'ケ')).toEqual([{ text: '見物', ruby: 'ケ' }]);
    expect(buildRubySegments('見た目', 'タ')).toEqual([
      { text: '見', ruby: '' },
      { text: 'た', ruby: '' },
      { text: '目', ruby: '' }
    ]);
  });

  test('an unmatched kana joins the pending run', () => {
    expect(buildRubySegments('食べ物', 'タ')).toEqual([{ text: '食べ物', ruby: 'タ' }]);
  });

  test('empty reading leaves everything in one plain run', () => {
    expect(buildRubySegments('漢字', '')).toEqual([{ text: '漢字', ruby: '' }]);
  });

  test('segments always cover the surface exactly', () => {
    const cases: [string, string][] = [
      ['食べた', 'タベタ'],
      ['お母さん', 'オカアサン'],
      ['聞き手', 'キキテ'],
      ['見た目', 'タ'],
      ['行ってきます', 'イッテキマス'],
      ['𠮟られた', 'シカラレタ'],
      ['漢字', '']
    ];
    for (const [surface, reading] of cases) {
      expect(joined(surface, reading)).toBe(surface);
    }
  });
});
