// rubify/render - Turning annotations into displayable text

import { katakanaToHiragana } from './characters.js';
import type { TokenAnnotation } from './protocol.js';
import type { RubySegment } from './ruby.js';

export interface RenderOptions {
  /** Show readings in hiragana instead of the dictionary's katakana */
  hiragana?: boolean;
}

export type RenderFormat = 'text' | 'html';

function segmentsOf(annotations: readonly TokenAnnotation[]): RubySegment[] {
  return annotations.flatMap((annotation) => annotation.rubySegments);
}

function rubyText(segment: RubySegment, options: RenderOptions): string {
  return options.hiragana ? katakanaToHiragana(segment.ruby) : segment.ruby;
}

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** 食[た]べた style: the reading in brackets right after its text */
export function renderBracketed(annotations: readonly TokenAnnotation[], options: RenderOptions = {}): string {
  return segmentsOf(annotations)
    .map((segment) => (segment.ruby ? `${segment.text}[${rubyText(segment, options)}]` : segment.text))
    .join('');
}

export function renderHtml(annotations: readonly TokenAnnotation[], options: RenderOptions = {}): string {
  return segmentsOf(annotations)
    .map((segment) => {
      const text = escapeHtml(segment.text);
      if (!segment.ruby) return text;
      return `<ruby>${text}<rt>${escapeHtml(rubyText(segment, options))}</rt></ruby>`;
    })
    .join('');
}

export function render(annotations: readonly TokenAnnotation[], format: RenderFormat, options: RenderOptions = {}): string {
  return format === 'html' ? renderHtml(annotations, options) : renderBracketed(annotations, options);
}
