import { baseLanguage } from '../translation/languages.js';
import type { BBox, Point } from '../types/pdf.js';

const LINE_HEIGHTS: Record<string, number> = {
  ko: 1.4,
  en: 1.2,
  ja: 1.1,
  zh: 1.1,
  ar: 1.0,
  ru: 0.8,
  uk: 0.8,
  ta: 0.8
};

/** Line height, as a multiple of the font size, for text in `lang`. */
export function lineHeightFor(lang: string): number {
  return LINE_HEIGHTS[lang] ?? LINE_HEIGHTS[baseLanguage(lang)] ?? 1.1;
}

export interface TextMeasurer {
  widthOfTextAtSize(text: string, size: number): number;
  canEncode(char: string): boolean;
}

export interface SanitizedText {
  text: string;
  /** Distinct characters that had to be replaced. */
  replaced: string[];
}

/**
 * Replaces characters the font cannot encode with their decomposed base
 * letters, or `?` when there is none. Control characters become spaces.
 */
export function sanitizeText(text: string, canEncode: (char: string) => boolean): SanitizedText {
  const replaced = new Set<string>();
  let result = '';

  for (const char of text) {
    if (/[\p{Cc}\p{Zl}\p{Zp}]/u.test(char) || (char !== ' ' && /\s/u.test(char))) {
      result += ' ';
      continue;
    }
    if (canEncode(char)) {
      result += char;
      continue;
    }
    replaced.add(char);
    const base = char.normalize('NFKD').replace(/\p{M}/gu, '');
    if (base !== '' && [...base].every(canEncode)) {
      result += base;
    } else if (canEncode('?')) {
      result += '?';
    }
  }

  return { text: result, replaced: [...replaced] };
}

/** Private-use characters stand in for inline formulas while a translation is laid out. */
const MARKER_BASE = 0xe000;
const MARKER_LIMIT = 0xf8ff;
const PLACEHOLDER = /\{\s*v\s*(\d+)\s*\}/giu;

export function formulaMarker(index: number): string {
  return String.fromCodePoint(MARKER_BASE + index);
}

function markerIndex(char: string): number | undefined {
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined || codePoint < MARKER_BASE || codePoint > MARKER_LIMIT) return undefined;
  return codePoint - MARKER_BASE;
}

export interface FormulaMarkers {
  text: string;
  /** Formulas whose placeholder the translation lost; their markers are appended. */
  missing: number[];
}

/**
 * Swaps the `{vN}` placeholders of a translation for marker characters.
 * Spacing and case inside the braces are forgiven. A placeholder seen a
 * second time or naming no formula is dropped.
 */
export function insertFormulaMarkers(text: string, count: number): FormulaMarkers {
  const seen = new Set<number>();
  let result = text.replace(PLACEHOLDER, (_match, digits: string) => {
    const index = Number(digits);
    if (index >= count || seen.has(index)) return '';
    seen.add(index);
    return formulaMarker(index);
  });

  const missing: number[] = [];
  for (let index = 0; index < count; index++) {
    if (!seen.has(index)) missing.push(index);
  }
  if (missing.length > 0) {
    result = [result.replace(/\s+$/u, ''), ...missing.map(formulaMarker)].join(' ');
  }
  return { text: result, missing };
}

export type LineSegment = { kind: 'text'; text: string } | { kind: 'formula'; index: number };

export function splitFormulaMarkers(text: string): LineSegment[] {
  const segments: LineSegment[] = [];
  let current = '';
  for (const char of text) {
    const index = markerIndex(char);
    if (index === undefined) {
      current += char;
      continue;
    }
    if (current) segments.push({ kind: 'text', text: current });
    current = '';
    segments.push({ kind: 'formula', index });
  }
  if (current) segments.push({ kind: 'text', text: current });
  return segments;
}

/**
 * Width of text holding formula markers. `advances[i]` is the width of
 * formula `i` at `baseSize`; formulas scale with the text.
 */
export function measureWithFormulas(
  measure: TextMeasurer['widthOfTextAtSize'],
  advances: number[],
  baseSize: number
): TextMeasurer['widthOfTextAtSize'] {
  return (text, size) =>
    splitFormulaMarkers(text).reduce((width, segment) => {
      if (segment.kind === 'text') return width + measure(segment.text, size);
      return width + ((advances[segment.index] ?? 0) * size) / Math.max(baseSize, 0.1);
    }, 0);
}

const CJK_CHAR = /[\u3000-\u303F\u3040-\u30FF\u3400-\u4DBF\u4E00-\u9FFF\uF900-\uFAFF\uFF00-\uFFEF]/u;

function tokenize(text: string, breakAnywhere: boolean): string[] {
  if (!breakAnywhere) return text.match(/\s+|\S+/gu) ?? [];
  const tokens: string[] = [];
  for (const part of text.match(/\s+|\S+/gu) ?? []) {
    if (/^\s/u.test(part)) {
      tokens.push(part);
      continue;
    }
    let word = '';
    for (const char of part) {
      if (CJK_CHAR.test(char)) {
        if (word) tokens.push(word);
        word = '';
        tokens.push(char);
      } else {
        word += char;
      }
    }
    if (word) tokens.push(word);
  }
  return tokens;
}

function splitToFit(token: string, width: number, measure: (text: string) => number): string[] {
  const pieces: string[] = [];
  let piece = '';
  for (const char of token) {
    if (piece !== '' && measure(piece + char) > width) {
      pieces.push(piece);
      piece = '';
    }
    piece += char;
  }
  if (piece) pieces.push(piece);
  return pieces;
}

/**
 * Greedy line breaking. Lines break at whitespace, and between any two
 * CJK characters when `breakAnywhere` is set; a token wider than a whole
 * line is split by characters. `widths[i]` is the width of line `i`, the
 * last entry repeating.
 */
export function wrapText(text: string, widths: number[], measure: (text: string) => number, breakAnywhere: boolean): string[] {
  const lines: string[] = [];
  const widthOf = (line: number): number => widths[Math.min(line, widths.length - 1)] ?? 0;
  let current = '';
  let pendingSpace = false;

  const place = (token: string): void => {
    const candidate = current === '' ? token : current + (pendingSpace ? ' ' : '') + token;
    if (current === '' || measure(candidate) <= widthOf(lines.length)) {
      if (current === '' && measure(token) > widthOf(lines.length)) {
        const pieces = splitToFit(token, widthOf(lines.length), measure);
        for (const piece of pieces.slice(0, -1)) lines.push(piece);
        current = pieces[pieces.length - 1] ?? '';
      } else {
        current = candidate;
      }
    } else {
      lines.push(current);
      current = '';
      place(token);
    }
    pendingSpace = false;
  };

  for (const token of tokenize(text, breakAnywhere)) {
    if (/^\s/u.test(token)) {
      pendingSpace = current !== '';
      continue;
    }
    place(token);
  }
  if (current !== '') lines.push(current);
  return lines;
}

export interface TypesetInput {
  text: string;
  box: BBox;
  /** Baseline start of the first line. */
  origin: Point;
  fontSize: number;
  /** Descent below the baseline as a fraction of the font size (positive). */
  descent: number;
  lineHeight: number;
  overflow: 'shrink' | 'overflow';
  minFontScale: number;
  breakAnywhere: boolean;
}

export interface TypesetLine {
  text: string;
  x: number;
  y: number;
}

export interface TypesetResult {
  lines: TypesetLine[];
  fontSize: number;
  lineHeight: number;
  /** Text runs past the bottom of the box. */
  overflow: boolean;
}

interface Attempt {
  fontSize: number;
  lineHeight: number;
}

function attempts(input: TypesetInput): Attempt[] {
  const list: Attempt[] = [{ fontSize: input.fontSize, lineHeight: input.lineHeight }];
  if (input.overflow === 'overflow') return list;

  if (input.lineHeight > 1) list.push({ fontSize: input.fontSize, lineHeight: 1 });
  const lineHeight = Math.min(1, input.lineHeight);
  for (let step = 1; 1 - step * 0.05 >= input.minFontScale - 1e-9; step++) {
    list.push({ fontSize: input.fontSize * (1 - step * 0.05), lineHeight });
  }
  return list;
}

/**
 * Flows text into a run's box starting at the original first baseline.
 * Under `shrink` the line height tightens to 1.0 first, then the size
 * drops in 5 % steps down to `minFontScale`; text that still does not fit
 * runs below the box and is reported as overflowing.
 */
export function layoutText(input: TypesetInput, measure: TextMeasurer['widthOfTextAtSize']): TypesetResult {
  const { box, origin } = input;
  const firstWidth = Math.max(1, box.x1 - origin.x);
  const restWidth = Math.max(1, box.x1 - box.x0);
  const room = origin.y - box.y0;

  let result: TypesetResult | null = null;
  for (const attempt of attempts(input)) {
    const wrapped = wrapText(input.text, [firstWidth, restWidth], (text) => measure(text, attempt.fontSize), input.breakAnywhere);
    const step = attempt.fontSize * attempt.lineHeight;
    const needed = (wrapped.length - 1) * step + input.descent * attempt.fontSize;
    const overflow = needed > room + 0.5;

    result = {
      lines: wrapped.map((text, i) => ({ text, x: i === 0 ? origin.x : box.x0, y: origin.y - i * step })),
      fontSize: attempt.fontSize,
      lineHeight: attempt.lineHeight,
      overflow
    };
    if (!overflow) break;
  }

  return result ?? { lines: [], fontSize: input.fontSize, lineHeight: input.lineHeight, overflow: false };
}
