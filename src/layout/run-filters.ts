import { matchesFontPattern } from '../fonts/font-name-normalizer.js';
import type { FormulaReason, TextRun } from '../types/pdf.js';

/** LaTeX/math font families, matched against the name without its subset tag. */
export const DEFAULT_FORMULA_FONT_PATTERN =
  /(CM[^R]|MS.M|XY|MT|BL|RM|EU|LA|RS|LINE|LCIRCLE|TeX-|rsfs|txsy|wasy|stmary|.*Mono|.*Code|.*Ital|.*Sym|.*Math)/;

/** Modifier letters, combining marks, math/modifier symbols, separators and Greek. */
export const DEFAULT_FORMULA_CHAR_PATTERN = /[\p{Lm}\p{Mn}\p{Sk}\p{Sm}\p{Zl}\p{Zp}\p{Zs}\u0370-\u03FF]/u;

export interface RunFilterOptions {
  fontPattern?: RegExp;
  charPattern?: RegExp;
  /** Runs smaller than this fraction of their region's dominant size count as sub/superscripts. */
  scriptSizeRatio?: number;
}

function testChar(pattern: RegExp, ch: string): boolean {
  pattern.lastIndex = 0;
  return pattern.test(ch);
}

/**
 * Run-level formula detection, independent of the region label. Returns
 * the first rule that marks the run non-translatable, or `undefined`.
 */
export function formulaReason(run: TextRun, dominantSize: number, options: RunFilterOptions = {}): FormulaReason | undefined {
  const fontPattern = options.fontPattern ?? DEFAULT_FORMULA_FONT_PATTERN;
  const charPattern = options.charPattern ?? DEFAULT_FORMULA_CHAR_PATTERN;
  const scriptSizeRatio = options.scriptSizeRatio ?? 0.79;

  if (run.invisible) return 'invisible';
  if (run.vertical) return 'vertical';
  if (run.text.includes('(cid:')) return 'cid';
  if (matchesFontPattern(run.fontName, fontPattern)) return 'font';

  const chars = [...run.text].filter((ch) => !/\s/u.test(ch));
  if (chars.length === 0) return 'no-letters';
  if (run.unmappedGlyphs * 2 >= chars.length) return 'unmapped';

  const formulaChars = chars.filter((ch) => testChar(charPattern, ch)).length;
  if (formulaChars * 2 > chars.length) return 'characters';
  // An operator with no real word around it is an inline expression such as `E=mc^2`
  if (formulaChars > 0 && !/\p{L}{3,}/u.test(run.text)) return 'characters';

  if (!/\p{L}/u.test(run.text)) return 'no-letters';

  if (dominantSize > 0 && run.fontSize < scriptSizeRatio * dominantSize && !/\p{L}{4,}/u.test(run.text)) {
    return 'script-size';
  }

  return undefined;
}
