import { pageRuns } from '../core/document-utils.js';
import { horizontalOverlap, intersection, union } from '../utils/geometry.js';
import type { FormulaReason, GlyphOpRef, PageContent, ParsedDocument, ParsedPage, TextRun } from '../types/pdf.js';

const CJK = /[\u1100-\u11FF\u3040-\u30FF\u3400-\u4DBF\u4E00-\u9FFF\uAC00-\uD7AF\uF900-\uFAFF\uFF00-\uFFEF]/u;

export interface ParagraphAssemblerOptions {
  /** Baseline distance range for consecutive lines, as multiples of the font size. */
  minLineSpacing: number;
  maxLineSpacing: number;
  /** Largest gap between runs on one line, as a multiple of the font size. */
  maxWordGap: number;
  /** Largest relative font size difference within a paragraph. */
  sizeTolerance: number;
}

const DEFAULT_OPTIONS: ParagraphAssemblerOptions = {
  minLineSpacing: 0.8,
  maxLineSpacing: 2.0,
  maxWordGap: 1.0,
  sizeTolerance: 0.1
};

/** Joins two line texts, undoing end-of-line hyphenation. */
export function joinLines(first: string, second: string): string {
  const a = first.replace(/\s+$/u, '');
  const b = second.replace(/^\s+/u, '');
  if (a.length === 0) return b;
  if (b.length === 0) return a;

  if (/\p{L}-$/u.test(a) && /^\p{Ll}/u.test(b)) {
    return a.slice(0, -1) + b;
  }
  if (CJK.test(a.slice(-1)) || CJK.test(b.charAt(0))) {
    return a + b;
  }
  return `${a} ${b}`;
}

/** Formula kinds that may sit inside a sentence. */
const INLINE_REASONS: ReadonlySet<FormulaReason> = new Set(['font', 'characters', 'no-letters', 'script-size']);

/**
 * True when a formula run can be lifted out of the page and redrawn
 * elsewhere: every operator it uses draws only its glyphs, with a known
 * font resource and no rotation.
 */
export function isInlineFormula(run: TextRun, content: PageContent): boolean {
  if (run.isTranslatable || run.formulaReason === undefined || !INLINE_REASONS.has(run.formulaReason)) return false;
  if (!run.excisable || run.vertical || run.invisible || run.lineCount > 1 || run.opGlyphs.length === 0) return false;
  return run.opGlyphs.every((ref) => {
    const show = content.shows.get(ref.opIndex);
    return (
      show !== undefined &&
      show.glyphCount === ref.glyphs &&
      show.fontResource !== undefined &&
      Math.abs(show.matrix[1]) < 1e-6 &&
      Math.abs(show.matrix[2]) < 1e-6
    );
  });
}

function mergeOpGlyphs(a: GlyphOpRef[], b: GlyphOpRef[]): GlyphOpRef[] {
  const counts = new Map<number, number>();
  for (const ref of [...a, ...b]) counts.set(ref.opIndex, (counts.get(ref.opIndex) ?? 0) + ref.glyphs);
  return [...counts.entries()].map(([opIndex, glyphs]) => ({ opIndex, glyphs })).sort((x, y) => x.opIndex - y.opIndex);
}

/**
 * Merges consecutive translatable line runs of a region into paragraph
 * runs so a sentence broken across lines is translated as a whole. A
 * formula inside the sentence joins the paragraph as a `{vN}` placeholder
 * when its operators can be redrawn (see {@link isInlineFormula}).
 */
export class ParagraphAssembler {
  private readonly options: ParagraphAssemblerOptions;

  constructor(options: Partial<ParagraphAssemblerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  assemble(document: ParsedDocument): ParsedDocument {
    for (const page of document.pages) {
      this.assemblePage(page);
    }
    return document;
  }

  assemblePage(page: ParsedPage): void {
    const obstacles = pageRuns(page).filter((run) => !run.isTranslatable);

    for (const region of page.regions) {
      const merged: TextRun[] = [];
      for (const run of region.runs) {
        const previous = merged[merged.length - 1];
        if (previous && run.isTranslatable && this.canMerge(previous, run, obstacles)) {
          merged[merged.length - 1] = this.merge(previous, run);
        } else if (previous && isInlineFormula(run, page.content) && this.canMerge(previous, run, obstacles)) {
          merged[merged.length - 1] = this.absorb(previous, run);
        } else {
          merged.push(run);
        }
      }
      region.runs = merged;
    }
  }

  private canMerge(previous: TextRun, next: TextRun, obstacles: TextRun[]): boolean {
    if (!previous.isTranslatable) return false;
    const formula = !next.isTranslatable;

    const size = Math.max(previous.fontSize, next.fontSize, 0.1);
    if (!formula && Math.abs(previous.fontSize - next.fontSize) > this.options.sizeTolerance * size) return false;

    // Compare against the last line of the paragraph built so far
    const drop = this.lastBaseline(previous) - next.origin.y;
    const sameLine = Math.abs(drop) < (formula ? 0.5 : 0.3) * size;

    if (sameLine) {
      const gap = next.bbox.x0 - previous.bbox.x1;
      if (gap > this.options.maxWordGap * size || gap < -0.5 * size) return false;
    } else {
      if (drop < this.options.minLineSpacing * size || drop > this.options.maxLineSpacing * size) return false;
      if (horizontalOverlap(previous.bbox, next.bbox) <= 0) return false;
    }

    const absorbed = new Set([next, ...(previous.inlineFormulas ?? []).map((inline) => inline.run)]);
    const box = union(previous.bbox, next.bbox);
    return !obstacles.some((obstacle) => {
      if (absorbed.has(obstacle)) return false;
      const shared = intersection(box, obstacle.bbox);
      return shared !== null && (shared.x1 - shared.x0) * (shared.y1 - shared.y0) > 0.5;
    });
  }

  /** Baseline of the last line a run covers. */
  private lastBaseline(run: TextRun): number {
    if (run.lineCount <= 1) return run.origin.y;
    return run.bbox.y0 - run.descent * run.fontSize;
  }

  /** Takes a formula into the paragraph as the next `{vN}` placeholder. */
  private absorb(previous: TextRun, formula: TextRun): TextRun {
    const inlineFormulas = previous.inlineFormulas ?? [];
    const placeholder = `{v${inlineFormulas.length}}`;
    const lastBaseline = this.lastBaseline(previous);
    const sameLine = Math.abs(lastBaseline - formula.origin.y) < 0.5 * Math.max(previous.fontSize, 0.1);

    return {
      ...previous,
      text: sameLine ? `${previous.text.replace(/\s+$/u, '')} ${placeholder}` : joinLines(previous.text, placeholder),
      // The box widens to the formula but keeps the text's line extent
      bbox: { ...previous.bbox, x0: Math.min(previous.bbox.x0, formula.bbox.x0), x1: Math.max(previous.bbox.x1, formula.bbox.x1) },
      lineCount: previous.lineCount + (sameLine ? 0 : 1),
      unmappedGlyphs: previous.unmappedGlyphs + formula.unmappedGlyphs,
      warnings: [...previous.warnings, ...formula.warnings],
      inlineFormulas: [...inlineFormulas, { run: formula, baselineOffset: sameLine ? formula.origin.y - lastBaseline : 0 }]
    };
  }

  private merge(previous: TextRun, next: TextRun): TextRun {
    const size = Math.max(previous.fontSize, 0.1);
    const sameLine = Math.abs(this.lastBaseline(previous) - next.origin.y) < 0.3 * size;

    return {
      ...previous,
      text: sameLine ? `${previous.text.replace(/\s+$/u, '')} ${next.text.replace(/^\s+/u, '')}` : joinLines(previous.text, next.text),
      bbox: union(previous.bbox, next.bbox),
      opGlyphs: mergeOpGlyphs(previous.opGlyphs, next.opGlyphs),
      glyphCount: previous.glyphCount + next.glyphCount,
      unmappedGlyphs: previous.unmappedGlyphs + next.unmappedGlyphs,
      excisable: previous.excisable && next.excisable,
      lineCount: previous.lineCount + (sameLine ? 0 : 1),
      warnings: [...previous.warnings, ...next.warnings]
    };
  }
}
