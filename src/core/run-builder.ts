import type { PositionedGlyph } from './content-stream/text-interpreter.js';
import type { BBox, DocumentWarning, GlyphOpRef, TextRun } from '../types/pdf.js';

export interface RunBuilderOptions {
  /** Baseline offset, as a fraction of the font size, that starts a new line. */
  lineTolerance: number;
  /** Gap, as a fraction of the font size, treated as a word break. */
  wordGap: number;
  /** Gap, as a fraction of the font size, that splits a line into separate runs. */
  columnGap: number;
}

const DEFAULT_OPTIONS: RunBuilderOptions = {
  lineTolerance: 0.3,
  wordGap: 0.2,
  columnGap: 1.5
};

const LIGATURES: Record<string, string> = {
  '\uFB00': 'ff',
  '\uFB01': 'fi',
  '\uFB02': 'fl',
  '\uFB03': 'ffi',
  '\uFB04': 'ffl',
  '\uFB05': 'st',
  '\uFB06': 'st'
};

interface RunDraft {
  glyphs: PositionedGlyph[];
  trailing: PositionedGlyph[];
  text: string;
  last: PositionedGlyph;
}

function isBlank(text: string): boolean {
  return /^\s*$/u.test(text);
}

function expandLigatures(text: string): string {
  return text.replace(/[\uFB00-\uFB06]/g, (ch) => LIGATURES[ch] ?? ch);
}

function sameColor(a: PositionedGlyph, b: PositionedGlyph): boolean {
  return (
    Math.abs(a.color.r - b.color.r) < 0.01 &&
    Math.abs(a.color.g - b.color.g) < 0.01 &&
    Math.abs(a.color.b - b.color.b) < 0.01
  );
}

/** Offsets of `next` relative to the end of `prev`, along and across the baseline. */
function relativePosition(prev: PositionedGlyph, next: PositionedGlyph): { along: number; across: number } {
  const cos = Math.cos(prev.rotation);
  const sin = Math.sin(prev.rotation);
  const dx = next.x - (prev.x + prev.advance * cos);
  const dy = next.y - (prev.y + prev.advance * sin);
  return { along: dx * cos + dy * sin, across: -dx * sin + dy * cos };
}

function glyphBox(glyph: PositionedGlyph): BBox {
  const ascent = glyph.font.ascent * glyph.fontSize;
  const descent = glyph.font.descent * glyph.fontSize;
  const cos = Math.cos(glyph.rotation);
  const sin = Math.sin(glyph.rotation);
  const extent = Math.max(glyph.width, glyph.advance, 0);
  const corners = [
    [0, descent],
    [extent, descent],
    [0, ascent],
    [extent, ascent]
  ].map(([u, v]) => ({ x: glyph.x + u * cos - v * sin, y: glyph.y + u * sin + v * cos }));
  return {
    x0: Math.min(...corners.map((p) => p.x)),
    y0: Math.min(...corners.map((p) => p.y)),
    x1: Math.max(...corners.map((p) => p.x)),
    y1: Math.max(...corners.map((p) => p.y))
  };
}

/**
 * Groups positioned glyphs, in content order, into line-level runs that
 * share font, size, colour and baseline. Whitespace glyphs never start a
 * run: they belong to the run before them on the same line, or else to
 * the next run, so every glyph of a text operator has an owner.
 */
export class RunBuilder {
  private readonly options: RunBuilderOptions;

  constructor(options: Partial<RunBuilderOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  build(glyphs: PositionedGlyph[], pageIndex: number): TextRun[] {
    const drafts: RunDraft[] = [];
    let current: RunDraft | null = null;
    let pending: PositionedGlyph[] = [];

    for (const glyph of glyphs) {
      const blank = isBlank(glyph.unicode);

      if (current && this.continues(current.last, glyph, blank)) {
        if (blank) {
          current.trailing.push(glyph);
        } else {
          this.append(current, glyph);
        }
        continue;
      }

      if (blank) {
        pending.push(glyph);
        continue;
      }

      current = { glyphs: [...pending], trailing: [], text: '', last: glyph };
      pending = [];
      this.append(current, glyph);
      drafts.push(current);
    }

    if (pending.length > 0 && current) {
      current.trailing.push(...pending);
    }

    return drafts.map((draft, index) => this.toRun(draft, pageIndex, index));
  }

  private continues(prev: PositionedGlyph, next: PositionedGlyph, blank: boolean): boolean {
    const size = Math.max(prev.fontSize, 0.1);
    const { along, across } = relativePosition(prev, next);

    if (Math.abs(across) > this.options.lineTolerance * size) return false;
    if (along < -0.5 * size || along > this.options.columnGap * size) return false;
    if (blank) return true;

    return (
      next.font.id === prev.font.id &&
      Math.abs(next.fontSize - prev.fontSize) <= 0.05 * size &&
      next.invisible === prev.invisible &&
      Math.abs(next.rotation - prev.rotation) < 0.01 &&
      sameColor(prev, next)
    );
  }

  private append(draft: RunDraft, glyph: PositionedGlyph): void {
    const hadSpace = draft.trailing.length > 0;

    if (draft.text.length > 0) {
      const { along } = relativePosition(draft.last, glyph);
      if (hadSpace || along > this.options.wordGap * Math.max(glyph.fontSize, 0.1)) {
        draft.text += ' ';
      }
    }

    draft.glyphs.push(...draft.trailing, glyph);
    draft.trailing = [];
    draft.text += expandLigatures(glyph.unicode);
    draft.last = glyph;
  }

  private toRun(draft: RunDraft, pageIndex: number, index: number): TextRun {
    const all = [...draft.glyphs, ...draft.trailing];
    const visible = draft.glyphs.filter((g) => !isBlank(g.unicode));
    const first = visible[0];

    const opCounts = new Map<number, number>();
    for (const glyph of all) {
      opCounts.set(glyph.opIndex, (opCounts.get(glyph.opIndex) ?? 0) + 1);
    }
    const opGlyphs: GlyphOpRef[] = [...opCounts.entries()]
      .filter(([opIndex]) => opIndex >= 0)
      .map(([opIndex, count]) => ({ opIndex, glyphs: count }))
      .sort((a, b) => a.opIndex - b.opIndex);

    const bbox = visible.map(glyphBox).reduce((acc, box) => ({
      x0: Math.min(acc.x0, box.x0),
      y0: Math.min(acc.y0, box.y0),
      x1: Math.max(acc.x1, box.x1),
      y1: Math.max(acc.y1, box.y1)
    }));

    const id = `p${pageIndex + 1}-t${index + 1}`;
    const unmappedGlyphs = visible.filter((g) => g.unmapped).length;
    const warnings: DocumentWarning[] = [];
    if (unmappedGlyphs > 0) {
      warnings.push({
        code: 'UnmappableGlyph',
        message: `${unmappedGlyphs} glyph(s) in font ${first.font.name} have no Unicode mapping`,
        pageNumber: pageIndex + 1,
        runId: id
      });
    }

    const sin = Math.sin(first.rotation);
    const cos = Math.cos(first.rotation);

    return {
      id,
      pageIndex,
      fontId: first.font.id,
      fontName: first.font.name,
      fontSize: first.fontSize,
      color: first.color,
      origin: { x: first.x, y: first.y },
      bbox,
      text: draft.text,
      ascent: first.font.ascent,
      descent: first.font.descent,
      opGlyphs,
      glyphCount: all.length,
      unmappedGlyphs,
      excisable: all.every((g) => g.opIndex >= 0),
      vertical: first.font.vertical || Math.abs(sin) > 0.1 || cos < 0,
      invisible: first.invisible,
      lineCount: 1,
      isTranslatable: false,
      warnings
    };
  }
}
