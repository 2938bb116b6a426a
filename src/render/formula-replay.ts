import { PDFName } from 'pdf-lib';
import { formatNumber } from './content-filter.js';
import type { InlineFormula, PageContent } from '../types/pdf.js';

export interface FormulaPlacement {
  formula: InlineFormula;
  /** Baseline point of the typeset line where the formula starts. */
  x: number;
  y: number;
  /** Typeset size relative to the source paragraph size. */
  scale: number;
}

/** Width a formula takes on its line, measured from its origin. */
export function formulaAdvance(formula: InlineFormula): number {
  return Math.max(0, formula.run.bbox.x1 - formula.run.origin.x);
}

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Content drawing each placed formula with its own show operators, copied
 * byte for byte from the page and moved to the placement. Each operator
 * gets its text state back from the values recorded when it was parsed.
 */
export function formulaContent(content: PageContent, placements: FormulaPlacement[]): Uint8Array {
  const encoder = new TextEncoder();
  const parts: Uint8Array[] = [];
  const n = (value: number): string => formatNumber(value, 5);

  for (const { formula, x, y, scale } of placements) {
    const { run, baselineOffset } = formula;
    parts.push(encoder.encode(`q ${n(clamp(run.color.r))} ${n(clamp(run.color.g))} ${n(clamp(run.color.b))} rg\n`));

    for (const ref of run.opGlyphs) {
      const op = content.ops[ref.opIndex];
      const show = content.shows.get(ref.opIndex);
      if (!op || !show || show.fontResource === undefined) continue;

      const [a, b, c, d, e, f] = show.matrix;
      const matrix = [
        a * scale,
        b * scale,
        c * scale,
        d * scale,
        x + (e - run.origin.x) * scale,
        y + (baselineOffset + f - run.origin.y) * scale
      ];
      const state = [
        `${PDFName.of(show.fontResource).toString()} ${n(show.fontSize)} Tf`,
        `${n(show.charSpacing)} Tc ${n(show.wordSpacing)} Tw ${n(show.horizontalScale * 100)} Tz ${n(show.rise)} Ts 0 TL 0 Tr`
      ];
      parts.push(encoder.encode(`q ${matrix.map(n).join(' ')} cm BT ${state.join(' ')}\n`));
      parts.push(content.bytes.subarray(op.start, op.end));
      parts.push(encoder.encode('\nET Q\n'));
    }
    parts.push(encoder.encode('Q\n'));
  }

  const bytes = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    bytes.set(part, offset);
    offset += part.length;
  }
  return bytes;
}
