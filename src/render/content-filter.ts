import type { PageContent, TextRun, TextShowInfo } from '../types/pdf.js';

export interface FilteredContent {
  /** Page content with the translated runs' show operators neutralised. */
  bytes: Uint8Array;
  /** Runs whose glyphs could not be removed and need covering instead. */
  covered: TextRun[];
  /** Number of show operators replaced. */
  replaced: number;
}

export function formatNumber(value: number, digits = 3): string {
  if (!Number.isFinite(value)) return '0';
  const factor = 10 ** digits;
  const rounded = Math.round(value * factor) / factor;
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

/**
 * Operator text that moves the text position exactly as `show` did while
 * painting nothing. `'` and `"` keep their line-advance side effects.
 */
export function spacerFor(operator: string, show: TextShowInfo): string {
  const scale = show.fontSize * show.horizontalScale;
  const adjustment = scale === 0 ? 0 : (-show.advance * 1000) / scale;
  const spacer = `[${formatNumber(adjustment)}] TJ`;

  switch (operator) {
    case "'":
      return `T* ${spacer}`;
    case '"':
      return `${formatNumber(show.wordSpacing)} Tw ${formatNumber(show.charSpacing)} Tc T* ${spacer}`;
    default:
      return spacer;
  }
}

/**
 * Removes the glyphs of `runs` from a page's content. An operator is
 * replaced only when every glyph it shows belongs to one of `runs`;
 * all other bytes are copied unchanged.
 */
export function filterContent(content: PageContent, runs: TextRun[]): FilteredContent {
  const owned = new Map<number, number>();
  for (const run of runs) {
    for (const ref of run.opGlyphs) {
      owned.set(ref.opIndex, (owned.get(ref.opIndex) ?? 0) + ref.glyphs);
    }
  }

  const isFullyOwned = (opIndex: number): boolean => {
    const show = content.shows.get(opIndex);
    return show !== undefined && owned.get(opIndex) === show.glyphCount;
  };

  const covered = runs.filter((run) => !run.excisable || !run.opGlyphs.every((ref) => isFullyOwned(ref.opIndex)));
  const removable = new Set<number>();
  for (const run of runs) {
    if (covered.includes(run)) continue;
    for (const ref of run.opGlyphs) removable.add(ref.opIndex);
  }

  const encoder = new TextEncoder();
  const parts: Uint8Array[] = [];
  let cursor = 0;
  const indices = [...removable].sort((a, b) => a - b);

  for (const opIndex of indices) {
    const op = content.ops[opIndex];
    const show = content.shows.get(opIndex);
    if (!op || !show) continue;
    parts.push(content.bytes.subarray(cursor, op.start));
    parts.push(encoder.encode(spacerFor(op.operator, show)));
    cursor = op.end;
  }
  parts.push(content.bytes.subarray(cursor));

  const length = parts.reduce((sum, part) => sum + part.length, 0);
  const bytes = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    bytes.set(part, offset);
    offset += part.length;
  }

  return { bytes, covered, replaced: indices.length };
}
