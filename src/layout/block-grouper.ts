import { height, horizontalOverlap, median, union } from '../utils/geometry.js';
import type { Region, RegionKind, TextRun } from '../types/pdf.js';

export interface BlockGrouperOptions {
  /** Largest vertical gap between stacked lines, as a fraction of the font size. */
  lineGap: number;
  /** Largest horizontal gap between runs on one line, as a fraction of the font size. */
  wordGap: number;
  /** Block size relative to the page's dominant size that marks a heading. */
  headingRatio: number;
}

const DEFAULT_OPTIONS: BlockGrouperOptions = {
  lineGap: 0.9,
  wordGap: 1.0,
  headingRatio: 1.25
};

class DisjointSet {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(i: number): number {
    while (this.parent[i] !== i) {
      this.parent[i] = this.parent[this.parent[i]];
      i = this.parent[i];
    }
    return i;
  }

  join(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra !== rb) this.parent[Math.max(ra, rb)] = Math.min(ra, rb);
  }
}

/**
 * Groups runs that no detected region covers into text blocks: runs that
 * sit on one line, or that stack as consecutive lines with overlapping
 * columns and similar sizes, end up in one block.
 */
export class BlockGrouper {
  private readonly options: BlockGrouperOptions;

  constructor(options: Partial<BlockGrouperOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  group(runs: TextRun[], pageNumber: number, pageDominantSize: number, firstIndex = 1): Region[] {
    if (runs.length === 0) return [];

    const sets = new DisjointSet(runs.length);
    for (let i = 0; i < runs.length; i++) {
      for (let j = i + 1; j < runs.length; j++) {
        if (this.related(runs[i], runs[j])) sets.join(i, j);
      }
    }

    const blocks = new Map<number, TextRun[]>();
    runs.forEach((run, i) => {
      const root = sets.find(i);
      const block = blocks.get(root);
      if (block) block.push(run);
      else blocks.set(root, [run]);
    });

    return [...blocks.values()].map((blockRuns, index) => ({
      id: `p${pageNumber}-r${firstIndex + index}`,
      kind: this.kindOf(blockRuns, pageDominantSize),
      source: 'heuristic',
      bbox: blockRuns.map((run) => run.bbox).reduce(union),
      confidence: 0.5,
      runs: blockRuns
    }));
  }

  private related(a: TextRun, b: TextRun): boolean {
    const size = Math.max(a.fontSize, b.fontSize, 0.1);
    const ratio = Math.min(a.fontSize, b.fontSize) / size;

    // Same line: baselines agree and the horizontal gap is small
    if (Math.abs(a.origin.y - b.origin.y) < 0.3 * size) {
      const gap = Math.max(a.bbox.x0, b.bbox.x0) - Math.min(a.bbox.x1, b.bbox.x1);
      return gap < this.options.wordGap * size;
    }

    if (ratio < 0.8) return false;
    if (horizontalOverlap(a.bbox, b.bbox) <= 0) return false;

    const verticalGap = Math.max(a.bbox.y0, b.bbox.y0) - Math.min(a.bbox.y1, b.bbox.y1);
    return verticalGap < this.options.lineGap * size;
  }

  private kindOf(runs: TextRun[], pageDominantSize: number): RegionKind {
    const blockSize = median(runs.map((run) => run.fontSize));
    const lines = new Set(runs.map((run) => Math.round(run.origin.y))).size;
    const box = runs.map((run) => run.bbox).reduce(union);

    if (
      pageDominantSize > 0 &&
      blockSize >= this.options.headingRatio * pageDominantSize &&
      lines <= 3 &&
      height(box) < 4 * blockSize
    ) {
      return 'heading';
    }
    return 'body';
  }
}
