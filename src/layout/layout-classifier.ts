import { pageRuns } from '../core/document-utils.js';
import { area, center, containsPoint, overlapArea } from '../utils/geometry.js';
import { BlockGrouper } from './block-grouper.js';
import { formulaReason, type RunFilterOptions } from './run-filters.js';
import type { LayoutDetection, PageDetections } from '../types/layout.js';
import type { BBox, ParsedDocument, ParsedPage, Region, RegionKind, TextRun } from '../types/pdf.js';

export interface LayoutClassifierOptions extends RunFilterOptions {
  /** Detections below this confidence are ignored. */
  confidence: number;
  translatableKinds: RegionKind[];
}

const DEFAULT_OPTIONS: LayoutClassifierOptions = {
  confidence: 0.25,
  translatableKinds: ['body', 'heading', 'caption', 'footnote']
};

/** Kinds that win when several detections cover one run. */
const PROTECTED_KINDS: ReadonlySet<RegionKind> = new Set(['formula', 'table', 'figure', 'unknown']);

/**
 * Size that most characters on a page are set in, rounded to half a point.
 */
export function dominantFontSize(runs: TextRun[]): number {
  const weights = new Map<number, number>();
  for (const run of runs) {
    const size = Math.round(run.fontSize * 2) / 2;
    weights.set(size, (weights.get(size) ?? 0) + run.text.length);
  }
  let best = 0;
  let bestWeight = -1;
  for (const [size, weight] of weights) {
    if (weight > bestWeight || (weight === bestWeight && size < best)) {
      best = size;
      bestWeight = weight;
    }
  }
  return best;
}

/**
 * Maps a detection box in page-image pixels (top-left origin, page
 * rotation applied) back to PDF user space.
 */
export function imageBoxToPdf(
  bbox: [number, number, number, number],
  page: Pick<ParsedPage, 'width' | 'height' | 'origin' | 'rotation'>,
  scale: number
): BBox {
  const [px0, py0, px1, py1] = bbox;
  const toUser = (dx: number, dy: number): { x: number; y: number } => {
    const u = dx / scale;
    const v = dy / scale;
    switch (page.rotation) {
      case 90:
        return { x: v, y: u };
      case 180:
        return { x: page.width - u, y: v };
      case 270:
        return { x: page.width - v, y: page.height - u };
      default:
        return { x: u, y: page.height - v };
    }
  };
  const a = toUser(px0, py0);
  const b = toUser(px1, py1);
  return {
    x0: page.origin.x + Math.min(a.x, b.x),
    y0: page.origin.y + Math.min(a.y, b.y),
    x1: page.origin.x + Math.max(a.x, b.x),
    y1: page.origin.y + Math.max(a.y, b.y)
  };
}

/**
 * Assigns every run to a region and decides whether it is translatable.
 * Regions come from layout detections where available; uncovered runs
 * are grouped into heuristic body/heading blocks. Run-level filters then
 * override the region label for inline formulas and similar runs.
 */
export class LayoutClassifier {
  private readonly options: LayoutClassifierOptions;
  private readonly grouper = new BlockGrouper();

  constructor(options: Partial<LayoutClassifierOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  classify(document: ParsedDocument, detections?: PageDetections): ParsedDocument {
    for (const page of document.pages) {
      const pageDetections = detections?.get(page.index);
      this.classifyPage(page, pageDetections?.detections ?? [], pageDetections?.image.scale ?? 1);
    }
    return document;
  }

  classifyPage(page: ParsedPage, detections: LayoutDetection[], scale: number): void {
    const runs = pageRuns(page);
    const pageSize = dominantFontSize(runs);

    const modelRegions: Region[] = detections
      .filter((detection) => detection.confidence >= this.options.confidence)
      .map((detection, index) => ({
        id: `p${page.pageNumber}-m${index + 1}`,
        kind: detection.kind,
        source: 'model',
        bbox: imageBoxToPdf(detection.bbox, page, scale),
        confidence: detection.confidence,
        runs: []
      }));

    const uncovered: TextRun[] = [];
    for (const run of runs) {
      const region = this.coveringRegion(run, modelRegions);
      if (region) region.runs.push(run);
      else uncovered.push(run);
    }

    const heuristicRegions = this.grouper.group(uncovered, page.pageNumber, pageSize);
    page.regions = [...modelRegions, ...heuristicRegions];

    for (const region of page.regions) {
      this.classifyRuns(region);
    }
  }

  private coveringRegion(run: TextRun, regions: Region[]): Region | undefined {
    const point = center(run.bbox);
    const candidates = regions.filter((region) => containsPoint(region.bbox, point, 1));
    if (candidates.length <= 1) return candidates[0];

    return candidates.sort((a, b) => {
      const protectedA = PROTECTED_KINDS.has(a.kind) ? 1 : 0;
      const protectedB = PROTECTED_KINDS.has(b.kind) ? 1 : 0;
      if (protectedA !== protectedB) return protectedB - protectedA;
      const overlap = overlapArea(b.bbox, run.bbox) - overlapArea(a.bbox, run.bbox);
      if (Math.abs(overlap) > 1e-6) return overlap;
      return area(a.bbox) - area(b.bbox);
    })[0];
  }

  private classifyRuns(region: Region): void {
    const regionSize = dominantFontSize(region.runs);
    const kindTranslatable = this.options.translatableKinds.includes(region.kind);

    for (const run of region.runs) {
      run.formulaReason = formulaReason(run, regionSize, this.options);
      run.isTranslatable = kindTranslatable && run.formulaReason === undefined;
    }

    if (region.source === 'heuristic' && region.runs.length > 0 && region.runs.every((run) => run.formulaReason !== undefined)) {
      region.kind = 'formula';
    }
  }
}
