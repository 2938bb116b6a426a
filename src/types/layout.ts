import type { RegionKind } from './pdf.js';

/** A rasterised page handed to a layout detector. */
export interface PageImage {
  pageIndex: number;
  /** Pixel dimensions. */
  width: number;
  height: number;
  /** RGBA, row major, top-left origin. */
  data: Uint8Array;
  /** Pixels per PDF point. */
  scale: number;
}

export interface LayoutDetection {
  /** `[x0, y0, x1, y1]` in image pixels, top-left origin. */
  bbox: [number, number, number, number];
  kind: RegionKind;
  label: string;
  confidence: number;
}

export interface LayoutDetector {
  readonly name: string;
  detect(image: PageImage): Promise<LayoutDetection[]>;
  dispose?(): Promise<void>;
}

/** Detections per page, keyed by 0-based page index. */
export type PageDetections = Map<number, { image: Pick<PageImage, 'width' | 'height' | 'scale'>; detections: LayoutDetection[] }>;
