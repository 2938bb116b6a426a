import { JobCancelledError, LayoutModelUnavailableError, errorMessage } from '../errors.js';
import { PageRasterizer } from './page-rasterizer.js';
import type { LayoutDetector, PageDetections, PageImage } from '../types/layout.js';
import type { DocumentWarning, ParsedDocument } from '../types/pdf.js';

export interface PageImageSource {
  rasterize(pdfBytes: Uint8Array, pageIndices: number[]): AsyncIterable<PageImage>;
}

export interface LayoutAnalyzerOptions {
  /** Without a model every region comes from the heuristic grouper. */
  detector?: LayoutDetector;
  rasterizer: PageImageSource;
  /** Fail instead of degrading when the model cannot run. */
  required: boolean;
}

export interface LayoutAnalysis {
  detections: PageDetections;
  warnings: DocumentWarning[];
  /** True when the model was wanted but regions came from heuristics alone. */
  degraded: boolean;
}

/**
 * Runs the layout model over the selected pages. A model that cannot be
 * loaded leaves the document to the heuristic classifier with a warning,
 * unless it is required.
 */
export class LayoutAnalyzer {
  private readonly options: LayoutAnalyzerOptions;

  constructor(options: Partial<LayoutAnalyzerOptions> = {}) {
    this.options = {
      ...options,
      rasterizer: options.rasterizer ?? new PageRasterizer(),
      required: options.required ?? false
    };
  }

  async analyze(document: ParsedDocument, signal?: AbortSignal): Promise<LayoutAnalysis> {
    const detections: PageDetections = new Map();
    const warnings: DocumentWarning[] = [];
    const { detector, rasterizer, required } = this.options;

    if (!detector) {
      return { detections, warnings, degraded: false };
    }

    const pageIndices = document.pages.filter((page) => page.selected).map((page) => page.index);
    let degraded = false;

    try {
      for await (const image of rasterizer.rasterize(document.sourceBytes, pageIndices)) {
        if (signal?.aborted) throw new JobCancelledError('layout');
        try {
          const pageDetections = await detector.detect(image);
          detections.set(image.pageIndex, {
            image: { width: image.width, height: image.height, scale: image.scale },
            detections: pageDetections
          });
        } catch (error) {
          if (error instanceof LayoutModelUnavailableError && detections.size === 0) throw error;
          if (required) throw new LayoutModelUnavailableError(`Layout detection failed on page ${image.pageIndex + 1}: ${errorMessage(error)}`, error);
          console.warn(`Layout detection failed on page ${image.pageIndex + 1}:`, error);
          degraded = true;
          warnings.push({
            code: 'LayoutModelUnavailable',
            message: `Layout detection failed, using heuristics: ${errorMessage(error)}`,
            pageNumber: image.pageIndex + 1
          });
        }
      }
    } catch (error) {
      if (error instanceof JobCancelledError) throw error;
      if (required) {
        throw error instanceof LayoutModelUnavailableError
          ? error
          : new LayoutModelUnavailableError(`Layout analysis failed: ${errorMessage(error)}`, error);
      }
      console.warn('Layout model unavailable, falling back to heuristics:', errorMessage(error));
      detections.clear();
      return {
        detections,
        warnings: [{ code: 'LayoutModelUnavailable', message: `Layout model unavailable: ${errorMessage(error)}` }],
        degraded: true
      };
    }

    return { detections, warnings, degraded };
  }

  async dispose(): Promise<void> {
    await this.options.detector?.dispose?.();
  }
}
