import { PNG } from 'pngjs';
import { getDocumentProxy, renderPageAsImage } from 'unpdf';
import type { PageImage } from '../types/layout.js';

export interface PageRasterizerOptions {
  /** Pixels per PDF point. */
  scale: number;
}

/**
 * Renders pages to RGBA bitmaps for the layout model. Pages come out one
 * at a time so only a single bitmap is alive per iteration.
 */
export class PageRasterizer {
  private readonly options: PageRasterizerOptions;

  constructor(options: Partial<PageRasterizerOptions> = {}) {
    this.options = { scale: options.scale ?? 2 };
  }

  async *rasterize(pdfBytes: Uint8Array, pageIndices: number[]): AsyncGenerator<PageImage> {
    // pdf.js takes ownership of the buffer it is given
    const pdf = await getDocumentProxy(new Uint8Array(pdfBytes));
    try {
      for (const pageIndex of pageIndices) {
        const png = await renderPageAsImage(pdf, pageIndex + 1, {
          canvasImport: () => import('@napi-rs/canvas'),
          scale: this.options.scale
        });
        yield { pageIndex, scale: this.options.scale, ...decodePng(png) };
      }
    } finally {
      await pdf.destroy();
    }
  }
}

export function decodePng(png: ArrayBuffer | Uint8Array): Pick<PageImage, 'width' | 'height' | 'data'> {
  const image = PNG.sync.read(Buffer.from(png instanceof Uint8Array ? png : new Uint8Array(png)));
  return { width: image.width, height: image.height, data: new Uint8Array(image.data) };
}
