import { PDFContext, PDFDict, PDFName } from 'pdf-lib';
import { lookupDict, refKey } from '../core/pdf-objects.js';
import { PdfFont } from './pdf-font.js';
import type { SourceFont } from '../types/fonts.js';

/**
 * Document-wide cache of decoded fonts. Fonts shared between pages by
 * indirect reference are decoded once and share one id.
 */
export class FontRegistry {
  private readonly fonts = new Map<string, PdfFont>();

  constructor(private readonly context: PDFContext) {}

  resolve(resources: PDFDict | undefined, resourceName: string, scope: string): PdfFont {
    const fontDict = resources ? lookupDict(resources, 'Font') : undefined;
    const raw = fontDict?.get(PDFName.of(resourceName));
    const id = refKey(raw) ?? `${scope}/${resourceName}`;

    const cached = this.fonts.get(id);
    if (cached) return cached;

    const dict = fontDict?.lookup(PDFName.of(resourceName));
    let font: PdfFont;
    if (dict instanceof PDFDict) {
      try {
        font = new PdfFont(id, dict);
      } catch (error) {
        console.warn(`Failed to decode font ${resourceName}, using byte fallback:`, error);
        font = new PdfFont(id, PDFDict.withContext(this.context));
      }
    } else {
      console.warn(`Font resource ${resourceName} not found on ${scope}`);
      font = new PdfFont(id, PDFDict.withContext(this.context));
    }

    this.fonts.set(id, font);
    return font;
  }

  sourceFonts(): Map<string, SourceFont> {
    const sources = new Map<string, SourceFont>();
    for (const [id, font] of this.fonts) sources.set(id, font.toSourceFont());
    return sources;
  }
}
