import fontkit from '@pdf-lib/fontkit';
import type { PDFDocument, PDFFont } from 'pdf-lib';
import type { FontCatalog } from './font-catalog.js';
import type { FontEntry, FontTable, ScriptId, SourceFont } from '../types/fonts.js';

export interface FontManagerOptions {
  /** Embed only the glyphs drawn instead of whole font files. */
  subset: boolean;
}

const DEFAULT_OPTIONS: FontManagerOptions = {
  subset: true
};

/** Traits assumed for runs whose font is missing from the table. */
const FALLBACK_SOURCE: SourceFont = {
  id: '',
  name: 'Helvetica',
  baseName: 'Helvetica',
  subtype: 'Type1',
  serif: false,
  fixedPitch: false,
  italic: false,
  bold: false,
  ascent: 0.718,
  descent: -0.207
};

export function entryKey(sourceFontId: string, script: ScriptId): string {
  return `${sourceFontId}@${script}`;
}

/**
 * Owns the substitute fonts of one document. Entries are created on first
 * use, embedded once per output document and finalised when that output is
 * saved; glyph subsets are collected while text is drawn.
 */
export class FontManager {
  private readonly options: FontManagerOptions;
  private readonly embedded = new WeakMap<PDFDocument, Map<string, Promise<PDFFont>>>();

  constructor(
    private readonly catalog: FontCatalog,
    private readonly table: FontTable,
    options: Partial<FontManagerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /** `null` when no substitute can render `script`. */
  async entryFor(sourceFontId: string, script: ScriptId): Promise<FontEntry | null> {
    const key = entryKey(sourceFontId, script);
    const existing = this.table.entries.get(key);
    if (existing) return existing;

    const source = this.table.sources.get(sourceFontId) ?? FALLBACK_SOURCE;
    const substitute = await this.catalog.resolve(script, source);
    if (!substitute) return null;

    const entry: FontEntry = {
      key,
      sourceFontId,
      script,
      substitute,
      subset: this.options.subset && substitute.kind === 'file',
      glyphsUsed: new Set(),
      finalized: false
    };
    this.table.entries.set(key, entry);
    return entry;
  }

  /** Name of the font the entry stands in for, without its subset prefix. */
  sourceName(entry: FontEntry): string {
    return (this.table.sources.get(entry.sourceFontId) ?? FALLBACK_SOURCE).baseName;
  }

  /** Embeds the entry's substitute into `pdf`, once per document and font. */
  embed(pdf: PDFDocument, entry: FontEntry): Promise<PDFFont> {
    let fonts = this.embedded.get(pdf);
    if (!fonts) {
      fonts = new Map();
      this.embedded.set(pdf, fonts);
    }

    const { substitute } = entry;
    const fontKey = substitute.kind === 'file' ? `file:${substitute.path}` : `standard:${substitute.name}`;
    let pending = fonts.get(fontKey);
    if (!pending) {
      pending = this.load(pdf, entry);
      fonts.set(fontKey, pending);
    }
    return pending;
  }

  private async load(pdf: PDFDocument, entry: FontEntry): Promise<PDFFont> {
    const { substitute } = entry;
    if (substitute.kind === 'standard') {
      return pdf.embedFont(substitute.name);
    }
    pdf.registerFontkit(fontkit);
    const bytes = await this.catalog.fontBytes(substitute.path);
    return pdf.embedFont(bytes, { subset: entry.subset });
  }

  recordGlyphs(entry: FontEntry, text: string): void {
    for (const char of text) {
      const codePoint = char.codePointAt(0);
      if (codePoint !== undefined && char.trim() !== '') entry.glyphsUsed.add(codePoint);
    }
  }

  /** Marks every entry as written; called once the output carrying them is saved. */
  finalize(): void {
    for (const entry of this.table.entries.values()) {
      entry.finalized = true;
    }
  }

  entries(): FontEntry[] {
    return [...this.table.entries.values()];
  }
}
