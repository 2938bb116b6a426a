import { PDFDocument, StandardFonts, rgb, type PDFFont } from 'pdf-lib';
import { BaseBackend } from '../../src/translation/backend.js';
import type { LanguagePair } from '../../src/types/translation.js';
import type { ParsedDocument, ParsedPage, TextRun } from '../../src/types/pdf.js';

export interface FixtureText {
  text: string;
  x: number;
  y: number;
  size?: number;
  font?: StandardFonts;
  color?: [number, number, number];
}

export interface FixturePage {
  width?: number;
  height?: number;
  texts: FixtureText[];
}

/** Builds a PDF with pdf-lib, one `drawText` per entry. */
export async function buildPdf(pages: FixturePage[], title?: string): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  if (title) pdf.setTitle(title);
  const fonts = new Map<StandardFonts, PDFFont>();

  for (const pageSpec of pages) {
    const page = pdf.addPage([pageSpec.width ?? 612, pageSpec.height ?? 792]);
    for (const text of pageSpec.texts) {
      const name = text.font ?? StandardFonts.Helvetica;
      let font = fonts.get(name);
      if (!font) {
        font = await pdf.embedFont(name);
        fonts.set(name, font);
      }
      const [r, g, b] = text.color ?? [0, 0, 0];
      page.drawText(text.text, { x: text.x, y: text.y, size: text.size ?? 12, font, color: rgb(r, g, b) });
    }
  }

  return pdf.save();
}

/** Body line above an inline formula set in Times-Italic. */
export function helloWorldPdf(): Promise<Uint8Array> {
  return buildPdf([
    {
      texts: [
        { text: 'Hello world', x: 72, y: 700 },
        { text: 'E=mc^2', x: 72, y: 650, font: StandardFonts.TimesRomanItalic }
      ]
    }
  ]);
}

/**
 * A run with a box derived from its text: half an em per character,
 * ascent 0.8 and descent 0.2 of the size.
 */
export function textRun(fields: Partial<TextRun> & { text: string }): TextRun {
  const fontSize = fields.fontSize ?? 10;
  const origin = fields.origin ?? { x: 72, y: 700 };
  return {
    id: 'p1-t1',
    pageIndex: 0,
    fontId: 'F1',
    fontName: 'Helvetica',
    fontSize,
    color: { r: 0, g: 0, b: 0 },
    origin,
    bbox: {
      x0: origin.x,
      y0: origin.y - 0.2 * fontSize,
      x1: origin.x + fields.text.length * fontSize * 0.5,
      y1: origin.y + 0.8 * fontSize
    },
    ascent: 0.8,
    descent: -0.2,
    opGlyphs: [],
    glyphCount: [...fields.text].length,
    unmappedGlyphs: 0,
    excisable: true,
    vertical: false,
    invisible: false,
    lineCount: 1,
    isTranslatable: false,
    warnings: [],
    ...fields
  };
}

export function pageOf(runs: TextRun[], index = 0): ParsedPage {
  return {
    index,
    pageNumber: index + 1,
    width: 612,
    height: 792,
    origin: { x: 0, y: 0 },
    rotation: 0,
    content: { bytes: new Uint8Array(0), ops: [], shows: new Map() },
    regions: [
      { id: `p${index + 1}-r0`, kind: 'unknown', source: 'parser', bbox: { x0: 0, y0: 0, x1: 612, y1: 792 }, confidence: 0, runs }
    ],
    selected: true,
    warnings: []
  };
}

export function documentOf(pages: ParsedPage[]): ParsedDocument {
  return {
    pageCount: pages.length,
    pages,
    fonts: { sources: new Map(), entries: new Map() },
    metadata: {},
    sourceBytes: new Uint8Array(0),
    warnings: []
  };
}

export function indexOfBytes(haystack: Uint8Array, needle: Uint8Array): number {
  outer: for (let i = 0; i + needle.length <= haystack.length; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) continue outer;
    }
    return i;
  }
  return -1;
}

export type TranslateFn = (texts: string[], pair: LanguagePair) => string[] | Promise<string[]>;

/** In-process backend; counts `translate` calls and the texts it saw. */
export class MockBackend extends BaseBackend {
  readonly name: string;
  calls = 0;
  readonly seen: string[][] = [];

  constructor(
    private readonly fn: TranslateFn,
    options: { name?: string; batchSize?: number } = {}
  ) {
    super('test', { batchSize: options.batchSize });
    this.name = options.name ?? 'mock';
  }

  protected async translateBatch(texts: string[], pair: LanguagePair): Promise<string[]> {
    this.calls++;
    this.seen.push([...texts]);
    return this.fn(texts, pair);
  }
}

/** Looks each text up in `table`; unknown texts come back upper-cased. */
export function dictionaryBackend(table: Record<string, string>): MockBackend {
  return new MockBackend((texts) => texts.map((text) => table[text] ?? text.toUpperCase()));
}
