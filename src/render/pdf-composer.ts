import { PDFDocument, PDFName, PDFPage, rgb, type PDFFont, type PDFObject } from 'pdf-lib';
import { RenderFailureError, errorMessage } from '../errors.js';
import { pageRuns } from '../core/document-utils.js';
import type { FontManager } from '../fonts/font-manager.js';
import { breaksAnywhere, scriptForLanguage } from '../translation/languages.js';
import { filterContent } from './content-filter.js';
import { formulaAdvance, formulaContent, type FormulaPlacement } from './formula-replay.js';
import {
  insertFormulaMarkers,
  layoutText,
  lineHeightFor,
  measureWithFormulas,
  sanitizeText,
  splitFormulaMarkers,
  type TextMeasurer
} from './typesetter.js';
import type { FontEntry } from '../types/fonts.js';
import type { DocumentWarning, ParsedDocument, ParsedPage, TextRun } from '../types/pdf.js';
import type { RenderOutput } from '../types/output.js';

export interface PdfComposerOptions {
  targetLang: string;
  overflow: 'shrink' | 'overflow';
  minFontScale: number;
  dualLayout: 'interleave' | 'side-by-side';
}

const DEFAULT_OPTIONS: PdfComposerOptions = {
  targetLang: 'ko',
  overflow: 'shrink',
  minFontScale: 0.7,
  dualLayout: 'interleave'
};

/** Extra margin around boxes painted over runs that could not be excised. */
const COVER_PADDING = 0.5;

export function measurerFor(font: PDFFont): TextMeasurer {
  const characters = new Set(font.getCharacterSet());
  return {
    widthOfTextAtSize: (text, size) => font.widthOfTextAtSize(text, size),
    canEncode: (char) => {
      const codePoint = char.codePointAt(0);
      return codePoint !== undefined && characters.has(codePoint);
    }
  };
}

function translatedRuns(page: ParsedPage): TextRun[] {
  return pageRuns(page).filter((run) => run.isTranslatable && run.translation !== undefined);
}

function runWarning(page: ParsedPage, run: TextRun, code: DocumentWarning['code'], message: string): DocumentWarning {
  const warning: DocumentWarning = { code, message, pageNumber: page.pageNumber, runId: run.id };
  run.warnings.push(warning);
  return warning;
}

/**
 * Writes translated runs back into the source PDF. The original show
 * operators of each translated run are removed (or painted over) and the
 * translation is typeset in its place; every other byte of the page
 * content is kept.
 */
export class PdfComposer {
  private readonly options: PdfComposerOptions;
  /** Entries whose substitution has been reported. */
  private readonly substitutions = new Set<string>();

  constructor(
    private readonly fonts: FontManager,
    options: Partial<PdfComposerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async render(document: ParsedDocument): Promise<RenderOutput> {
    const mono = await this.renderMono(document);
    const dual = await this.renderDual(document.sourceBytes, mono.bytes, document);
    return { mono: mono.bytes, dual, fallbackPages: mono.fallbackPages, overflowRuns: mono.overflowRuns };
  }

  private async renderMono(document: ParsedDocument): Promise<{ bytes: Uint8Array; fallbackPages: number[]; overflowRuns: number }> {
    const pdf = await PdfComposer.load(document.sourceBytes, 'mono');
    const fallbackPages: number[] = [];
    let overflowRuns = 0;

    for (const page of document.pages) {
      if (!page.selected) continue;
      const runs = translatedRuns(page);
      if (runs.length === 0) continue;

      const pdfPage = pdf.getPage(page.index);
      const original = pdfPage.node.get(PDFName.of('Contents'));
      try {
        overflowRuns += await this.renderPage(pdf, pdfPage, page, runs);
      } catch (error) {
        PdfComposer.restoreContents(pdfPage, original);
        const message = `Page ${page.pageNumber} kept its original text: ${errorMessage(error)}`;
        console.warn(message);
        page.warnings.push({ code: 'RenderFailure', message, pageNumber: page.pageNumber });
        fallbackPages.push(page.index);
      }
    }

    const bytes = await PdfComposer.save(pdf, 'mono');
    this.fonts.finalize();
    return { bytes, fallbackPages, overflowRuns };
  }

  /** Returns the number of runs whose text overflowed its box. */
  private async renderPage(pdf: PDFDocument, pdfPage: PDFPage, page: ParsedPage, runs: TextRun[]): Promise<number> {
    const script = scriptForLanguage(this.options.targetLang);
    const lineHeight = lineHeightFor(this.options.targetLang);

    // Resolve fonts first so a missing font leaves the page untouched
    const fonts = new Map<string, PDFFont>();
    const entries: FontEntry[] = [];
    for (const run of runs) {
      if (fonts.has(run.fontId)) continue;
      const entry = await this.fonts.entryFor(run.fontId, script);
      if (!entry) {
        throw new RenderFailureError('page', `no font available for ${script} text`, { pageIndex: page.index });
      }
      fonts.set(run.fontId, await this.fonts.embed(pdf, entry));
      entries.push(entry);
    }
    for (const entry of entries) {
      this.reportSubstitution(page, entry);
    }

    const formulaRuns = runs.flatMap((run) => (run.inlineFormulas ?? []).map((inline) => inline.run));
    const filtered = filterContent(page.content, [...runs, ...formulaRuns]);
    const stream = pdf.context.flateStream(PdfComposer.wrap(filtered.bytes));
    pdfPage.node.set(PDFName.of('Contents'), pdf.context.obj([pdf.context.register(stream)]));

    for (const run of filtered.covered) {
      pdfPage.drawRectangle({
        x: run.bbox.x0 - COVER_PADDING,
        y: run.bbox.y0 - COVER_PADDING,
        width: run.bbox.x1 - run.bbox.x0 + 2 * COVER_PADDING,
        height: run.bbox.y1 - run.bbox.y0 + 2 * COVER_PADDING,
        color: rgb(1, 1, 1)
      });
    }

    let overflowed = 0;
    const placements: FormulaPlacement[] = [];
    for (const run of runs) {
      const font = fonts.get(run.fontId);
      const entry = await this.fonts.entryFor(run.fontId, script);
      if (!font || !entry || run.translation === undefined) continue;

      const measurer = measurerFor(font);
      const sanitized = sanitizeText(run.translation, measurer.canEncode);
      if (sanitized.replaced.length > 0) {
        runWarning(page, run, 'UnencodableCharacter', `${entry.substitute.name} cannot encode ${sanitized.replaced.map((char) => JSON.stringify(char)).join(', ')}`);
      }

      const formulas = run.inlineFormulas ?? [];
      const marked = insertFormulaMarkers(sanitized.text, formulas.length);
      if (marked.missing.length > 0) {
        runWarning(page, run, 'FormulaPlaceholderMissing', `Translation lost ${marked.missing.map((index) => `{v${index}}`).join(', ')}; appended at the end`);
      }

      const layout = layoutText(
        {
          text: marked.text,
          box: run.bbox,
          origin: run.origin,
          fontSize: run.fontSize,
          descent: Math.abs(run.descent),
          lineHeight,
          overflow: this.options.overflow,
          minFontScale: this.options.minFontScale,
          breakAnywhere: breaksAnywhere(script)
        },
        measureWithFormulas(measurer.widthOfTextAtSize, formulas.map(formulaAdvance), run.fontSize)
      );
      if (layout.overflow) {
        overflowed++;
        runWarning(page, run, 'TextOverflow', `Translation does not fit its box at ${layout.fontSize.toFixed(1)}pt`);
      }

      const color = rgb(clamp(run.color.r), clamp(run.color.g), clamp(run.color.b));
      const scale = layout.fontSize / Math.max(run.fontSize, 0.1);
      for (const line of layout.lines) {
        let x = line.x;
        for (const segment of splitFormulaMarkers(line.text)) {
          if (segment.kind === 'formula') {
            const formula = formulas[segment.index];
            if (!formula) continue;
            placements.push({ formula, x, y: line.y, scale });
            x += formulaAdvance(formula) * scale;
            continue;
          }
          pdfPage.drawText(segment.text, { x, y: line.y, size: layout.fontSize, font, color });
          this.fonts.recordGlyphs(entry, segment.text);
          x += font.widthOfTextAtSize(segment.text, layout.fontSize);
        }
      }
    }

    if (placements.length > 0) {
      const replay = pdf.context.flateStream(formulaContent(page.content, placements));
      pdfPage.node.addContentStream(pdf.context.register(replay));
    }
    return overflowed;
  }

  private reportSubstitution(page: ParsedPage, entry: FontEntry): void {
    const source = this.fonts.sourceName(entry);
    if (this.substitutions.has(entry.key) || source === entry.substitute.name) return;
    this.substitutions.add(entry.key);
    page.warnings.push({
      code: 'FontSubstitution',
      message: `${source} drawn with ${entry.substitute.name}`,
      pageNumber: page.pageNumber
    });
  }

  private async renderDual(sourceBytes: Uint8Array, monoBytes: Uint8Array, document: ParsedDocument): Promise<Uint8Array> {
    const source = await PdfComposer.load(sourceBytes, 'dual');
    const translated = await PdfComposer.load(monoBytes, 'dual');
    const dual = await PDFDocument.create();
    const indices = source.getPageIndices();

    try {
      if (this.options.dualLayout === 'side-by-side') {
        for (const index of indices) {
          const [left, right] = await dual.embedPages([source.getPage(index), translated.getPage(index)]);
          const page = dual.addPage([left.width + right.width, Math.max(left.height, right.height)]);
          page.drawPage(left, { x: 0, y: 0 });
          page.drawPage(right, { x: left.width, y: 0 });
        }
      } else {
        const originals = await dual.copyPages(source, indices);
        const translations = await dual.copyPages(translated, indices);
        originals.forEach((page, i) => {
          dual.addPage(page);
          dual.addPage(translations[i]);
        });
      }
    } catch (error) {
      throw new RenderFailureError('document', `Failed to assemble dual PDF: ${errorMessage(error)}`, { cause: error });
    }

    const { title, author, subject } = document.metadata;
    if (title) dual.setTitle(title);
    if (author) dual.setAuthor(author);
    if (subject) dual.setSubject(subject);

    return PdfComposer.save(dual, 'dual');
  }

  private static async load(bytes: Uint8Array, variant: string): Promise<PDFDocument> {
    try {
      return await PDFDocument.load(bytes, { updateMetadata: false });
    } catch (error) {
      throw new RenderFailureError('document', `Failed to open source for ${variant} PDF: ${errorMessage(error)}`, { cause: error });
    }
  }

  private static async save(pdf: PDFDocument, variant: string): Promise<Uint8Array> {
    try {
      return await pdf.save();
    } catch (error) {
      throw new RenderFailureError('document', `Failed to write ${variant} PDF: ${errorMessage(error)}`, { cause: error });
    }
  }

  /** Keeps the graphics state of the original content from leaking into drawn text. */
  private static wrap(content: Uint8Array): Uint8Array {
    const encoder = new TextEncoder();
    const head = encoder.encode('q\n');
    const tail = encoder.encode('\nQ\n');
    const out = new Uint8Array(head.length + content.length + tail.length);
    out.set(head, 0);
    out.set(content, head.length);
    out.set(tail, head.length + content.length);
    return out;
  }

  private static restoreContents(page: PDFPage, original: PDFObject | undefined): void {
    if (original) {
      page.node.set(PDFName.of('Contents'), original);
    } else {
      page.node.delete(PDFName.of('Contents'));
    }
  }
}

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value));
}
