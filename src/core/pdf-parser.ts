import { EncryptedPDFError, PDFArray, PDFDocument, PDFPage, PDFRawStream } from 'pdf-lib';
import { MalformedDocumentError } from '../errors.js';
import { FontRegistry } from '../fonts/font-registry.js';
import { parseOperations } from './content-stream/lexer.js';
import { TextInterpreter } from './content-stream/text-interpreter.js';
import { RunBuilder, type RunBuilderOptions } from './run-builder.js';
import { arrayItems, streamBytes } from './pdf-objects.js';
import type { DocumentWarning, PageContent, ParsedDocument, ParsedPage, PDFParserOptions, TextRun } from '../types/pdf.js';

const NEWLINE = new Uint8Array([0x0a]);

function concatBytes(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/** Decoded page content; a Contents array is joined with newlines so tokens never fuse across streams. */
export function readPageContent(page: PDFPage): Uint8Array {
  const contents = page.node.Contents();
  const streams = contents instanceof PDFArray ? arrayItems(contents) : [contents];
  const chunks: Uint8Array[] = [];

  for (const stream of streams) {
    if (!(stream instanceof PDFRawStream)) continue;
    const bytes = streamBytes(stream);
    if (!bytes) continue;
    if (chunks.length > 0) chunks.push(NEWLINE);
    chunks.push(bytes);
  }

  return concatBytes(chunks);
}

/**
 * Builds the in-memory document model: page geometry, decoded content
 * operators with byte ranges, and line-level text runs with Unicode text.
 * The input bytes are never modified.
 */
export class PDFParser {
  private readonly runBuilder: RunBuilder;

  constructor(runOptions: Partial<RunBuilderOptions> = {}) {
    this.runBuilder = new RunBuilder(runOptions);
  }

  async parse(data: Uint8Array | ArrayBuffer, options: PDFParserOptions = {}): Promise<ParsedDocument> {
    const bytes = data instanceof Uint8Array ? data : new Uint8Array(data);
    const pdf = await PDFParser.load(bytes, options.password);
    const pageCount = pdf.getPageCount();

    if (pageCount === 0) {
      throw new MalformedDocumentError('empty', 'PDF contains no pages');
    }

    const selected = options.pages ? new Set(options.pages) : null;
    const fonts = new FontRegistry(pdf.context);
    const warnings: DocumentWarning[] = [];

    const pages = pdf.getPages().map((page, index) => {
      const parsed = this.parsePage(page, index, fonts, options.maxFormDepth ?? 8);
      parsed.selected = selected ? selected.has(index) : true;
      return parsed;
    });

    return {
      pageCount,
      pages,
      fonts: { sources: fonts.sourceFonts(), entries: new Map() },
      metadata: {
        title: pdf.getTitle(),
        author: pdf.getAuthor(),
        subject: pdf.getSubject(),
        creator: pdf.getCreator(),
        producer: pdf.getProducer()
      },
      sourceBytes: bytes,
      warnings
    };
  }

  static async load(bytes: Uint8Array, password?: string): Promise<PDFDocument> {
    try {
      return await PDFDocument.load(bytes, { updateMetadata: false });
    } catch (error) {
      if (error instanceof EncryptedPDFError) {
        throw new MalformedDocumentError(
          'encrypted',
          password
            ? 'PDF is encrypted and decryption is not supported; remove the password first'
            : 'PDF is encrypted and no password was supplied',
          error
        );
      }
      throw new MalformedDocumentError(
        'invalid',
        `Not a readable PDF: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  private parsePage(page: PDFPage, index: number, fonts: FontRegistry, maxFormDepth: number): ParsedPage {
    const box = page.getMediaBox();
    const pageNumber = index + 1;
    const warnings: DocumentWarning[] = [];
    let content: PageContent = { bytes: new Uint8Array(0), ops: [], shows: new Map() };
    let runs: TextRun[] = [];

    try {
      const bytes = readPageContent(page);
      const ops = parseOperations(bytes);
      const interpreter = new TextInterpreter(fonts, { maxFormDepth, scope: `page${pageNumber}` });
      const { glyphs, shows } = interpreter.run(ops, page.node.Resources());
      content = { bytes, ops, shows };
      runs = this.runBuilder.build(glyphs, index);
    } catch (error) {
      console.warn(`Failed to read content of page ${pageNumber}, keeping it untranslated:`, error);
      warnings.push({
        code: 'ContentUnreadable',
        message: `Page content could not be read: ${error instanceof Error ? error.message : String(error)}`,
        pageNumber
      });
    }

    return {
      index,
      pageNumber,
      width: box.width,
      height: box.height,
      origin: { x: box.x, y: box.y },
      rotation: ((page.getRotation().angle % 360) + 360) % 360,
      content,
      regions: [
        {
          id: `p${pageNumber}-r0`,
          kind: 'unknown',
          source: 'parser',
          bbox: { x0: box.x, y0: box.y, x1: box.x + box.width, y1: box.y + box.height },
          confidence: 0,
          runs
        }
      ],
      selected: true,
      warnings
    };
  }
}
