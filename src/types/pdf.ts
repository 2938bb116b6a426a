import type { FontTable } from './fonts.js';

/** Affine matrix `[a b c d e f]` in PDF order. */
export type Matrix = [number, number, number, number, number, number];

export interface Point {
  x: number;
  y: number;
}

/** Rectangle in PDF user space (y grows upwards). */
export interface BBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface RGBColor {
  r: number;
  g: number;
  b: number;
}

export type RegionKind =
  | 'body'
  | 'heading'
  | 'formula'
  | 'table'
  | 'figure'
  | 'caption'
  | 'footnote'
  | 'reference'
  | 'unknown';

export type RegionSource = 'model' | 'heuristic' | 'parser';

export type WarningCode =
  | 'UnmappableGlyph'
  | 'ContentUnreadable'
  | 'LayoutModelUnavailable'
  | 'TranslationFailed'
  | 'RenderFailure'
  | 'TextOverflow'
  | 'UnencodableCharacter'
  | 'FontSubstitution'
  | 'FormulaPlaceholderMissing';

export interface DocumentWarning {
  code: WarningCode;
  message: string;
  pageNumber?: number;
  runId?: string;
}

export type Operand =
  | { type: 'number'; value: number }
  | { type: 'string'; value: Uint8Array }
  | { type: 'name'; value: string }
  | { type: 'array'; value: Operand[] }
  | { type: 'dict'; value: Map<string, Operand> }
  | { type: 'bool'; value: boolean }
  | { type: 'null' };

/** One content-stream operator with its operands and byte range in the page content. */
export interface ContentOp {
  operator: string;
  operands: Operand[];
  start: number;
  end: number;
}

/** Advance data for a text-showing operator, used to excise it without moving later glyphs. */
export interface TextShowInfo {
  opIndex: number;
  /** Horizontal displacement in unscaled text space units. */
  advance: number;
  fontSize: number;
  horizontalScale: number;
  glyphCount: number;
  wordSpacing: number;
  charSpacing: number;
  rise: number;
  /** Resource name given to `Tf`. */
  fontResource?: string;
  /** Text space to user space at the start of the operator. */
  matrix: Matrix;
}

export interface PageContent {
  bytes: Uint8Array;
  ops: ContentOp[];
  shows: Map<number, TextShowInfo>;
}

/** Number of a run's glyphs drawn by one page-level operator. */
export interface GlyphOpRef {
  opIndex: number;
  glyphs: number;
}

export type FormulaReason =
  | 'font'
  | 'characters'
  | 'no-letters'
  | 'script-size'
  | 'unmapped'
  | 'vertical'
  | 'invisible'
  | 'cid';

export interface TextRun {
  id: string;
  pageIndex: number;
  fontId: string;
  fontName: string;
  fontSize: number;
  color: RGBColor;
  /** Baseline start of the first line. */
  origin: Point;
  bbox: BBox;
  text: string;
  /** Font ascent/descent as fractions of the font size. */
  ascent: number;
  descent: number;
  opGlyphs: GlyphOpRef[];
  glyphCount: number;
  unmappedGlyphs: number;
  /** False when glyphs were drawn inside a form XObject and cannot be removed from the page stream. */
  excisable: boolean;
  vertical: boolean;
  invisible: boolean;
  lineCount: number;
  isTranslatable: boolean;
  formulaReason?: FormulaReason;
  warnings: DocumentWarning[];
  translation?: string;
  /** Formulas held in the text as `{vN}` placeholders, N being the array index. */
  inlineFormulas?: InlineFormula[];
}

/** A formula run taken into a paragraph and redrawn from its own operators. */
export interface InlineFormula {
  run: TextRun;
  /** Baseline shift from the line the formula sat on. */
  baselineOffset: number;
}

export interface Region {
  id: string;
  kind: RegionKind;
  source: RegionSource;
  bbox: BBox;
  confidence: number;
  runs: TextRun[];
}

export interface ParsedPage {
  index: number;
  pageNumber: number;
  width: number;
  height: number;
  /** Lower-left corner of the media box. */
  origin: Point;
  rotation: number;
  content: PageContent;
  regions: Region[];
  selected: boolean;
  warnings: DocumentWarning[];
}

export interface DocumentMetadata {
  title?: string;
  author?: string;
  subject?: string;
  creator?: string;
  producer?: string;
}

export interface ParsedDocument {
  pageCount: number;
  pages: ParsedPage[];
  fonts: FontTable;
  metadata: DocumentMetadata;
  sourceBytes: Uint8Array;
  warnings: DocumentWarning[];
}

export interface PDFParserOptions {
  /** 0-based page indices to mark as selected; all pages when omitted. */
  pages?: number[];
  password?: string;
  maxFormDepth?: number;
}
