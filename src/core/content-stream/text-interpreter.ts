import { PDFDict, PDFName, PDFRawStream } from 'pdf-lib';
import { lookupDict, lookupName, numberArray, lookupArray, refKey, streamBytes } from '../pdf-objects.js';
import { parseOperations, numberOperand, nameOperand } from './lexer.js';
import { IDENTITY, multiply, toMatrix, translate } from './matrix.js';
import type { FontRegistry } from '../../fonts/font-registry.js';
import type { PdfFont } from '../../fonts/pdf-font.js';
import type { ContentOp, Matrix, Operand, RGBColor, TextShowInfo } from '../../types/pdf.js';

export interface PositionedGlyph {
  sequence: number;
  unicode: string;
  unmapped: boolean;
  font: PdfFont;
  /** Effective size in user space. */
  fontSize: number;
  /** Baseline origin in user space. */
  x: number;
  y: number;
  /** Glyph width without spacing, in user space. */
  width: number;
  /** Distance to the next glyph origin, in user space. */
  advance: number;
  rotation: number;
  color: RGBColor;
  invisible: boolean;
  /** Index of the page-level operator that drew it; -1 inside form XObjects. */
  opIndex: number;
}

export interface InterpretResult {
  glyphs: PositionedGlyph[];
  shows: Map<number, TextShowInfo>;
}

interface GraphicsState {
  ctm: Matrix;
  fill: RGBColor;
  charSpacing: number;
  wordSpacing: number;
  horizontalScale: number;
  leading: number;
  font: PdfFont | null;
  fontResource: string | undefined;
  fontSize: number;
  renderMode: number;
  rise: number;
}

const BLACK: RGBColor = { r: 0, g: 0, b: 0 };

function initialState(): GraphicsState {
  return {
    ctm: IDENTITY,
    fill: BLACK,
    charSpacing: 0,
    wordSpacing: 0,
    horizontalScale: 1,
    leading: 0,
    font: null,
    fontResource: undefined,
    fontSize: 0,
    renderMode: 0,
    rise: 0
  };
}

function cmykToRgb(c: number, m: number, y: number, k: number): RGBColor {
  return { r: (1 - c) * (1 - k), g: (1 - m) * (1 - k), b: (1 - y) * (1 - k) };
}

function colorFromComponents(values: number[]): RGBColor | undefined {
  if (values.length === 1) return { r: values[0], g: values[0], b: values[0] };
  if (values.length === 3) return { r: values[0], g: values[1], b: values[2] };
  if (values.length === 4) return cmykToRgb(values[0], values[1], values[2], values[3]);
  return undefined;
}

function numbers(operands: Operand[]): number[] {
  return operands.flatMap((operand) => (operand.type === 'number' ? [operand.value] : []));
}

/**
 * Walks a page's operators, tracking graphics and text state, and emits
 * every shown glyph positioned in user space. Form XObjects are followed
 * up to `maxFormDepth` levels.
 */
export class TextInterpreter {
  private glyphs: PositionedGlyph[] = [];
  private shows = new Map<number, TextShowInfo>();
  private state: GraphicsState = initialState();
  private stack: GraphicsState[] = [];
  private textMatrix: Matrix = IDENTITY;
  private lineMatrix: Matrix = IDENTITY;
  private sequence = 0;

  constructor(
    private readonly fonts: FontRegistry,
    private readonly options: { maxFormDepth: number; scope: string }
  ) {}

  run(ops: ContentOp[], resources: PDFDict | undefined): InterpretResult {
    this.glyphs = [];
    this.shows = new Map();
    this.stack = [];
    this.sequence = 0;
    this.state = initialState();
    this.textMatrix = IDENTITY;
    this.lineMatrix = IDENTITY;

    this.execute(ops, resources, 0, new Set());
    return { glyphs: this.glyphs, shows: this.shows };
  }

  private execute(ops: ContentOp[], resources: PDFDict | undefined, depth: number, activeForms: Set<string>): void {
    ops.forEach((op, index) => {
      this.step(op, depth === 0 ? index : -1, resources, depth, activeForms);
    });
  }

  private step(op: ContentOp, opIndex: number, resources: PDFDict | undefined, depth: number, activeForms: Set<string>): void {
    const operands = op.operands;
    const state = this.state;

    switch (op.operator) {
      case 'q':
        this.stack.push({ ...state });
        break;
      case 'Q':
        this.state = this.stack.pop() ?? state;
        break;
      case 'cm':
        state.ctm = multiply(toMatrix(numbers(operands)), state.ctm);
        break;

      case 'BT':
        this.textMatrix = IDENTITY;
        this.lineMatrix = IDENTITY;
        break;
      case 'ET':
        break;
      case 'Tf': {
        const name = nameOperand(operands[0]);
        state.font = name !== undefined ? this.fonts.resolve(resources, name, this.options.scope) : null;
        state.fontResource = name;
        state.fontSize = numberOperand(operands[1]);
        break;
      }
      case 'Tc':
        state.charSpacing = numberOperand(operands[0]);
        break;
      case 'Tw':
        state.wordSpacing = numberOperand(operands[0]);
        break;
      case 'Tz':
        state.horizontalScale = numberOperand(operands[0], 100) / 100;
        break;
      case 'TL':
        state.leading = numberOperand(operands[0]);
        break;
      case 'Ts':
        state.rise = numberOperand(operands[0]);
        break;
      case 'Tr':
        state.renderMode = numberOperand(operands[0]);
        break;
      case 'Td':
        this.moveLine(numberOperand(operands[0]), numberOperand(operands[1]));
        break;
      case 'TD':
        state.leading = -numberOperand(operands[1]);
        this.moveLine(numberOperand(operands[0]), numberOperand(operands[1]));
        break;
      case 'Tm':
        this.textMatrix = toMatrix(numbers(operands));
        this.lineMatrix = this.textMatrix;
        break;
      case 'T*':
        this.moveLine(0, -state.leading);
        break;

      case 'Tj':
        this.beginShow(opIndex);
        if (operands[0]?.type === 'string') this.show(operands[0].value, opIndex);
        break;
      case 'TJ':
        this.beginShow(opIndex);
        if (operands[0]?.type === 'array') {
          for (const item of operands[0].value) {
            if (item.type === 'string') {
              this.show(item.value, opIndex);
            } else if (item.type === 'number') {
              this.adjust(item.value, opIndex);
            }
          }
        }
        break;
      case "'":
        this.moveLine(0, -state.leading);
        this.beginShow(opIndex);
        if (operands[0]?.type === 'string') this.show(operands[0].value, opIndex);
        break;
      case '"':
        state.wordSpacing = numberOperand(operands[0]);
        state.charSpacing = numberOperand(operands[1]);
        this.moveLine(0, -state.leading);
        this.beginShow(opIndex);
        if (operands[2]?.type === 'string') this.show(operands[2].value, opIndex);
        break;

      case 'g':
      case 'rg':
      case 'k':
      case 'sc':
      case 'scn':
        state.fill = colorFromComponents(numbers(operands)) ?? state.fill;
        break;
      case 'cs':
        state.fill = BLACK;
        break;

      case 'Do':
        if (depth < this.options.maxFormDepth) {
          const name = nameOperand(operands[0]);
          if (name !== undefined) this.drawForm(name, resources, depth, activeForms);
        }
        break;
    }
  }

  private moveLine(tx: number, ty: number): void {
    this.lineMatrix = translate(this.lineMatrix, tx, ty);
    this.textMatrix = this.lineMatrix;
  }

  private beginShow(opIndex: number): void {
    if (opIndex < 0) return;
    const state = this.state;
    this.shows.set(opIndex, {
      opIndex,
      advance: 0,
      fontSize: state.fontSize,
      horizontalScale: state.horizontalScale,
      glyphCount: 0,
      wordSpacing: state.wordSpacing,
      charSpacing: state.charSpacing,
      rise: state.rise,
      fontResource: state.fontResource,
      matrix: multiply(this.textMatrix, state.ctm)
    });
  }

  private adjust(amount: number, opIndex: number): void {
    const state = this.state;
    const tx = (-amount / 1000) * state.fontSize * state.horizontalScale;
    this.textMatrix = translate(this.textMatrix, tx, 0);
    const info = this.shows.get(opIndex);
    if (info) info.advance += tx;
  }

  private show(bytes: Uint8Array, opIndex: number): void {
    const state = this.state;
    const font = state.font;
    if (!font) return;

    const info = opIndex >= 0 ? this.shows.get(opIndex) : undefined;
    const th = state.horizontalScale;
    const fs = state.fontSize;

    for (const glyph of font.decode(bytes)) {
      const textToUser = multiply(this.textMatrix, state.ctm);
      const trm = multiply([fs * th, 0, 0, fs, 0, state.rise], textToUser);
      const tx = (glyph.width * fs + state.charSpacing + (glyph.isWordSpace ? state.wordSpacing : 0)) * th;
      const userScale = Math.hypot(textToUser[0], textToUser[1]);

      this.glyphs.push({
        sequence: this.sequence++,
        unicode: glyph.unicode,
        unmapped: glyph.unmapped,
        font,
        fontSize: Math.hypot(trm[2], trm[3]),
        x: trm[4],
        y: trm[5],
        width: glyph.width * Math.hypot(trm[0], trm[1]),
        advance: tx * userScale,
        rotation: Math.atan2(trm[1], trm[0]),
        color: state.fill,
        invisible: state.renderMode === 3 || state.renderMode === 7,
        opIndex
      });

      this.textMatrix = translate(this.textMatrix, tx, 0);
      if (info) {
        info.advance += tx;
        info.glyphCount++;
      }
    }
  }

  private drawForm(name: string, resources: PDFDict | undefined, depth: number, activeForms: Set<string>): void {
    const xobjects = resources ? lookupDict(resources, 'XObject') : undefined;
    if (!xobjects) return;
    const raw = xobjects.get(PDFName.of(name));
    const stream = xobjects.lookup(PDFName.of(name));
    if (!(stream instanceof PDFRawStream) || lookupName(stream.dict, 'Subtype') !== 'Form') return;

    const key = refKey(raw) ?? `${depth}/${name}`;
    if (activeForms.has(key)) return;

    let bytes: Uint8Array | undefined;
    try {
      bytes = streamBytes(stream);
    } catch (error) {
      console.warn(`Failed to decode form XObject ${name}:`, error);
      return;
    }
    if (!bytes) return;

    const saved = this.state;
    const savedStack = this.stack;
    const savedText = this.textMatrix;
    const savedLine = this.lineMatrix;
    this.state = { ...saved };
    this.stack = [];

    const formMatrix = numberArray(lookupArray(stream.dict, 'Matrix'));
    if (formMatrix.length === 6) {
      this.state.ctm = multiply(toMatrix(formMatrix), this.state.ctm);
    }

    activeForms.add(key);
    this.execute(parseOperations(bytes), lookupDict(stream.dict, 'Resources') ?? resources, depth + 1, activeForms);
    activeForms.delete(key);

    this.state = saved;
    this.stack = savedStack;
    this.textMatrix = savedText;
    this.lineMatrix = savedLine;
  }
}
