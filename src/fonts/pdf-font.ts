import { PDFArray, PDFDict, PDFName, PDFNumber, PDFRawStream } from 'pdf-lib';
import { Font, FontNames } from '@pdf-lib/standard-fonts';
import { arrayItems, lookup, lookupArray, lookupDict, lookupName, lookupNumber, numberArray, streamBytes } from '../core/pdf-objects.js';
import { parseCMap, splitCodes, type CodespaceRange } from './cmap-parser.js';
import { getBaseEncoding, glyphNameToUnicode, isBaseEncodingName, unicodeToGlyphName, type BaseEncodingName, type DecodeTable } from './encodings.js';
import { deriveFontTraits, normalizeFontName, type FontTraits } from './font-name-normalizer.js';
import type { SourceFont } from '../types/fonts.js';

export const REPLACEMENT_CHARACTER = '\uFFFD';

export interface DecodedGlyph {
  code: number;
  byteLength: number;
  unicode: string;
  unmapped: boolean;
  /** Horizontal advance in text space units for a font size of 1. */
  width: number;
  /** Single-byte code 32, the only code word spacing applies to. */
  isWordSpace: boolean;
}

interface GlyphInfo {
  unicode: string;
  unmapped: boolean;
  width: number;
}

const IDENTITY_CODESPACE: CodespaceRange[] = [{ bytes: 2, low: 0, high: 0xffff }];
const SINGLE_BYTE_CODESPACE: CodespaceRange[] = [{ bytes: 1, low: 0, high: 0xff }];

const standardMetrics = new Map<FontNames, Font>();

function loadStandardFont(name: FontNames): Font {
  let font = standardMetrics.get(name);
  if (!font) {
    font = Font.load(name);
    standardMetrics.set(name, font);
  }
  return font;
}

/**
 * Maps a BaseFont to one of the standard 14 fonts when it is one of them
 * or a common alias (Arial, Times New Roman, Courier New).
 */
export function standardFontFor(fontName: string): FontNames | undefined {
  const { baseName, bold, italic } = normalizeFontName(fontName);
  const key = baseName.toLowerCase().replace(/[^a-z]/g, '');

  let candidate: string | undefined;
  if (key.startsWith('helvetica') || key.startsWith('arial')) {
    candidate = 'Helvetica' + (bold && italic ? '-BoldOblique' : bold ? '-Bold' : italic ? '-Oblique' : '');
  } else if (key.startsWith('times')) {
    candidate = bold && italic ? 'Times-BoldItalic' : bold ? 'Times-Bold' : italic ? 'Times-Italic' : 'Times-Roman';
  } else if (key.startsWith('courier')) {
    candidate = 'Courier' + (bold && italic ? '-BoldOblique' : bold ? '-Bold' : italic ? '-Oblique' : '');
  } else if (key.startsWith('symbol')) {
    candidate = 'Symbol';
  } else if (key.startsWith('zapfdingbats')) {
    candidate = 'ZapfDingbats';
  }

  return Object.values(FontNames).find((name) => name === candidate);
}

function sanitizeMetric(value: number | void | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value !== 0 ? value : fallback;
}

/**
 * Decoder for one font resource: splits shown strings into character
 * codes, maps them to Unicode and reports their advance widths.
 */
export class PdfFont {
  readonly id: string;
  readonly name: string;
  readonly subtype: string;
  readonly composite: boolean;
  readonly vertical: boolean;
  readonly ascent: number;
  readonly descent: number;
  readonly traits: FontTraits;

  private readonly codespaces: CodespaceRange[];
  private readonly toUnicode: Map<number, string>;
  private readonly glyphCache = new Map<number, GlyphInfo>();
  private readonly resolveGlyph: (code: number) => GlyphInfo;

  constructor(id: string, dict: PDFDict) {
    this.id = id;
    this.subtype = lookupName(dict, 'Subtype') ?? 'Type1';
    this.name = lookupName(dict, 'BaseFont') ?? lookupName(dict, 'Name') ?? id;
    this.composite = this.subtype === 'Type0';
    this.toUnicode = PdfFont.readToUnicode(dict);

    const descendant = this.composite ? PdfFont.descendantOf(dict) : undefined;
    const descriptor = lookupDict(descendant ?? dict, 'FontDescriptor');
    const standard = this.composite ? undefined : standardFontFor(this.name);
    const afm = standard ? loadStandardFont(standard) : undefined;

    this.traits = deriveFontTraits({ name: this.name, flags: descriptor ? lookupNumber(descriptor, 'Flags') : undefined });

    const ascent = descriptor ? lookupNumber(descriptor, 'Ascent') : undefined;
    const descent = descriptor ? lookupNumber(descriptor, 'Descent') : undefined;
    this.ascent = sanitizeMetric(ascent ?? afm?.Ascender, 800) / 1000;
    this.descent = -Math.abs(sanitizeMetric(descent ?? afm?.Descender, -200)) / 1000;

    if (this.composite && descendant) {
      const composite = this.setupComposite(dict, descendant);
      this.codespaces = composite.codespaces;
      this.vertical = composite.vertical;
      this.resolveGlyph = composite.resolve;
    } else {
      this.codespaces = SINGLE_BYTE_CODESPACE;
      this.vertical = false;
      this.resolveGlyph = this.setupSimple(dict, descriptor, standard, afm);
    }
  }

  decode(bytes: Uint8Array): DecodedGlyph[] {
    return splitCodes(bytes, this.codespaces).map(({ code, length }) => {
      let info = this.glyphCache.get(code);
      if (!info) {
        info = this.resolveGlyph(code);
        this.glyphCache.set(code, info);
      }
      return {
        code,
        byteLength: length,
        unicode: info.unicode,
        unmapped: info.unmapped,
        width: info.width,
        isWordSpace: length === 1 && code === 32
      };
    });
  }

  toSourceFont(): SourceFont {
    return {
      id: this.id,
      name: this.name,
      baseName: normalizeFontName(this.name).baseName,
      subtype: this.subtype,
      serif: this.traits.serif,
      fixedPitch: this.traits.fixedPitch,
      italic: this.traits.italic,
      bold: this.traits.bold,
      ascent: this.ascent,
      descent: this.descent
    };
  }

  private static readToUnicode(dict: PDFDict): Map<number, string> {
    const stream = lookup(dict, 'ToUnicode');
    if (!(stream instanceof PDFRawStream)) return new Map();
    try {
      const bytes = streamBytes(stream);
      return bytes ? parseCMap(bytes).unicode : new Map();
    } catch (error) {
      console.warn('Failed to read ToUnicode CMap, falling back to encoding tables:', error);
      return new Map();
    }
  }

  private static descendantOf(dict: PDFDict): PDFDict | undefined {
    const descendants = lookupArray(dict, 'DescendantFonts');
    const first = descendants && descendants.size() > 0 ? descendants.lookup(0) : undefined;
    return first instanceof PDFDict ? first : undefined;
  }

  private setupComposite(
    dict: PDFDict,
    descendant: PDFDict
  ): { codespaces: CodespaceRange[]; vertical: boolean; resolve: (code: number) => GlyphInfo } {
    const encoding = lookup(dict, 'Encoding');
    let codespaces = IDENTITY_CODESPACE;
    let vertical = false;
    let cids: Map<number, number> | undefined;
    let codesAreUnicode = false;

    if (encoding instanceof PDFName) {
      const name = encoding.decodeText();
      vertical = name.endsWith('-V');
      codesAreUnicode = /UCS2|UTF16/.test(name);
    } else if (encoding instanceof PDFRawStream) {
      const bytes = streamBytes(encoding);
      if (bytes) {
        const cmap = parseCMap(bytes);
        if (cmap.codespaces.length > 0) codespaces = cmap.codespaces;
        vertical = cmap.vertical || (cmap.useCMap?.endsWith('-V') ?? false);
        cids = cmap.cids.size > 0 ? cmap.cids : undefined;
      }
    }

    const widths = PdfFont.readCidWidths(descendant);
    const defaultWidth = lookupNumber(descendant, 'DW') ?? 1000;

    return {
      codespaces,
      vertical,
      resolve: (code) => {
        const cid = cids?.get(code) ?? code;
        const width = (widths.get(cid) ?? defaultWidth) / 1000;
        const mapped = this.toUnicode.get(code);
        if (mapped !== undefined) return { unicode: mapped, unmapped: false, width };
        if (codesAreUnicode) return { unicode: String.fromCharCode(code), unmapped: false, width };
        return { unicode: REPLACEMENT_CHARACTER, unmapped: true, width };
      }
    };
  }

  private static readCidWidths(descendant: PDFDict): Map<number, number> {
    const widths = new Map<number, number>();
    const w = lookupArray(descendant, 'W');
    if (!w) return widths;

    const items = arrayItems(w);
    let i = 0;
    while (i < items.length) {
      const first = items[i];
      const second = items[i + 1];
      if (!(first instanceof PDFNumber)) {
        i++;
        continue;
      }
      if (second instanceof PDFArray) {
        numberArray(second).forEach((width, offset) => widths.set(first.asNumber() + offset, width));
        i += 2;
      } else if (second instanceof PDFNumber && items[i + 2] instanceof PDFNumber) {
        const last = second.asNumber();
        const width = numberAt(items, i + 2);
        for (let cid = first.asNumber(); cid <= last && cid - first.asNumber() < 0x10000; cid++) {
          widths.set(cid, width);
        }
        i += 3;
      } else {
        i++;
      }
    }
    return widths;
  }

  private setupSimple(
    dict: PDFDict,
    descriptor: PDFDict | undefined,
    standard: FontNames | undefined,
    afm: Font | undefined
  ): (code: number) => GlyphInfo {
    const { table, differences } = PdfFont.readSimpleEncoding(dict, standard);
    const firstChar = lookupNumber(dict, 'FirstChar') ?? 0;
    const widthsArray = lookupArray(dict, 'Widths');
    const widths = widthsArray ? numberArray(widthsArray) : undefined;
    const missingWidth = descriptor ? lookupNumber(descriptor, 'MissingWidth') : undefined;

    // Type3 glyph space is defined by FontMatrix rather than 1/1000 units
    const fontMatrix = numberArray(lookupArray(dict, 'FontMatrix'));
    const scale = this.subtype === 'Type3' && fontMatrix.length === 6 ? fontMatrix[0] : 0.001;

    return (code) => {
      const glyphName = differences.get(code);
      let unicode = this.toUnicode.get(code);
      let unmapped = false;

      if (unicode === undefined) {
        if (glyphName !== undefined) {
          unicode = glyphNameToUnicode(glyphName);
        } else {
          unicode = table.get(code);
          if (unicode === undefined && code >= 0x20 && code < 0x7f) {
            unicode = String.fromCharCode(code);
          }
        }
      }
      if (unicode === undefined) {
        unicode = REPLACEMENT_CHARACTER;
        unmapped = true;
      }

      let width: number | undefined;
      if (widths) {
        width = widths[code - firstChar] ?? missingWidth ?? 0;
      } else if (afm) {
        const name = glyphName ?? (unmapped ? undefined : unicodeToGlyphName(unicode.codePointAt(0) ?? 0));
        width = (name !== undefined ? afm.getWidthOfGlyph(name) : undefined) ?? missingWidth ?? 500;
      } else {
        width = missingWidth ?? 500;
      }

      return { unicode, unmapped, width: width * scale };
    };
  }

  private static readSimpleEncoding(
    dict: PDFDict,
    standard: FontNames | undefined
  ): { table: DecodeTable; differences: Map<number, string> } {
    let baseName: BaseEncodingName =
      standard === FontNames.Symbol
        ? 'SymbolEncoding'
        : standard === FontNames.ZapfDingbats
          ? 'ZapfDingbatsEncoding'
          : 'StandardEncoding';
    const differences = new Map<number, string>();
    const encoding = lookup(dict, 'Encoding');

    if (encoding instanceof PDFName) {
      const name = encoding.decodeText();
      if (isBaseEncodingName(name)) baseName = name;
    } else if (encoding instanceof PDFDict) {
      const name = lookupName(encoding, 'BaseEncoding');
      if (name !== undefined && isBaseEncodingName(name)) baseName = name;

      const diffs = lookupArray(encoding, 'Differences');
      if (diffs) {
        let code = 0;
        for (const item of arrayItems(diffs)) {
          if (item instanceof PDFNumber) {
            code = item.asNumber();
          } else if (item instanceof PDFName) {
            differences.set(code, item.decodeText());
            code++;
          }
        }
      }
    }

    return { table: getBaseEncoding(baseName), differences };
  }
}

function numberAt(items: unknown[], index: number): number {
  const item = items[index];
  return item instanceof PDFNumber ? item.asNumber() : 0;
}
