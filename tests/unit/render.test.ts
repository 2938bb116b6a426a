import { describe, it, expect } from 'vitest';
import { parseOperations } from '../../src/core/content-stream/lexer.js';
import { PDFParser } from '../../src/core/pdf-parser.js';
import { pageRuns } from '../../src/core/document-utils.js';
import { filterContent, spacerFor } from '../../src/render/content-filter.js';
import { formulaAdvance, formulaContent } from '../../src/render/formula-replay.js';
import {
  insertFormulaMarkers,
  layoutText,
  lineHeightFor,
  measureWithFormulas,
  sanitizeText,
  splitFormulaMarkers,
  wrapText,
  type TypesetInput
} from '../../src/render/typesetter.js';
import type { PageContent, TextShowInfo } from '../../src/types/pdf.js';
import { helloWorldPdf, textRun } from '../helpers/fixtures.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function show(fields: Partial<TextShowInfo> = {}): TextShowInfo {
  return {
    opIndex: 2,
    advance: 55,
    fontSize: 10,
    horizontalScale: 1,
    glyphCount: 11,
    wordSpacing: 0,
    charSpacing: 0,
    rise: 0,
    fontResource: 'F1',
    matrix: [1, 0, 0, 1, 72, 700],
    ...fields
  };
}

/** `BT /F1 10 Tf (Hello world) Tj ET`; the Tj is operator 2. */
function helloContent(): PageContent {
  const bytes = encoder.encode('BT /F1 10 Tf (Hello world) Tj ET');
  return { bytes, ops: parseOperations(bytes), shows: new Map([[2, show()]]) };
}

describe('spacerFor', () => {
  it('should move the pen by the shown advance', () => {
    expect(spacerFor('Tj', show())).toBe('[-5500] TJ');
    expect(spacerFor('TJ', show({ horizontalScale: 0.5 }))).toBe('[-11000] TJ');
    expect(spacerFor('Tj', show({ fontSize: 0 }))).toBe('[0] TJ');
  });

  it('should keep the line advance of quote operators', () => {
    expect(spacerFor("'", show())).toBe('T* [-5500] TJ');
    expect(spacerFor('"', show({ wordSpacing: 2, charSpacing: 0.5 }))).toBe('2 Tw 0.5 Tc T* [-5500] TJ');
  });
});

describe('filterContent', () => {
  it('should replace an operator owned by one run', () => {
    const run = textRun({ text: 'Hello world', opGlyphs: [{ opIndex: 2, glyphs: 11 }] });

    const result = filterContent(helloContent(), [run]);

    expect(decoder.decode(result.bytes)).toBe('BT /F1 10 Tf [-5500] TJ ET');
    expect(result.replaced).toBe(1);
    expect(result.covered).toEqual([]);
  });

  it('should replace an operator shared by two translated runs', () => {
    const first = textRun({ text: 'Hello', id: 'p1-t1', opGlyphs: [{ opIndex: 2, glyphs: 5 }] });
    const second = textRun({ text: ' world', id: 'p1-t2', opGlyphs: [{ opIndex: 2, glyphs: 6 }] });

    expect(filterContent(helloContent(), [first, second]).replaced).toBe(1);
  });

  it('should cover runs that share an operator with kept text', () => {
    const partial = textRun({ text: 'Hello', opGlyphs: [{ opIndex: 2, glyphs: 5 }] });
    const content = helloContent();

    const result = filterContent(content, [partial]);

    expect(result.bytes).toEqual(content.bytes);
    expect(result.replaced).toBe(0);
    expect(result.covered).toEqual([partial]);
  });

  it('should cover runs drawn inside form XObjects', () => {
    const nested = textRun({ text: 'Hello world', excisable: false });

    expect(filterContent(helloContent(), [nested]).covered).toEqual([nested]);
  });

  it('should keep every other byte of a real page', async () => {
    const page = (await new PDFParser().parse(await helloWorldPdf())).pages[0];
    const [hello] = pageRuns(page);
    const op = page.content.ops[hello.opGlyphs[0].opIndex];
    const source = decoder.decode(page.content.bytes);

    const result = filterContent(page.content, [hello]);

    expect(decoder.decode(result.bytes)).toBe(`${source.slice(0, op.start)}[-4945] TJ${source.slice(op.end)}`);
  });
});

describe('lineHeightFor', () => {
  it('should look up the language, then its base language', () => {
    expect(lineHeightFor('ko')).toBe(1.4);
    expect(lineHeightFor('en')).toBe(1.2);
    expect(lineHeightFor('zh-TW')).toBe(1.1);
    expect(lineHeightFor('fr')).toBe(1.1);
  });
});

describe('sanitizeText', () => {
  const ascii = (char: string) => (char.codePointAt(0) ?? 0) < 0x80;

  it('should decompose accents and replace what is left', () => {
    expect(sanitizeText('caf\u00e9\tna\u00efve \u2713', ascii)).toEqual({
      text: 'cafe naive ?',
      replaced: ['\u00e9', '\u00ef', '\u2713']
    });
  });

  it('should leave encodable text alone', () => {
    expect(sanitizeText('plain text', ascii)).toEqual({ text: 'plain text', replaced: [] });
  });
});

describe('wrapText', () => {
  const length = (text: string) => text.length;

  it('should break greedily at spaces', () => {
    expect(wrapText('aa bb cc', [5], length, false)).toEqual(['aa bb', 'cc']);
  });

  it('should use a narrower first line', () => {
    expect(wrapText('aa bb cc', [2, 8], length, false)).toEqual(['aa', 'bb cc']);
  });

  it('should split words longer than a line', () => {
    expect(wrapText('abcdefgh', [3], length, false)).toEqual(['abc', 'def', 'gh']);
  });

  it('should break between CJK characters only when asked', () => {
    const text = 'ab 一二三';

    expect(wrapText(text, [4], length, true)).toEqual(['ab 一', '二三']);
    expect(wrapText(text, [4], length, false)).toEqual(['ab', '一二三']);
  });
});

describe('layoutText', () => {
  const halfEm = (text: string, size: number) => text.length * size * 0.5;

  function input(fields: Partial<TypesetInput> = {}): TypesetInput {
    return {
      text: 'aaaa bbbb cccc',
      box: { x0: 72, y0: 670, x1: 112, y1: 712 },
      origin: { x: 72, y: 700 },
      fontSize: 10,
      descent: 0.2,
      lineHeight: 1.2,
      overflow: 'shrink',
      minFontScale: 0.7,
      breakAnywhere: false,
      ...fields
    };
  }

  it('should keep the original size when the text fits', () => {
    expect(layoutText(input(), halfEm)).toEqual({
      lines: [
        { text: 'aaaa', x: 72, y: 700 },
        { text: 'bbbb', x: 72, y: 688 },
        { text: 'cccc', x: 72, y: 676 }
      ],
      fontSize: 10,
      lineHeight: 1.2,
      overflow: false
    });
  });

  it('should tighten the leading, then shrink the size', () => {
    const result = layoutText(input({ box: { x0: 72, y0: 680, x1: 112, y1: 712 } }), halfEm);

    expect(result.overflow).toBe(false);
    expect(result.lineHeight).toBe(1);
    expect(result.fontSize).toBeCloseTo(9, 9);
    expect(result.lines.map((line) => line.y)).toEqual([700, 691, 682]);
  });

  it('should report overflow when shrinking is off', () => {
    const result = layoutText(input({ box: { x0: 72, y0: 680, x1: 112, y1: 712 }, overflow: 'overflow' }), halfEm);

    expect(result).toMatchObject({ fontSize: 10, lineHeight: 1.2, overflow: true });
  });

  it('should stop at the minimum scale', () => {
    const result = layoutText(input({ box: { x0: 72, y0: 690, x1: 112, y1: 712 }, minFontScale: 0.95 }), halfEm);

    expect(result.overflow).toBe(true);
    expect(result.fontSize).toBeCloseTo(9.5, 9);
    expect(result.lines).toHaveLength(3);
  });
});

describe('formula markers', () => {
  it('should swap placeholders for markers, forgiving spacing and case', () => {
    expect(insertFormulaMarkers('Soit {v0} le travail { V1 }.', 2)).toEqual({
      text: 'Soit \uE000 le travail \uE001.',
      missing: []
    });
  });

  it('should drop repeated or unknown placeholders and append lost ones', () => {
    expect(insertFormulaMarkers('Soit le travail {v0} {v0} {v7}', 2)).toEqual({
      text: 'Soit le travail \uE000 \uE001',
      missing: [1]
    });
  });

  it('should split a line at its markers', () => {
    expect(splitFormulaMarkers('a \uE001b')).toEqual([
      { kind: 'text', text: 'a ' },
      { kind: 'formula', index: 1 },
      { kind: 'text', text: 'b' }
    ]);
    expect(splitFormulaMarkers('plain')).toEqual([{ kind: 'text', text: 'plain' }]);
  });

  it('should scale formula widths with the text size', () => {
    const measure = measureWithFormulas((text, size) => text.length * size * 0.5, [8], 10);

    expect(measure('ab \uE000', 20)).toBe(46);
  });
});

describe('formulaContent', () => {
  it('should redraw the original operator at the new place and scale', () => {
    const bytes = encoder.encode('BT /F2 10 Tf 1 0 0 1 175 700 Tm (E) Tj ET');
    const content: PageContent = {
      bytes,
      ops: parseOperations(bytes),
      shows: new Map([[3, show({ opIndex: 3, glyphCount: 1, fontResource: 'F2', matrix: [1, 0, 0, 1, 175, 700] })]])
    };
    const run = textRun({ text: 'E', origin: { x: 175, y: 700 }, color: { r: 1, g: 0, b: 0 }, opGlyphs: [{ opIndex: 3, glyphs: 1 }] });
    const formula = { run, baselineOffset: 2 };

    const result = formulaContent(content, [{ formula, x: 100, y: 650, scale: 0.5 }]);

    expect(decoder.decode(result)).toBe(
      'q 1 0 0 rg\n' +
        'q 0.5 0 0 0.5 100 651 cm BT /F2 10 Tf 0 Tc 0 Tw 100 Tz 0 Ts 0 TL 0 Tr\n' +
        '(E) Tj\n' +
        'ET Q\n' +
        'Q\n'
    );
    expect(formulaAdvance(formula)).toBe(5);
  });
});
