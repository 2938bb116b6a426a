import { describe, it, expect } from 'vitest';
import { ContentLexer, parseOperations } from '../../src/core/content-stream/lexer.js';
import { applyToPoint, multiply, transformBBox, translate } from '../../src/core/content-stream/matrix.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function ops(source: string) {
  return parseOperations(encoder.encode(source));
}

describe('ContentLexer', () => {
  it('should tokenize numbers, names and keywords', () => {
    const lexer = new ContentLexer(encoder.encode('-.5 +3 1. /F#201 Tf'));
    const tokens = [lexer.nextToken(), lexer.nextToken(), lexer.nextToken(), lexer.nextToken(), lexer.nextToken()];

    expect(tokens.map((token) => ('value' in token ? token.value : token.type))).toEqual([-0.5, 3, 1, 'F 1', 'Tf']);
    expect(lexer.nextToken().type).toBe('eof');
  });

  it('should skip comments', () => {
    expect(ops('% a comment\nBT ET').map((op) => op.operator)).toEqual(['BT', 'ET']);
  });
});

describe('parseOperations', () => {
  it('should group operands with their operator and keep byte ranges', () => {
    const source = 'BT /F1 12 Tf 72 700 Td (Hello) Tj ET';
    const result = ops(source);

    expect(result.map((op) => op.operator)).toEqual(['BT', 'Tf', 'Td', 'Tj', 'ET']);
    expect(result[1].operands).toEqual([
      { type: 'name', value: 'F1' },
      { type: 'number', value: 12 }
    ]);
    expect(result[1].start).toBe(3);
    expect(result[1].end).toBe(12);
    expect(result.map((op) => source.slice(op.start, op.end))).toEqual([
      'BT',
      '/F1 12 Tf',
      '72 700 Td',
      '(Hello) Tj',
      'ET'
    ]);
  });

  it('should decode literal string escapes', () => {
    const [show] = ops('(a\\(b\\) \\101\\102 (nested)) Tj');
    const operand = show.operands[0];

    expect(operand.type).toBe('string');
    if (operand.type !== 'string') return;
    expect(decoder.decode(operand.value)).toBe('a(b) AB (nested)');
  });

  it('should decode hex strings and pad an odd digit', () => {
    const [show] = ops('<48656C 6C6F> Tj <414> Tj');
    const [, odd] = ops('<48656C 6C6F> Tj <414> Tj');

    expect(show.operands[0]).toEqual({ type: 'string', value: encoder.encode('Hello') });
    expect(odd.operands[0]).toEqual({ type: 'string', value: Uint8Array.from([0x41, 0x40]) });
  });

  it('should nest arrays and dictionaries', () => {
    const [tj, bdc] = ops('[(A) -250 (B)] TJ /Span <</ActualText (x) /MCID 3>> BDC');

    expect(tj.operands).toHaveLength(1);
    const array = tj.operands[0];
    expect(array.type).toBe('array');
    if (array.type !== 'array') return;
    expect(array.value.map((item) => item.type)).toEqual(['string', 'number', 'string']);

    expect(bdc.operator).toBe('BDC');
    const dict = bdc.operands[1];
    expect(dict.type).toBe('dict');
    if (dict.type !== 'dict') return;
    expect(dict.value.get('MCID')).toEqual({ type: 'number', value: 3 });
  });

  it('should skip inline image data as one operator', () => {
    const result = ops('q BI /W 2 /H 1 /BPC 8 ID ab EI Q');

    expect(result.map((op) => op.operator)).toEqual(['q', 'BI', 'Q']);
    const dict = result[1].operands[0];
    expect(dict.type).toBe('dict');
    if (dict.type !== 'dict') return;
    expect(dict.value.get('W')).toEqual({ type: 'number', value: 2 });
  });

  it('should read booleans and null', () => {
    const [op] = ops('true false null foo');
    expect(op.operator).toBe('foo');
    expect(op.operands).toEqual([{ type: 'bool', value: true }, { type: 'bool', value: false }, { type: 'null' }]);
  });
});

describe('matrix helpers', () => {
  it('should apply the first matrix before the second', () => {
    const scale = multiply([2, 0, 0, 2, 0, 0], [1, 0, 0, 1, 10, 20]);
    expect(applyToPoint(scale, 1, 1)).toEqual({ x: 12, y: 22 });
  });

  it('should translate in the local frame', () => {
    expect(translate([2, 0, 0, 2, 5, 5], 3, 0)).toEqual([2, 0, 0, 2, 11, 5]);
  });

  it('should bound a transformed box', () => {
    const rotated = transformBBox([0, 1, -1, 0, 0, 0], { x0: 0, y0: 0, x1: 10, y1: 5 });
    expect(rotated).toEqual({ x0: -5, y0: 0, x1: 0, y1: 10 });
  });
});
