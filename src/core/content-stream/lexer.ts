import type { ContentOp, Operand } from '../../types/pdf.js';

const WHITESPACE = new Set([0x00, 0x09, 0x0a, 0x0c, 0x0d, 0x20]);
const DELIMITERS = new Set([0x28, 0x29, 0x3c, 0x3e, 0x5b, 0x5d, 0x7b, 0x7d, 0x2f, 0x25]);

export type Token = { start: number; end: number } & (
  | { type: 'number'; value: number }
  | { type: 'string'; value: Uint8Array }
  | { type: 'name'; value: string }
  | { type: 'keyword'; value: string }
  | { type: 'arrayStart' | 'arrayEnd' | 'dictStart' | 'dictEnd' | 'procStart' | 'procEnd' }
  | { type: 'eof' }
);

export function isWhitespace(byte: number): boolean {
  return WHITESPACE.has(byte);
}

function isRegular(byte: number): boolean {
  return !WHITESPACE.has(byte) && !DELIMITERS.has(byte);
}

function hexValue(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x37;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x57;
  return -1;
}

/**
 * Tokenizer for PDF content streams and the PostScript subset used by CMaps.
 * Every token carries its byte range so operators can be spliced out later.
 */
export class ContentLexer {
  pos = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get length(): number {
    return this.bytes.length;
  }

  nextToken(): Token {
    this.skipWhitespaceAndComments();
    const start = this.pos;
    const bytes = this.bytes;

    if (start >= bytes.length) {
      return { type: 'eof', start, end: start };
    }

    const byte = bytes[start];
    switch (byte) {
      case 0x28: // (
        return { type: 'string', value: this.readLiteralString(), start, end: this.pos };
      case 0x3c: // <
        if (bytes[start + 1] === 0x3c) {
          this.pos += 2;
          return { type: 'dictStart', start, end: this.pos };
        }
        return { type: 'string', value: this.readHexString(), start, end: this.pos };
      case 0x3e: // >
        this.pos += bytes[start + 1] === 0x3e ? 2 : 1;
        return { type: 'dictEnd', start, end: this.pos };
      case 0x5b:
        this.pos++;
        return { type: 'arrayStart', start, end: this.pos };
      case 0x5d:
        this.pos++;
        return { type: 'arrayEnd', start, end: this.pos };
      case 0x7b:
        this.pos++;
        return { type: 'procStart', start, end: this.pos };
      case 0x7d:
        this.pos++;
        return { type: 'procEnd', start, end: this.pos };
      case 0x2f: // /
        return { type: 'name', value: this.readName(), start, end: this.pos };
      case 0x29:
        // Stray ')' is skipped
        this.pos++;
        return this.nextToken();
    }

    const word = this.readRegular();
    if (/^[+-]*(\d+\.?\d*|\.\d+)$/.test(word)) {
      const magnitude = parseFloat(word.replace(/^[+-]+/, ''));
      const value = word.startsWith('-') ? -magnitude : magnitude;
      return { type: 'number', value: Number.isFinite(value) ? value : 0, start, end: this.pos };
    }
    return { type: 'keyword', value: word, start, end: this.pos };
  }

  /**
   * Skips inline image data that follows an `ID` keyword; returns the offset just past the closing `EI`.
   */
  skipInlineImageData(): number {
    const bytes = this.bytes;
    // A single whitespace byte separates ID from the data
    if (WHITESPACE.has(bytes[this.pos])) this.pos++;

    for (let i = this.pos; i + 1 < bytes.length; i++) {
      if (
        bytes[i] === 0x45 &&
        bytes[i + 1] === 0x49 &&
        (i === 0 || WHITESPACE.has(bytes[i - 1])) &&
        (i + 2 >= bytes.length || !isRegular(bytes[i + 2]))
      ) {
        this.pos = i + 2;
        return this.pos;
      }
    }

    this.pos = bytes.length;
    return this.pos;
  }

  private skipWhitespaceAndComments(): void {
    const bytes = this.bytes;
    while (this.pos < bytes.length) {
      const byte = bytes[this.pos];
      if (WHITESPACE.has(byte)) {
        this.pos++;
      } else if (byte === 0x25) {
        while (this.pos < bytes.length && bytes[this.pos] !== 0x0a && bytes[this.pos] !== 0x0d) {
          this.pos++;
        }
      } else {
        break;
      }
    }
  }

  private readRegular(): string {
    const start = this.pos;
    while (this.pos < this.bytes.length && isRegular(this.bytes[this.pos])) {
      this.pos++;
    }
    if (this.pos === start) {
      // Unknown delimiter; consume it so the lexer always advances
      this.pos++;
    }
    return String.fromCharCode(...this.bytes.subarray(start, this.pos));
  }

  private readName(): string {
    const bytes = this.bytes;
    this.pos++;
    let name = '';
    while (this.pos < bytes.length && isRegular(bytes[this.pos])) {
      const byte = bytes[this.pos];
      if (byte === 0x23 && this.pos + 2 < bytes.length) {
        const high = hexValue(bytes[this.pos + 1]);
        const low = hexValue(bytes[this.pos + 2]);
        if (high >= 0 && low >= 0) {
          name += String.fromCharCode(high * 16 + low);
          this.pos += 3;
          continue;
        }
      }
      name += String.fromCharCode(byte);
      this.pos++;
    }
    return name;
  }

  private readLiteralString(): Uint8Array {
    const bytes = this.bytes;
    const out: number[] = [];
    let depth = 1;
    this.pos++;

    while (this.pos < bytes.length) {
      const byte = bytes[this.pos++];

      if (byte === 0x5c) {
        const next = bytes[this.pos++];
        switch (next) {
          case 0x6e: out.push(0x0a); break; // n
          case 0x72: out.push(0x0d); break; // r
          case 0x74: out.push(0x09); break; // t
          case 0x62: out.push(0x08); break; // b
          case 0x66: out.push(0x0c); break; // f
          case 0x0d:
            if (bytes[this.pos] === 0x0a) this.pos++;
            break;
          case 0x0a:
            break;
          default:
            if (next >= 0x30 && next <= 0x37) {
              let value = next - 0x30;
              for (let i = 0; i < 2 && bytes[this.pos] >= 0x30 && bytes[this.pos] <= 0x37; i++) {
                value = value * 8 + (bytes[this.pos++] - 0x30);
              }
              out.push(value & 0xff);
            } else if (next !== undefined) {
              out.push(next);
            }
        }
        continue;
      }

      if (byte === 0x28) {
        depth++;
      } else if (byte === 0x29) {
        depth--;
        if (depth === 0) break;
      }
      out.push(byte);
    }

    return Uint8Array.from(out);
  }

  private readHexString(): Uint8Array {
    const bytes = this.bytes;
    const out: number[] = [];
    let pending = -1;
    this.pos++;

    while (this.pos < bytes.length) {
      const byte = bytes[this.pos++];
      if (byte === 0x3e) break;
      const value = hexValue(byte);
      if (value < 0) continue;
      if (pending < 0) {
        pending = value;
      } else {
        out.push(pending * 16 + value);
        pending = -1;
      }
    }
    if (pending >= 0) out.push(pending * 16);

    return Uint8Array.from(out);
  }
}

/**
 * Groups tokens into operators with their operands. Operand nesting
 * (arrays, dictionaries) is resolved; procedure braces are ignored.
 */
export function parseOperations(bytes: Uint8Array): ContentOp[] {
  const lexer = new ContentLexer(bytes);
  const ops: ContentOp[] = [];
  const stack: { items: Operand[]; kind: 'root' | 'array' | 'dict' }[] = [{ items: [], kind: 'root' }];
  let opStart = -1;

  const push = (operand: Operand) => {
    stack[stack.length - 1].items.push(operand);
  };

  for (;;) {
    const token = lexer.nextToken();
    if (token.type === 'eof') break;
    if (opStart < 0) opStart = token.start;

    switch (token.type) {
      case 'number':
        push({ type: 'number', value: token.value });
        break;
      case 'string':
        push({ type: 'string', value: token.value });
        break;
      case 'name':
        push({ type: 'name', value: token.value });
        break;
      case 'arrayStart':
        stack.push({ items: [], kind: 'array' });
        break;
      case 'dictStart':
        stack.push({ items: [], kind: 'dict' });
        break;
      case 'arrayEnd':
      case 'dictEnd': {
        if (stack.length === 1) break;
        const frame = stack.pop();
        if (!frame) break;
        push(frame.kind === 'dict' ? { type: 'dict', value: toDict(frame.items) } : { type: 'array', value: frame.items });
        break;
      }
      case 'procStart':
      case 'procEnd':
        break;
      case 'keyword': {
        const word = token.value;
        if (word === 'true' || word === 'false') {
          push({ type: 'bool', value: word === 'true' });
          break;
        }
        if (word === 'null') {
          push({ type: 'null' });
          break;
        }
        if (stack.length > 1) {
          // Keywords inside arrays are malformed; keep them as names so the array survives
          push({ type: 'name', value: word });
          break;
        }

        const root = stack[0];
        if (word === 'BI') {
          const operands = readInlineImage(lexer);
          ops.push({ operator: 'BI', operands, start: opStart, end: lexer.pos });
        } else {
          ops.push({ operator: word, operands: root.items, start: opStart, end: token.end });
        }
        root.items = [];
        opStart = -1;
        break;
      }
    }
  }

  return ops;
}

function readInlineImage(lexer: ContentLexer): Operand[] {
  const items: Operand[] = [];
  for (;;) {
    const token = lexer.nextToken();
    if (token.type === 'eof') break;
    if (token.type === 'keyword' && token.value === 'ID') {
      lexer.skipInlineImageData();
      break;
    }
    if (token.type === 'name') items.push({ type: 'name', value: token.value });
    else if (token.type === 'number') items.push({ type: 'number', value: token.value });
    else if (token.type === 'keyword') items.push({ type: 'name', value: token.value });
  }
  return [{ type: 'dict', value: toDict(items) }];
}

function toDict(items: Operand[]): Map<string, Operand> {
  const dict = new Map<string, Operand>();
  for (let i = 0; i + 1 < items.length; i += 2) {
    const key = items[i];
    if (key.type === 'name') dict.set(key.value, items[i + 1]);
  }
  return dict;
}

export function numberOperand(operand: Operand | undefined, fallback = 0): number {
  return operand?.type === 'number' ? operand.value : fallback;
}

export function nameOperand(operand: Operand | undefined): string | undefined {
  return operand?.type === 'name' ? operand.value : undefined;
}
