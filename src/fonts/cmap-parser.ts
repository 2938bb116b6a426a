import { parseOperations } from '../core/content-stream/lexer.js';
import type { Operand } from '../types/pdf.js';

export interface CodespaceRange {
  bytes: number;
  low: number;
  high: number;
}

export interface ParsedCMap {
  codespaces: CodespaceRange[];
  /** Character code → Unicode text (ToUnicode CMaps). */
  unicode: Map<number, string>;
  /** Character code → CID (encoding CMaps). */
  cids: Map<number, number>;
  vertical: boolean;
  useCMap?: string;
}

export interface CharCode {
  code: number;
  length: number;
}

const MAX_RANGE = 0x10000;

function bytesToCode(bytes: Uint8Array): number {
  let code = 0;
  for (const byte of bytes) code = code * 256 + byte;
  return code;
}

/** UTF-16BE bytes as used by ToUnicode destinations. */
export function decodeUtf16BE(bytes: Uint8Array): string {
  if (bytes.length % 2 === 1) {
    return String.fromCharCode(...bytes);
  }
  const units: number[] = [];
  for (let i = 0; i < bytes.length; i += 2) {
    units.push(bytes[i] * 256 + bytes[i + 1]);
  }
  return String.fromCharCode(...units);
}

function incrementLastUnit(text: string, offset: number): string {
  if (text.length === 0) return text;
  const last = text.charCodeAt(text.length - 1) + offset;
  return text.slice(0, -1) + String.fromCharCode(last & 0xffff);
}

function stringOperand(operand: Operand | undefined): Uint8Array | undefined {
  return operand?.type === 'string' ? operand.value : undefined;
}

/**
 * Parses a CMap program: codespace ranges, bfchar/bfrange Unicode mappings,
 * cidchar/cidrange CID mappings, WMode and usecmap.
 */
export function parseCMap(bytes: Uint8Array): ParsedCMap {
  const cmap: ParsedCMap = { codespaces: [], unicode: new Map(), cids: new Map(), vertical: false };

  for (const op of parseOperations(bytes)) {
    const operands = op.operands;

    switch (op.operator) {
      case 'endcodespacerange':
        for (let i = 0; i + 1 < operands.length; i += 2) {
          const low = stringOperand(operands[i]);
          const high = stringOperand(operands[i + 1]);
          if (low && high && low.length > 0) {
            cmap.codespaces.push({ bytes: low.length, low: bytesToCode(low), high: bytesToCode(high) });
          }
        }
        break;

      case 'endbfchar':
        for (let i = 0; i + 1 < operands.length; i += 2) {
          const source = stringOperand(operands[i]);
          const target = operands[i + 1];
          if (!source) continue;
          if (target.type === 'string') {
            cmap.unicode.set(bytesToCode(source), decodeUtf16BE(target.value));
          } else if (target.type === 'name') {
            cmap.unicode.set(bytesToCode(source), target.value);
          }
        }
        break;

      case 'endbfrange':
        for (let i = 0; i + 2 < operands.length; i += 3) {
          const low = stringOperand(operands[i]);
          const high = stringOperand(operands[i + 1]);
          const target = operands[i + 2];
          if (!low || !high) continue;
          const first = bytesToCode(low);
          const last = Math.min(bytesToCode(high), first + MAX_RANGE - 1);

          if (target.type === 'string') {
            const base = decodeUtf16BE(target.value);
            for (let code = first; code <= last; code++) {
              cmap.unicode.set(code, incrementLastUnit(base, code - first));
            }
          } else if (target.type === 'array') {
            target.value.forEach((entry, offset) => {
              if (entry.type === 'string' && first + offset <= last) {
                cmap.unicode.set(first + offset, decodeUtf16BE(entry.value));
              }
            });
          }
        }
        break;

      case 'endcidchar':
        for (let i = 0; i + 1 < operands.length; i += 2) {
          const source = stringOperand(operands[i]);
          const cid = operands[i + 1];
          if (source && cid.type === 'number') cmap.cids.set(bytesToCode(source), cid.value);
        }
        break;

      case 'endcidrange':
        for (let i = 0; i + 2 < operands.length; i += 3) {
          const low = stringOperand(operands[i]);
          const high = stringOperand(operands[i + 1]);
          const cid = operands[i + 2];
          if (!low || !high || cid.type !== 'number') continue;
          const first = bytesToCode(low);
          const last = Math.min(bytesToCode(high), first + MAX_RANGE - 1);
          for (let code = first; code <= last; code++) {
            cmap.cids.set(code, cid.value + code - first);
          }
        }
        break;

      case 'def': {
        const [key, value] = operands;
        if (key?.type === 'name' && key.value === 'WMode' && value?.type === 'number') {
          cmap.vertical = value.value === 1;
        }
        break;
      }

      case 'usecmap': {
        const [name] = operands;
        if (name?.type === 'name') cmap.useCMap = name.value;
        break;
      }
    }
  }

  return cmap;
}

/**
 * Splits a shown string into character codes using codespace ranges.
 * Bytes outside every range consume the shortest codespace width.
 */
export function splitCodes(bytes: Uint8Array, codespaces: CodespaceRange[], defaultWidth = 1): CharCode[] {
  const codes: CharCode[] = [];
  const widths = [...new Set(codespaces.map((range) => range.bytes))].sort((a, b) => a - b);
  const fallbackWidth = widths[0] ?? defaultWidth;
  let pos = 0;

  while (pos < bytes.length) {
    let matched: CharCode | null = null;

    for (const width of widths) {
      if (pos + width > bytes.length) break;
      const code = bytesToCode(bytes.subarray(pos, pos + width));
      if (codespaces.some((range) => range.bytes === width && code >= range.low && code <= range.high)) {
        matched = { code, length: width };
        break;
      }
    }

    if (!matched) {
      const width = Math.min(fallbackWidth, bytes.length - pos);
      matched = { code: bytesToCode(bytes.subarray(pos, pos + width)), length: width };
    }

    codes.push(matched);
    pos += matched.length;
  }

  return codes;
}
