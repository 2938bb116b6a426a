import { readFileSync } from 'node:fs';
import { Encodings } from '@pdf-lib/standard-fonts';

interface EncodingData {
  standard: Record<string, number>;
  macRoman: Record<string, number>;
  glyphNames: Record<string, number>;
}

export type BaseEncodingName =
  | 'StandardEncoding'
  | 'WinAnsiEncoding'
  | 'MacRomanEncoding'
  | 'SymbolEncoding'
  | 'ZapfDingbatsEncoding';

/** code → Unicode text for a single-byte font. */
export type DecodeTable = Map<number, string>;

let data: EncodingData | null = null;
let glyphNameMap: Map<string, string> | null = null;
let unicodeNameMap: Map<number, string> | null = null;
const baseTables = new Map<BaseEncodingName, DecodeTable>();

function loadData(): EncodingData {
  if (!data) {
    const file = new URL('../../data/encodings.json', import.meta.url);
    const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'));
    if (!isEncodingData(parsed)) {
      throw new Error(`Encoding tables at ${file.pathname} are malformed`);
    }
    data = parsed;
  }
  return data;
}

function isEncodingData(value: unknown): value is EncodingData {
  if (typeof value !== 'object' || value === null) return false;
  return ['standard', 'macRoman', 'glyphNames'].every((key) => {
    const table: unknown = Reflect.get(value, key);
    return typeof table === 'object' && table !== null;
  });
}

function tableFromLibrary(encoding: typeof Encodings.WinAnsi): DecodeTable {
  const table: DecodeTable = new Map();
  for (const codePoint of encoding.supportedCodePoints) {
    const { code } = encoding.encodeUnicodeCodePoint(codePoint);
    // Several code points can share a code; keep the first (lowest)
    if (!table.has(code)) table.set(code, String.fromCodePoint(codePoint));
  }
  return table;
}

function tableFromRecord(record: Record<string, number>): DecodeTable {
  const table: DecodeTable = new Map();
  for (const [code, codePoint] of Object.entries(record)) {
    table.set(Number(code), String.fromCodePoint(codePoint));
  }
  return table;
}

export function getBaseEncoding(name: BaseEncodingName): DecodeTable {
  let table = baseTables.get(name);
  if (!table) {
    switch (name) {
      case 'WinAnsiEncoding':
        table = tableFromLibrary(Encodings.WinAnsi);
        break;
      case 'SymbolEncoding':
        table = tableFromLibrary(Encodings.Symbol);
        break;
      case 'ZapfDingbatsEncoding':
        table = tableFromLibrary(Encodings.ZapfDingbats);
        break;
      case 'MacRomanEncoding':
        table = tableFromRecord(loadData().macRoman);
        break;
      case 'StandardEncoding':
        table = tableFromRecord(loadData().standard);
        break;
    }
    baseTables.set(name, table);
  }
  return table;
}

export function isBaseEncodingName(name: string): name is BaseEncodingName {
  return (
    name === 'StandardEncoding' ||
    name === 'WinAnsiEncoding' ||
    name === 'MacRomanEncoding' ||
    name === 'SymbolEncoding' ||
    name === 'ZapfDingbatsEncoding'
  );
}

function buildGlyphNameMaps(): void {
  const names = new Map<string, string>();
  const byUnicode = new Map<number, string>();

  for (const encoding of [Encodings.WinAnsi, Encodings.Symbol]) {
    for (const codePoint of encoding.supportedCodePoints) {
      const { name } = encoding.encodeUnicodeCodePoint(codePoint);
      if (!names.has(name)) names.set(name, String.fromCodePoint(codePoint));
      if (!byUnicode.has(codePoint)) byUnicode.set(codePoint, name);
    }
  }
  for (const [name, codePoint] of Object.entries(loadData().glyphNames)) {
    names.set(name, String.fromCodePoint(codePoint));
    if (!byUnicode.has(codePoint)) byUnicode.set(codePoint, name);
  }

  glyphNameMap = names;
  unicodeNameMap = byUnicode;
}

/**
 * Resolves an Adobe glyph name (`Aacute`, `fi`, `uni00E9`, `u1D400`,
 * `f_f_i`, `a.sc`) to Unicode text; `undefined` when the name carries no
 * Unicode meaning (`g123`, `cid45`).
 */
export function glyphNameToUnicode(glyphName: string): string | undefined {
  if (!glyphNameMap) buildGlyphNameMaps();
  const known = glyphNameMap?.get(glyphName);
  if (known !== undefined) return known;

  const base = glyphName.split('.')[0];
  if (base.length === 0) return undefined;
  if (base !== glyphName) return glyphNameToUnicode(base);

  if (base.includes('_')) {
    const parts = base.split('_').map((part) => glyphNameToUnicode(part));
    return parts.every((part) => part !== undefined) ? parts.join('') : undefined;
  }

  const uni = /^uni((?:[0-9A-F]{4})+)$/.exec(base);
  if (uni) {
    const groups = uni[1].match(/.{4}/g) ?? [];
    return groups.map((group) => String.fromCharCode(parseInt(group, 16))).join('');
  }

  const u = /^u([0-9A-F]{4,6})$/.exec(base);
  if (u) {
    const codePoint = parseInt(u[1], 16);
    return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : undefined;
  }

  return undefined;
}

/** Adobe glyph name for a code point, where one is known. */
export function unicodeToGlyphName(codePoint: number): string | undefined {
  if (!unicodeNameMap) buildGlyphNameMaps();
  return unicodeNameMap?.get(codePoint);
}
