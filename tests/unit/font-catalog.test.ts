import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { homedir, tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import { FontCatalog, defaultFontSearchPaths, packageDir, standardSubstitute } from '../../src/fonts/font-catalog.js';
import { FontManager } from '../../src/fonts/font-manager.js';
import type { FontTable, SourceFont } from '../../src/types/fonts.js';

function sourceFont(fields: Partial<SourceFont> = {}): SourceFont {
  return {
    id: 'F1',
    name: 'ABCDEF+CMR10',
    baseName: 'CMR10',
    subtype: 'Type1',
    serif: true,
    fixedPitch: false,
    italic: false,
    bold: false,
    ascent: 0.75,
    descent: -0.25,
    ...fields
  };
}

function tableWith(...fonts: SourceFont[]): FontTable {
  return { sources: new Map(fonts.map((font) => [font.id, font])), entries: new Map() };
}

describe('standardSubstitute', () => {
  it('should pick the family by traits', () => {
    expect(standardSubstitute(sourceFont())).toBe(StandardFonts.TimesRoman);
    expect(standardSubstitute(sourceFont({ bold: true, italic: true }))).toBe(StandardFonts.TimesRomanBoldItalic);
    expect(standardSubstitute(sourceFont({ serif: false, bold: true }))).toBe(StandardFonts.HelveticaBold);
    expect(standardSubstitute(sourceFont({ fixedPitch: true, italic: true }))).toBe(StandardFonts.CourierOblique);
  });
});

describe('defaultFontSearchPaths', () => {
  it('should expand home-relative paths', () => {
    const paths = defaultFontSearchPaths('linux');

    expect(paths[0]).toBe('/usr/share/fonts');
    expect(paths).toContain(join(homedir(), '.fonts'));
    expect(defaultFontSearchPaths('aix')).toEqual([]);
  });
});

describe('FontCatalog', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should use standard faces for Latin text', async () => {
    const catalog = new FontCatalog({ searchPaths: [] });

    expect(await catalog.resolve('latin', sourceFont({ bold: true }))).toEqual({ kind: 'standard', name: 'Times-Bold' });
  });

  it('should prefer a configured font file', async () => {
    const catalog = new FontCatalog({ fonts: { hangul: '/opt/fonts/MyHangul.ttf' }, searchPaths: [] });

    expect(await catalog.resolve('hangul', sourceFont())).toEqual({
      kind: 'file',
      name: 'MyHangul.ttf',
      path: '/opt/fonts/MyHangul.ttf'
    });
  });

  it('should report scripts without any font', async () => {
    const catalog = new FontCatalog({ searchPaths: [], bundled: false });

    expect(await catalog.resolve('hangul', sourceFont())).toBeNull();
    expect(await catalog.resolve('hangul', sourceFont())).toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith('No font for hangul text found under (no search paths)');
  });

  it('should fall back to the Hangul font shipped with its dependencies', async () => {
    const catalog = new FontCatalog({ searchPaths: [] });

    const substitute = await catalog.resolve('hangul', sourceFont());

    expect(substitute).toMatchObject({ kind: 'file', name: 'NotoSansKR_400Regular.ttf' });
    expect(substitute?.kind === 'file' ? basename(substitute.path) : undefined).toBe('NotoSansKR_400Regular.ttf');
    expect(console.warn).not.toHaveBeenCalled();
  });

  describe('with a font directory', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'font-catalog-'));
      await mkdir(join(dir, 'nested'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should skip candidate files that are not fonts', async () => {
      await writeFile(join(dir, 'nested', 'NanumGothic.ttf'), 'not a font');
      const catalog = new FontCatalog({ searchPaths: [dir], bundled: false });

      expect(await catalog.resolve('hangul', sourceFont())).toBeNull();
      expect(console.warn).toHaveBeenCalledWith(`No font for hangul text found under ${dir}`);
    });

    it('should read and cache font bytes', async () => {
      const path = join(dir, 'nested', 'data.bin');
      await writeFile(path, Uint8Array.from([1, 2, 3]));
      const catalog = new FontCatalog({ searchPaths: [dir] });

      const first = await catalog.fontBytes(path);
      expect(first).toEqual(Uint8Array.from([1, 2, 3]));
      expect(await catalog.fontBytes(path)).toBe(first);
    });
  });
});

describe('packageDir', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should locate installed packages only', () => {
    expect(packageDir('pdf-lib')).toBe(join(process.cwd(), 'node_modules', 'pdf-lib'));
    expect(packageDir('not-an-installed-package')).toBeNull();
  });
});

describe('FontManager', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should create one entry per source font and script', async () => {
    const table = tableWith(sourceFont({ italic: true }));
    const manager = new FontManager(new FontCatalog({ searchPaths: [] }), table);

    const entry = await manager.entryFor('F1', 'latin');

    expect(entry).toEqual({
      key: 'F1@latin',
      sourceFontId: 'F1',
      script: 'latin',
      substitute: { kind: 'standard', name: 'Times-Italic' },
      subset: false,
      glyphsUsed: new Set(),
      finalized: false
    });
    expect(await manager.entryFor('F1', 'latin')).toBe(entry);
    expect(table.entries.get('F1@latin')).toBe(entry);
  });

  it('should fall back to sans traits for unknown fonts', async () => {
    const manager = new FontManager(new FontCatalog({ searchPaths: [] }), tableWith());

    expect((await manager.entryFor('missing', 'latin'))?.substitute).toEqual({ kind: 'standard', name: 'Helvetica' });
  });

  it('should return null when the script has no font', async () => {
    const table = tableWith(sourceFont());
    const manager = new FontManager(new FontCatalog({ searchPaths: [], bundled: false }), table);

    expect(await manager.entryFor('F1', 'hangul')).toBeNull();
    expect(table.entries.size).toBe(0);
  });

  it('should embed each substitute once per document', async () => {
    const manager = new FontManager(new FontCatalog({ searchPaths: [] }), tableWith(sourceFont(), sourceFont({ id: 'F2' })));
    const first = await manager.entryFor('F1', 'latin');
    const second = await manager.entryFor('F2', 'latin');
    if (!first || !second) throw new Error('expected standard entries');

    const pdf = await PDFDocument.create();
    const font = await manager.embed(pdf, first);

    expect(font.name).toBe('Times-Roman');
    expect(await manager.embed(pdf, second)).toBe(font);
    expect(await manager.embed(await PDFDocument.create(), first)).not.toBe(font);
  });

  it('should track drawn glyphs and finalise entries', async () => {
    const manager = new FontManager(new FontCatalog({ searchPaths: [] }), tableWith(sourceFont()));
    const entry = await manager.entryFor('F1', 'latin');
    if (!entry) throw new Error('expected a standard entry');

    manager.recordGlyphs(entry, 'a b\ta');
    manager.finalize();

    expect([...entry.glyphsUsed]).toEqual([0x61, 0x62]);
    expect(manager.entries().map((item) => item.finalized)).toEqual([true]);
  });
});
