import { existsSync, readFileSync } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { createRequire } from 'node:module';
import { basename, dirname, join } from 'node:path';
import fontkit from '@pdf-lib/fontkit';
import { StandardFonts } from 'pdf-lib';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import type { FontSubstitute, ScriptId, SourceFont } from '../types/fonts.js';

const candidatesSchema = z.object({
  searchPaths: z.record(z.string(), z.array(z.string())),
  scripts: z.record(z.string(), z.array(z.string())),
  /** Font files shipped by npm packages among our dependencies. */
  bundled: z.record(z.string(), z.array(z.object({ package: z.string(), file: z.string() }))).default({})
});

type FontCandidates = z.infer<typeof candidatesSchema>;

let candidates: FontCandidates | null = null;

function loadCandidates(): FontCandidates {
  if (!candidates) {
    const file = new URL('../../data/font-candidates.json', import.meta.url);
    candidates = candidatesSchema.parse(JSON.parse(readFileSync(file, 'utf8')));
  }
  return candidates;
}

/** A code point every font for the script must have. */
const SAMPLE_CODE_POINTS: Record<ScriptId, number> = {
  latin: 0x41,
  hangul: 0xac00,
  japanese: 0x3042,
  'chinese-simplified': 0x4e2d,
  'chinese-traditional': 0x570b,
  cyrillic: 0x0416,
  greek: 0x03a9,
  arabic: 0x0627,
  hebrew: 0x05d0,
  devanagari: 0x0905,
  thai: 0x0e01
};

export function defaultFontSearchPaths(platform: NodeJS.Platform = process.platform): string[] {
  const paths = loadCandidates().searchPaths[platform] ?? [];
  return paths.map((path) => (path.startsWith('~/') ? join(homedir(), path.slice(2)) : path));
}

const requireFrom = createRequire(import.meta.url);

/** Install directory of an npm package, or `null` when it is not installed. */
export function packageDir(name: string): string | null {
  let entry: string;
  try {
    entry = requireFrom.resolve(name);
  } catch (error) {
    console.debug(`Font package ${name} is not installed:`, errorMessage(error));
    return null;
  }
  const marker = join('node_modules', name);
  const at = entry.lastIndexOf(marker);
  return at === -1 ? dirname(entry) : entry.slice(0, at + marker.length);
}

async function findUnder(dir: string, fileName: string): Promise<string | null> {
  if (!existsSync(dir)) return null;
  const wanted = fileName.toLowerCase();
  const entries = await readdir(dir, { recursive: true });
  const match = entries.find((entry) => basename(entry).toLowerCase() === wanted);
  return match === undefined ? null : join(dir, match);
}

/** Standard 14 face closest to the source font's traits. */
export function standardSubstitute(source: Pick<SourceFont, 'serif' | 'fixedPitch' | 'bold' | 'italic'>): StandardFonts {
  const { bold, italic } = source;
  if (source.fixedPitch) {
    if (bold && italic) return StandardFonts.CourierBoldOblique;
    if (bold) return StandardFonts.CourierBold;
    return italic ? StandardFonts.CourierOblique : StandardFonts.Courier;
  }
  if (source.serif) {
    if (bold && italic) return StandardFonts.TimesRomanBoldItalic;
    if (bold) return StandardFonts.TimesRomanBold;
    return italic ? StandardFonts.TimesRomanItalic : StandardFonts.TimesRoman;
  }
  if (bold && italic) return StandardFonts.HelveticaBoldOblique;
  if (bold) return StandardFonts.HelveticaBold;
  return italic ? StandardFonts.HelveticaOblique : StandardFonts.Helvetica;
}

export interface FontCatalogOptions {
  /** Font file per script; wins over everything found on disk. */
  fonts: Partial<Record<ScriptId, string>>;
  searchPaths: string[];
  /** Fall back to the font files shipped with npm packages. */
  bundled: boolean;
}

/**
 * Picks a substitute font per target script: a configured file, then for
 * Latin text the standard face matching the source font, then a known
 * font file under the search paths that covers the script, then a font
 * shipped with an installed npm package.
 */
export class FontCatalog {
  private readonly options: FontCatalogOptions;
  private fileIndex: Promise<Map<string, string>> | null = null;
  private readonly resolved = new Map<ScriptId, Promise<FontSubstitute | null>>();
  private readonly bytes = new Map<string, Promise<Uint8Array>>();

  constructor(options: Partial<FontCatalogOptions> = {}) {
    this.options = {
      fonts: options.fonts ?? {},
      searchPaths: options.searchPaths ?? defaultFontSearchPaths(),
      bundled: options.bundled ?? true
    };
  }

  /** `null` when nothing on this machine can render the script. */
  async resolve(script: ScriptId, source: SourceFont): Promise<FontSubstitute | null> {
    const configured = this.options.fonts[script];
    if (configured) {
      return { kind: 'file', name: basename(configured), path: configured };
    }
    if (script === 'latin') {
      return { kind: 'standard', name: standardSubstitute(source) };
    }

    let pending = this.resolved.get(script);
    if (!pending) {
      pending = this.findFile(script);
      this.resolved.set(script, pending);
    }
    return pending;
  }

  async fontBytes(path: string): Promise<Uint8Array> {
    let pending = this.bytes.get(path);
    if (!pending) {
      pending = readFile(path).then((buffer) => new Uint8Array(buffer));
      this.bytes.set(path, pending);
    }
    return pending;
  }

  private async findFile(script: ScriptId): Promise<FontSubstitute | null> {
    const index = await this.indexFiles();
    const names = loadCandidates().scripts[script] ?? [];

    for (const name of names) {
      const path = index.get(name.toLowerCase());
      if (!path) continue;
      if (await this.covers(path, SAMPLE_CODE_POINTS[script])) {
        return { kind: 'file', name, path };
      }
    }

    const bundled = this.options.bundled ? await this.findBundled(script) : null;
    if (bundled) return bundled;

    console.warn(`No font for ${script} text found under ${this.options.searchPaths.join(', ') || '(no search paths)'}`);
    return null;
  }

  private async findBundled(script: ScriptId): Promise<FontSubstitute | null> {
    for (const { package: name, file } of loadCandidates().bundled[script] ?? []) {
      const dir = packageDir(name);
      const path = dir === null ? null : await findUnder(dir, file);
      if (path && (await this.covers(path, SAMPLE_CODE_POINTS[script]))) {
        console.debug(`Using ${file} from ${name} for ${script} text`);
        return { kind: 'file', name: file, path };
      }
    }
    return null;
  }

  private async covers(path: string, codePoint: number): Promise<boolean> {
    try {
      const font = fontkit.create(await this.fontBytes(path));
      return font.hasGlyphForCodePoint(codePoint);
    } catch (error) {
      console.debug(`Skipping unreadable font ${path}:`, error);
      return false;
    }
  }

  /** Lower-case file name → first path it was found at. */
  private indexFiles(): Promise<Map<string, string>> {
    if (!this.fileIndex) {
      this.fileIndex = (async () => {
        const index = new Map<string, string>();
        for (const dir of this.options.searchPaths) {
          if (!existsSync(dir)) continue;
          const entries = await readdir(dir, { recursive: true });
          for (const entry of entries) {
            if (!/\.(ttf|otf)$/i.test(entry)) continue;
            const key = basename(entry).toLowerCase();
            if (!index.has(key)) index.set(key, join(dir, entry));
          }
        }
        return index;
      })();
    }
    return this.fileIndex;
  }
}
