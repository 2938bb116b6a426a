import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import type { OutputFiles } from '../types/output.js';

export interface OutputPathOptions {
  /** Defaults to the input file's directory. */
  outputDir?: string;
  /** Put both files in a `{basename}-{lang}` folder. */
  subfolder: boolean;
}

/** `paper.pdf` → `paper-ko-mono.pdf` and `paper-ko-dual.pdf`. */
export function outputPaths(inputPath: string, lang: string, options: Partial<OutputPathOptions> = {}): OutputFiles {
  const ext = extname(inputPath);
  const name = ext.toLowerCase() === '.pdf' ? basename(inputPath, ext) : basename(inputPath);
  const stem = `${name}-${lang}`;
  const base = options.outputDir ?? dirname(inputPath);
  const dir = options.subfolder ? join(base, stem) : base;

  return {
    dir,
    mono: join(dir, `${stem}-mono.pdf`),
    dual: join(dir, `${stem}-dual.pdf`)
  };
}

/**
 * Writes both outputs under temporary names and renames them into place.
 * If any step fails, every file written so far is removed.
 */
export async function writeOutputs(files: OutputFiles, mono: Uint8Array, dual: Uint8Array): Promise<OutputFiles> {
  const suffix = `.${process.pid}.tmp`;
  const written: string[] = [];

  try {
    await mkdir(files.dir, { recursive: true });
    for (const [path, bytes] of [[files.mono, mono], [files.dual, dual]] as const) {
      written.push(path + suffix);
      await writeFile(path + suffix, bytes);
    }
    for (const path of [files.mono, files.dual]) {
      await rename(path + suffix, path);
      written.push(path);
    }
    return files;
  } catch (error) {
    await Promise.all(written.map((path) => rm(path, { force: true })));
    throw error;
  }
}
