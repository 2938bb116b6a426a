import { existsSync } from 'node:fs';
import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import type { CacheEntry, CacheStore } from '../types/translation.js';

export function defaultCacheDir(): string {
  return join(homedir(), '.cache', 'paper-translate');
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  async get(fingerprint: string): Promise<CacheEntry | undefined> {
    return this.entries.get(fingerprint);
  }

  async put(entry: CacheEntry): Promise<boolean> {
    if (this.entries.has(entry.fingerprint)) return false;
    this.entries.set(entry.fingerprint, entry);
    return true;
  }

  get size(): number {
    return this.entries.size;
  }
}

const cacheEntrySchema = z.object({
  fingerprint: z.string(),
  translation: z.string(),
  sourceText: z.string(),
  backend: z.string(),
  model: z.string(),
  sourceLang: z.string(),
  targetLang: z.string(),
  createdAt: z.string()
});

/**
 * Append-only JSON-lines cache. The file is read once when opened; later
 * writes append one line each, serialized so lines never interleave. The
 * first entry for a fingerprint wins, in the file and in memory.
 */
export class FileCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();
  private writing: Promise<void> = Promise.resolve();

  private constructor(readonly path: string) {}

  static async open(dir: string = defaultCacheDir(), fileName = 'translations.jsonl'): Promise<FileCacheStore> {
    await mkdir(dir, { recursive: true });
    const store = new FileCacheStore(join(dir, fileName));
    await store.load();
    return store;
  }

  private async load(): Promise<void> {
    if (!existsSync(this.path)) return;

    const lines = (await readFile(this.path, 'utf8')).split('\n');
    let skipped = 0;
    for (const line of lines) {
      if (line.trim() === '') continue;
      const entry = parseLine(line);
      if (!entry) {
        skipped++;
        continue;
      }
      if (!this.entries.has(entry.fingerprint)) this.entries.set(entry.fingerprint, entry);
    }
    if (skipped > 0) {
      console.warn(`Skipped ${skipped} unreadable line(s) in translation cache ${this.path}`);
    }
  }

  async get(fingerprint: string): Promise<CacheEntry | undefined> {
    return this.entries.get(fingerprint);
  }

  async put(entry: CacheEntry): Promise<boolean> {
    if (this.entries.has(entry.fingerprint)) return false;
    this.entries.set(entry.fingerprint, entry);

    const line = `${JSON.stringify(entry)}\n`;
    const write = this.writing.then(() => appendFile(this.path, line, 'utf8'));
    // Keep the chain alive after a failed append; the caller still sees the error
    this.writing = write.catch((error: unknown) => {
      console.warn(`Failed to append to translation cache ${this.path}:`, error);
    });
    await write;
    return true;
  }

  async close(): Promise<void> {
    await this.writing;
  }

  get size(): number {
    return this.entries.size;
  }
}

function parseLine(line: string): CacheEntry | undefined {
  try {
    const result = cacheEntrySchema.safeParse(JSON.parse(line));
    return result.success ? result.data : undefined;
  } catch {
    return undefined;
  }
}
