import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { basename, join } from 'node:path';
import { LayoutModelUnavailableError, errorMessage } from '../errors.js';

export interface DownloadProgress {
  loaded: number;
  total: number;
  percent: number;
  model: string;
}

export interface ModelDownloaderOptions {
  /** Directory downloaded models are kept in between runs. */
  cacheDir: string;
  fetch: typeof fetch;
}

export function defaultModelCacheDir(): string {
  return join(homedir(), '.cache', 'paper-translate', 'models');
}

/**
 * Fetches model files once per process and once per machine: concurrent
 * requests for a URL share one download, finished downloads land in the
 * cache directory.
 */
export class ModelDownloader {
  private readonly options: ModelDownloaderOptions;
  private modelCache: Map<string, Uint8Array> = new Map();
  private downloadProgress: Map<string, Promise<Uint8Array>> = new Map();

  constructor(options: Partial<ModelDownloaderOptions> = {}) {
    this.options = {
      cacheDir: options.cacheDir ?? defaultModelCacheDir(),
      fetch: options.fetch ?? fetch
    };
  }

  cachePath(url: string): string {
    const name = basename(new URL(url).pathname) || 'model.onnx';
    return join(this.options.cacheDir, name);
  }

  async downloadModel(url: string, onProgress?: (progress: DownloadProgress) => void): Promise<Uint8Array> {
    const cached = this.modelCache.get(url);
    if (cached) return cached;

    const pending = this.downloadProgress.get(url);
    if (pending) return pending;

    const downloadPromise = this.loadOrDownload(url, onProgress);
    this.downloadProgress.set(url, downloadPromise);

    try {
      const data = await downloadPromise;
      this.modelCache.set(url, data);
      return data;
    } finally {
      this.downloadProgress.delete(url);
    }
  }

  private async loadOrDownload(url: string, onProgress?: (progress: DownloadProgress) => void): Promise<Uint8Array> {
    const path = this.cachePath(url);
    if (existsSync(path)) {
      return new Uint8Array(await readFile(path));
    }

    const data = await this.downloadWithProgress(url, onProgress);
    await mkdir(this.options.cacheDir, { recursive: true });
    const partial = `${path}.${process.pid}.part`;
    await writeFile(partial, data);
    await rename(partial, path);
    return data;
  }

  private async downloadWithProgress(url: string, onProgress?: (progress: DownloadProgress) => void): Promise<Uint8Array> {
    let response: Response;
    try {
      response = await this.options.fetch(url);
    } catch (error) {
      throw new LayoutModelUnavailableError(`Failed to download layout model from ${url}: ${errorMessage(error)}`, error);
    }
    if (!response.ok) {
      throw new LayoutModelUnavailableError(`Failed to download layout model from ${url}: ${response.status} ${response.statusText}`);
    }

    const reader = response.body?.getReader();
    if (!reader) {
      return new Uint8Array(await response.arrayBuffer());
    }

    const contentLength = Number(response.headers.get('Content-Length')) || 0;
    const chunks: Uint8Array[] = [];
    let receivedLength = 0;

    for (;;) {
      const { done, value } = await reader.read();
      if (done || !value) break;

      chunks.push(value);
      receivedLength += value.length;

      if (onProgress && contentLength > 0) {
        onProgress({
          loaded: receivedLength,
          total: contentLength,
          percent: (receivedLength / contentLength) * 100,
          model: basename(new URL(url).pathname) || 'model'
        });
      }
    }

    const data = new Uint8Array(receivedLength);
    let offset = 0;
    for (const chunk of chunks) {
      data.set(chunk, offset);
      offset += chunk.length;
    }
    return data;
  }

  clearCache(): void {
    this.modelCache.clear();
    this.downloadProgress.clear();
  }

  isCached(url: string): boolean {
    return this.modelCache.has(url);
  }
}
