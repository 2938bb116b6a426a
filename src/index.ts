import { readFile } from 'node:fs/promises';
import { ConfigPresets, resolveConfig, type TranslateConfig, type TranslateOptions } from './config/schema.js';
import { JobCancelledError, TranslationJobError } from './errors.js';
import { documentRuns } from './core/document-utils.js';
import { PDFParser } from './core/pdf-parser.js';
import { outputPaths, writeOutputs, type OutputPathOptions } from './job/output-writer.js';
import { TranslationJob } from './job/translation-job.js';
import { LayoutClassifier } from './layout/layout-classifier.js';
import { OnnxLayoutDetector } from './layout/layout-detector.js';
import { FileCacheStore } from './translation/cache-store.js';
import type { ProgressCallback, TranslateDependencies } from './types/config.js';
import type { ScriptId } from './types/fonts.js';
import type { LayoutDetector } from './types/layout.js';
import type { AnalysisResult, OutputFiles, TranslateResult, TranslationReport } from './types/output.js';
import type { CacheStore, TranslationBackend } from './types/translation.js';

export type * from './types/index.js';
export * from './errors.js';
export { ConfigPresets, resolveConfig, translateConfigSchema } from './config/schema.js';
export type { TranslateConfig, TranslateOptions } from './config/schema.js';
export { parsePageRange, parsePageSpans } from './core/page-range.js';
export { PDFParser } from './core/pdf-parser.js';
export { LayoutClassifier } from './layout/layout-classifier.js';
export { LayoutAnalyzer } from './layout/layout-analyzer.js';
export { OnnxLayoutDetector } from './layout/layout-detector.js';
export { PageRasterizer } from './layout/page-rasterizer.js';
export { ParagraphAssembler } from './layout/paragraph-assembler.js';
export { ModelDownloader } from './layout/model-downloader.js';
export { DEFAULT_FORMULA_CHAR_PATTERN, DEFAULT_FORMULA_FONT_PATTERN } from './layout/run-filters.js';
export { TranslationDispatcher, collectUnits, applyResults } from './translation/dispatcher.js';
export { MemoryCacheStore, FileCacheStore, defaultCacheDir } from './translation/cache-store.js';
export { BaseBackend } from './translation/backend.js';
export {
  createBackend,
  parseService,
  GoogleTranslateBackend,
  GeminiBackend,
  BedrockBackend
} from './translation/backends/index.js';
export { fingerprint, normalizeText } from './translation/fingerprint.js';
export { supportedLanguages, scriptForLanguage } from './translation/languages.js';
export { FontCatalog } from './fonts/font-catalog.js';
export { FontManager } from './fonts/font-manager.js';
export { PdfComposer } from './render/pdf-composer.js';
export { TranslationJob } from './job/translation-job.js';
export { outputPaths, writeOutputs } from './job/output-writer.js';

type PresetName = keyof typeof ConfigPresets;

function mergeOptions(base: TranslateOptions, patch: TranslateOptions): TranslateOptions {
  return {
    ...base,
    ...patch,
    cache: { ...base.cache, ...patch.cache },
    retry: { ...base.retry, ...patch.retry },
    layout: { ...base.layout, ...patch.layout },
    fonts: { ...base.fonts, ...patch.fonts }
  };
}

function toBytes(input: Uint8Array | ArrayBuffer): Uint8Array {
  return input instanceof Uint8Array ? input : new Uint8Array(input);
}

export interface TranslateFileResult {
  files: OutputFiles;
  report: TranslationReport;
}

/**
 * Translates scientific PDFs into a translated-only (mono) and a
 * side-by-side (dual) PDF. Configuration is validated on every call.
 *
 * ```ts
 * const translator = new PaperTranslator().setLanguages('en', 'ko');
 * const { mono, dual, report } = await translator.translate(bytes);
 * ```
 */
export class PaperTranslator {
  private options: TranslateOptions;
  private dependencies: TranslateDependencies;
  private detector: OnnxLayoutDetector | null = null;
  private cacheStores = new Map<string, Promise<FileCacheStore>>();

  constructor(options: TranslateOptions = {}, dependencies: TranslateDependencies = {}) {
    this.options = { ...options };
    this.dependencies = { ...dependencies };
  }

  // Chainable configuration methods
  setLanguages(sourceLang: string, targetLang: string): this {
    this.options = { ...this.options, sourceLang, targetLang };
    return this;
  }

  setService(service: string, model?: string): this {
    this.options = { ...this.options, service, model };
    return this;
  }

  setFallbackService(service: string | undefined): this {
    this.options = { ...this.options, fallbackService: service };
    return this;
  }

  setThreads(threads: number): this {
    this.options = { ...this.options, threads };
    return this;
  }

  setPages(pages: string | undefined): this {
    this.options = { ...this.options, pages };
    return this;
  }

  setOverflow(overflow: 'shrink' | 'overflow', minFontScale?: number): this {
    this.options = { ...this.options, overflow, ...(minFontScale !== undefined ? { minFontScale } : {}) };
    return this;
  }

  setDualLayout(dualLayout: 'interleave' | 'side-by-side'): this {
    this.options = { ...this.options, dualLayout };
    return this;
  }

  setFont(script: ScriptId, path: string): this {
    const fonts: Partial<Record<ScriptId, string>> = { ...this.options.fonts };
    fonts[script] = path;
    this.options = { ...this.options, fonts };
    return this;
  }

  enableLayoutModel(enabled: boolean = true): this {
    this.options = mergeOptions(this.options, { layout: { enabled } });
    return this;
  }

  enableCache(enabled: boolean = true): this {
    this.options = mergeOptions(this.options, { cache: { enabled } });
    return this;
  }

  forceRefresh(forceRefresh: boolean = true): this {
    this.options = mergeOptions(this.options, { cache: { forceRefresh } });
    return this;
  }

  setBackend(backend: TranslationBackend | undefined, fallbackBackend?: TranslationBackend): this {
    this.dependencies = { ...this.dependencies, backend, fallbackBackend };
    return this;
  }

  setLayoutDetector(detector: LayoutDetector | null | undefined): this {
    this.dependencies = { ...this.dependencies, layoutDetector: detector };
    return this;
  }

  setCacheStore(cacheStore: CacheStore | undefined): this {
    this.dependencies = { ...this.dependencies, cacheStore };
    return this;
  }

  onProgress(callback: ProgressCallback | undefined): this {
    this.dependencies = { ...this.dependencies, onProgress: callback };
    return this;
  }

  applyPreset(preset: PresetName): this {
    this.options = mergeOptions(this.options, ConfigPresets[preset]);
    return this;
  }

  /** @throws ConfigError before any work when the configuration is invalid */
  async translate(input: Uint8Array | ArrayBuffer, signal?: AbortSignal): Promise<TranslateResult> {
    const config = resolveConfig(this.options);
    const deps = await this.resolveDependencies(config, signal);
    return new TranslationJob(config, deps).run(toBytes(input));
  }

  /**
   * Translates a file and writes `{name}-{lang}-mono.pdf` and
   * `{name}-{lang}-dual.pdf`. Nothing is written when the job fails or is
   * cancelled.
   */
  async translateFile(
    inputPath: string,
    output: Partial<OutputPathOptions> = {},
    signal?: AbortSignal
  ): Promise<TranslateFileResult> {
    const config = resolveConfig(this.options);

    let input: Uint8Array;
    try {
      input = new Uint8Array(await readFile(inputPath));
    } catch (error) {
      throw new TranslationJobError('parse', error);
    }

    const deps = await this.resolveDependencies(config, signal);
    const result = await new TranslationJob(config, deps).run(input);
    if (signal?.aborted) throw new JobCancelledError('write');

    const files = outputPaths(inputPath, config.targetLang, output);
    try {
      await writeOutputs(files, result.mono, result.dual);
    } catch (error) {
      throw new TranslationJobError('write', error);
    }
    return { files, report: result.report };
  }

  /** Parses and classifies without translating; the layout model is not used. */
  async analyze(input: Uint8Array | ArrayBuffer): Promise<AnalysisResult> {
    const config = resolveConfig(this.options);
    const document = await new PDFParser().parse(toBytes(input));
    new LayoutClassifier({
      confidence: config.layout.confidence,
      translatableKinds: config.translatableKinds,
      fontPattern: config.fontRegex,
      charPattern: config.charRegex
    }).classify(document);

    const runs = documentRuns(document);
    const fonts = new Set([...document.fonts.sources.values()].map((font) => font.baseName));
    return {
      pageCount: document.pageCount,
      textRuns: runs.length,
      regions: document.pages.reduce((sum, page) => sum + page.regions.length, 0),
      totalCharacters: runs.reduce((sum, run) => sum + [...run.text].length, 0),
      translatableRuns: runs.filter((run) => run.isTranslatable).length,
      formulaRuns: runs.filter((run) => run.formulaReason !== undefined).length,
      fonts: [...fonts].sort(),
      warnings: [
        ...document.warnings,
        ...document.pages.flatMap((page) => page.warnings),
        ...runs.flatMap((run) => run.warnings)
      ]
    };
  }

  async dispose(): Promise<void> {
    const detector = this.detector;
    this.detector = null;
    if (detector) await detector.dispose();

    const stores = [...this.cacheStores.values()];
    this.cacheStores.clear();
    for (const store of stores) {
      await (await store).close();
    }
  }

  private async resolveDependencies(config: TranslateConfig, signal?: AbortSignal): Promise<TranslateDependencies> {
    const deps: TranslateDependencies = { ...this.dependencies, signal: signal ?? this.dependencies.signal };

    if (deps.layoutDetector === undefined) {
      deps.layoutDetector = config.layout.enabled ? this.defaultDetector(config) : null;
    }
    if (!deps.cacheStore && config.cache.enabled) {
      deps.cacheStore = await this.fileCache(config.cache.dir);
    }
    return deps;
  }

  private defaultDetector(config: TranslateConfig): OnnxLayoutDetector {
    if (!this.detector) {
      this.detector = new OnnxLayoutDetector({
        modelPath: config.layout.modelPath,
        modelUrl: config.layout.modelUrl,
        cacheDir: config.layout.cacheDir,
        confidence: config.layout.confidence
      });
    }
    return this.detector;
  }

  private fileCache(dir: string | undefined): Promise<FileCacheStore> {
    const key = dir ?? '';
    let store = this.cacheStores.get(key);
    if (!store) {
      // A failed open is not kept, so a later job can try again
      store = FileCacheStore.open(dir).catch((error: unknown) => {
        this.cacheStores.delete(key);
        throw error;
      });
      this.cacheStores.set(key, store);
    }
    return store;
  }

  // Static convenience method for one-shot translation
  static async translate(
    input: Uint8Array | ArrayBuffer,
    options: TranslateOptions = {},
    dependencies: TranslateDependencies = {}
  ): Promise<TranslateResult> {
    const translator = new PaperTranslator(options, dependencies);
    try {
      return await translator.translate(input);
    } finally {
      await translator.dispose();
    }
  }
}

export default PaperTranslator;
