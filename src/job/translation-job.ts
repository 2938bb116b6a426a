import { ConfigError, InvalidLanguagePairError, JobCancelledError, TranslationJobError, type JobStage } from '../errors.js';
import type { TranslateConfig } from '../config/schema.js';
import { documentRuns, translatableRuns } from '../core/document-utils.js';
import { parsePageRange } from '../core/page-range.js';
import { PDFParser } from '../core/pdf-parser.js';
import { FontCatalog } from '../fonts/font-catalog.js';
import { FontManager } from '../fonts/font-manager.js';
import { LayoutAnalyzer } from '../layout/layout-analyzer.js';
import { LayoutClassifier } from '../layout/layout-classifier.js';
import { PageRasterizer } from '../layout/page-rasterizer.js';
import { ParagraphAssembler } from '../layout/paragraph-assembler.js';
import { PdfComposer } from '../render/pdf-composer.js';
import { createBackend } from '../translation/backends/index.js';
import { applyResults, collectUnits, TranslationDispatcher } from '../translation/dispatcher.js';
import { validateLanguagePair } from '../translation/languages.js';
import { RateLimiter } from '../translation/rate-limiter.js';
import type { TranslateDependencies, TranslationProgress } from '../types/config.js';
import type { RenderOutput, TranslateResult, TranslationReport } from '../types/output.js';
import type { DocumentWarning, ParsedDocument } from '../types/pdf.js';
import type { DispatchStats, LanguagePair, TranslationBackend } from '../types/translation.js';

/**
 * Gathers every warning of the document: document level, then per page,
 * then per run.
 */
export function collectWarnings(document: ParsedDocument, extra: DocumentWarning[] = []): DocumentWarning[] {
  const warnings = [...document.warnings, ...extra];
  for (const page of document.pages) {
    warnings.push(...page.warnings);
    for (const region of page.regions) {
      for (const run of region.runs) warnings.push(...run.warnings);
    }
  }
  return warnings;
}

/**
 * One translation of one document: parse, detect layout, classify,
 * translate and render. Layout detection only runs when a detector is
 * supplied, and the cache only when a store is.
 */
export class TranslationJob {
  private stage: JobStage = 'config';

  constructor(
    private readonly config: TranslateConfig,
    private readonly deps: TranslateDependencies = {}
  ) {}

  async run(input: Uint8Array): Promise<TranslateResult> {
    const startTime = Date.now();
    try {
      return await this.execute(input, startTime);
    } catch (error) {
      if (error instanceof JobCancelledError || error instanceof ConfigError) throw error;
      throw new TranslationJobError(this.stage, error);
    }
  }

  private async execute(input: Uint8Array, startTime: number): Promise<TranslateResult> {
    const { config, deps } = this;
    const pair: LanguagePair = { sourceLang: config.sourceLang, targetLang: config.targetLang };

    this.enter('config');
    const backend = deps.backend ?? createBackend(config.service, config);
    const fallback = deps.fallbackBackend ?? (config.fallbackService ? createBackend(config.fallbackService, config) : undefined);
    validateLanguagePair(pair);
    if (!backend.supports(pair)) {
      throw new InvalidLanguagePairError(pair.sourceLang, pair.targetLang, `not supported by ${backend.name}`);
    }

    this.enter('parse');
    const document = await new PDFParser().parse(input);
    if (config.pages !== undefined) {
      const selected = new Set(parsePageRange(config.pages, document.pageCount));
      for (const page of document.pages) page.selected = selected.has(page.index);
    }
    this.report('parse', 100, { totalPages: document.pageCount, message: `Parsed ${document.pageCount} pages` });

    this.enter('layout');
    const analysis = await new LayoutAnalyzer({
      detector: deps.layoutDetector ?? undefined,
      rasterizer: new PageRasterizer({ scale: config.layout.renderScale }),
      required: config.layout.required
    }).analyze(document, deps.signal);
    new LayoutClassifier({
      confidence: config.layout.confidence,
      translatableKinds: config.translatableKinds,
      fontPattern: config.fontRegex,
      charPattern: config.charRegex
    }).classify(document, analysis.detections);
    if (config.mergeLines) new ParagraphAssembler().assemble(document);
    this.report('layout', 100, { message: analysis.degraded ? 'Layout model unavailable, using heuristics' : 'Layout classified' });

    this.enter('translate');
    const stats = await this.translate(document, pair, backend, fallback);

    this.enter('render');
    const catalog = new FontCatalog({
      fonts: config.fonts,
      searchPaths: config.fontSearchPaths,
      bundled: config.bundledFonts
    });
    const fonts = new FontManager(catalog, document.fonts, { subset: config.subsetFonts });
    const output = await new PdfComposer(fonts, {
      targetLang: config.targetLang,
      overflow: config.overflow,
      minFontScale: config.minFontScale,
      dualLayout: config.dualLayout
    }).render(document);
    this.checkCancelled();
    this.report('render', 100, { message: 'Rendered mono and dual PDFs' });

    const report = this.buildReport(document, stats, output, analysis.warnings, analysis.degraded, startTime);
    this.report('complete', 100, { message: 'Translation completed' });
    return { mono: output.mono, dual: output.dual, report };
  }

  private async translate(
    document: ParsedDocument,
    pair: LanguagePair,
    backend: TranslationBackend,
    fallback: TranslationBackend | undefined
  ): Promise<DispatchStats> {
    const { config, deps } = this;
    const runs = translatableRuns(document);
    const units = collectUnits(runs, pair, backend);

    const dispatcher = new TranslationDispatcher(backend, {
      threads: config.threads,
      batchSize: config.batchSize,
      maxBatchChars: config.maxBatchChars,
      retry: config.retry,
      forceRefresh: config.cache.forceRefresh,
      failoverAfter: config.failoverAfter,
      cache: deps.cacheStore,
      fallback,
      rateLimiter: new RateLimiter(config.requestsPerMinute),
      signal: deps.signal,
      onProgress: (completed, total) =>
        this.report('translate', total === 0 ? 100 : Math.round((completed / total) * 100), {
          message: `Translated ${completed}/${total} texts`
        })
    });

    const results = await dispatcher.translateAll(units);
    applyResults(runs, units, results);
    return dispatcher.stats;
  }

  private buildReport(
    document: ParsedDocument,
    stats: DispatchStats,
    output: RenderOutput,
    layoutWarnings: DocumentWarning[],
    layoutDegraded: boolean,
    startTime: number
  ): TranslationReport {
    const fallback = new Set(output.fallbackPages);
    const translatedPages = document.pages.filter(
      (page) =>
        page.selected &&
        !fallback.has(page.index) &&
        page.regions.some((region) => region.runs.some((run) => run.translation !== undefined))
    ).length;
    const runs = documentRuns(document);

    return {
      pageCount: document.pageCount,
      translatedPages,
      units: stats.units,
      cacheHits: stats.cacheHits,
      backendCalls: stats.backendCalls,
      processingTime: Date.now() - startTime,
      warnings: collectWarnings(document, layoutWarnings),
      summary: {
        untranslatedRuns: translatableRuns(document).filter((run) => run.translation === undefined).length,
        unmappedGlyphs: runs.reduce((sum, run) => sum + run.unmappedGlyphs, 0),
        fallbackPages: output.fallbackPages.length,
        overflowRuns: output.overflowRuns,
        layoutDegraded,
        failedUnits: stats.failed
      }
    };
  }

  private enter(stage: JobStage): void {
    this.checkCancelled();
    this.stage = stage;
    this.report(stage, 0);
  }

  private checkCancelled(): void {
    if (this.deps.signal?.aborted) throw new JobCancelledError(this.stage);
  }

  private report(stage: TranslationProgress['stage'], progress: number, extra: Partial<TranslationProgress> = {}): void {
    this.deps.onProgress?.({ stage, progress, ...extra });
  }
}
