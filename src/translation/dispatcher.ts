import { BatchMisalignedError, InvalidLanguagePairError, JobCancelledError, errorMessage } from '../errors.js';
import { fingerprint, normalizeText } from './fingerprint.js';
import { RateLimiter } from './rate-limiter.js';
import { withRetry, type RetryPolicy, type SleepFn } from './retry.js';
import type { TextRun } from '../types/pdf.js';
import type {
  CacheStore,
  DispatchStats,
  LanguagePair,
  TranslationBackend,
  TranslationUnit,
  UnitResult
} from '../types/translation.js';

export interface DispatcherOptions {
  /** Size of the worker pool. */
  threads: number;
  batchSize: number;
  maxBatchChars: number;
  retry: RetryPolicy;
  /** Skip cache reads; successes are still written. */
  forceRefresh: boolean;
  /** Consecutive failed units before switching to the fallback backend. */
  failoverAfter: number;
  cache?: CacheStore;
  fallback?: TranslationBackend;
  rateLimiter?: RateLimiter;
  signal?: AbortSignal;
  sleep?: SleepFn;
  onProgress?: (completed: number, total: number) => void;
}

const DEFAULT_OPTIONS: DispatcherOptions = {
  threads: 4,
  batchSize: 1,
  maxBatchChars: 4000,
  retry: { maxAttempts: 4, baseDelayMs: 1000, maxDelayMs: 20000 },
  forceRefresh: false,
  failoverAfter: 3
};

function emptyStats(): DispatchStats {
  return { units: 0, cacheHits: 0, backendCalls: 0, retries: 0, failed: 0, failedOver: false };
}

function backendIdentity(backend: TranslationBackend): { name: string; model: string; params: ReturnType<TranslationBackend['cacheParams']> } {
  return { name: backend.name, model: backend.model, params: backend.cacheParams() };
}

/**
 * One unit per distinct normalised text, in order of first appearance.
 * Runs with nothing to translate are left out.
 */
export function collectUnits(runs: TextRun[], pair: LanguagePair, backend: TranslationBackend): TranslationUnit[] {
  const identity = backendIdentity(backend);
  const units = new Map<string, TranslationUnit>();

  for (const run of runs) {
    if (!run.isTranslatable) continue;
    const text = normalizeText(run.text);
    if (text === '') continue;

    const key = fingerprint(text, pair, identity);
    const existing = units.get(key);
    if (existing) {
      existing.runIds.push(run.id);
    } else {
      units.set(key, {
        fingerprint: key,
        text,
        sourceLang: pair.sourceLang,
        targetLang: pair.targetLang,
        backend: backend.name,
        model: backend.model,
        runIds: [run.id]
      });
    }
  }
  return [...units.values()];
}

/**
 * Writes unit results back onto their runs. Failed units leave the run
 * untranslated with a `TranslationFailed` warning.
 */
export function applyResults(runs: TextRun[], units: TranslationUnit[], results: Map<string, UnitResult>): void {
  const byId = new Map(runs.map((run) => [run.id, run]));
  for (const unit of units) {
    const result = results.get(unit.fingerprint);
    for (const runId of unit.runIds) {
      const run = byId.get(runId);
      if (!run || !result) continue;
      if (result.status === 'translated') {
        run.translation = result.text;
      } else {
        run.warnings.push({
          code: 'TranslationFailed',
          message: `Translation failed: ${result.error.message}`,
          runId: run.id
        });
      }
    }
  }
}

/**
 * Sends translation units to a backend through the cache, a bounded
 * pool of workers and the retry policy. Results are keyed by unit
 * fingerprint so completion order never matters.
 */
export class TranslationDispatcher {
  private readonly options: DispatcherOptions;
  private readonly rateLimiter: RateLimiter;
  private active: TranslationBackend;
  private results = new Map<string, UnitResult>();
  private queue: TranslationUnit[][] = [];
  private failedUnits: TranslationUnit[] = [];
  private consecutiveFailures = 0;
  private fatal: Error | null = null;
  private total = 0;
  private _stats: DispatchStats = emptyStats();

  constructor(
    private readonly backend: TranslationBackend,
    options: Partial<DispatcherOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.rateLimiter = options.rateLimiter ?? new RateLimiter(0);
    this.active = backend;
  }

  get stats(): DispatchStats {
    return { ...this._stats };
  }

  async translateAll(units: TranslationUnit[]): Promise<Map<string, UnitResult>> {
    const { signal } = this.options;
    if (signal?.aborted) throw new JobCancelledError('translate');

    const unique = this.dedupe(units);
    this.reset();
    this.total = unique.length;
    this._stats.units = unique.length;

    const pending = this.options.forceRefresh ? unique : await this.resolveFromCache(unique, this.backend);
    this.queue = this.makeBatches(pending);

    const workers = Math.max(1, Math.min(this.options.threads, this.queue.length));
    await Promise.all(Array.from({ length: workers }, () => this.worker()));

    if (this.fatal) throw this.fatal;
    if (signal?.aborted) throw new JobCancelledError('translate');

    this._stats.failed = [...this.results.values()].filter((result) => result.status === 'failed').length;
    return this.results;
  }

  /** Clears the state of a previous call; the dispatcher may be reused. */
  private reset(): void {
    this.active = this.backend;
    this.results = new Map();
    this.queue = [];
    this.failedUnits = [];
    this.consecutiveFailures = 0;
    this.fatal = null;
    this._stats = emptyStats();
  }

  private dedupe(units: TranslationUnit[]): TranslationUnit[] {
    const unique = new Map<string, TranslationUnit>();
    for (const unit of units) {
      const existing = unique.get(unit.fingerprint);
      if (existing) {
        existing.runIds = [...new Set([...existing.runIds, ...unit.runIds])];
      } else {
        unique.set(unit.fingerprint, { ...unit, runIds: [...unit.runIds] });
      }
    }
    return [...unique.values()];
  }

  /** Resolves cache hits; returns the units still to translate. */
  private async resolveFromCache(units: TranslationUnit[], backend: TranslationBackend): Promise<TranslationUnit[]> {
    const { cache } = this.options;
    if (!cache) return units;

    const identity = backendIdentity(backend);
    const misses: TranslationUnit[] = [];
    for (const unit of units) {
      const key = backend === this.backend ? unit.fingerprint : fingerprint(unit.text, unit, identity);
      const entry = await cache.get(key);
      if (entry) {
        this.succeed(unit, entry.translation, true, backend);
        this._stats.cacheHits++;
      } else {
        misses.push(unit);
      }
    }
    return misses;
  }

  private makeBatches(units: TranslationUnit[]): TranslationUnit[][] {
    const limit = Math.max(1, Math.min(this.options.batchSize, this.active.maxBatchSize));
    const batches: TranslationUnit[][] = [];
    let current: TranslationUnit[] = [];
    let chars = 0;

    for (const unit of units) {
      const full = current.length >= limit || (current.length > 0 && chars + unit.text.length > this.options.maxBatchChars);
      if (full) {
        batches.push(current);
        current = [];
        chars = 0;
      }
      current.push(unit);
      chars += unit.text.length;
    }
    if (current.length > 0) batches.push(current);
    return batches;
  }

  private async worker(): Promise<void> {
    for (;;) {
      if (this.fatal || this.options.signal?.aborted) return;
      const batch = this.queue.shift();
      if (!batch) return;
      await this.processBatch(batch);
    }
  }

  private async processBatch(units: TranslationUnit[]): Promise<void> {
    const backend = this.active;
    const batch = backend === this.backend || this.options.forceRefresh ? units : await this.resolveFromCache(units, backend);
    if (batch.length === 0) return;
    const pair: LanguagePair = { sourceLang: batch[0].sourceLang, targetLang: batch[0].targetLang };

    try {
      const translations = await this.call(backend, batch.map((unit) => unit.text), pair);
      if (translations.length !== batch.length) {
        throw new BatchMisalignedError(batch.length, translations.length);
      }
      this.consecutiveFailures = 0;
      for (let i = 0; i < batch.length; i++) {
        this.succeed(batch[i], translations[i], false, backend);
        await this.store(batch[i], translations[i], backend);
      }
    } catch (error) {
      if (error instanceof InvalidLanguagePairError) {
        this.fatal = error;
        return;
      }
      if (error instanceof BatchMisalignedError && batch.length > 1) {
        console.warn(`${error.message}; retrying ${batch.length} texts one by one`);
        for (const unit of batch) {
          if (this.fatal) return;
          await this.processBatch([unit]);
        }
        return;
      }
      this.fail(batch, error, backend);
    }
  }

  private async call(backend: TranslationBackend, texts: string[], pair: LanguagePair): Promise<string[]> {
    const { signal } = this.options;
    return withRetry(
      async () => {
        await this.rateLimiter.acquire(signal);
        this._stats.backendCalls++;
        // In-flight requests run to completion even when the job is cancelled
        return backend.translate(texts, pair);
      },
      this.options.retry,
      {
        signal,
        sleep: this.options.sleep,
        onRetry: (attempt, delayMs, error) => {
          this._stats.retries++;
          console.warn(`Retrying ${backend.name} (attempt ${attempt + 1}) in ${delayMs}ms: ${errorMessage(error)}`);
        }
      }
    );
  }

  private succeed(unit: TranslationUnit, text: string, fromCache: boolean, backend: TranslationBackend): void {
    this.results.set(unit.fingerprint, { status: 'translated', text, fromCache, backend: backend.name });
    this.progress();
  }

  private fail(batch: TranslationUnit[], error: unknown, backend: TranslationBackend): void {
    const cause = error instanceof Error ? error : new Error(String(error));
    console.warn(`Translation failed for ${batch.length} text(s) on ${backend.name}: ${cause.message}`);

    // Started on the primary before another worker switched over
    if (backend === this.backend && this._stats.failedOver) {
      this.queue.push(...this.makeBatches(batch));
      return;
    }

    for (const unit of batch) {
      this.results.set(unit.fingerprint, { status: 'failed', error: cause });
      this.progress();
    }
    if (backend !== this.backend) return;

    this.failedUnits.push(...batch);
    this.consecutiveFailures += batch.length;
    if (this.options.fallback && !this._stats.failedOver && this.consecutiveFailures >= this.options.failoverAfter) {
      this.failover(this.options.fallback);
    }
  }

  /** Re-queues the failed and the remaining units for the fallback backend. */
  private failover(fallback: TranslationBackend): void {
    console.warn(`${this.backend.name} failed ${this.consecutiveFailures} time(s) in a row; switching to ${fallback.name}`);
    this._stats.failedOver = true;
    this.active = fallback;

    const retry = this.failedUnits;
    this.failedUnits = [];
    for (const unit of retry) this.results.delete(unit.fingerprint);
    this.queue = this.makeBatches([...retry, ...this.queue.flat()]);
  }

  private async store(unit: TranslationUnit, translation: string, backend: TranslationBackend): Promise<void> {
    const { cache } = this.options;
    if (!cache) return;

    const key = backend === this.backend ? unit.fingerprint : fingerprint(unit.text, unit, backendIdentity(backend));
    try {
      await cache.put({
        fingerprint: key,
        translation,
        sourceText: unit.text,
        backend: backend.name,
        model: backend.model,
        sourceLang: unit.sourceLang,
        targetLang: unit.targetLang,
        createdAt: new Date().toISOString()
      });
    } catch (error) {
      console.warn('Failed to write translation cache entry:', errorMessage(error));
    }
  }

  private progress(): void {
    this.options.onProgress?.(this.results.size, this.total);
  }
}
