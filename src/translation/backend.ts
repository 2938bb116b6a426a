import { BatchMisalignedError, InvalidLanguagePairError } from '../errors.js';
import { validateLanguagePair } from './languages.js';
import type { CacheParams, LanguagePair, TranslationBackend } from '../types/translation.js';

export interface BackendOptions {
  model?: string;
  /** Credentials and endpoints; missing keys fall back to `process.env`. */
  envs?: Record<string, string>;
  /** Texts per request. */
  batchSize?: number;
}

/**
 * Shared checks around a concrete service call: language validation,
 * code mapping and the one-output-per-input contract.
 */
export abstract class BaseBackend implements TranslationBackend {
  abstract readonly name: string;
  readonly model: string;
  readonly maxBatchSize: number;
  protected readonly envs: Record<string, string>;
  /** Service-specific language codes, keyed by lower-case code. */
  protected readonly langMap: Record<string, string> = {};

  constructor(defaultModel: string, options: BackendOptions = {}) {
    this.model = options.model ?? defaultModel;
    this.envs = options.envs ?? {};
    this.maxBatchSize = Math.max(1, options.batchSize ?? 1);
  }

  protected getEnv(key: string): string | undefined {
    return this.envs[key] ?? process.env[key];
  }

  protected mapLanguage(code: string): string {
    return this.langMap[code.toLowerCase()] ?? code;
  }

  cacheParams(): CacheParams {
    return {};
  }

  supports(pair: LanguagePair): boolean {
    return pair.sourceLang !== pair.targetLang || pair.sourceLang === 'auto';
  }

  async translate(texts: string[], pair: LanguagePair, signal?: AbortSignal): Promise<string[]> {
    validateLanguagePair(pair);
    if (!this.supports(pair)) {
      throw new InvalidLanguagePairError(pair.sourceLang, pair.targetLang, `not supported by ${this.name}`);
    }
    if (texts.length === 0) return [];

    const mapped = { sourceLang: this.mapLanguage(pair.sourceLang), targetLang: this.mapLanguage(pair.targetLang) };
    const results = await this.translateBatch(texts, mapped, signal);
    if (results.length !== texts.length) {
      throw new BatchMisalignedError(texts.length, results.length);
    }
    return results;
  }

  protected abstract translateBatch(texts: string[], pair: LanguagePair, signal?: AbortSignal): Promise<string[]>;
}
