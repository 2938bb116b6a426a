export interface LanguagePair {
  sourceLang: string;
  targetLang: string;
}

export type CacheParams = Record<string, string | number | boolean>;

/** Deduplicated piece of text to translate; every run with the same fingerprint shares it. */
export interface TranslationUnit {
  fingerprint: string;
  text: string;
  sourceLang: string;
  targetLang: string;
  backend: string;
  model: string;
  runIds: string[];
}

export type UnitResult =
  | { status: 'translated'; text: string; fromCache: boolean; backend: string }
  | { status: 'failed'; error: Error };

export interface CacheEntry {
  fingerprint: string;
  translation: string;
  sourceText: string;
  backend: string;
  model: string;
  sourceLang: string;
  targetLang: string;
  createdAt: string;
}

export interface CacheStore {
  get(fingerprint: string): Promise<CacheEntry | undefined>;
  /** Stores the entry unless one already exists; returns whether it was written. */
  put(entry: CacheEntry): Promise<boolean>;
  close?(): Promise<void>;
}

export interface TranslationBackend {
  readonly name: string;
  readonly model: string;
  /** Largest number of texts accepted by one `translate` call. */
  readonly maxBatchSize: number;
  translate(texts: string[], pair: LanguagePair, signal?: AbortSignal): Promise<string[]>;
  /** Parameters that change the backend's output and therefore the cache key. */
  cacheParams(): CacheParams;
  supports(pair: LanguagePair): boolean;
}

export interface DispatchStats {
  units: number;
  cacheHits: number;
  backendCalls: number;
  retries: number;
  failed: number;
  failedOver: boolean;
}
