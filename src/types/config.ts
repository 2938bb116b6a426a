import type { JobStage } from '../errors.js';
import type { LayoutDetector } from './layout.js';
import type { CacheStore, TranslationBackend } from './translation.js';

export interface TranslationProgress {
  stage: JobStage | 'complete';
  /** 0-100 within the stage. */
  progress: number;
  currentPage?: number;
  totalPages?: number;
  message?: string;
}

export type ProgressCallback = (progress: TranslationProgress) => void;

/** Collaborators that do not belong in a serialisable configuration. */
export interface TranslateDependencies {
  /** Replaces the backend named by `service`. */
  backend?: TranslationBackend;
  /** Replaces the backend named by `fallbackService`. */
  fallbackBackend?: TranslationBackend;
  /** `null` turns layout detection off. */
  layoutDetector?: LayoutDetector | null;
  /** Replaces the file cache in `cache.dir`. */
  cacheStore?: CacheStore;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}
