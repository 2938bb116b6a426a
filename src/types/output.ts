import type { DocumentWarning } from './pdf.js';

export interface RenderOutput {
  mono: Uint8Array;
  dual: Uint8Array;
  /** 0-based indices of pages that fell back to their original content. */
  fallbackPages: number[];
  overflowRuns: number;
}

export interface WarningSummary {
  untranslatedRuns: number;
  unmappedGlyphs: number;
  fallbackPages: number;
  overflowRuns: number;
  layoutDegraded: boolean;
  failedUnits: number;
}

export interface TranslationReport {
  pageCount: number;
  translatedPages: number;
  units: number;
  cacheHits: number;
  backendCalls: number;
  processingTime: number;
  warnings: DocumentWarning[];
  summary: WarningSummary;
}

export interface TranslateResult {
  mono: Uint8Array;
  dual: Uint8Array;
  report: TranslationReport;
}

export interface OutputFiles {
  dir: string;
  mono: string;
  dual: string;
}

export interface AnalysisResult {
  pageCount: number;
  textRuns: number;
  regions: number;
  totalCharacters: number;
  translatableRuns: number;
  formulaRuns: number;
  fonts: string[];
  warnings: DocumentWarning[];
}
