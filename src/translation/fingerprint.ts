import { createHash } from 'node:crypto';
import type { CacheParams, LanguagePair } from '../types/translation.js';

/** Unicode NFC with runs of whitespace collapsed to one space. */
export function normalizeText(text: string): string {
  return text.normalize('NFC').replace(/\s+/gu, ' ').trim();
}

export interface BackendIdentity {
  name: string;
  model: string;
  params: CacheParams;
}

/**
 * Cache and dedup key of a text: the normalised text, the language pair
 * and everything about the backend that changes its output.
 */
export function fingerprint(text: string, pair: LanguagePair, backend: BackendIdentity): string {
  const params = Object.keys(backend.params)
    .sort()
    .map((key) => [key, backend.params[key]]);
  const key = JSON.stringify([normalizeText(text), pair.sourceLang, pair.targetLang, backend.name, backend.model, params]);
  return createHash('sha256').update(key).digest('hex');
}
