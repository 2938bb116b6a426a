import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { InvalidLanguagePairError } from '../errors.js';
import type { ScriptId } from '../types/fonts.js';
import type { LanguagePair } from '../types/translation.js';

const LANGUAGE_CODE = /^(auto|[a-z]{2,3}(-[A-Za-z]{2,4})?)$/;

let languages: Record<string, string> | null = null;

/** Supported language codes and their English names; `auto` is source-only. */
export function supportedLanguages(): Record<string, string> {
  if (!languages) {
    const file = new URL('../../data/languages.json', import.meta.url);
    languages = z.record(z.string(), z.string()).parse(JSON.parse(readFileSync(file, 'utf8')));
  }
  return languages;
}

export function languageName(code: string): string {
  const table = supportedLanguages();
  return table[code] ?? table[baseLanguage(code)] ?? code;
}

/** `zh-TW` → `zh`. */
export function baseLanguage(code: string): string {
  return code.split('-')[0].toLowerCase();
}

/**
 * @throws InvalidLanguagePairError for malformed codes or an `auto` target
 */
export function validateLanguagePair(pair: LanguagePair): void {
  const { sourceLang, targetLang } = pair;
  if (!LANGUAGE_CODE.test(sourceLang)) {
    throw new InvalidLanguagePairError(sourceLang, targetLang, `malformed source language "${sourceLang}"`);
  }
  if (!LANGUAGE_CODE.test(targetLang)) {
    throw new InvalidLanguagePairError(sourceLang, targetLang, `malformed target language "${targetLang}"`);
  }
  if (targetLang === 'auto') {
    throw new InvalidLanguagePairError(sourceLang, targetLang, 'target language cannot be auto');
  }
}

const SCRIPTS: Record<string, ScriptId> = {
  ko: 'hangul',
  ja: 'japanese',
  zh: 'chinese-simplified',
  ru: 'cyrillic',
  uk: 'cyrillic',
  bg: 'cyrillic',
  sr: 'cyrillic',
  be: 'cyrillic',
  mk: 'cyrillic',
  el: 'greek',
  ar: 'arabic',
  fa: 'arabic',
  ur: 'arabic',
  he: 'hebrew',
  hi: 'devanagari',
  mr: 'devanagari',
  ne: 'devanagari',
  th: 'thai'
};

/** Writing system text in `code` is set in. */
export function scriptForLanguage(code: string): ScriptId {
  const normalized = code.toLowerCase();
  if (normalized === 'zh-tw' || normalized === 'zh-hk' || normalized === 'zh-hant') return 'chinese-traditional';
  return SCRIPTS[baseLanguage(code)] ?? 'latin';
}

/**
 * Scripts written without spaces between words, so a line may break
 * between any two characters. Korean separates words with spaces.
 */
export function breaksAnywhere(script: ScriptId): boolean {
  return script === 'japanese' || script === 'chinese-simplified' || script === 'chinese-traditional';
}
