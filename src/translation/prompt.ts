import { z } from 'zod';
import { BatchMisalignedError } from '../errors.js';
import { languageName } from './languages.js';
import type { LanguagePair } from '../types/translation.js';

export const DEFAULT_PROMPT_TEMPLATE =
  'You are a professional, authentic machine translation engine. ' +
  'Only Output the translated text, do not include any other text.\n\n' +
  'Translate the following source text to ${lang_out}. ' +
  'Keep mathematical notation, citations and URLs unchanged. ' +
  'Keep the formula notation {v*} unchanged. ' +
  'Output translation directly without any additional text.\n\n' +
  'Source Text: ${text}\n\n' +
  'Translated Text:';

/**
 * Fills `${lang_in}`, `${lang_out}` and `${text}`; any other placeholder
 * is left as written.
 */
export function renderPrompt(template: string | undefined, pair: LanguagePair, text: string): string {
  const values: Record<string, string> = {
    lang_in: pair.sourceLang === 'auto' ? 'the detected language' : languageName(pair.sourceLang),
    lang_out: languageName(pair.targetLang),
    text
  };
  return (template ?? DEFAULT_PROMPT_TEMPLATE).replace(/\$\{(\w+)\}/g, (match, name: string) => values[name] ?? match);
}

export function batchPrompt(texts: string[], pair: LanguagePair): string {
  return [
    'You are a professional, authentic machine translation engine.',
    `Translate each string of the JSON array below to ${languageName(pair.targetLang)}.`,
    'Keep mathematical notation, citations and URLs unchanged.',
    'Keep the formula notation {v*} unchanged.',
    `Answer with a JSON array of exactly ${texts.length} strings in the same order and nothing else.`,
    '',
    JSON.stringify(texts)
  ].join('\n');
}

/** Removes reasoning blocks some models emit before the answer. */
export function stripThinking(text: string): string {
  return text.replace(/<think>[\s\S]*?<\/think>/g, '').trim();
}

const batchResponseSchema = z.array(z.string());

/**
 * @throws BatchMisalignedError when the answer is not an array of the expected length
 */
export function parseBatchResponse(raw: string, expected: number): string[] {
  const body = stripThinking(raw)
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new BatchMisalignedError(expected, 0);
  }

  const result = batchResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new BatchMisalignedError(expected, Array.isArray(parsed) ? parsed.length : 0);
  }
  if (result.data.length !== expected) {
    throw new BatchMisalignedError(expected, result.data.length);
  }
  return result.data;
}
