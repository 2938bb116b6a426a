import { BackendRejectedError, BackendUnavailableError, RateLimitedError, errorMessage } from '../../errors.js';
import { BaseBackend, type BackendOptions } from '../backend.js';
import type { LanguagePair } from '../../types/translation.js';

/** Longest query the endpoint accepts. */
const MAX_QUERY_LENGTH = 5000;

const RESULT_PATTERN = /class="(?:t0|result-container)">([\s\S]*?)</;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00a0'
};

export function unescapeHtml(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (match, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) return String.fromCodePoint(parseInt(entity.slice(2), 16));
    if (entity.startsWith('#')) return String.fromCodePoint(parseInt(entity.slice(1), 10));
    return NAMED_ENTITIES[entity] ?? match;
  });
}

export function removeControlCharacters(text: string): string {
  return text.replace(/\p{C}/gu, '');
}

export interface GoogleTranslateOptions extends BackendOptions {
  endpoint?: string;
  fetch?: typeof fetch;
}

/**
 * Google's free mobile translation page. One request per text; the
 * translation is scraped out of the returned HTML.
 */
export class GoogleTranslateBackend extends BaseBackend {
  readonly name = 'google';
  protected readonly langMap: Record<string, string> = { zh: 'zh-CN', 'zh-cn': 'zh-CN', 'zh-tw': 'zh-TW' };
  private readonly endpoint: string;
  private readonly fetchFn: typeof fetch;

  constructor(options: GoogleTranslateOptions = {}) {
    super('default', { ...options, batchSize: 1 });
    this.endpoint = options.endpoint ?? 'https://translate.google.com/m';
    this.fetchFn = options.fetch ?? fetch;
  }

  protected async translateBatch(texts: string[], pair: LanguagePair, signal?: AbortSignal): Promise<string[]> {
    const results: string[] = [];
    for (const text of texts) {
      results.push(await this.translateOne(text, pair, signal));
    }
    return results;
  }

  private async translateOne(text: string, pair: LanguagePair, signal?: AbortSignal): Promise<string> {
    const url = new URL(this.endpoint);
    url.searchParams.set('tl', pair.targetLang);
    url.searchParams.set('sl', pair.sourceLang);
    url.searchParams.set('q', text.slice(0, MAX_QUERY_LENGTH));

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: { 'User-Agent': 'Mozilla/4.0 (compatible;MSIE 6.0;Windows NT 5.1;SV1)' },
        signal
      });
    } catch (error) {
      throw new BackendUnavailableError(`Google Translate request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (response.status === 429) {
      const retryAfter = Number(response.headers.get('Retry-After'));
      throw new RateLimitedError('Google Translate rate limit reached', {
        retryAfterMs: Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter * 1000 : undefined
      });
    }
    if (response.status >= 500) {
      throw new BackendUnavailableError(`Google Translate returned ${response.status}`, { status: response.status });
    }
    if (!response.ok) {
      throw new BackendRejectedError(`Google Translate returned ${response.status}`, { status: response.status });
    }

    const match = RESULT_PATTERN.exec(await response.text());
    if (!match) {
      throw new BackendUnavailableError('Google Translate response contained no translation');
    }
    return removeControlCharacters(unescapeHtml(match[1]));
  }
}
