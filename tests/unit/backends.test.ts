import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import {
  AccessDeniedException,
  ServiceUnavailableException,
  ThrottlingException,
  ValidationException
} from '@aws-sdk/client-bedrock-runtime';
import { ApiError } from '@google/genai';
import {
  BackendRejectedError,
  BackendUnavailableError,
  BatchMisalignedError,
  ConfigError,
  InvalidLanguagePairError,
  RateLimitedError
} from '../../src/errors.js';
import {
  BedrockBackend,
  DEFAULT_BEDROCK_MODEL,
  GeminiBackend,
  GoogleTranslateBackend,
  bedrockClientConfig,
  classifyBedrockError,
  classifyGeminiError,
  createBackend,
  parseService,
  removeControlCharacters,
  parseBedrockResponse,
  unescapeHtml,
  type BedrockBackendOptions,
  type BedrockRequest,
  type GenerateRequest
} from '../../src/translation/backends/index.js';
import { TranslationDispatcher, applyResults, collectUnits } from '../../src/translation/dispatcher.js';
import { DEFAULT_PROMPT_TEMPLATE, renderPrompt } from '../../src/translation/prompt.js';
import { textRun } from '../helpers/fixtures.js';

const EN_FR = { sourceLang: 'en', targetLang: 'fr' };

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

function googleWith(body: string, init: ResponseInit = {}) {
  const urls: URL[] = [];
  const backend = new GoogleTranslateBackend({
    fetch: async (input) => {
      urls.push(new URL(String(input)));
      return new Response(body, init);
    }
  });
  return { backend, urls };
}

describe('GoogleTranslateBackend', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should scrape the translation out of the page', async () => {
    const { backend, urls } = googleWith('<html><div class="result-container">Bonjour &amp; salut</div></html>');

    expect(await backend.translate(['Hello and hi'], EN_FR)).toEqual(['Bonjour & salut']);
    expect(urls).toHaveLength(1);
    expect(urls[0].origin + urls[0].pathname).toBe('https://translate.google.com/m');
    expect(urls[0].searchParams.get('q')).toBe('Hello and hi');
    expect(urls[0].searchParams.get('sl')).toBe('en');
    expect(urls[0].searchParams.get('tl')).toBe('fr');
  });

  it('should send one request per text', async () => {
    const { backend, urls } = googleWith('<div class="t0">x</div>');

    expect(await backend.translate(['a', 'b'], EN_FR)).toEqual(['x', 'x']);
    expect(urls).toHaveLength(2);
    expect(backend.maxBatchSize).toBe(1);
  });

  it('should map Chinese codes', async () => {
    const { backend, urls } = googleWith('<div class="t0">你好</div>');

    await backend.translate(['Hello'], { sourceLang: 'en', targetLang: 'zh' });
    await backend.translate(['Hello'], { sourceLang: 'en', targetLang: 'zh-TW' });

    expect(urls.map((url) => url.searchParams.get('tl'))).toEqual(['zh-CN', 'zh-TW']);
  });

  it('should fail only the text a request was refused for', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const backend = new GoogleTranslateBackend({
      fetch: async (input) => {
        const text = new URL(String(input)).searchParams.get('q');
        return text === 'Bad'
          ? new Response('', { status: 400 })
          : new Response(`<div class="result-container">${text?.toUpperCase()}</div>`);
      }
    });
    const runs = [
      textRun({ text: 'Good', id: 'p1-t1', isTranslatable: true }),
      textRun({ text: 'Bad', id: 'p1-t2', isTranslatable: true })
    ];
    const units = collectUnits(runs, EN_FR, backend);

    const results = await new TranslationDispatcher(backend, {
      threads: 1,
      retry: { maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0 }
    }).translateAll(units);
    applyResults(runs, units, results);

    expect(runs.map((run) => run.translation)).toEqual(['GOOD', undefined]);
    expect(runs[1].warnings).toEqual([
      { code: 'TranslationFailed', message: 'Translation failed: Google Translate returned 400', runId: 'p1-t2' }
    ]);
  });

  it('should report a rate limit with the requested delay', async () => {
    const { backend } = googleWith('slow down', { status: 429, headers: { 'Retry-After': '3' } });
    const error = await rejection(backend.translate(['Hello'], EN_FR));

    expect(error).toBeInstanceOf(RateLimitedError);
    if (!(error instanceof RateLimitedError)) return;
    expect(error.retryAfterMs).toBe(3000);
  });

  it('should classify failed responses', async () => {
    await expect(googleWith('', { status: 400 }).backend.translate(['Hello'], EN_FR)).rejects.toThrow(
      new BackendRejectedError('Google Translate returned 400')
    );
    await expect(googleWith('', { status: 503 }).backend.translate(['Hello'], EN_FR)).rejects.toThrow(
      BackendUnavailableError
    );
    await expect(googleWith('', { status: 403 }).backend.translate(['Hello'], EN_FR)).rejects.toThrow(
      BackendRejectedError
    );
    await expect(googleWith('<html>captcha</html>').backend.translate(['Hello'], EN_FR)).rejects.toThrow(
      'Google Translate response contained no translation'
    );
  });

  it('should wrap network failures', async () => {
    const backend = new GoogleTranslateBackend({
      fetch: async () => {
        throw new TypeError('fetch failed');
      }
    });

    await expect(backend.translate(['Hello'], EN_FR)).rejects.toThrow(
      new BackendUnavailableError('Google Translate request failed: fetch failed')
    );
  });

  it('should refuse a pair with the same language on both sides', async () => {
    const { backend, urls } = googleWith('<div class="t0">x</div>');

    await expect(backend.translate(['Hello'], { sourceLang: 'en', targetLang: 'en' })).rejects.toThrow(
      'Unsupported language pair en -> en: not supported by google'
    );
    expect(urls).toHaveLength(0);
  });

  it('should return nothing for no texts', async () => {
    const { backend, urls } = googleWith('<div class="t0">x</div>');

    expect(await backend.translate([], EN_FR)).toEqual([]);
    expect(urls).toHaveLength(0);
  });
});

describe('HTML clean-up', () => {
  it('should decode entities and drop control characters', () => {
    expect(unescapeHtml('&lt;b&gt; &#39;x&#x27; &nbsp;&unknown;')).toBe("<b> 'x' \u00a0&unknown;");
    expect(removeControlCharacters('a\u0000b\u200Bc')).toBe('abc');
  });
});

describe('GeminiBackend', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  function geminiWith(answer: string | (() => Promise<string>), batchSize = 1) {
    const requests: GenerateRequest[] = [];
    const backend = new GeminiBackend({
      batchSize,
      generate: async (request) => {
        requests.push(request);
        return typeof answer === 'string' ? answer : answer();
      }
    });
    return { backend, requests };
  }

  it('should send one rendered prompt for a single text', async () => {
    const { backend, requests } = geminiWith('<think>plan</think>Bonjour le monde');

    expect(await backend.translate(['Hello world'], EN_FR)).toEqual(['Bonjour le monde']);
    expect(requests).toEqual([
      {
        model: 'gemini-2.0-flash',
        prompt: renderPrompt(undefined, EN_FR, 'Hello world'),
        temperature: 0,
        signal: undefined
      }
    ]);
  });

  it('should translate a batch through a JSON array', async () => {
    const { backend, requests } = geminiWith('["Un", "Deux"]', 4);

    expect(await backend.translate(['One', 'Two'], EN_FR)).toEqual(['Un', 'Deux']);
    expect(requests).toHaveLength(1);
    expect(requests[0].prompt).toContain('["One","Two"]');
  });

  it('should reject a batch answer of the wrong length', async () => {
    const { backend } = geminiWith('["Un"]', 4);

    await expect(backend.translate(['One', 'Two'], EN_FR)).rejects.toThrow(BatchMisalignedError);
  });

  it('should treat an empty answer as a transient failure', async () => {
    const { backend } = geminiWith('<think>hmm</think>');

    await expect(backend.translate(['One'], EN_FR)).rejects.toThrow(
      new BackendUnavailableError('Gemini returned an empty answer')
    );
  });

  it('should classify SDK failures', async () => {
    const { backend } = geminiWith(async () => {
      throw new Error('got status: 429 RESOURCE_EXHAUSTED');
    });

    await expect(backend.translate(['One'], EN_FR)).rejects.toThrow(RateLimitedError);
  });

  it('should put prompt settings into the cache parameters', () => {
    expect(geminiWith('x').backend.cacheParams()).toEqual({ temperature: 0, prompt: DEFAULT_PROMPT_TEMPLATE });
    expect(geminiWith('x', 4).backend.cacheParams()).toEqual({
      temperature: 0,
      prompt: DEFAULT_PROMPT_TEMPLATE,
      batch: true
    });
  });

  it('should require an API key', () => {
    vi.stubEnv('GEMINI_API_KEY', '');
    vi.stubEnv('GOOGLE_API_KEY', '');

    expect(() => new GeminiBackend()).toThrow(ConfigError);
    expect(() => new GeminiBackend({ envs: { GEMINI_API_KEY: 'test-secret' } })).not.toThrow();
  });
});

describe('classifyGeminiError', () => {
  it('should map status codes and messages onto retry classes', () => {
    expect(classifyGeminiError(new ApiError({ message: 'quota', status: 429 }))).toBeInstanceOf(RateLimitedError);
    expect(classifyGeminiError(new ApiError({ message: 'boom', status: 503 }))).toBeInstanceOf(BackendUnavailableError);
    expect(classifyGeminiError(new Error('fetch failed'))).toBeInstanceOf(BackendUnavailableError);
    expect(classifyGeminiError(new Error('The model is overloaded'))).toBeInstanceOf(BackendUnavailableError);

    const rejected = classifyGeminiError(new ApiError({ message: 'API key not valid', status: 400 }));
    expect(rejected).toBeInstanceOf(BackendRejectedError);
    expect(rejected.message).toBe('Gemini rejected the request: API key not valid');
  });

  it('should pass through errors that are already classified', () => {
    const error = new RateLimitedError('slow');
    expect(classifyGeminiError(error)).toBe(error);
  });
});

describe('BedrockBackend', () => {
  beforeEach(() => {
    vi.stubEnv('BEDROCK_MODEL_ID', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  function bedrockWith(answers: (string | Error)[], options: Partial<BedrockBackendOptions> = {}) {
    const requests: BedrockRequest[] = [];
    const backend = new BedrockBackend({
      ...options,
      invoke: async (request) => {
        requests.push(request);
        const answer = answers[Math.min(requests.length, answers.length) - 1];
        if (answer instanceof Error) throw answer;
        return answer;
      }
    });
    return { backend, requests };
  }

  async function translateOne(backend: BedrockBackend) {
    const runs = [textRun({ text: 'Hello world', id: 'p1-t1', isTranslatable: true })];
    const units = collectUnits(runs, EN_FR, backend);
    const dispatcher = new TranslationDispatcher(backend, {
      threads: 1,
      retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 }
    });
    applyResults(runs, units, await dispatcher.translateAll(units));
    return { run: runs[0], stats: dispatcher.stats };
  }

  it('should send an Anthropic messages request', async () => {
    const { backend, requests } = bedrockWith(['<think>plan</think>Bonjour le monde']);

    expect(await backend.translate(['Hello world'], EN_FR)).toEqual(['Bonjour le monde']);
    expect(requests).toEqual([
      {
        modelId: DEFAULT_BEDROCK_MODEL,
        body: {
          anthropic_version: 'bedrock-2023-05-31',
          max_tokens: 2000,
          temperature: 0,
          messages: [{ role: 'user', content: renderPrompt(undefined, EN_FR, 'Hello world') }]
        },
        signal: undefined
      }
    ]);
  });

  it('should resolve model shortcuts', () => {
    expect(bedrockWith(['x'], { model: 'claude-4.5-sonnet' }).backend.model).toBe(
      'global.anthropic.claude-sonnet-4-5-20250929-v1:0'
    );
    expect(bedrockWith(['x'], { envs: { BEDROCK_MODEL_ID: 'haiku' } }).backend.model).toBe(
      'global.anthropic.claude-haiku-4-5-20251001-v1:0'
    );
    expect(bedrockWith(['x'], { model: 'anthropic.claude-3-haiku-20240307-v1:0' }).backend.model).toBe(
      'anthropic.claude-3-haiku-20240307-v1:0'
    );
    expect(bedrockWith(['x']).backend.model).toBe(DEFAULT_BEDROCK_MODEL);
  });

  it('should retry a throttled request', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const throttled = new ThrottlingException({ message: 'Rate exceeded', $metadata: { httpStatusCode: 429 } });
    const { backend, requests } = bedrockWith([throttled, 'Bonjour']);

    const { run, stats } = await translateOne(backend);

    expect(run.translation).toBe('Bonjour');
    expect(requests).toHaveLength(2);
    expect(stats.retries).toBe(1);
  });

  it('should not retry a request the service refused', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const invalid = new ValidationException({ message: 'Invalid request', $metadata: { httpStatusCode: 400 } });
    const { backend, requests } = bedrockWith([invalid]);

    const { run } = await translateOne(backend);

    expect(run.translation).toBeUndefined();
    expect(requests).toHaveLength(1);
    expect(run.warnings).toEqual([
      {
        code: 'TranslationFailed',
        message: 'Translation failed: Bedrock rejected the request (ValidationException): Invalid request',
        runId: 'p1-t1'
      }
    ]);
  });

  it('should put prompt settings into the cache parameters', () => {
    expect(bedrockWith(['x']).backend.cacheParams()).toEqual({
      temperature: 0,
      max_tokens: 2000,
      prompt: DEFAULT_PROMPT_TEMPLATE
    });
  });
});

describe('classifyBedrockError', () => {
  it('should map service exceptions onto retry classes', () => {
    const $metadata = { httpStatusCode: 400 };

    expect(classifyBedrockError(new ThrottlingException({ message: 'slow', $metadata }))).toBeInstanceOf(RateLimitedError);
    expect(classifyBedrockError(new ServiceUnavailableException({ message: 'down', $metadata }))).toBeInstanceOf(
      BackendUnavailableError
    );
    expect(classifyBedrockError(new AccessDeniedException({ message: 'no access', $metadata }))).toBeInstanceOf(
      BackendRejectedError
    );
    expect(classifyBedrockError(new Error('socket hang up'))).toBeInstanceOf(BackendUnavailableError);

    const rejected = classifyBedrockError(new ValidationException({ message: 'Invalid request', $metadata }));
    expect(rejected).toBeInstanceOf(BackendRejectedError);
    expect(rejected.message).toBe('Bedrock rejected the request (ValidationException): Invalid request');
  });
});

describe('bedrockClientConfig', () => {
  it('should pass explicit credentials', () => {
    const envs: Record<string, string> = {
      AWS_REGION: 'us-east-1',
      AWS_ACCESS_KEY_ID: 'test-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret'
    };

    expect(bedrockClientConfig((key) => envs[key])).toEqual({
      region: 'us-east-1',
      credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret', sessionToken: undefined }
    });
  });

  it('should leave credentials to the default provider chain', () => {
    expect(bedrockClientConfig(() => undefined)).toEqual({ region: 'us-west-2' });
    expect(bedrockClientConfig((key) => (key === 'AWS_ACCESS_KEY_ID' ? 'test-key' : undefined))).toEqual({
      region: 'us-west-2'
    });
  });
});

describe('parseBedrockResponse', () => {
  const encoder = new TextEncoder();

  it('should join the text blocks of the answer', () => {
    const body = encoder.encode('{"content":[{"type":"text","text":"Bon"},{"type":"text","text":"jour"}]}');

    expect(parseBedrockResponse(body)).toBe('Bonjour');
  });

  it('should treat a malformed body as a transient failure', () => {
    expect(() => parseBedrockResponse(encoder.encode('oops'))).toThrow(BackendUnavailableError);
    expect(() => parseBedrockResponse(encoder.encode('{"content":"x"}'))).toThrow(
      new BackendUnavailableError('Bedrock returned an unexpected response body')
    );
  });
});

describe('createBackend', () => {
  const config = { envs: { GEMINI_API_KEY: 'test-secret' }, temperature: 0, batchSize: 1 };

  it('should parse service strings', () => {
    expect(parseService('google')).toEqual({ name: 'google' });
    expect(parseService(' Gemini:gemini-2.5-pro ')).toEqual({ name: 'gemini', model: 'gemini-2.5-pro' });
    expect(parseService('gemini:')).toEqual({ name: 'gemini', model: undefined });
  });

  it('should build the named backend', () => {
    const google = createBackend('google', config);
    const gemini = createBackend('gemini:gemini-2.5-pro', { ...config, model: 'ignored' });

    expect(google).toBeInstanceOf(GoogleTranslateBackend);
    expect(gemini).toBeInstanceOf(GeminiBackend);
    expect(gemini.model).toBe('gemini-2.5-pro');
    expect(createBackend('gemini', config).model).toBe('gemini-2.0-flash');

    const bedrock = createBackend('bedrock:sonnet', { ...config, envs: { AWS_REGION: 'eu-west-1' } });
    expect(bedrock).toBeInstanceOf(BedrockBackend);
    expect(bedrock.model).toBe('global.anthropic.claude-sonnet-4-5-20250929-v1:0');
  });

  it('should reject unknown services', () => {
    expect(() => createBackend('deepl', config)).toThrow(
      new ConfigError(['service: unknown translation service "deepl" (expected one of google, gemini, bedrock)'])
    );
  });
});
