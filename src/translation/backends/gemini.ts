import { ApiError, GoogleGenAI } from '@google/genai';
import {
  BackendRejectedError,
  BackendUnavailableError,
  ConfigError,
  PaperTranslateError,
  RateLimitedError,
  errorMessage
} from '../../errors.js';
import { BaseBackend, type BackendOptions } from '../backend.js';
import { DEFAULT_PROMPT_TEMPLATE, batchPrompt, parseBatchResponse, renderPrompt, stripThinking } from '../prompt.js';
import type { CacheParams, LanguagePair } from '../../types/translation.js';

export interface GenerateRequest {
  model: string;
  prompt: string;
  temperature: number;
  signal?: AbortSignal;
}

/** Seam around the SDK call; returns the model's text answer. */
export type GenerateTextFn = (request: GenerateRequest) => Promise<string>;

export interface GeminiBackendOptions extends BackendOptions {
  promptTemplate?: string;
  temperature?: number;
  generate?: GenerateTextFn;
}

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

const RATE_LIMIT_PATTERNS = ['rateLimitExceeded', 'Too Many Requests', 'QUOTA_EXCEEDED', 'RESOURCE_EXHAUSTED'];
const UNAVAILABLE_PATTERNS = ['overloaded', 'UNAVAILABLE', 'DEADLINE_EXCEEDED', 'INTERNAL', 'fetch failed', 'ECONNRESET', 'ETIMEDOUT'];

/** Maps SDK and network failures onto the retry policy's error classes. */
export function classifyGeminiError(error: unknown): PaperTranslateError {
  if (error instanceof PaperTranslateError) return error;

  const message = errorMessage(error);
  const status = error instanceof ApiError ? error.status : undefined;

  if (status === 429 || RATE_LIMIT_PATTERNS.some((pattern) => message.includes(pattern))) {
    return new RateLimitedError(`Gemini rate limit: ${message}`, { cause: error });
  }
  if ((status !== undefined && status >= 500) || UNAVAILABLE_PATTERNS.some((pattern) => message.includes(pattern))) {
    return new BackendUnavailableError(`Gemini unavailable: ${message}`, { status, cause: error });
  }
  return new BackendRejectedError(`Gemini rejected the request: ${message}`, { status, cause: error });
}

function sdkGenerate(apiKey: string): GenerateTextFn {
  const client = new GoogleGenAI({ apiKey });
  return async ({ model, prompt, temperature, signal }) => {
    const response = await client.models.generateContent({
      model,
      contents: prompt,
      config: { temperature, abortSignal: signal }
    });
    return response.text ?? '';
  };
}

/** LLM translation through the Gemini API; batches above one text use a JSON-array prompt. */
export class GeminiBackend extends BaseBackend {
  readonly name = 'gemini';
  private readonly promptTemplate?: string;
  private readonly temperature: number;
  private readonly generate: GenerateTextFn;

  constructor(options: GeminiBackendOptions = {}) {
    super(DEFAULT_GEMINI_MODEL, options);
    this.promptTemplate = options.promptTemplate;
    this.temperature = options.temperature ?? 0;

    if (options.generate) {
      this.generate = options.generate;
    } else {
      const apiKey = this.getEnv('GEMINI_API_KEY') ?? this.getEnv('GOOGLE_API_KEY');
      if (!apiKey) {
        throw new ConfigError(['envs.GEMINI_API_KEY: required for the gemini service']);
      }
      this.generate = sdkGenerate(apiKey);
    }
  }

  cacheParams(): CacheParams {
    const params: CacheParams = {
      temperature: this.temperature,
      prompt: this.promptTemplate ?? DEFAULT_PROMPT_TEMPLATE
    };
    if (this.maxBatchSize > 1) params.batch = true;
    return params;
  }

  protected async translateBatch(texts: string[], pair: LanguagePair, signal?: AbortSignal): Promise<string[]> {
    if (texts.length === 1) {
      const answer = await this.call(renderPrompt(this.promptTemplate, pair, texts[0]), signal);
      return [answer];
    }
    const answer = await this.call(batchPrompt(texts, pair), signal);
    return parseBatchResponse(answer, texts.length);
  }

  private async call(prompt: string, signal?: AbortSignal): Promise<string> {
    let text: string;
    try {
      text = await this.generate({ model: this.model, prompt, temperature: this.temperature, signal });
    } catch (error) {
      throw classifyGeminiError(error);
    }

    const answer = stripThinking(text);
    if (answer === '') {
      throw new BackendUnavailableError('Gemini returned an empty answer');
    }
    return answer;
  }
}
