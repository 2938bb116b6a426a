import {
  BedrockRuntimeClient,
  BedrockRuntimeServiceException,
  InvokeModelCommand,
  type BedrockRuntimeClientConfig
} from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import {
  BackendRejectedError,
  BackendUnavailableError,
  PaperTranslateError,
  RateLimitedError,
  errorMessage
} from '../../errors.js';
import { BaseBackend, type BackendOptions } from '../backend.js';
import { DEFAULT_PROMPT_TEMPLATE, batchPrompt, parseBatchResponse, renderPrompt, stripThinking } from '../prompt.js';
import type { CacheParams, LanguagePair } from '../../types/translation.js';

export const DEFAULT_BEDROCK_MODEL = 'global.anthropic.claude-haiku-4-5-20251001-v1:0';
export const DEFAULT_BEDROCK_REGION = 'us-west-2';

export const BEDROCK_MODEL_SHORTCUTS: Readonly<Record<string, string>> = {
  'claude-4.5-opus': 'global.anthropic.claude-opus-4-5-20251101-v1:0',
  'claude-4.5-sonnet': 'global.anthropic.claude-sonnet-4-5-20250929-v1:0',
  'claude-4.5-haiku': 'global.anthropic.claude-haiku-4-5-20251001-v1:0',
  opus: 'global.anthropic.claude-opus-4-5-20251101-v1:0',
  sonnet: 'global.anthropic.claude-sonnet-4-5-20250929-v1:0',
  haiku: 'global.anthropic.claude-haiku-4-5-20251001-v1:0'
};

const MAX_TOKENS = 2000;

export interface BedrockRequest {
  modelId: string;
  body: {
    anthropic_version: string;
    max_tokens: number;
    temperature: number;
    messages: { role: 'user'; content: string }[];
  };
  signal?: AbortSignal;
}

/** Seam around `InvokeModel`; returns the model's text answer. */
export type InvokeModelFn = (request: BedrockRequest) => Promise<string>;

export interface BedrockBackendOptions extends BackendOptions {
  promptTemplate?: string;
  temperature?: number;
  invoke?: InvokeModelFn;
}

const RATE_LIMITED = new Set(['ThrottlingException']);
const UNAVAILABLE = new Set([
  'ServiceUnavailableException',
  'InternalServerException',
  'ModelTimeoutException',
  'ModelNotReadyException'
]);

/**
 * Maps Bedrock failures onto the retry policy's error classes. Service
 * exceptions are sorted by name; anything that never reached the service
 * counts as transient.
 */
export function classifyBedrockError(error: unknown): PaperTranslateError {
  if (error instanceof PaperTranslateError) return error;

  const message = errorMessage(error);
  if (!(error instanceof BedrockRuntimeServiceException)) {
    return new BackendUnavailableError(`Bedrock unavailable: ${message}`, { cause: error });
  }

  const status = error.$metadata.httpStatusCode;
  if (RATE_LIMITED.has(error.name)) {
    return new RateLimitedError(`Bedrock rate limit: ${message}`, { cause: error });
  }
  if (UNAVAILABLE.has(error.name)) {
    return new BackendUnavailableError(`Bedrock unavailable: ${message}`, { status, cause: error });
  }
  return new BackendRejectedError(`Bedrock rejected the request (${error.name}): ${message}`, { status, cause: error });
}

export function resolveBedrockModel(model: string): string {
  return BEDROCK_MODEL_SHORTCUTS[model.trim().toLowerCase()] ?? model;
}

/**
 * Client settings from `AWS_*` variables. Without both keys the SDK's
 * default provider chain (profile, IAM role) supplies credentials.
 */
export function bedrockClientConfig(getEnv: (key: string) => string | undefined): BedrockRuntimeClientConfig {
  const region = getEnv('AWS_REGION')?.trim() || DEFAULT_BEDROCK_REGION;
  const accessKeyId = getEnv('AWS_ACCESS_KEY_ID');
  const secretAccessKey = getEnv('AWS_SECRET_ACCESS_KEY');
  if (!accessKeyId || !secretAccessKey) return { region };

  const sessionToken = getEnv('AWS_SESSION_TOKEN') || undefined;
  return { region, credentials: { accessKeyId, secretAccessKey, sessionToken } };
}

const responseSchema = z.object({
  content: z.array(z.object({ type: z.string().optional(), text: z.string().optional() }))
});

/** Text of an Anthropic messages response body. */
export function parseBedrockResponse(body: Uint8Array): string {
  let json: unknown;
  try {
    json = JSON.parse(new TextDecoder().decode(body));
  } catch (error) {
    throw new BackendUnavailableError(`Bedrock returned a body that is not JSON: ${errorMessage(error)}`, { cause: error });
  }
  const parsed = responseSchema.safeParse(json);
  if (!parsed.success) {
    throw new BackendUnavailableError('Bedrock returned an unexpected response body');
  }
  return parsed.data.content.map((block) => block.text ?? '').join('');
}

function sdkInvoke(config: BedrockRuntimeClientConfig): InvokeModelFn {
  const client = new BedrockRuntimeClient(config);
  return async ({ modelId, body, signal }) => {
    const response = await client.send(
      new InvokeModelCommand({
        modelId,
        contentType: 'application/json',
        accept: 'application/json',
        body: JSON.stringify(body)
      }),
      { abortSignal: signal }
    );
    return parseBedrockResponse(response.body);
  };
}

function envValue(envs: Record<string, string> | undefined, key: string): string | undefined {
  return envs?.[key] ?? process.env[key];
}

/** Claude models on AWS Bedrock through the Anthropic messages format. */
export class BedrockBackend extends BaseBackend {
  readonly name = 'bedrock';
  private readonly promptTemplate?: string;
  private readonly temperature: number;
  private readonly invoke: InvokeModelFn;

  constructor(options: BedrockBackendOptions = {}) {
    const model = options.model || envValue(options.envs, 'BEDROCK_MODEL_ID') || DEFAULT_BEDROCK_MODEL;
    super(DEFAULT_BEDROCK_MODEL, { ...options, model: resolveBedrockModel(model) });
    this.promptTemplate = options.promptTemplate;
    this.temperature = options.temperature ?? 0;
    this.invoke = options.invoke ?? sdkInvoke(bedrockClientConfig((key) => this.getEnv(key)));
  }

  cacheParams(): CacheParams {
    const params: CacheParams = {
      temperature: this.temperature,
      max_tokens: MAX_TOKENS,
      prompt: this.promptTemplate ?? DEFAULT_PROMPT_TEMPLATE
    };
    if (this.maxBatchSize > 1) params.batch = true;
    return params;
  }

  protected async translateBatch(texts: string[], pair: LanguagePair, signal?: AbortSignal): Promise<string[]> {
    if (texts.length === 1) {
      return [await this.call(renderPrompt(this.promptTemplate, pair, texts[0]), signal)];
    }
    const answer = await this.call(batchPrompt(texts, pair), signal);
    return parseBatchResponse(answer, texts.length);
  }

  private async call(prompt: string, signal?: AbortSignal): Promise<string> {
    let text: string;
    try {
      text = await this.invoke({
        modelId: this.model,
        body: {
          anthropic_version: 'bedrock-2023-05-31',
          max_tokens: MAX_TOKENS,
          temperature: this.temperature,
          messages: [{ role: 'user', content: prompt }]
        },
        signal
      });
    } catch (error) {
      throw classifyBedrockError(error);
    }

    const answer = stripThinking(text);
    if (answer === '') {
      throw new BackendUnavailableError('Bedrock returned an empty answer');
    }
    return answer;
  }
}
