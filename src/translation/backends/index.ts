import { ConfigError } from '../../errors.js';
import { BedrockBackend } from './bedrock.js';
import { GeminiBackend } from './gemini.js';
import { GoogleTranslateBackend } from './google-translate.js';
import type { TranslateConfig } from '../../config/schema.js';
import type { TranslationBackend } from '../../types/translation.js';

export { GoogleTranslateBackend, unescapeHtml, removeControlCharacters } from './google-translate.js';
export { GeminiBackend, classifyGeminiError, DEFAULT_GEMINI_MODEL } from './gemini.js';
export type { GenerateTextFn, GenerateRequest, GeminiBackendOptions } from './gemini.js';
export {
  BedrockBackend,
  BEDROCK_MODEL_SHORTCUTS,
  DEFAULT_BEDROCK_MODEL,
  bedrockClientConfig,
  classifyBedrockError,
  parseBedrockResponse,
  resolveBedrockModel
} from './bedrock.js';
export type { BedrockBackendOptions, BedrockRequest, InvokeModelFn } from './bedrock.js';
export type { GoogleTranslateOptions } from './google-translate.js';

export const SERVICES = ['google', 'gemini', 'bedrock'] as const;

/** `gemini:gemini-2.5-pro` → `{ name: 'gemini', model: 'gemini-2.5-pro' }`. */
export function parseService(service: string): { name: string; model?: string } {
  const separator = service.indexOf(':');
  if (separator < 0) return { name: service.trim().toLowerCase() };
  const model = service.slice(separator + 1).trim();
  return { name: service.slice(0, separator).trim().toLowerCase(), model: model || undefined };
}

type BackendConfig = Pick<TranslateConfig, 'model' | 'envs' | 'promptTemplate' | 'temperature' | 'batchSize'>;

/**
 * Builds the backend a service string names. A model in the string wins
 * over `config.model`.
 */
export function createBackend(service: string, config: BackendConfig): TranslationBackend {
  const { name, model } = parseService(service);
  const options = { model: model ?? config.model, envs: config.envs };

  switch (name) {
    case 'google':
      return new GoogleTranslateBackend(options);
    case 'gemini':
      return new GeminiBackend({
        ...options,
        promptTemplate: config.promptTemplate,
        temperature: config.temperature,
        batchSize: config.batchSize
      });
    case 'bedrock':
      return new BedrockBackend({
        ...options,
        promptTemplate: config.promptTemplate,
        temperature: config.temperature,
        batchSize: config.batchSize
      });
    default:
      throw new ConfigError([`service: unknown translation service "${name}" (expected one of ${SERVICES.join(', ')})`]);
  }
}
