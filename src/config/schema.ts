import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { parsePageSpans } from '../core/page-range.js';
import type { RegionKind } from '../types/pdf.js';
import type { ScriptId } from '../types/fonts.js';

const regionKinds = [
  'body',
  'heading',
  'formula',
  'table',
  'figure',
  'caption',
  'footnote',
  'reference',
  'unknown'
] as const satisfies readonly RegionKind[];

const scriptIds = [
  'latin',
  'hangul',
  'japanese',
  'chinese-simplified',
  'chinese-traditional',
  'cyrillic',
  'greek',
  'arabic',
  'hebrew',
  'devanagari',
  'thai'
] as const satisfies readonly ScriptId[];

const regexOption = z
  .union([z.string(), z.instanceof(RegExp)])
  .transform((value, ctx) => {
    if (value instanceof RegExp) return value;
    try {
      return new RegExp(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `invalid regular expression: ${error instanceof Error ? error.message : String(error)}`
      });
      return z.NEVER;
    }
  });

const languageCode = z
  .string()
  .regex(/^(auto|[a-z]{2,3}(-[A-Za-z]{2,4})?)$/, 'expected an ISO-639-1 style code such as "en" or "zh-TW"');

export const translateConfigSchema = z
  .object({
    sourceLang: languageCode.default('en'),
    targetLang: languageCode.default('ko'),
    service: z.string().min(1).default('google'),
    model: z.string().min(1).optional(),
    threads: z.number().int().min(1).max(64).default(4),
    pages: z.string().optional(),
    fontRegex: regexOption.optional(),
    charRegex: regexOption.optional(),
    cache: z
      .object({
        enabled: z.boolean().default(true),
        dir: z.string().optional(),
        forceRefresh: z.boolean().default(false)
      })
      .default({}),
    subsetFonts: z.boolean().default(true),
    overflow: z.enum(['shrink', 'overflow']).default('shrink'),
    minFontScale: z.number().gt(0).max(1).default(0.7),
    dualLayout: z.enum(['interleave', 'side-by-side']).default('interleave'),
    mergeLines: z.boolean().default(true),
    translatableKinds: z.array(z.enum(regionKinds)).default(['body', 'heading', 'caption', 'footnote']),
    retry: z
      .object({
        maxAttempts: z.number().int().min(1).max(20).default(4),
        baseDelayMs: z.number().min(0).default(1000),
        maxDelayMs: z.number().min(0).default(20000)
      })
      .default({}),
    batchSize: z.number().int().min(1).max(200).default(1),
    maxBatchChars: z.number().int().min(1).default(4000),
    requestsPerMinute: z.number().min(0).default(0),
    fallbackService: z.string().min(1).optional(),
    failoverAfter: z.number().int().min(1).default(3),
    layout: z
      .object({
        enabled: z.boolean().default(true),
        modelUrl: z.string().url().optional(),
        modelPath: z.string().optional(),
        cacheDir: z.string().optional(),
        confidence: z.number().min(0).max(1).default(0.25),
        required: z.boolean().default(false),
        renderScale: z.number().gt(0).max(8).default(2)
      })
      .default({}),
    fonts: z.record(z.enum(scriptIds), z.string()).default({}),
    fontSearchPaths: z.array(z.string()).optional(),
    /** Fall back to fonts shipped with npm packages when nothing on the machine covers a script. */
    bundledFonts: z.boolean().default(true),
    envs: z.record(z.string(), z.string()).default({}),
    promptTemplate: z.string().optional(),
    temperature: z.number().min(0).max(2).default(0)
  })
  .superRefine((config, ctx) => {
    if (config.targetLang === 'auto') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['targetLang'], message: 'target language cannot be auto' });
    }
    if (config.pages !== undefined) {
      try {
        parsePageSpans(config.pages);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['pages'],
          message: error instanceof Error ? error.message : String(error)
        });
      }
    }
    if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['retry', 'maxDelayMs'], message: 'must be >= baseDelayMs' });
    }
  });

export type TranslateOptions = z.input<typeof translateConfigSchema>;
export type TranslateConfig = z.output<typeof translateConfigSchema>;

/**
 * Validates user options and fills in defaults.
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(options: TranslateOptions = {}): TranslateConfig {
  const parsed = translateConfigSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'config'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export const ConfigPresets = {
  /** Statistical backend, larger pool, no layout model. */
  fast: {
    service: 'google',
    threads: 8,
    layout: { enabled: false }
  },

  /** LLM backend with the free translator as fallback. */
  quality: {
    service: 'gemini',
    threads: 4,
    batchSize: 8,
    fallbackService: 'google',
    requestsPerMinute: 60
  },

  /** Everything from cache or an injected backend; nothing downloaded. */
  offline: {
    layout: { enabled: false },
    cache: { enabled: true }
  }
} satisfies Record<string, TranslateOptions>;
