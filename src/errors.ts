export type JobStage = 'config' | 'parse' | 'layout' | 'translate' | 'render' | 'write';

export type ErrorCode =
  | 'MalformedDocument'
  | 'LayoutModelUnavailable'
  | 'BackendUnavailable'
  | 'BackendRejected'
  | 'RateLimited'
  | 'InvalidLanguagePair'
  | 'BatchMisaligned'
  | 'RenderFailure'
  | 'Cancelled'
  | 'InvalidConfig'
  | 'JobFailed';

export class PaperTranslateError extends Error {
  readonly code: ErrorCode;
  stage?: JobStage;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown; stage?: JobStage }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.stage = options?.stage;
  }
}

export class MalformedDocumentError extends PaperTranslateError {
  readonly reason: 'invalid' | 'encrypted' | 'empty';

  constructor(reason: 'invalid' | 'encrypted' | 'empty', message: string, cause?: unknown) {
    super('MalformedDocument', message, { cause, stage: 'parse' });
    this.reason = reason;
  }
}

export class LayoutModelUnavailableError extends PaperTranslateError {
  constructor(message: string, cause?: unknown) {
    super('LayoutModelUnavailable', message, { cause, stage: 'layout' });
  }
}

export class BackendUnavailableError extends PaperTranslateError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('BackendUnavailable', message, { cause: options?.cause, stage: 'translate' });
    this.status = options?.status;
  }
}

/** The backend refused the request; repeating it will not help. */
export class BackendRejectedError extends PaperTranslateError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('BackendRejected', message, { cause: options?.cause, stage: 'translate' });
    this.status = options?.status;
  }
}

export class RateLimitedError extends PaperTranslateError {
  readonly retryAfterMs?: number;

  constructor(message: string, options?: { retryAfterMs?: number; cause?: unknown }) {
    super('RateLimited', message, { cause: options?.cause, stage: 'translate' });
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export class InvalidLanguagePairError extends PaperTranslateError {
  readonly sourceLang: string;
  readonly targetLang: string;

  constructor(sourceLang: string, targetLang: string, detail?: string, cause?: unknown) {
    super(
      'InvalidLanguagePair',
      `Unsupported language pair ${sourceLang} -> ${targetLang}${detail ? `: ${detail}` : ''}`,
      { cause, stage: 'translate' }
    );
    this.sourceLang = sourceLang;
    this.targetLang = targetLang;
  }
}

export class BatchMisalignedError extends PaperTranslateError {
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number) {
    super('BatchMisaligned', `Backend returned ${received} translations for ${expected} inputs`, {
      stage: 'translate'
    });
    this.expected = expected;
    this.received = received;
  }
}

export class RenderFailureError extends PaperTranslateError {
  readonly scope: 'page' | 'document';
  readonly pageIndex?: number;

  constructor(scope: 'page' | 'document', message: string, options?: { pageIndex?: number; cause?: unknown }) {
    super('RenderFailure', message, { cause: options?.cause, stage: 'render' });
    this.scope = scope;
    this.pageIndex = options?.pageIndex;
  }
}

export class JobCancelledError extends PaperTranslateError {
  constructor(stage?: JobStage) {
    super('Cancelled', 'Translation job was cancelled', { stage });
  }
}

export class ConfigError extends PaperTranslateError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('InvalidConfig', `Invalid configuration: ${issues.join('; ')}`, { stage: 'config' });
    this.issues = issues;
  }
}

export class TranslationJobError extends PaperTranslateError {
  constructor(stage: JobStage, cause: unknown) {
    super('JobFailed', `Translation failed during ${stage}: ${errorMessage(cause)}`, { cause, stage });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Errors worth retrying against the same backend. */
export function isTransientError(error: unknown): error is BackendUnavailableError | RateLimitedError {
  return error instanceof BackendUnavailableError || error instanceof RateLimitedError;
}
