import { ApiError, errorMessage } from './errorHandler';

export type PipelineErrorCode =
  | 'TRANSIENT_PROVIDER_ERROR'
  | 'PROVIDER_QUOTA'
  | 'PROVIDER_AUTH'
  | 'PROVIDER_BAD_REQUEST'
  | 'MALFORMED_GENERATION'
  | 'SCENE_COUNT_MISMATCH'
  | 'STORE_UNAVAILABLE'
  | 'ARTICLE_NOT_FOUND';

/**
 * Base class for every failure the pipeline knows how to classify.
 * `code` is stable and is what run results and HTTP payloads report.
 */
export class PipelineError extends ApiError {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, statusCode: number, data?: Record<string, unknown>) {
    super(message, statusCode, { code, ...data });
    this.code = code;
    this.name = new.target.name;
  }
}

export interface ProviderErrorContext {
  provider?: string;
  status?: number;
}

/** Timeout, rate limit or 5xx. The gateway retries these. */
export class TransientProviderError extends PipelineError {
  constructor(message: string, context: ProviderErrorContext = {}) {
    super('TRANSIENT_PROVIDER_ERROR', message, 503, { ...context });
  }
}

/** Payment required or quota exhausted. */
export class ProviderQuotaError extends PipelineError {
  constructor(message: string, context: ProviderErrorContext = {}) {
    super('PROVIDER_QUOTA', message, 402, { ...context });
  }
}

export class AuthError extends PipelineError {
  constructor(message: string, context: ProviderErrorContext = {}) {
    super('PROVIDER_AUTH', message, 502, { ...context });
  }
}

/** The provider rejected the request itself; retrying cannot help. */
export class MalformedRequestError extends PipelineError {
  constructor(message: string, context: ProviderErrorContext = {}) {
    super('PROVIDER_BAD_REQUEST', message, 502, { ...context });
  }
}

export class MalformedGenerationError extends PipelineError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('MALFORMED_GENERATION', message, 422, details);
  }
}

export class SceneCountMismatchError extends PipelineError {
  readonly expected: number;
  readonly actual: number;

  constructor(stage: string, expected: number, actual: number) {
    super('SCENE_COUNT_MISMATCH', `${stage} returned ${actual} scenes, expected ${expected}`, 422, {
      stage,
      expected,
      actual,
    });
    this.expected = expected;
    this.actual = actual;
  }
}

export class StoreUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('STORE_UNAVAILABLE', message, 503, {
      cause: cause === undefined ? undefined : errorMessage(cause),
    });
  }
}

export class ArticleNotFoundError extends PipelineError {
  constructor(title: string, language: string) {
    super('ARTICLE_NOT_FOUND', `No ${language} Wikipedia article found for "${title}"`, 404, { title, language });
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}
