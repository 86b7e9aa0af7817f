import { RetryPolicy } from '../config/pipelineConfig';
import {
  Capability,
  GenerationGateway,
  ImageBackend,
  ImageGenerationRequest,
  ImageGenerationResult,
  ProviderAttempt,
  TextBackend,
  TextGenerationRequest,
  TextGenerationResult,
} from '../types/provider';
import { errorMessage } from '../utils/errorHandler';
import { Logger, logger as rootLogger } from '../utils/logger';
import { PipelineError, TransientProviderError } from '../utils/pipelineErrors';
import { classifyProviderError, isRetryable } from '../utils/providerErrorMapper';

export interface ProviderGatewayOptions {
  text: TextBackend;
  image: {
    primary: ImageBackend;
    fallback?: ImageBackend;
  };
  retry: RetryPolicy;
  logger?: Logger;
  onAttempt?: (event: ProviderAttempt) => void;
  /** Injected by tests so backoff does not really wait. */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

interface AttemptContext {
  capability: Capability;
  provider: string;
  sceneIndex?: number;
}

/**
 * Single calling contract over the configured text and image backends.
 *
 * Every backend call runs under the retry policy: up to `maxAttempts` tries,
 * `baseDelayMs * 2^(k-1)` before retry k, each try raced against `timeoutMs`.
 * Only transient errors are retried. Text failures propagate; image failures
 * move to the fallback backend and finally to a placeholder, never an exception.
 */
export class ProviderGateway implements GenerationGateway {
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: ProviderGatewayOptions) {
    this.log = (options.logger ?? rootLogger).child({ component: 'gateway' });
    this.sleep = options.sleep ?? defaultSleep;
  }

  async generateText(request: TextGenerationRequest): Promise<TextGenerationResult> {
    const backend = this.options.text;
    const { value, attempts } = await this.withRetry({ capability: 'text', provider: backend.name }, () =>
      backend.generateText(request)
    );
    return { text: value, provider: backend.name, attempts };
  }

  async generateImage(request: ImageGenerationRequest): Promise<ImageGenerationResult> {
    const { primary, fallback } = this.options.image;
    const backends = fallback ? [primary, fallback] : [primary];
    let lastError: PipelineError | undefined;

    for (const [position, backend] of backends.entries()) {
      const context: AttemptContext = { capability: 'image', provider: backend.name, sceneIndex: request.sceneIndex };
      try {
        const { value } = await this.withRetry(context, () => backend.generateImage(request.prompt));
        return { kind: 'image', data: value.data, mimeType: value.mimeType, provider: backend.name };
      } catch (err) {
        lastError = classifyProviderError(err, backend.name);
        const next = backends[position + 1];
        if (next) {
          this.emit({ ...context, attempt: 0, outcome: 'fallback', durationMs: 0, errorCode: lastError.code, message: lastError.message });
          this.log.warn(
            { provider: backend.name, fallback: next.name, sceneIndex: request.sceneIndex, code: lastError.code },
            'Image provider failed, switching to fallback'
          );
        }
      }
    }

    const reason = lastError ? `${lastError.code}: ${lastError.message}` : 'no image provider available';
    this.emit({
      capability: 'image',
      provider: 'placeholder',
      attempt: 0,
      outcome: 'placeholder',
      durationMs: 0,
      sceneIndex: request.sceneIndex,
      errorCode: lastError?.code,
      message: reason,
    });
    this.log.warn({ sceneIndex: request.sceneIndex, reason }, 'All image providers failed, using placeholder');
    return { kind: 'placeholder', reason };
  }

  private async withRetry<T>(context: AttemptContext, task: () => Promise<T>): Promise<{ value: T; attempts: number }> {
    const { maxAttempts, baseDelayMs, timeoutMs } = this.options.retry;

    for (let attempt = 1; ; attempt++) {
      if (attempt > 1) {
        // Exponential backoff: base, 2x base, 4x base...
        await this.sleep(baseDelayMs * Math.pow(2, attempt - 2));
      }
      const startedAt = Date.now();
      try {
        const value = await this.withTimeout(task, timeoutMs, context);
        this.emit({ ...context, attempt, outcome: 'success', durationMs: Date.now() - startedAt });
        this.log.debug({ ...context, attempt }, 'Provider call succeeded');
        return { value, attempts: attempt };
      } catch (raw) {
        const err = classifyProviderError(raw, context.provider);
        const willRetry = isRetryable(err) && attempt < maxAttempts;
        this.emit({
          ...context,
          attempt,
          outcome: willRetry ? 'retry' : 'failure',
          durationMs: Date.now() - startedAt,
          errorCode: err.code,
          message: err.message,
        });
        this.log.warn({ ...context, attempt, maxAttempts, code: err.code, err: err.message }, 'Provider call failed');
        if (!willRetry) throw err;
      }
    }
  }

  // The underlying call is not cancelled on timeout; it settles on its own
  private async withTimeout<T>(task: () => Promise<T>, timeoutMs: number, context: AttemptContext): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            new TransientProviderError(`${context.provider} ${context.capability} call timed out after ${timeoutMs}ms`, {
              provider: context.provider,
            })
          ),
        timeoutMs
      );
    });
    try {
      return await Promise.race([task(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private emit(event: ProviderAttempt): void {
    if (!this.options.onAttempt) return;
    try {
      this.options.onAttempt(event);
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, 'onAttempt listener threw');
    }
  }
}
