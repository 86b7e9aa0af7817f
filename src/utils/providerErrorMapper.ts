import {
  AuthError,
  MalformedRequestError,
  PipelineError,
  ProviderQuotaError,
  TransientProviderError,
} from './pipelineErrors';
import { errorMessage } from './errorHandler';

const TRANSIENT_STATUSES = new Set([408, 425, 429]);
const BAD_REQUEST_STATUSES = new Set([400, 404, 409, 413, 422]);

const AUTH_HINT = /unauthori[sz]ed|invalid api key|invalid token|authentication|forbidden|permission denied/i;
const QUOTA_HINT = /quota|billing|insufficient (credit|balance|fund)|payment required|out of credits/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function asStatus(value: unknown): number | undefined {
  const n = typeof value === 'string' ? Number(value) : value;
  return typeof n === 'number' && Number.isInteger(n) && n >= 100 && n <= 599 ? n : undefined;
}

// Extract HTTP status code from the formats SDKs and axios use
export function extractHttpStatus(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined;
  const response = isRecord(err.response) ? err.response : undefined;
  const direct = asStatus(err.status) ?? asStatus(err.statusCode) ?? asStatus(response?.status);
  if (direct !== undefined) return direct;
  const match = errorMessage(err).match(/status(?: code)?[:\s]+(\d{3})/i);
  return match ? asStatus(match[1]) : undefined;
}

/**
 * Maps whatever a backend threw onto the pipeline's provider error categories.
 * Errors that are already classified pass through untouched.
 */
export function classifyProviderError(err: unknown, provider: string): PipelineError {
  if (err instanceof TransientProviderError) return err;
  if (err instanceof ProviderQuotaError) return err;
  if (err instanceof AuthError) return err;
  if (err instanceof MalformedRequestError) return err;

  const status = extractHttpStatus(err);
  const message = errorMessage(err) || `${provider} request failed`;
  const context = { provider, status };

  if (status === 401 || status === 403 || (status === undefined && AUTH_HINT.test(message))) {
    return new AuthError(message, context);
  }
  if (status === 402 || QUOTA_HINT.test(message)) {
    return new ProviderQuotaError(message, context);
  }
  if (status !== undefined && (TRANSIENT_STATUSES.has(status) || status >= 500)) {
    return new TransientProviderError(message, context);
  }
  if (status !== undefined && BAD_REQUEST_STATUSES.has(status)) {
    return new MalformedRequestError(message, context);
  }
  // Network failures (ECONNRESET, ETIMEDOUT, ...), timeouts and anything unrecognised
  return new TransientProviderError(message, context);
}

export function isRetryable(err: PipelineError): boolean {
  return err instanceof TransientProviderError;
}
