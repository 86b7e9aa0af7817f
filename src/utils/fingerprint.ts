import crypto from 'crypto';
import { StageName } from '../types/stage';

const FINGERPRINT_LENGTH = 24;

/**
 * JSON serialization with object keys sorted at every level, so equal values
 * always produce the same string. `undefined` members are dropped like JSON.stringify does.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => (item === undefined ? 'null' : stableStringify(item))).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
  return `{${entries.join(',')}}`;
}

export function sha256(input: string): string {
  return crypto.createHash('sha256').update(input).digest('hex');
}

/** Hash of a stage payload; downstream fingerprints include it. */
export function digestPayload(payload: unknown): string {
  return sha256(stableStringify(payload));
}

/** Truncated SHA-256 of the stable serialization; used for every store key. */
export function shortHash(value: unknown): string {
  return sha256(stableStringify(value)).slice(0, FINGERPRINT_LENGTH);
}

export function computeFingerprint(
  stage: StageName,
  parameters: Record<string, unknown>,
  upstream: Record<string, string> = {}
): string {
  return shortHash({ stage, parameters, upstream });
}
