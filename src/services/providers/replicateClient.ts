import Replicate from 'replicate';
import { AuthError, MalformedRequestError } from '../../utils/pipelineErrors';

export type ReplicateModelId = `${string}/${string}`;

export function isReplicateModelId(value: string): value is ReplicateModelId {
  return /^[\w.-]+\/[\w.-]+(:[a-f0-9]+)?$/i.test(value);
}

export function toReplicateModelId(value: string): ReplicateModelId {
  if (!isReplicateModelId(value)) {
    throw new MalformedRequestError(`Invalid Replicate model id "${value}"`, { provider: 'replicate' });
  }
  return value;
}

export function createReplicateClient(apiKey: string | undefined): Replicate {
  if (!apiKey) throw new AuthError('Replicate API key not configured', { provider: 'replicate' });
  return new Replicate({ auth: apiKey });
}

async function resolveItemUrl(item: unknown): Promise<string | null> {
  if (typeof item === 'string') return item;
  if (item instanceof URL) return item.toString();
  // Replicate SDK file outputs expose url(), sync or async
  if (typeof item === 'object' && item !== null && 'url' in item && typeof item.url === 'function') {
    const result: unknown = await item.url();
    if (typeof result === 'string') return result;
    if (result instanceof URL) return result.toString();
  }
  return null;
}

export async function resolveOutputUrls(output: unknown): Promise<string[]> {
  const items = Array.isArray(output) ? output : [output];
  const urls: string[] = [];
  for (const item of items) {
    const url = await resolveItemUrl(item);
    if (url) urls.push(url);
  }
  return urls;
}
