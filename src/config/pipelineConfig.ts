import { z } from 'zod';
import { EnvConfig } from './env';

export const TextProviderNameSchema = z.enum(['gemini', 'replicate']);
export const ImageProviderNameSchema = z.enum(['replicate', 'fal']);
export const StageStoreKindSchema = z.enum(['file', 'redis']);

export type TextProviderName = z.infer<typeof TextProviderNameSchema>;
export type ImageProviderName = z.infer<typeof ImageProviderNameSchema>;

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  timeoutMs: number;
}

/**
 * Everything the pipeline needs from the environment, resolved once and passed
 * explicitly to the gateway, backends and coordinator.
 */
export interface PipelineConfig {
  text: {
    provider: TextProviderName;
    geminiApiKey?: string;
    geminiModel: string;
    replicateApiKey?: string;
    replicateModel: string;
  };
  image: {
    primary: ImageProviderName;
    fallback: ImageProviderName;
    replicateApiKey?: string;
    replicateModel: string;
    falKey?: string;
    falModel: string;
    aspectRatio: string;
    concurrency: number;
  };
  retry: RetryPolicy;
  store: {
    kind: z.infer<typeof StageStoreKindSchema>;
    directory: string;
    redisUrl?: string;
    redisPrefix: string;
  };
  wikipedia: {
    userAgent: string;
  };
}

const PositiveInt = z.number().int().min(1);

export function buildPipelineConfig(env: EnvConfig): PipelineConfig {
  const image = {
    primary: ImageProviderNameSchema.parse(env.imagePrimaryProvider),
    fallback: ImageProviderNameSchema.parse(env.imageFallbackProvider),
  };
  if (image.primary === image.fallback) {
    throw new Error(`IMAGE_FALLBACK_PROVIDER must differ from IMAGE_PRIMARY_PROVIDER (both are "${image.primary}")`);
  }

  return {
    text: {
      provider: TextProviderNameSchema.parse(env.textProvider),
      geminiApiKey: env.geminiApiKey,
      geminiModel: env.geminiTextModel,
      replicateApiKey: env.replicateApiKey,
      replicateModel: env.replicateTextModel,
    },
    image: {
      ...image,
      replicateApiKey: env.replicateApiKey,
      replicateModel: env.replicateImageModel,
      falKey: env.falKey,
      falModel: env.falImageModel,
      aspectRatio: env.imageAspectRatio,
      concurrency: PositiveInt.parse(env.imageConcurrency),
    },
    retry: {
      maxAttempts: PositiveInt.parse(env.providerMaxAttempts),
      baseDelayMs: z.number().int().min(0).parse(env.providerBaseDelayMs),
      timeoutMs: PositiveInt.parse(env.providerTimeoutMs),
    },
    store: {
      kind: StageStoreKindSchema.parse(env.stageStore),
      directory: env.stageStoreDir,
      redisUrl: env.redisUrl,
      redisPrefix: env.redisPrefix,
    },
    wikipedia: {
      userAgent: env.wikipediaUserAgent,
    },
  };
}
