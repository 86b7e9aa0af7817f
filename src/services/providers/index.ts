import { PipelineConfig, ImageProviderName } from '../../config/pipelineConfig';
import { ImageBackend, TextBackend } from '../../types/provider';
import { FalImageBackend } from './falImageBackend';
import { GeminiTextBackend } from './geminiTextBackend';
import { ReplicateImageBackend } from './replicateImageBackend';
import { ReplicateTextBackend } from './replicateTextBackend';

export function createTextBackend(config: PipelineConfig['text']): TextBackend {
  switch (config.provider) {
    case 'gemini':
      return new GeminiTextBackend(config.geminiApiKey, config.geminiModel);
    case 'replicate':
      return new ReplicateTextBackend(config.replicateApiKey, config.replicateModel);
  }
}

export function createImageBackend(name: ImageProviderName, config: PipelineConfig['image']): ImageBackend {
  switch (name) {
    case 'replicate':
      return new ReplicateImageBackend(config.replicateApiKey, config.replicateModel, config.aspectRatio);
    case 'fal':
      return new FalImageBackend(config.falKey, config.falModel, config.aspectRatio);
  }
}

export function createImageBackends(config: PipelineConfig['image']): { primary: ImageBackend; fallback: ImageBackend } {
  return {
    primary: createImageBackend(config.primary, config),
    fallback: createImageBackend(config.fallback, config),
  };
}
