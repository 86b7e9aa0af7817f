/**
 * Services Layer - Central Export
 */
import { PipelineConfig } from '../config/pipelineConfig';
import { StageStore } from '../repository/stageStore';
import { ContentSource } from '../types/content';
import { ProviderAttempt } from '../types/provider';
import { PipelineCoordinator } from './pipelineCoordinator';
import { ProviderGateway } from './providerGateway';
import { createImageBackends, createTextBackend } from './providers';
import { WikipediaService } from './wikipediaService';

export * from './pipelineCoordinator';
export * from './providerGateway';
export * from './wikipediaService';
export * from './exportService';
export * from './stageFingerprints';

export interface PipelineServices {
  gateway: ProviderGateway;
  contentSource: ContentSource;
  coordinator: PipelineCoordinator;
}

// Wires the configured backends, content source and store into a coordinator
export function createPipelineServices(
  config: PipelineConfig,
  store: StageStore,
  hooks: { onAttempt?: (event: ProviderAttempt) => void } = {}
): PipelineServices {
  const gateway = new ProviderGateway({
    text: createTextBackend(config.text),
    image: createImageBackends(config.image),
    retry: config.retry,
    onAttempt: hooks.onAttempt,
  });
  const contentSource = new WikipediaService({ userAgent: config.wikipedia.userAgent });
  const coordinator = new PipelineCoordinator({
    store,
    gateway,
    contentSource,
    images: { concurrency: config.image.concurrency, aspectRatio: config.image.aspectRatio },
  });
  return { gateway, contentSource, coordinator };
}
