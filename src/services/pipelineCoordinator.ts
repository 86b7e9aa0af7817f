import { ZodError } from 'zod';
import { StageStore, createStageRecord } from '../repository/stageStore';
import { ContentSource } from '../types/content';
import {
  AdvanceOptions,
  AdvanceResult,
  PipelineParameters,
  PipelineParametersInput,
  PipelineParametersSchema,
  PipelineState,
  PipelineStatus,
  StageOutcome,
  TargetStage,
} from '../types/pipeline';
import { GenerationGateway } from '../types/provider';
import {
  STAGE_ORDER,
  StageName,
  StageRecord,
  StageRecordMap,
  StageResult,
  Topic,
  isRecordFor,
} from '../types/stage';
import { ApiError } from '../utils/errorHandler';
import { Logger, logger as rootLogger } from '../utils/logger';
import { isPipelineError } from '../utils/pipelineErrors';
import { renderPlaceholderPanel } from '../utils/placeholderPanel';
import { topicKey } from '../utils/topic';
import { TopicExport, buildTopicExport } from './exportService';
import { stageFingerprint } from './stageFingerprints';
import {
  executeExtraction,
  executeImages,
  executeNarration,
  executeSceneNarration,
  executeScenePrompts,
  executeStoryline,
} from './stages';

export interface PipelineCoordinatorOptions {
  store: StageStore;
  gateway: GenerationGateway;
  contentSource: ContentSource;
  images: {
    concurrency: number;
    aspectRatio: string;
  };
  logger?: Logger;
  now?: () => Date;
}

export type SceneImage =
  | { kind: 'image'; mimeType: string; data: Buffer }
  | { kind: 'placeholder'; mimeType: 'image/png'; data: Buffer; reason: string };

interface StageRun<S extends StageName> {
  kind: 'record';
  record: StageRecord<S>;
  reused: boolean;
}

interface Disambiguation {
  kind: 'disambiguation';
  candidates: string[];
}

const STATE_AFTER: Record<StageName, PipelineState> = {
  extraction: 'Extracted',
  storyline: 'StoryGenerated',
  scenePrompts: 'PromptsGenerated',
  narration: 'NarrationGenerated',
  images: 'ImagesGenerated',
};

/** Applies defaults and validates; accepts untyped input from the CLI or HTTP bodies. */
export function resolveParameters(input: unknown = {}): PipelineParameters {
  try {
    return PipelineParametersSchema.parse(input);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ApiError('Invalid pipeline parameters', 400, err.issues);
    }
    throw err;
  }
}

/** State implied by the records present for one parameter chain. */
export function deriveState(records: StageRecordMap): PipelineState {
  if (!records.extraction) return 'NotStarted';
  if (!records.storyline) return 'Extracted';
  if (!records.scenePrompts) return 'StoryGenerated';
  if (records.narration && records.images) return 'Complete';
  if (records.images) return 'ImagesGenerated';
  if (records.narration) return 'NarrationGenerated';
  return 'PromptsGenerated';
}

/**
 * Sequences the stages for one topic. Each stage's fingerprint is looked up in the
 * store first; a usable record is reused without calling the executor. Known
 * pipeline errors end the run as `Failed`; anything else is rethrown.
 */
export class PipelineCoordinator {
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly inflight = new Map<string, Promise<StageRun<StageName> | Disambiguation>>();

  constructor(private readonly options: PipelineCoordinatorOptions) {
    this.log = (options.logger ?? rootLogger).child({ component: 'coordinator' });
    this.now = options.now ?? (() => new Date());
  }

  private fingerprint(stage: StageName, params: PipelineParameters, upstreamDigest: string | null): string {
    return stageFingerprint(stage, params, { aspectRatio: this.options.images.aspectRatio }, upstreamDigest);
  }

  async advance(
    topic: Topic,
    targetStage: TargetStage,
    input: PipelineParametersInput = {},
    options: AdvanceOptions = {}
  ): Promise<AdvanceResult> {
    const params = resolveParameters(input);
    const { force = false, signal } = options;
    const { gateway, contentSource } = this.options;
    const outcomes: StageOutcome[] = [];
    const log = this.log.child({ title: topic.title, language: topic.language, targetStage });

    let state: PipelineState = 'NotStarted';
    let current: StageName = 'extraction';

    const done = (extra: Partial<AdvanceResult> = {}): AdvanceResult => ({
      topic,
      targetStage,
      state,
      stages: outcomes,
      ...extra,
    });
    const forced = (stage: StageName) =>
      force && (targetStage === 'complete' ? stage === 'narration' || stage === 'images' : stage === targetStage);
    const aborted = () => {
      if (!signal?.aborted) return false;
      log.info({ state }, 'Run aborted between stages');
      return true;
    };
    const accept = <S extends StageName>(run: StageRun<S>): StageRun<S> => {
      outcomes.push({
        stage: run.record.stage,
        fingerprint: run.record.fingerprint,
        status: run.record.status,
        reused: run.reused,
      });
      state = STATE_AFTER[run.record.stage];
      return run;
    };

    try {
      if (aborted()) return done({ aborted: true });
      const extraction = await this.runStage(
        topic,
        'extraction',
        this.fingerprint('extraction', params, null),
        forced('extraction'),
        async (): Promise<StageResult<'extraction'> | Disambiguation> => {
          const outcome = await executeExtraction(topic, contentSource);
          return outcome.kind === 'article' ? outcome.result : { kind: 'disambiguation', candidates: outcome.candidates };
        }
      );
      if (extraction.kind === 'disambiguation') {
        log.info({ candidates: extraction.candidates.length }, 'Title is a disambiguation page');
        return done({ candidates: extraction.candidates });
      }
      const article = accept(extraction).record;
      if (targetStage === 'extraction') return done();

      if (aborted()) return done({ aborted: true });
      current = 'storyline';
      const storyline = accept(
        await this.runStage(
          topic,
          'storyline',
          this.fingerprint('storyline', params, article.digest),
          forced('storyline'),
          () => executeStoryline(article.payload, params, gateway)
        )
      ).record;
      if (targetStage === 'storyline') return done();

      if (aborted()) return done({ aborted: true });
      current = 'scenePrompts';
      const prompts = accept(
        await this.runStage(
          topic,
          'scenePrompts',
          this.fingerprint('scenePrompts', params, storyline.digest),
          forced('scenePrompts'),
          () => executeScenePrompts(storyline.payload, params, gateway)
        )
      ).record;
      if (targetStage === 'scenePrompts') return done();

      if (aborted()) return done({ aborted: true });
      const narration = () =>
        this.runStage(
          topic,
          'narration',
          this.fingerprint('narration', params, storyline.digest),
          forced('narration'),
          () => executeNarration(storyline.payload, params, gateway)
        );
      const images = () =>
        this.runStage(
          topic,
          'images',
          this.fingerprint('images', params, prompts.digest),
          forced('images'),
          () => executeImages(prompts.payload, { concurrency: this.options.images.concurrency }, gateway)
        );

      if (targetStage === 'narration') {
        current = 'narration';
        accept(await narration());
        return done();
      }
      if (targetStage === 'images') {
        current = 'images';
        accept(await images());
        return done();
      }

      // complete: both leaves run concurrently; a failure in one does not cancel the other
      const [narrationRun, imagesRun] = await Promise.allSettled([narration(), images()]);
      if (narrationRun.status === 'fulfilled') accept(narrationRun.value);
      if (imagesRun.status === 'fulfilled') accept(imagesRun.value);
      if (narrationRun.status === 'rejected') {
        current = 'narration';
        throw narrationRun.reason;
      }
      if (imagesRun.status === 'rejected') {
        current = 'images';
        throw imagesRun.reason;
      }
      state = 'Complete';
      log.info({ stages: outcomes.length }, 'Pipeline complete');
      return done();
    } catch (err) {
      if (!isPipelineError(err)) throw err;
      log.warn({ stage: current, code: err.code, err: err.message }, 'Stage failed');
      state = 'Failed';
      return done({ failure: { stage: current, code: err.code, message: err.message } });
    }
  }

  private runStage<S extends StageName>(
    topic: Topic,
    stage: S,
    fingerprint: string,
    force: boolean,
    execute: () => Promise<StageResult<S>>
  ): Promise<StageRun<S>>;
  private runStage<S extends StageName>(
    topic: Topic,
    stage: S,
    fingerprint: string,
    force: boolean,
    execute: () => Promise<StageResult<S> | Disambiguation>
  ): Promise<StageRun<S> | Disambiguation>;
  // Concurrent unforced runs of the same key share one execution
  private async runStage<S extends StageName>(
    topic: Topic,
    stage: S,
    fingerprint: string,
    force: boolean,
    execute: () => Promise<StageResult<S> | Disambiguation>
  ): Promise<StageRun<S> | Disambiguation> {
    if (force) return this.produce(topic, stage, fingerprint, execute);

    const key = `${topicKey(topic)}:${stage}:${fingerprint}`;
    const pending = this.inflight.get(key);
    if (pending) {
      const shared = await pending;
      if (shared.kind === 'disambiguation') return shared;
      if (isRecordFor(shared.record, stage)) return { kind: 'record', record: shared.record, reused: true };
      throw new Error(`In-flight run for ${key} resolved to a ${shared.record.stage} record`);
    }

    const run = (async (): Promise<StageRun<S> | Disambiguation> => {
      const stored = await this.options.store.get(topic, stage, fingerprint);
      if (stored && stored.status !== 'failed') {
        this.log.debug({ stage, fingerprint, title: topic.title }, 'Reusing stored stage record');
        return { kind: 'record', record: stored, reused: true };
      }
      return this.produce(topic, stage, fingerprint, execute);
    })();
    this.inflight.set(key, run);
    try {
      return await run;
    } finally {
      this.inflight.delete(key);
    }
  }

  private async produce<S extends StageName>(
    topic: Topic,
    stage: S,
    fingerprint: string,
    execute: () => Promise<StageResult<S> | Disambiguation>
  ): Promise<StageRun<S> | Disambiguation> {
    const startedAt = Date.now();
    const result = await execute();
    if ('kind' in result) return result;
    const record = createStageRecord(topic, stage, fingerprint, result.payload, result.status, this.now());
    await this.options.store.put(record);
    this.log.info(
      { stage, fingerprint, status: record.status, title: topic.title, durationMs: Date.now() - startedAt },
      'Stage record stored'
    );
    return { kind: 'record', record, reused: false };
  }

  private async lookup<S extends StageName>(topic: Topic, stage: S, fingerprint: string): Promise<StageRecord<S> | undefined> {
    const record = await this.options.store.get(topic, stage, fingerprint);
    return record && record.status !== 'failed' ? record : undefined;
  }

  /** Walks the fingerprint chain for these parameters, reading only from the store. */
  private async resolveChain(
    topic: Topic,
    params: PipelineParameters
  ): Promise<{ records: StageRecordMap; fingerprints: Record<StageName, string | null> }> {
    const records: StageRecordMap = {};
    const extractionFp = this.fingerprint('extraction', params, null);
    const fingerprints: Record<StageName, string | null> = {
      extraction: extractionFp,
      storyline: null,
      scenePrompts: null,
      narration: null,
      images: null,
    };

    records.extraction = await this.lookup(topic, 'extraction', extractionFp);
    if (records.extraction) {
      const fp = this.fingerprint('storyline', params, records.extraction.digest);
      fingerprints.storyline = fp;
      records.storyline = await this.lookup(topic, 'storyline', fp);
    }
    if (records.storyline) {
      const promptsFp = this.fingerprint('scenePrompts', params, records.storyline.digest);
      const narrationFp = this.fingerprint('narration', params, records.storyline.digest);
      fingerprints.scenePrompts = promptsFp;
      fingerprints.narration = narrationFp;
      records.scenePrompts = await this.lookup(topic, 'scenePrompts', promptsFp);
      records.narration = await this.lookup(topic, 'narration', narrationFp);
    }
    if (records.scenePrompts) {
      const fp = this.fingerprint('images', params, records.scenePrompts.digest);
      fingerprints.images = fp;
      records.images = await this.lookup(topic, 'images', fp);
    }
    return { records, fingerprints };
  }

  async status(topic: Topic, input: PipelineParametersInput = {}): Promise<PipelineStatus> {
    const { records, fingerprints } = await this.resolveChain(topic, resolveParameters(input));
    return {
      topic,
      state: deriveState(records),
      stages: STAGE_ORDER.map((stage) => ({
        stage,
        fingerprint: fingerprints[stage],
        status: records[stage]?.status ?? null,
      })),
    };
  }

  /** Builds the combined export for one parameter chain and persists it beside the records. */
  async exportTopic(topic: Topic, input: PipelineParametersInput = {}): Promise<TopicExport> {
    const params = resolveParameters(input);
    const { records } = await this.resolveChain(topic, params);
    if (!records.extraction) {
      throw new ApiError(`Nothing to export for "${topic.title}" with these parameters`, 404);
    }
    const document = buildTopicExport(topic, params, deriveState(records), records, this.now());
    await this.options.store.saveExport(topic, document.fingerprint, document);
    this.log.info({ title: topic.title, fingerprint: document.fingerprint, stages: document.stages.length }, 'Export saved');
    return document;
  }

  /** Every stored record for the topic, across all parameter sets. */
  async records(topic: Topic): Promise<StageRecord[]> {
    return this.options.store.list(topic);
  }

  async record<S extends StageName>(topic: Topic, stage: S, fingerprint: string): Promise<StageRecord<S> | null> {
    return this.options.store.get(topic, stage, fingerprint);
  }

  /**
   * Replaces one scene's narration entry in the stored narration record of this parameter
   * chain. The record keeps its fingerprint; its digest and createdAt change.
   */
  async regenerateNarration(
    topic: Topic,
    sceneIndex: number,
    input: PipelineParametersInput = {},
    additionalContext?: string
  ): Promise<StageRecord<'narration'>> {
    const params = resolveParameters(input);
    const { records } = await this.resolveChain(topic, params);
    const { storyline, narration } = records;
    if (!storyline || !narration) {
      throw new ApiError(`No narration stored for "${topic.title}" with these parameters`, 404);
    }
    const scene = storyline.payload.scenes.find((item) => item.index === sceneIndex);
    if (!scene) throw new ApiError(`Scene ${sceneIndex} not found`, 404);

    const entry = await executeSceneNarration(storyline.payload, scene, params, this.options.gateway, additionalContext);
    const entries = narration.payload.entries.map((item) => (item.index === sceneIndex ? entry : item));
    const record = createStageRecord(topic, 'narration', narration.fingerprint, { entries }, narration.status, this.now());
    await this.options.store.put(record);
    this.log.info({ title: topic.title, scene: sceneIndex, fingerprint: record.fingerprint }, 'Scene narration regenerated');
    return record;
  }

  /** Bytes for one scene of an image set. Placeholders come back as a rendered stand-in panel. */
  async sceneImage(topic: Topic, fingerprint: string, sceneIndex: number): Promise<SceneImage> {
    const record = await this.record(topic, 'images', fingerprint);
    if (!record) throw new ApiError('Image set not found', 404);
    const artifact = record.payload.artifacts.find((item) => item.index === sceneIndex);
    if (!artifact) throw new ApiError(`No image for scene ${sceneIndex}`, 404);
    if (artifact.kind === 'placeholder') {
      const data = await renderPlaceholderPanel(sceneIndex, artifact.reason, this.options.images.aspectRatio);
      return { kind: 'placeholder', mimeType: 'image/png', data, reason: artifact.reason };
    }
    return { kind: 'image', mimeType: artifact.mimeType, data: Buffer.from(artifact.data, 'base64') };
  }
}
