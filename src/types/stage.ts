import { z } from 'zod';

// Pipeline order; lists, exports and state derivation all follow it
export const STAGE_ORDER = ['extraction', 'storyline', 'scenePrompts', 'narration', 'images'] as const;

export const StageNameSchema = z.enum(STAGE_ORDER);
export type StageName = z.infer<typeof StageNameSchema>;

export const StageStatusSchema = z.enum(['ok', 'partial', 'failed']);
export type StageStatus = z.infer<typeof StageStatusSchema>;

export const TopicSchema = z.object({
  title: z.string().min(1),
  language: z.string().min(2),
});
export type Topic = Readonly<z.infer<typeof TopicSchema>>;

const SceneIndex = z.number().int().min(1);

export const ArticleContentSchema = z.object({
  title: z.string(),
  language: z.string(),
  pageId: z.number().int().nullable(),
  url: z.string().nullable(),
  summary: z.string(),
  content: z.string(),
  sections: z.array(z.string()),
  candidates: z.array(z.string()),
});
export type ArticleContent = z.infer<typeof ArticleContentSchema>;

export const StorylineSceneSchema = z.object({
  index: SceneIndex,
  title: z.string(),
  narrative: z.string(),
});
export type StorylineScene = z.infer<typeof StorylineSceneSchema>;

export const StorylineSchema = z.object({
  title: z.string(),
  scenes: z.array(StorylineSceneSchema).min(1),
});
export type Storyline = z.infer<typeof StorylineSchema>;

export const ScenePromptSchema = z.object({
  index: SceneIndex,
  visual: z.string(),
  styleTag: z.string(),
});
export type ScenePrompt = z.infer<typeof ScenePromptSchema>;

export const ScenePromptSetSchema = z.object({
  prompts: z.array(ScenePromptSchema),
});
export type ScenePromptSet = z.infer<typeof ScenePromptSetSchema>;

export const NarrationEntrySchema = z.object({
  index: SceneIndex,
  text: z.string(),
  style: z.string(),
  tone: z.string(),
});
export type NarrationEntry = z.infer<typeof NarrationEntrySchema>;

export const NarrationSetSchema = z.object({
  entries: z.array(NarrationEntrySchema),
});
export type NarrationSet = z.infer<typeof NarrationSetSchema>;

export const PLACEHOLDER_PROVIDER = 'placeholder';

export const ImageArtifactSchema = z.discriminatedUnion('kind', [
  z.object({
    index: SceneIndex,
    kind: z.literal('image'),
    provider: z.string(),
    mimeType: z.string(),
    // base64 encoded image bytes
    data: z.string(),
    prompt: z.string(),
  }),
  z.object({
    index: SceneIndex,
    kind: z.literal('placeholder'),
    provider: z.literal(PLACEHOLDER_PROVIDER),
    reason: z.string(),
    prompt: z.string(),
  }),
]);
export type ImageArtifact = z.infer<typeof ImageArtifactSchema>;

export const ImageSetSchema = z.object({
  artifacts: z.array(ImageArtifactSchema),
});
export type ImageSet = z.infer<typeof ImageSetSchema>;

export interface StagePayloads {
  extraction: ArticleContent;
  storyline: Storyline;
  scenePrompts: ScenePromptSet;
  narration: NarrationSet;
  images: ImageSet;
}

export interface StageRecord<S extends StageName = StageName> {
  topic: Topic;
  stage: S;
  fingerprint: string;
  digest: string;
  status: StageStatus;
  createdAt: string;
  payload: StagePayloads[S];
}

/** At most one record per stage, each typed by its stage. */
export type StageRecordMap = { [K in StageName]?: StageRecord<K> };

export function isRecordFor<S extends StageName>(record: StageRecord, stage: S): record is StageRecord<S> {
  return record.stage === stage;
}

/** Envelope as it sits on disk or in Redis, before the payload is checked. */
export const StageRecordEnvelopeSchema = z.object({
  topic: TopicSchema,
  stage: StageNameSchema,
  fingerprint: z.string().min(1),
  digest: z.string().min(1),
  status: StageStatusSchema,
  createdAt: z.string(),
  payload: z.unknown(),
});

export const stagePayloadParsers: { [K in StageName]: (raw: unknown) => StagePayloads[K] } = {
  extraction: (raw) => ArticleContentSchema.parse(raw),
  storyline: (raw) => StorylineSchema.parse(raw),
  scenePrompts: (raw) => ScenePromptSetSchema.parse(raw),
  narration: (raw) => NarrationSetSchema.parse(raw),
  images: (raw) => ImageSetSchema.parse(raw),
};

export interface StageResult<S extends StageName> {
  payload: StagePayloads[S];
  status: StageStatus;
}

export function stageRank(stage: StageName): number {
  return STAGE_ORDER.indexOf(stage);
}
