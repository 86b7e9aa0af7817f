import { z } from 'zod';
import { PipelineErrorCode } from '../utils/pipelineErrors';
import { StageName, StageStatus, Topic } from './stage';

export const STORY_LENGTHS = ['short', 'medium', 'long'] as const;
export const AUDIENCES = ['kids', 'teens', 'general', 'adult'] as const;
export const EDUCATION_LEVELS = ['basic', 'standard', 'advanced'] as const;
export const NARRATION_STYLES = ['dramatic', 'educational', 'storytelling', 'documentary'] as const;
export const VOICE_TONES = ['engaging', 'serious', 'playful', 'informative'] as const;

export const MAX_SCENES = 15;

export const PipelineParametersSchema = z.object({
  length: z.enum(STORY_LENGTHS).default('medium'),
  sceneCount: z.number().int().min(1).max(MAX_SCENES).default(5),
  artStyle: z.string().trim().toLowerCase().min(1).default('western comic'),
  audience: z.enum(AUDIENCES).default('general'),
  educationLevel: z.enum(EDUCATION_LEVELS).default('standard'),
  narrationStyle: z.enum(NARRATION_STYLES).default('dramatic'),
  voiceTone: z.enum(VOICE_TONES).default('engaging'),
});

/** Fully resolved parameters (defaults applied). */
export type PipelineParameters = z.infer<typeof PipelineParametersSchema>;
/** What callers may pass; anything omitted takes its default. */
export type PipelineParametersInput = z.input<typeof PipelineParametersSchema>;

export const TARGET_STAGES = ['extraction', 'storyline', 'scenePrompts', 'narration', 'images', 'complete'] as const;
export const TargetStageSchema = z.enum(TARGET_STAGES);
export type TargetStage = z.infer<typeof TargetStageSchema>;

export type PipelineState =
  | 'NotStarted'
  | 'Extracted'
  | 'StoryGenerated'
  | 'PromptsGenerated'
  | 'NarrationGenerated'
  | 'ImagesGenerated'
  | 'Complete'
  | 'Failed';

export interface StageOutcome {
  stage: StageName;
  fingerprint: string;
  status: StageStatus;
  reused: boolean;
}

export interface StageFailure {
  stage: StageName;
  code: PipelineErrorCode;
  message: string;
}

export interface AdvanceOptions {
  /** Regenerate the target stage (both leaves for `complete`) even if a record exists. */
  force?: boolean;
  /** Checked between stages; calls already dispatched are left to finish. */
  signal?: AbortSignal;
}

export interface AdvanceResult {
  topic: Topic;
  targetStage: TargetStage;
  state: PipelineState;
  stages: StageOutcome[];
  failure?: StageFailure;
  /** Set when the title is a disambiguation page; re-invoke with one of these. */
  candidates?: string[];
  aborted?: boolean;
}

export interface PipelineStatus {
  topic: Topic;
  state: PipelineState;
  stages: Array<{ stage: StageName; fingerprint: string | null; status: StageStatus | null }>;
}
