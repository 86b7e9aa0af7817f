import { PipelineParameters } from '../types/pipeline';
import { StageName } from '../types/stage';
import { computeFingerprint } from '../utils/fingerprint';

/** The stage whose record digest feeds each stage's fingerprint. */
export const STAGE_UPSTREAM: Record<StageName, StageName | null> = {
  extraction: null,
  storyline: 'extraction',
  scenePrompts: 'storyline',
  narration: 'storyline',
  images: 'scenePrompts',
};

export interface FingerprintSettings {
  aspectRatio: string;
}

// Only the parameters a stage actually reads; changing anything else must not invalidate it
export function effectiveParameters(
  stage: StageName,
  params: PipelineParameters,
  settings: FingerprintSettings
): Record<string, unknown> {
  switch (stage) {
    case 'extraction':
      return {};
    case 'storyline':
      return {
        length: params.length,
        sceneCount: params.sceneCount,
        audience: params.audience,
        educationLevel: params.educationLevel,
      };
    case 'scenePrompts':
      return { artStyle: params.artStyle, sceneCount: params.sceneCount };
    case 'narration':
      return { narrationStyle: params.narrationStyle, voiceTone: params.voiceTone };
    case 'images':
      return { aspectRatio: settings.aspectRatio };
  }
}

export function stageFingerprint(
  stage: StageName,
  params: PipelineParameters,
  settings: FingerprintSettings,
  upstreamDigest: string | null
): string {
  const upstreamStage = STAGE_UPSTREAM[stage];
  const upstream: Record<string, string> = {};
  if (upstreamStage && upstreamDigest) {
    upstream[upstreamStage] = upstreamDigest;
  }
  return computeFingerprint(stage, effectiveParameters(stage, params, settings), upstream);
}
