import pLimit from 'p-limit';
import { GenerationGateway } from '../../types/provider';
import { ImageArtifact, PLACEHOLDER_PROVIDER, ScenePromptSet, StageResult } from '../../types/stage';
import { buildImagePrompt } from '../prompts/comicPrompts';

export interface ImageStageSettings {
  concurrency: number;
}

/**
 * One gateway call per scene, at most `concurrency` in flight. The gateway never
 * throws for images, so a bad scene becomes a placeholder and the stage ends `partial`.
 */
export async function executeImages(
  prompts: ScenePromptSet,
  settings: ImageStageSettings,
  gateway: GenerationGateway
): Promise<StageResult<'images'>> {
  const limit = pLimit(Math.max(1, settings.concurrency));

  const artifacts = await Promise.all(
    prompts.prompts.map((scene) =>
      limit(async (): Promise<ImageArtifact> => {
        const prompt = buildImagePrompt(scene);
        const result = await gateway.generateImage({ prompt, sceneIndex: scene.index });
        if (result.kind === 'placeholder') {
          return { index: scene.index, kind: 'placeholder', provider: PLACEHOLDER_PROVIDER, reason: result.reason, prompt };
        }
        return {
          index: scene.index,
          kind: 'image',
          provider: result.provider,
          mimeType: result.mimeType,
          data: result.data.toString('base64'),
          prompt,
        };
      })
    )
  );

  artifacts.sort((a, b) => a.index - b.index);
  const status = artifacts.some((artifact) => artifact.kind === 'placeholder') ? 'partial' : 'ok';
  return { payload: { artifacts }, status };
}
