import { GenerationGateway } from '../../types/provider';
import { PipelineParameters } from '../../types/pipeline';
import { NarrationEntry, StageResult, Storyline, StorylineScene } from '../../types/stage';
import { MalformedGenerationError, SceneCountMismatchError } from '../../utils/pipelineErrors';
import { buildNarrationPrompt, buildSceneNarrationPrompt } from '../prompts/comicPrompts';
import { parseSceneBlocks, squash } from './sceneBlocks';

export async function executeNarration(
  storyline: Storyline,
  params: PipelineParameters,
  gateway: GenerationGateway
): Promise<StageResult<'narration'>> {
  const expected = storyline.scenes.length;
  const { text } = await gateway.generateText(buildNarrationPrompt(storyline, params));
  const blocks = parseSceneBlocks(text, 'narration');
  if (blocks.length !== expected) {
    throw new SceneCountMismatchError('narration', expected, blocks.length);
  }
  return {
    payload: {
      entries: blocks.map((block) => ({
        index: block.index,
        text: squash(block.body),
        style: params.narrationStyle,
        tone: params.voiceTone,
      })),
    },
    status: 'ok',
  };
}

const STRAY_DELIMITER = /^\s*===\s*SCENE\s+\d+\s*===\s*$/gim;

/** Narration for one scene, e.g. to replace a single entry with optional extra context. */
export async function executeSceneNarration(
  storyline: Storyline,
  scene: StorylineScene,
  params: PipelineParameters,
  gateway: GenerationGateway,
  additionalContext?: string
): Promise<NarrationEntry> {
  const { text } = await gateway.generateText(buildSceneNarrationPrompt(storyline, scene, params, additionalContext));
  const narration = squash(text.replace(STRAY_DELIMITER, ''));
  if (!narration) {
    throw new MalformedGenerationError(`narration: scene ${scene.index} is empty`, { label: 'narration', scene: scene.index });
  }
  return { index: scene.index, text: narration, style: params.narrationStyle, tone: params.voiceTone };
}
