import { GenerationGateway } from '../../types/provider';
import { PipelineParameters } from '../../types/pipeline';
import { ScenePrompt, StageResult, Storyline } from '../../types/stage';
import { MalformedGenerationError, SceneCountMismatchError } from '../../utils/pipelineErrors';
import { buildScenePromptsPrompt } from '../prompts/comicPrompts';
import { SceneBlock, parseSceneBlocks, squash } from './sceneBlocks';

const LABELLED = /^([a-z][a-z -]*?)\s*:\s*(.*)$/i;
// Images must not carry text, so lines feeding speech or captions are dropped
const TEXT_LABELS = new Set(['dialog', 'dialogue', 'narrator', 'narration', 'caption', 'voice-over', 'voiceover', 'voice over', 'speech', 'text']);

export function parseScenePrompt(block: SceneBlock, defaultStyle: string): ScenePrompt {
  const visual: string[] = [];
  let style: string | undefined;
  let section: 'visual' | 'style' | 'other' = 'other';

  for (const line of block.body.split('\n')) {
    const labelled = line.trim().match(LABELLED);
    const label = labelled?.[1].toLowerCase();
    if (labelled && label === 'visual') {
      section = 'visual';
      visual.push(labelled[2]);
    } else if (labelled && label === 'style') {
      section = 'style';
      style = labelled[2];
    } else if (labelled && label && TEXT_LABELS.has(label)) {
      section = 'other';
    } else if (section === 'visual') {
      visual.push(line);
    }
  }

  const text = squash(visual.join(' '));
  if (!text) {
    throw new MalformedGenerationError(`scenePrompts: scene ${block.index} has no Visual line`, { scene: block.index });
  }
  const styleTag = style ? squash(style) : '';
  return { index: block.index, visual: text, styleTag: styleTag || defaultStyle };
}

export async function executeScenePrompts(
  storyline: Storyline,
  params: PipelineParameters,
  gateway: GenerationGateway
): Promise<StageResult<'scenePrompts'>> {
  const expected = storyline.scenes.length;
  const { text } = await gateway.generateText(buildScenePromptsPrompt(storyline, params));
  const blocks = parseSceneBlocks(text, 'scenePrompts');
  if (blocks.length !== expected) {
    throw new SceneCountMismatchError('scenePrompts', expected, blocks.length);
  }
  return {
    payload: { prompts: blocks.map((block) => parseScenePrompt(block, params.artStyle)) },
    status: 'ok',
  };
}
