import { GenerationGateway } from '../../types/provider';
import { PipelineParameters } from '../../types/pipeline';
import { ArticleContent, StageResult, StorylineScene } from '../../types/stage';
import { MalformedGenerationError } from '../../utils/pipelineErrors';
import { buildStorylinePrompt } from '../prompts/comicPrompts';
import { SceneBlock, parseSceneBlocks, squash } from './sceneBlocks';

const TITLE_LINE = /^title\s*:\s*(.+)$/i;

function toScene(block: SceneBlock): StorylineScene {
  const [first, ...rest] = block.body.split('\n');
  const title = first.trim().match(TITLE_LINE);
  if (!title) {
    throw new MalformedGenerationError(`storyline: scene ${block.index} does not start with a Title line`, {
      scene: block.index,
    });
  }
  const narrative = rest.join('\n').trim();
  if (!narrative) {
    throw new MalformedGenerationError(`storyline: scene ${block.index} has no narrative`, { scene: block.index });
  }
  return { index: block.index, title: squash(title[1]), narrative };
}

export async function executeStoryline(
  article: ArticleContent,
  params: PipelineParameters,
  gateway: GenerationGateway
): Promise<StageResult<'storyline'>> {
  const request = buildStorylinePrompt(article, params);
  const { text } = await gateway.generateText(request);
  const blocks = parseSceneBlocks(text, 'storyline');
  if (blocks.length !== params.sceneCount) {
    throw new MalformedGenerationError(
      `storyline: expected ${params.sceneCount} scenes, got ${blocks.length}`,
      { expected: params.sceneCount, actual: blocks.length }
    );
  }
  return {
    payload: { title: article.title, scenes: blocks.map(toScene) },
    status: 'ok',
  };
}
