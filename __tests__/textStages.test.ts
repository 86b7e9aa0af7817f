/// <reference types="jest" />
import { resolveParameters } from '../src/services/pipelineCoordinator';
import { executeNarration } from '../src/services/stages/narrationStage';
import { executeScenePrompts, parseScenePrompt } from '../src/services/stages/scenePromptStage';
import { executeStoryline } from '../src/services/stages/storylineStage';
import { ArticleContent, Storyline } from '../src/types/stage';
import { MalformedGenerationError, SceneCountMismatchError } from '../src/utils/pipelineErrors';
import { FakeTextBackend, createTestGateway, sceneBlocks } from './helpers/fakes';

const articleContent: ArticleContent = {
  title: 'Albert Einstein',
  language: 'en',
  pageId: 736,
  url: 'https://en.wikipedia.org/wiki/Albert_Einstein',
  summary: 'Physicist.',
  content: 'Albert Einstein was a theoretical physicist.',
  sections: [],
  candidates: [],
};

const storyline: Storyline = {
  title: 'Albert Einstein',
  scenes: [
    { index: 1, title: 'Youth', narrative: 'Growing up in Munich.' },
    { index: 2, title: 'Miracle year', narrative: 'Four papers in 1905.' },
  ],
};

describe('executeStoryline', () => {
  it('parses one titled scene per block', async () => {
    const { gateway, text } = createTestGateway();
    const result = await executeStoryline(articleContent, resolveParameters({ sceneCount: 3 }), gateway);

    expect(result.status).toBe('ok');
    expect(result.payload.title).toBe('Albert Einstein');
    expect(result.payload.scenes).toEqual([
      { index: 1, title: 'Chapter 1', narrative: 'The narrative of scene 1.' },
      { index: 2, title: 'Chapter 2', narrative: 'The narrative of scene 2.' },
      { index: 3, title: 'Chapter 3', narrative: 'The narrative of scene 3.' },
    ]);
    expect(text.calls).toHaveLength(1);
    // medium length: 1000 words * 1.5 + 3 scenes * 40 + 256
    expect(text.calls[0].maxTokens).toBe(1876);
    expect(text.calls[0].prompt).toContain('Albert Einstein was a theoretical physicist.');
  });

  it('rejects the wrong number of scenes', async () => {
    const { gateway } = createTestGateway({ text: new FakeTextBackend(() => sceneBlocks(2, (i) => `Title: T${i}\nBody ${i}`)) });
    await expect(executeStoryline(articleContent, resolveParameters({ sceneCount: 3 }), gateway)).rejects.toThrow(
      'storyline: expected 3 scenes, got 2'
    );
  });

  it('rejects a scene without a title line', async () => {
    const { gateway } = createTestGateway({ text: new FakeTextBackend(() => '=== SCENE 1 ===\nNo title here') });
    await expect(executeStoryline(articleContent, resolveParameters({ sceneCount: 1 }), gateway)).rejects.toThrow(
      'storyline: scene 1 does not start with a Title line'
    );
  });

  it('rejects a scene with a title but no narrative', async () => {
    const { gateway } = createTestGateway({ text: new FakeTextBackend(() => '=== SCENE 1 ===\nTitle: Alone') });
    await expect(executeStoryline(articleContent, resolveParameters({ sceneCount: 1 }), gateway)).rejects.toBeInstanceOf(
      MalformedGenerationError
    );
  });
});

describe('executeScenePrompts', () => {
  const output = [
    '=== SCENE 1 ===',
    'Visual: A lab at night,',
    '  glowing equations.',
    'Dialogue: "Eureka!"',
    'Style: manga style, screen tones',
    '=== SCENE 2 ===',
    'Visual: A train.',
    'Caption: 1905',
    'more caption text',
  ].join('\n');

  it('keeps visual lines, drops text elements and defaults the style', async () => {
    const { gateway } = createTestGateway({ text: new FakeTextBackend(() => output) });
    const result = await executeScenePrompts(storyline, resolveParameters({ sceneCount: 2, artStyle: 'Manga' }), gateway);

    expect(result.payload.prompts).toEqual([
      { index: 1, visual: 'A lab at night, glowing equations.', styleTag: 'manga style, screen tones' },
      { index: 2, visual: 'A train.', styleTag: 'manga' },
    ]);
  });

  it('rejects a scene count that differs from the storyline', async () => {
    const { gateway } = createTestGateway({ text: new FakeTextBackend(() => sceneBlocks(3, (i) => `Visual: V${i}`)) });
    const promise = executeScenePrompts(storyline, resolveParameters({ sceneCount: 2 }), gateway);
    await expect(promise).rejects.toBeInstanceOf(SceneCountMismatchError);
    await expect(promise).rejects.toThrow('scenePrompts returned 3 scenes, expected 2');
  });

  it('requires a Visual line', () => {
    expect(() => parseScenePrompt({ index: 4, body: 'Style: noir' }, 'noir')).toThrow('scenePrompts: scene 4 has no Visual line');
  });
});

describe('executeNarration', () => {
  it('produces one squashed entry per storyline scene', async () => {
    const { gateway } = createTestGateway({
      text: new FakeTextBackend(() => sceneBlocks(2, (i) => `A young mind\n  wonders, scene ${i}.`)),
    });
    const result = await executeNarration(
      storyline,
      resolveParameters({ narrationStyle: 'documentary', voiceTone: 'serious' }),
      gateway
    );

    expect(result.payload.entries).toEqual([
      { index: 1, text: 'A young mind wonders, scene 1.', style: 'documentary', tone: 'serious' },
      { index: 2, text: 'A young mind wonders, scene 2.', style: 'documentary', tone: 'serious' },
    ]);
  });

  it('rejects a missing scene', async () => {
    const { gateway } = createTestGateway({ text: new FakeTextBackend(() => sceneBlocks(1, () => 'Only one.')) });
    await expect(executeNarration(storyline, resolveParameters({}), gateway)).rejects.toThrow(
      'narration returned 1 scenes, expected 2'
    );
  });
});
