/// <reference types="jest" />
import { parseSceneBlocks, squash } from '../src/services/stages/sceneBlocks';
import { MalformedGenerationError } from '../src/utils/pipelineErrors';

describe('parseSceneBlocks', () => {
  it('splits numbered blocks and ignores text before the first delimiter', () => {
    const text = 'Here is your story:\n=== SCENE 1 ===\nFirst\n\n=== scene 2 ===\n  Second line  \n';
    expect(parseSceneBlocks(text, 'storyline')).toEqual([
      { index: 1, body: 'First' },
      { index: 2, body: 'Second line' },
    ]);
  });

  it('tolerates code fences and CRLF line endings', () => {
    expect(parseSceneBlocks('```\r\n===SCENE 1===\r\nA\r\n```', 'narration')).toEqual([{ index: 1, body: 'A' }]);
  });

  it('rejects blocks out of order', () => {
    expect(() => parseSceneBlocks('=== SCENE 2 ===\nx', 'storyline')).toThrow('storyline: expected scene 1, found scene 2');
    expect(() => parseSceneBlocks('=== SCENE 1 ===\na\n=== SCENE 1 ===\nb', 'storyline')).toThrow(
      'storyline: expected scene 2, found scene 1'
    );
  });

  it('rejects empty blocks', () => {
    expect(() => parseSceneBlocks('=== SCENE 1 ===\n\n=== SCENE 2 ===\nB', 'narration')).toThrow('narration: scene 1 is empty');
  });

  it('rejects output with no blocks at all', () => {
    expect(() => parseSceneBlocks('just prose', 'scenePrompts')).toThrow(MalformedGenerationError);
    expect(() => parseSceneBlocks('just prose', 'scenePrompts')).toThrow('scenePrompts: no scene blocks found');
  });
});

describe('squash', () => {
  it('collapses whitespace onto one line', () => {
    expect(squash(' a \n  b\tc ')).toBe('a b c');
  });
});
