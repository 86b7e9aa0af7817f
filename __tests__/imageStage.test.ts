/// <reference types="jest" />
import { buildImagePrompt } from '../src/services/prompts/comicPrompts';
import { executeImages } from '../src/services/stages/imageStage';
import { ScenePromptSet } from '../src/types/stage';
import { FakeImageBackend, PNG_BYTES, createTestGateway, failingImageBackend } from './helpers/fakes';

function promptSet(count: number): ScenePromptSet {
  return {
    prompts: Array.from({ length: count }, (_, k) => ({ index: k + 1, visual: `Panel ${k + 1}.`, styleTag: 'manga' })),
  };
}

describe('buildImagePrompt', () => {
  it('appends the style and forbids lettering', () => {
    expect(buildImagePrompt({ index: 1, visual: 'A lab.', styleTag: 'noir' })).toBe(
      'A lab. Art style: noir. No text, no lettering, no speech bubbles, no captions.'
    );
  });
});

describe('executeImages', () => {
  it('stores one base64 image per scene in scene order', async () => {
    const { gateway } = createTestGateway();
    const result = await executeImages(promptSet(3), { concurrency: 2 }, gateway);

    expect(result.status).toBe('ok');
    expect(result.payload.artifacts.map((artifact) => artifact.index)).toEqual([1, 2, 3]);
    expect(result.payload.artifacts[0]).toEqual({
      index: 1,
      kind: 'image',
      provider: 'replicate',
      mimeType: 'image/png',
      data: PNG_BYTES.toString('base64'),
      prompt: 'Panel 1. Art style: manga. No text, no lettering, no speech bubbles, no captions.',
    });
  });

  it('ends partial with a placeholder for a scene no backend could draw', async () => {
    const refusing = (prompt: string) => {
      if (prompt.startsWith('Panel 2.')) throw Object.assign(new Error('Unprocessable'), { status: 422 });
      return { data: PNG_BYTES, mimeType: 'image/png' };
    };
    const { gateway } = createTestGateway({
      primary: new FakeImageBackend('replicate', refusing),
      fallback: new FakeImageBackend('fal', refusing),
    });
    const result = await executeImages(promptSet(3), { concurrency: 4 }, gateway);

    expect(result.status).toBe('partial');
    expect(result.payload.artifacts.map((artifact) => `${artifact.index}:${artifact.kind}`)).toEqual([
      '1:image',
      '2:placeholder',
      '3:image',
    ]);
    expect(result.payload.artifacts[1]).toMatchObject({
      provider: 'placeholder',
      reason: 'PROVIDER_BAD_REQUEST: Unprocessable',
    });
  });

  it('attributes every image to the fallback when the primary is out of quota', async () => {
    const primary = failingImageBackend('replicate', () => Object.assign(new Error('quota exceeded'), { status: 402 }));
    const { gateway } = createTestGateway({ primary });
    const result = await executeImages(promptSet(4), { concurrency: 4 }, gateway);

    expect(result.status).toBe('ok');
    expect(result.payload.artifacts.map((artifact) => artifact.provider)).toEqual(['fal', 'fal', 'fal', 'fal']);
  });

  it('keeps at most `concurrency` calls in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const slow = new FakeImageBackend('replicate', async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise<void>((resolve) => setTimeout(() => resolve(), 5));
      inFlight -= 1;
      return { data: PNG_BYTES, mimeType: 'image/png' };
    });
    const { gateway } = createTestGateway({ primary: slow });
    await executeImages(promptSet(6), { concurrency: 2 }, gateway);

    expect(slow.prompts).toHaveLength(6);
    expect(peak).toBe(2);
  });
});
