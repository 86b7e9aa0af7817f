/**
 * Prompt templates for the text-generation stages.
 * Batch templates ask for the `=== SCENE n ===` block format parsed by stages/sceneBlocks;
 * the single-scene narration template asks for plain text.
 */
import { ArticleContent, ScenePrompt, Storyline, StorylineScene } from '../../types/stage';
import { PipelineParameters } from '../../types/pipeline';

export const STORYLINE_MAX_CHARS = 15000;

export const STORY_WORD_COUNTS: Record<PipelineParameters['length'], number> = {
  short: 500,
  medium: 1000,
  long: 2000,
};

export const NARRATION_WORDS = { min: 18, max: 28 } as const;

const ART_STYLE_GUIDANCE: Record<string, string> = {
  manga:
    'Use manga-specific visual elements like speed lines, expressive emotions and distinctive panel layouts. Larger eyes, detailed hair, simplified facial features, black and white with screen tones.',
  superhero:
    'Use bold saturated colors, dynamic poses with exaggerated anatomy, dramatic lighting and action-oriented compositions with strong outlines.',
  cartoon:
    'Use simplified, exaggerated character features with bold outlines, bright colors, expressive faces, motion lines and impact stars.',
  noir: 'Use high-contrast black and white or muted colors with dramatic shadows, low-key lighting, rain and urban settings. Realistic proportions.',
  european:
    'Use detailed backgrounds with architectural precision and clear line work (ligne claire). Semi-realistic, consistent character proportions.',
  indie:
    'Use an unconventional, personal art style. Line work may be sketchy or deliberately unpolished; watercolor-like or limited palette.',
  retro: 'Use halftone dot shading, slightly faded colors and classic compositions reminiscent of 1950s-70s comics.',
};

const AUDIENCE_GUIDANCE: Record<PipelineParameters['audience'], string> = {
  kids: 'Use simple, clear vocabulary and straightforward concepts. Avoid complex themes, frightening imagery or adult situations.',
  teens: 'Use relatable language and themes important to adolescents, with moderate complexity and some emotional nuance.',
  general: 'Balance accessibility with depth. Informative without being overly technical.',
  adult: 'Include sophisticated themes, complex characterizations and full technical detail where appropriate.',
};

const EDUCATION_GUIDANCE: Record<PipelineParameters['educationLevel'], string> = {
  basic: 'Use simple vocabulary and focus on foundational concepts, broken into digestible pieces with examples.',
  standard: 'Use moderate vocabulary and present concepts with enough depth for general understanding.',
  advanced: 'Use field-specific terminology where appropriate and explore concepts in depth.',
};

const NARRATION_STYLE_GUIDANCE: Record<PipelineParameters['narrationStyle'], string> = {
  dramatic: 'Vivid descriptions, emotional depth and cinematic pacing. Build tension.',
  educational: 'Clear, informative language that explains concepts and gives context.',
  storytelling: 'Traditional storytelling with narrative flow and character development.',
  documentary: 'Factual, objective language with historical context.',
};

const VOICE_TONE_GUIDANCE: Record<PipelineParameters['voiceTone'], string> = {
  engaging: 'Enthusiastic and captivating; draw the audience in.',
  serious: 'Respectful and solemn, suited to important or grave topics.',
  playful: 'Light and fun, accessible to younger audiences.',
  informative: 'Clear and professional, focused on delivering information.',
};

export function artStyleGuidance(artStyle: string): string {
  return ART_STYLE_GUIDANCE[artStyle] ?? `Render consistently in a ${artStyle} comic art style.`;
}

export interface TextPrompt {
  systemInstruction: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

function truncate(content: string, maxChars: number): string {
  return content.length > maxChars ? `${content.slice(0, maxChars)}...` : content;
}

export function buildStorylinePrompt(article: ArticleContent, params: PipelineParameters): TextPrompt {
  const words = STORY_WORD_COUNTS[params.length];
  const prompt = `
Create a comic book storyline based on the following Wikipedia article about "${article.title}".

The storyline should:
1. Be approximately ${words} words in total
2. Capture the most important facts and details from the article
3. Have a clear beginning, middle and end
4. Be split into EXACTLY ${params.sceneCount} sequential scenes
5. Describe each scene vividly enough to be drawn as a comic panel

Audience: ${params.audience}. ${AUDIENCE_GUIDANCE[params.audience]}
Education level: ${params.educationLevel}. ${EDUCATION_GUIDANCE[params.educationLevel]}

Wikipedia content:

${truncate(article.content, STORYLINE_MAX_CHARS)}

FORMAT YOUR RESPONSE EXACTLY AS:
=== SCENE 1 ===
Title: <short scene title>
<narrative for scene 1>
=== SCENE 2 ===
Title: <short scene title>
<narrative for scene 2>

Continue up to === SCENE ${params.sceneCount} ===. Output nothing else.
`.trim();

  return {
    systemInstruction:
      'You are an expert comic book writer and historian who creates accurate, visually compelling storylines from real information.',
    prompt,
    // ~1.5 tokens per word plus headroom for the block markers
    maxTokens: Math.ceil(words * 1.5) + params.sceneCount * 40 + 256,
    temperature: 0.7,
  };
}

function renderStoryline(storyline: Storyline): string {
  return storyline.scenes.map((scene) => `Scene ${scene.index}: ${scene.title}\n${scene.narrative}`).join('\n\n');
}

export function buildScenePromptsPrompt(storyline: Storyline, params: PipelineParameters): TextPrompt {
  const prompt = `
Based on the following comic storyline titled "${storyline.title}", write exactly ${params.sceneCount} scene prompts for an image generator, one per scene, in order.

Each scene prompt MUST:
1. Describe the setting, characters, positions, expressions and actions in detail
2. Contain ZERO text elements: no dialogue, speech bubbles, captions or narration
3. Keep characters visually consistent across scenes
4. Use the ${params.artStyle} art style: ${artStyleGuidance(params.artStyle)}

Storyline:

${renderStoryline(storyline)}

FORMAT EACH SCENE EXACTLY AS:
=== SCENE 1 ===
Visual: <detailed visual description>
Style: ${params.artStyle} style with <specific stylistic elements>

PROVIDE EXACTLY ${params.sceneCount} SCENES. Output nothing else.
`.trim();

  return {
    systemInstruction:
      'You are an expert comic artist who writes detailed, text-free panel descriptions for image generation models.',
    prompt,
    maxTokens: params.sceneCount * 300 + 256,
    temperature: 0.7,
  };
}

export function buildNarrationPrompt(storyline: Storyline, params: PipelineParameters): TextPrompt {
  const prompt = `
Write a short voice-over for each scene of the comic "${storyline.title}", like a social media reel narration.

For every scene:
- EXACTLY 2 sentences, ${NARRATION_WORDS.min}-${NARRATION_WORDS.max} words in total
- Complement the scene without restating it verbatim
- Use only facts present in the storyline

Style: ${params.narrationStyle}. ${NARRATION_STYLE_GUIDANCE[params.narrationStyle]}
Tone: ${params.voiceTone}. ${VOICE_TONE_GUIDANCE[params.voiceTone]}

Storyline:

${renderStoryline(storyline)}

FORMAT YOUR RESPONSE EXACTLY AS:
=== SCENE 1 ===
<narration for scene 1>

Provide one block for each of the ${storyline.scenes.length} scenes. Output nothing else.
`.trim();

  return {
    systemInstruction: 'You are an expert narrator who writes compelling voice-over scripts for visual media.',
    prompt,
    maxTokens: storyline.scenes.length * 90 + 128,
    temperature: 0.8,
  };
}

export function buildSceneNarrationPrompt(
  storyline: Storyline,
  scene: StorylineScene,
  params: PipelineParameters,
  additionalContext = ''
): TextPrompt {
  const context = additionalContext.trim();
  const prompt = `
Write the voice-over for scene ${scene.index} only of the comic "${storyline.title}", like a social media reel narration.

- EXACTLY 2 sentences, ${NARRATION_WORDS.min}-${NARRATION_WORDS.max} words in total
- Complement the scene without restating it verbatim
- Use only facts present in the storyline${context ? ' and the additional context' : ''}

Style: ${params.narrationStyle}. ${NARRATION_STYLE_GUIDANCE[params.narrationStyle]}
Tone: ${params.voiceTone}. ${VOICE_TONE_GUIDANCE[params.voiceTone]}

Scene ${scene.index}: ${scene.title}
${scene.narrative}
${context ? `\nAdditional context: ${context}\n` : ''}
Respond with the narration text only.
`.trim();

  return {
    systemInstruction: 'You are an expert narrator who writes compelling voice-over scripts for visual media.',
    prompt,
    maxTokens: 160,
    temperature: 0.8,
  };
}

export function buildImagePrompt(scene: ScenePrompt): string {
  return `${scene.visual} Art style: ${scene.styleTag}. No text, no lettering, no speech bubbles, no captions.`;
}
