import { MalformedGenerationError } from '../../utils/pipelineErrors';

export interface SceneBlock {
  index: number;
  body: string;
}

const DELIMITER = /^===\s*SCENE\s+(\d+)\s*===$/i;
const CODE_FENCE = /^```/;

/**
 * Splits model output on `=== SCENE n ===` lines.
 *
 * Blocks must be numbered 1, 2, 3... in order and have non-empty bodies; text
 * before the first delimiter is ignored. Anything else throws
 * MalformedGenerationError rather than returning a partial split.
 */
export function parseSceneBlocks(text: string, label: string): SceneBlock[] {
  const blocks: SceneBlock[] = [];
  let current: { index: number; lines: string[] } | null = null;

  const close = () => {
    if (!current) return;
    const body = current.lines.join('\n').trim();
    if (!body) {
      throw new MalformedGenerationError(`${label}: scene ${current.index} is empty`, { label, scene: current.index });
    }
    blocks.push({ index: current.index, body });
  };

  for (const raw of text.replace(/\r\n?/g, '\n').split('\n')) {
    const line = raw.trim();
    if (CODE_FENCE.test(line)) continue;
    const match = line.match(DELIMITER);
    if (!match) {
      current?.lines.push(raw.trimEnd());
      continue;
    }
    close();
    const index = Number(match[1]);
    const expected = blocks.length + 1;
    if (index !== expected) {
      throw new MalformedGenerationError(`${label}: expected scene ${expected}, found scene ${index}`, {
        label,
        expected,
        found: index,
      });
    }
    current = { index, lines: [] };
  }
  close();

  if (blocks.length === 0) {
    throw new MalformedGenerationError(`${label}: no scene blocks found`, { label });
  }
  return blocks;
}

/** Collapses whitespace runs, keeping the text on one line. */
export function squash(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
