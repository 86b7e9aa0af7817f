import sharp from 'sharp';

const PANEL_WIDTH = 1024;
const BG_COLOR = '#f5f5f5';
const BORDER_COLOR = '#c8c8c8';
const TEXT_COLOR = '#222222';
const MUTED_COLOR = '#777777';
const MAX_REASON_CHARS = 90;

/** Panel dimensions for an aspect ratio such as "16:9"; anything unparsable falls back to 16:9. */
export function panelSize(aspectRatio: string): { width: number; height: number } {
  const match = /^(\d+):(\d+)$/.exec(aspectRatio.trim());
  const ratioWidth = match ? Number(match[1]) : 0;
  const ratioHeight = match ? Number(match[2]) : 0;
  if (!ratioWidth || !ratioHeight) return { width: PANEL_WIDTH, height: 576 };
  return { width: PANEL_WIDTH, height: Math.round((PANEL_WIDTH * ratioHeight) / ratioWidth) };
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Renders the visible stand-in for a scene whose image could not be generated:
 * a dashed frame with the scene number and the failure reason, as PNG.
 */
export async function renderPlaceholderPanel(sceneIndex: number, reason: string, aspectRatio: string): Promise<Buffer> {
  const { width, height } = panelSize(aspectRatio);
  const detail = reason.length > MAX_REASON_CHARS ? `${reason.slice(0, MAX_REASON_CHARS - 3)}...` : reason;
  const middle = Math.round(height / 2);

  const svg = `
    <svg width="${width}" height="${height}" xmlns="http://www.w3.org/2000/svg">
      <rect width="${width}" height="${height}" fill="${BG_COLOR}"/>
      <rect x="16" y="16" width="${width - 32}" height="${height - 32}" fill="none"
            stroke="${BORDER_COLOR}" stroke-width="4" stroke-dasharray="16 12"/>
      <text x="${width / 2}" y="${middle - 40}" font-family="Arial, sans-serif" font-size="48"
            fill="${TEXT_COLOR}" text-anchor="middle">Scene ${sceneIndex}</text>
      <text x="${width / 2}" y="${middle + 10}" font-family="Arial, sans-serif" font-size="28"
            fill="${TEXT_COLOR}" text-anchor="middle">Image generation failed</text>
      <text x="${width / 2}" y="${middle + 56}" font-family="Arial, sans-serif" font-size="20"
            fill="${MUTED_COLOR}" text-anchor="middle">${escapeXml(detail)}</text>
    </svg>
  `;

  return sharp(Buffer.from(svg)).png().toBuffer();
}
