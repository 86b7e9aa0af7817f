import axios from 'axios';
import { GeneratedImage } from '../../types/provider';
import { MalformedRequestError } from '../../utils/pipelineErrors';

const DATA_URI = /^data:([\w/+.-]+);base64,(.+)$/s;

const EXTENSION_MIME: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  gif: 'image/gif',
};

function mimeFromUrl(url: string): string {
  const ext = url.split('?')[0].split('.').pop()?.toLowerCase() ?? '';
  return EXTENSION_MIME[ext] ?? 'image/png';
}

/** Fetches generated image bytes from a provider URL (or decodes an inline data URI). */
export async function downloadImage(url: string, provider: string, timeoutMs = 60000): Promise<GeneratedImage> {
  const inline = url.match(DATA_URI);
  if (inline) {
    return { data: Buffer.from(inline[2], 'base64'), mimeType: inline[1] };
  }
  if (!/^https?:\/\//i.test(url)) {
    throw new MalformedRequestError(`${provider} returned an unusable image reference`, { provider });
  }
  const response = await axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer', timeout: timeoutMs });
  const contentType = response.headers['content-type'];
  const mimeType =
    typeof contentType === 'string' && contentType.startsWith('image/') ? contentType.split(';')[0] : mimeFromUrl(url);
  return { data: Buffer.from(response.data), mimeType };
}
