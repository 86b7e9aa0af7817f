import { createFalClient } from '@fal-ai/client';
import { z } from 'zod';
import { GeneratedImage, ImageBackend } from '../../types/provider';
import { AuthError, TransientProviderError } from '../../utils/pipelineErrors';
import { downloadImage } from './imageDownload';

type FalClient = ReturnType<typeof createFalClient>;

const FalImageOutputSchema = z.object({
  images: z
    .array(
      z.object({
        url: z.string().min(1),
        content_type: z.string().optional(),
      })
    )
    .min(1),
});

const IMAGE_SIZES: Record<string, string> = {
  '1:1': 'square_hd',
  '4:3': 'landscape_4_3',
  '16:9': 'landscape_16_9',
  '3:4': 'portrait_4_3',
  '9:16': 'portrait_16_9',
};

export class FalImageBackend implements ImageBackend {
  readonly name = 'fal';
  private client: FalClient | null = null;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly model: string,
    private readonly aspectRatio: string
  ) {}

  private getClient(): FalClient {
    if (!this.apiKey) throw new AuthError('FAL AI API key not configured', { provider: this.name });
    if (!this.client) this.client = createFalClient({ credentials: this.apiKey });
    return this.client;
  }

  async generateImage(prompt: string): Promise<GeneratedImage> {
    const result = await this.getClient().subscribe(this.model, {
      input: {
        prompt,
        image_size: IMAGE_SIZES[this.aspectRatio] ?? 'landscape_16_9',
        num_images: 1,
        enable_safety_checker: true,
      },
    });
    const data: unknown = result.data;
    const parsed = FalImageOutputSchema.safeParse(data);
    if (!parsed.success) {
      throw new TransientProviderError('No image URL in FAL response', { provider: this.name });
    }
    const image = await downloadImage(parsed.data.images[0].url, this.name);
    const declared = parsed.data.images[0].content_type;
    return declared && declared.startsWith('image/') ? { ...image, mimeType: declared } : image;
  }
}
