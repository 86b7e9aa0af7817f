import Replicate from 'replicate';
import { GeneratedImage, ImageBackend } from '../../types/provider';
import { TransientProviderError } from '../../utils/pipelineErrors';
import { downloadImage } from './imageDownload';
import { createReplicateClient, resolveOutputUrls, toReplicateModelId } from './replicateClient';

export class ReplicateImageBackend implements ImageBackend {
  readonly name = 'replicate';
  private client: Replicate | null = null;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly model: string,
    private readonly aspectRatio: string
  ) {}

  async generateImage(prompt: string): Promise<GeneratedImage> {
    if (!this.client) this.client = createReplicateClient(this.apiKey);
    const output: unknown = await this.client.run(toReplicateModelId(this.model), {
      input: {
        prompt,
        aspect_ratio: this.aspectRatio,
        num_outputs: 1,
        output_format: 'png',
      },
    });
    const [url] = await resolveOutputUrls(output);
    if (!url) {
      throw new TransientProviderError('No output URL returned by Replicate', { provider: this.name });
    }
    return downloadImage(url, this.name);
  }
}
