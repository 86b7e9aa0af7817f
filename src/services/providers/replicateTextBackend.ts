import Replicate from 'replicate';
import { TextBackend, TextGenerationRequest } from '../../types/provider';
import { TransientProviderError } from '../../utils/pipelineErrors';
import { createReplicateClient, toReplicateModelId } from './replicateClient';

// Language models on Replicate stream tokens, so output is usually an array of chunks
function collectText(output: unknown): string {
  if (typeof output === 'string') return output;
  if (Array.isArray(output)) return output.filter((chunk): chunk is string => typeof chunk === 'string').join('');
  return '';
}

export class ReplicateTextBackend implements TextBackend {
  readonly name = 'replicate';
  private client: Replicate | null = null;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly model: string
  ) {}

  async generateText(request: TextGenerationRequest): Promise<string> {
    if (!this.client) this.client = createReplicateClient(this.apiKey);
    const output: unknown = await this.client.run(toReplicateModelId(this.model), {
      input: {
        prompt: request.prompt,
        system_prompt: request.systemInstruction,
        max_completion_tokens: request.maxTokens,
        temperature: request.temperature,
      },
    });
    const text = collectText(output).trim();
    if (!text) {
      throw new TransientProviderError('Replicate returned no text', { provider: this.name });
    }
    return text;
  }
}
