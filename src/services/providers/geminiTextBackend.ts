import { GoogleGenAI } from '@google/genai';
import { TextBackend, TextGenerationRequest } from '../../types/provider';
import { AuthError, TransientProviderError } from '../../utils/pipelineErrors';

export class GeminiTextBackend implements TextBackend {
  readonly name = 'gemini';
  private client: GoogleGenAI | null = null;

  constructor(
    private readonly apiKey: string | undefined,
    private readonly model: string
  ) {}

  private getClient(): GoogleGenAI {
    if (!this.apiKey) throw new AuthError('Gemini API key not configured', { provider: this.name });
    if (!this.client) this.client = new GoogleGenAI({ apiKey: this.apiKey });
    return this.client;
  }

  async generateText(request: TextGenerationRequest): Promise<string> {
    const response = await this.getClient().models.generateContent({
      model: this.model,
      contents: request.prompt,
      config: {
        systemInstruction: request.systemInstruction,
        maxOutputTokens: request.maxTokens,
        temperature: request.temperature,
      },
    });
    const text = response.text?.trim();
    if (!text) {
      // Empty candidates usually mean MAX_TOKENS or a safety stop; worth another try
      const finishReason = response.candidates?.[0]?.finishReason;
      throw new TransientProviderError(`Gemini returned no text (finishReason: ${finishReason ?? 'unknown'})`, {
        provider: this.name,
      });
    }
    return text;
  }
}
