export type Capability = 'text' | 'image';

export interface TextGenerationRequest {
  prompt: string;
  maxTokens: number;
  systemInstruction?: string;
  temperature?: number;
}

export interface TextGenerationResult {
  text: string;
  provider: string;
  attempts: number;
}

export interface ImageGenerationRequest {
  prompt: string;
  // only used for logging and attempt events
  sceneIndex?: number;
}

export interface GeneratedImage {
  data: Buffer;
  mimeType: string;
}

export type ImageGenerationResult =
  | { kind: 'image'; data: Buffer; mimeType: string; provider: string }
  | { kind: 'placeholder'; reason: string };

export interface TextBackend {
  readonly name: string;
  generateText(request: TextGenerationRequest): Promise<string>;
}

export interface ImageBackend {
  readonly name: string;
  generateImage(prompt: string): Promise<GeneratedImage>;
}

export type AttemptOutcome = 'success' | 'retry' | 'failure' | 'fallback' | 'placeholder';

/** Emitted once per provider attempt plus once per fallback or placeholder decision. */
export interface ProviderAttempt {
  capability: Capability;
  provider: string;
  attempt: number;
  outcome: AttemptOutcome;
  durationMs: number;
  sceneIndex?: number;
  errorCode?: string;
  message?: string;
}

/** What executors see of the gateway. */
export interface GenerationGateway {
  generateText(request: TextGenerationRequest): Promise<TextGenerationResult>;
  generateImage(request: ImageGenerationRequest): Promise<ImageGenerationResult>;
}
