// Centralized environment configuration
// Loads .env via index.ts (dotenv) at process start

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  // Logging
  logLevel: string;
  requestLogFile?: string;
  // CORS
  allowedOrigins: string[];
  // Text generation
  textProvider: string;
  geminiApiKey?: string;
  geminiTextModel: string;
  replicateApiKey?: string;
  replicateTextModel: string;
  // Image generation
  replicateImageModel: string;
  falKey?: string;
  falImageModel: string;
  imagePrimaryProvider: string;
  imageFallbackProvider: string;
  imageAspectRatio: string;
  // Provider call policy
  providerMaxAttempts: number;
  providerBaseDelayMs: number;
  providerTimeoutMs: number;
  imageConcurrency: number;
  // Stage store
  stageStore: string;
  stageStoreDir: string;
  redisUrl?: string;
  redisPrefix: string;
  // Content source
  wikipediaUserAgent: string;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value == null || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const nodeEnv = source.NODE_ENV || 'development';
  return {
    nodeEnv,
    port: parseInteger(source.PORT, 5000),
    // Tests run silent unless LOG_LEVEL asks otherwise
    logLevel: source.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),
    requestLogFile: source.REQUEST_LOG_FILE || undefined,
    allowedOrigins: parseList(source.ALLOWED_ORIGINS),
    textProvider: (source.TEXT_PROVIDER || 'gemini').toLowerCase(),
    geminiApiKey: source.GEMINI_API_KEY || source.GOOGLE_GENAI_API_KEY || source.GENAI_API_KEY,
    geminiTextModel: source.GEMINI_TEXT_MODEL || 'gemini-2.5-flash',
    // Accept both env names for Replicate
    replicateApiKey: source.REPLICATE_API_TOKEN || source.REPLICATE_API_KEY,
    replicateTextModel: source.REPLICATE_TEXT_MODEL || 'openai/gpt-4o-mini',
    replicateImageModel: source.REPLICATE_IMAGE_MODEL || 'black-forest-labs/flux-schnell',
    falKey: source.FAL_KEY,
    falImageModel: source.FAL_IMAGE_MODEL || 'fal-ai/flux/schnell',
    imagePrimaryProvider: (source.IMAGE_PRIMARY_PROVIDER || 'replicate').toLowerCase(),
    imageFallbackProvider: (source.IMAGE_FALLBACK_PROVIDER || 'fal').toLowerCase(),
    imageAspectRatio: source.IMAGE_ASPECT_RATIO || '16:9',
    providerMaxAttempts: parseInteger(source.PROVIDER_MAX_ATTEMPTS, 3),
    providerBaseDelayMs: parseInteger(source.PROVIDER_BASE_DELAY_MS, 1000),
    providerTimeoutMs: parseInteger(source.PROVIDER_TIMEOUT_MS, 120000),
    imageConcurrency: parseInteger(source.IMAGE_CONCURRENCY, 4),
    stageStore: (source.STAGE_STORE || 'file').toLowerCase(),
    stageStoreDir: source.STAGE_STORE_DIR || 'data/stages',
    redisUrl: source.REDIS_URL,
    redisPrefix: source.REDIS_PREFIX || 'comic:',
    wikipediaUserAgent:
      source.WIKIPEDIA_USER_AGENT || 'wiki-comic-pipeline/1.0 (https://www.mediawiki.org/wiki/API:Etiquette)',
  };
}

export const env: EnvConfig = loadEnv();
