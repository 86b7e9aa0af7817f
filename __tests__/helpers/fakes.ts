import { RetryPolicy } from '../../src/config/pipelineConfig';
import { StageStoreRedisClient, StageStoreRedisTransaction } from '../../src/repository/redisStageStore';
import { ProviderGateway } from '../../src/services/providerGateway';
import { ContentFetchResult, ContentSource, SearchHit, WikiArticle } from '../../src/types/content';
import {
  GeneratedImage,
  ImageBackend,
  ProviderAttempt,
  TextBackend,
  TextGenerationRequest,
} from '../../src/types/provider';

export const FAST_RETRY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1000, timeoutMs: 5000 };

export function sceneBlocks(count: number, render: (index: number) => string): string {
  return Array.from({ length: count }, (_, k) => `=== SCENE ${k + 1} ===\n${render(k + 1)}`).join('\n');
}

/** Answers each text stage's prompt with well-formed scene blocks of the requested count. */
export function comicResponder(request: TextGenerationRequest): string {
  const storyline = request.prompt.match(/split into EXACTLY (\d+) sequential scenes/);
  if (storyline) {
    return sceneBlocks(Number(storyline[1]), (i) => `Title: Chapter ${i}\nThe narrative of scene ${i}.`);
  }
  const prompts = request.prompt.match(/write exactly (\d+) scene prompts/);
  if (prompts) {
    return sceneBlocks(Number(prompts[1]), (i) => `Visual: Panel ${i} shows the subject at work.\nStyle: manga style`);
  }
  const single = request.prompt.match(/Write the voice-over for scene (\d+) only/);
  if (single) {
    return `Fresh voice-over for scene ${single[1]}.`;
  }
  const narration = request.prompt.match(/one block for each of the (\d+) scenes/);
  if (narration) {
    return sceneBlocks(Number(narration[1]), (i) => `Voice-over for scene ${i}.`);
  }
  throw new Error('Unrecognised prompt');
}

export class FakeTextBackend implements TextBackend {
  readonly calls: TextGenerationRequest[] = [];

  constructor(
    private readonly respond: (request: TextGenerationRequest) => string | Promise<string> = comicResponder,
    readonly name = 'fake-text'
  ) {}

  async generateText(request: TextGenerationRequest): Promise<string> {
    this.calls.push(request);
    return this.respond(request);
  }
}

export const PNG_BYTES = Buffer.from('fake-png-bytes');

export class FakeImageBackend implements ImageBackend {
  readonly prompts: string[] = [];

  constructor(
    readonly name: string,
    private readonly respond: (prompt: string) => GeneratedImage | Promise<GeneratedImage> = () => ({
      data: PNG_BYTES,
      mimeType: 'image/png',
    })
  ) {}

  async generateImage(prompt: string): Promise<GeneratedImage> {
    this.prompts.push(prompt);
    return this.respond(prompt);
  }
}

export function failingImageBackend(name: string, error: () => Error): FakeImageBackend {
  return new FakeImageBackend(name, () => {
    throw error();
  });
}

export function article(title: string, extract?: string): WikiArticle {
  return {
    title,
    language: 'en',
    pageId: 736,
    url: `https://en.wikipedia.org/wiki/${title.replace(/ /g, '_')}`,
    extract:
      extract ??
      `${title} was a notable figure.\n\n== Early life ==\nBorn in a small town.\n\n== Career ==\nDid important work.\n\n== References ==\nSome book.`,
  };
}

export class FakeContentSource implements ContentSource {
  fetchCalls = 0;
  private readonly results = new Map<string, ContentFetchResult>();
  hits: SearchHit[] = [];

  withArticle(value: WikiArticle): this {
    this.results.set(value.title, { kind: 'article', article: value });
    return this;
  }

  withDisambiguation(title: string, candidates: string[]): this {
    this.results.set(title, { kind: 'disambiguation', title, candidates });
    return this;
  }

  async fetch(title: string): Promise<ContentFetchResult> {
    this.fetchCalls += 1;
    return this.results.get(title) ?? { kind: 'not-found' };
  }

  async search(): Promise<SearchHit[]> {
    return this.hits;
  }
}

/** Satisfies the Redis client interface the stage store uses, in memory. */
export class MemoryRedisClient implements StageStoreRedisClient {
  readonly values = new Map<string, string>();
  readonly sets = new Map<string, Set<string>>();
  setCalls = 0;
  execCalls = 0;
  failing = false;
  // Rejects the next EXEC before any queued command is applied, as Redis does on EXECABORT
  failNextExec = false;

  private check(): void {
    if (this.failing) throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
  }

  async get(key: string): Promise<string | null> {
    this.check();
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<string> {
    this.check();
    this.setCalls += 1;
    this.values.set(key, value);
    return 'OK';
  }

  async sAdd(key: string, member: string): Promise<number> {
    this.check();
    const members = this.sets.get(key) ?? new Set<string>();
    const added = members.has(member) ? 0 : 1;
    members.add(member);
    this.sets.set(key, members);
    return added;
  }

  async sMembers(key: string): Promise<string[]> {
    this.check();
    return [...(this.sets.get(key) ?? [])];
  }

  multi(): StageStoreRedisTransaction {
    const queued: Array<() => Promise<unknown>> = [];
    const transaction: StageStoreRedisTransaction = {
      set: (key, value) => {
        queued.push(() => this.set(key, value));
        return transaction;
      },
      sAdd: (key, member) => {
        queued.push(() => this.sAdd(key, member));
        return transaction;
      },
      exec: async () => {
        this.check();
        this.execCalls += 1;
        if (this.failNextExec) {
          this.failNextExec = false;
          throw new Error('EXECABORT Transaction discarded because of previous errors.');
        }
        const replies: unknown[] = [];
        for (const command of queued) replies.push(await command());
        return replies;
      },
    };
    return transaction;
  }
}

export interface TestGateway {
  gateway: ProviderGateway;
  text: FakeTextBackend;
  primary: FakeImageBackend;
  fallback: FakeImageBackend;
  events: ProviderAttempt[];
  delays: number[];
}

export function createTestGateway(
  overrides: { text?: FakeTextBackend; primary?: FakeImageBackend; fallback?: FakeImageBackend; retry?: RetryPolicy } = {}
): TestGateway {
  const text = overrides.text ?? new FakeTextBackend();
  const primary = overrides.primary ?? new FakeImageBackend('replicate');
  const fallback = overrides.fallback ?? new FakeImageBackend('fal');
  const events: ProviderAttempt[] = [];
  const delays: number[] = [];
  const gateway = new ProviderGateway({
    text,
    image: { primary, fallback },
    retry: overrides.retry ?? FAST_RETRY,
    onAttempt: (event) => events.push(event),
    sleep: async (ms) => {
      delays.push(ms);
    },
  });
  return { gateway, text, primary, fallback, events, delays };
}
