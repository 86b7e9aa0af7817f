/// <reference types="jest" />
import axios, { AxiosInstance } from 'axios';
import type { Server } from 'http';
import { createApp } from '../src/app/app';
import { RedisStageStore } from '../src/repository/redisStageStore';
import { PipelineCoordinator } from '../src/services/pipelineCoordinator';
import {
  FakeContentSource,
  MemoryRedisClient,
  PNG_BYTES,
  TestGateway,
  article,
  createTestGateway,
  failingImageBackend,
} from './helpers/fakes';

interface Running {
  server: Server;
  client: AxiosInstance;
  source: FakeContentSource;
  test: TestGateway;
}

async function start(overrides: Parameters<typeof createTestGateway>[0] = {}): Promise<Running> {
  const source = new FakeContentSource().withArticle(article('Albert Einstein'));
  source.withDisambiguation('Mercury', ['Mercury (planet)', 'Mercury (element)']);
  const test = createTestGateway(overrides);
  const coordinator = new PipelineCoordinator({
    store: new RedisStageStore(new MemoryRedisClient()),
    gateway: test.gateway,
    contentSource: source,
    images: { concurrency: 2, aspectRatio: '16:9' },
  });
  const app = createApp({ coordinator, contentSource: source });
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('Server has no TCP address');
  const client = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  return { server, client, source, test };
}

function stop(running: Running): Promise<void> {
  return new Promise((resolve, reject) => running.server.close((err) => (err ? reject(err) : resolve())));
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

const einstein = { title: 'Albert Einstein', language: 'en', parameters: { sceneCount: 2 } };

describe('pipeline HTTP API', () => {
  let running: Running;

  beforeAll(async () => {
    running = await start();
  });

  afterAll(async () => {
    await stop(running);
  });

  it('answers the health check', async () => {
    const res = await running.client.get('/health');
    expect(res.status).toBe(200);
    expect(res.data.responseStatus).toBe('success');
    expect(res.data.message).toBe('OK');
    expect(typeof res.headers['x-request-id']).toBe('string');
  });

  it('echoes a caller supplied request id', async () => {
    const res = await running.client.get('/health', { headers: { 'X-Request-Id': 'req-123' } });
    expect(res.headers['x-request-id']).toBe('req-123');
  });

  it('advances a topic to completion', async () => {
    const res = await running.client.post('/api/pipeline/advance', { ...einstein, targetStage: 'complete' });
    expect(res.status).toBe(200);
    expect(res.data.responseStatus).toBe('success');
    expect(res.data.message).toBe('Pipeline Complete');
    expect(res.data.data.state).toBe('Complete');
    expect(res.data.data.stages).toHaveLength(5);
  });

  it('reports the chain status', async () => {
    const res = await running.client.post('/api/pipeline/status', einstein);
    expect(res.status).toBe(200);
    expect(res.data.data.state).toBe('Complete');
    expect(res.data.data.stages.map((stage: { status: string }) => stage.status)).toEqual(['ok', 'ok', 'ok', 'ok', 'ok']);
  });

  it('lists stored records without payloads', async () => {
    const res = await running.client.get('/api/pipeline/en/Albert%20Einstein/records');
    expect(res.status).toBe(200);
    expect(res.data.data).toHaveLength(5);
    expect(Object.keys(res.data.data[0]).sort()).toEqual(['createdAt', 'digest', 'fingerprint', 'stage', 'status']);
  });

  it('returns a record with image bytes replaced by references', async () => {
    const advance = await running.client.post('/api/pipeline/advance', { ...einstein, targetStage: 'images' });
    const fingerprint: string = advance.data.data.stages[3].fingerprint;
    expect(advance.data.data.stages[3].reused).toBe(true);

    const res = await running.client.get(`/api/pipeline/en/Albert%20Einstein/records/images/${fingerprint}`);
    expect(res.status).toBe(200);
    expect(res.data.data.payload.artifacts[0]).toEqual({
      index: 1,
      kind: 'image',
      provider: 'replicate',
      mimeType: 'image/png',
      bytes: PNG_BYTES.length,
      prompt: 'Panel 1 shows the subject at work. Art style: manga style. No text, no lettering, no speech bubbles, no captions.',
    });

    const image = await running.client.get(`/api/pipeline/en/Albert%20Einstein/images/${fingerprint}/2`, {
      responseType: 'arraybuffer',
    });
    expect(image.status).toBe(200);
    expect(image.headers['content-type']).toBe('image/png');
    expect(image.headers['x-image-kind']).toBe('image');
    expect(Buffer.from(image.data).equals(PNG_BYTES)).toBe(true);

    const missing = await running.client.get(`/api/pipeline/en/Albert%20Einstein/images/${fingerprint}/9`);
    expect(missing.status).toBe(404);
    expect(missing.data.message).toBe('No image for scene 9');
  });

  it('404s for an unknown record', async () => {
    const res = await running.client.get('/api/pipeline/en/Albert%20Einstein/records/storyline/abcdef0123456789abcdef01');
    expect(res.status).toBe(404);
    expect(res.data).toEqual({ responseStatus: 'error', message: 'Stage record not found', data: null });
  });

  it('exports json and markdown', async () => {
    const json = await running.client.post('/api/pipeline/export', einstein);
    expect(json.status).toBe(200);
    expect(json.data.data.stages.map((stage: { stage: string }) => stage.stage)).toEqual([
      'extraction',
      'storyline',
      'scenePrompts',
      'narration',
      'images',
    ]);

    const markdown = await running.client.post('/api/pipeline/export', { ...einstein, format: 'markdown' }, { responseType: 'text' });
    expect(markdown.status).toBe(200);
    expect(markdown.headers['content-type']).toMatch(/^text\/markdown/);
    expect(markdown.data.split('\n').slice(0, 3)).toEqual(['# Albert Einstein', '', 'Language: en · State: Complete']);
  });

  it('regenerates the narration of one scene', async () => {
    const res = await running.client.post('/api/pipeline/narration/regenerate', { ...einstein, sceneIndex: 1 });
    expect(res.status).toBe(200);
    expect(res.data.message).toBe('Narration regenerated');
    expect(res.data.data.payload.entries.map((entry: { text: string }) => entry.text)).toEqual([
      'Fresh voice-over for scene 1.',
      'Voice-over for scene 2.',
    ]);

    const invalid = await running.client.post('/api/pipeline/narration/regenerate', { ...einstein, sceneIndex: 0 });
    expect(invalid.status).toBe(400);
  });

  it('404s an export with nothing stored', async () => {
    const res = await running.client.post('/api/pipeline/export', { title: 'Marie Curie', language: 'en' });
    expect(res.status).toBe(404);
    expect(res.data.message).toBe('Nothing to export for "Marie Curie" with these parameters');
  });

  it('returns 422 for a failed run', async () => {
    const res = await running.client.post('/api/pipeline/advance', { title: 'Nowhere Land', targetStage: 'storyline' });
    expect(res.status).toBe(422);
    expect(res.data.responseStatus).toBe('error');
    expect(res.data.data.failure).toMatchObject({ stage: 'extraction', code: 'ARTICLE_NOT_FOUND' });
  });

  it('returns disambiguation candidates', async () => {
    const res = await running.client.post('/api/pipeline/advance', { title: 'Mercury', targetStage: 'extraction' });
    expect(res.status).toBe(200);
    expect(res.data.data.state).toBe('NotStarted');
    expect(res.data.data.candidates).toEqual(['Mercury (planet)', 'Mercury (element)']);
  });

  it('validates request bodies', async () => {
    const res = await running.client.post('/api/pipeline/advance', {
      title: 'Albert Einstein',
      targetStage: 'everything',
      parameters: { sceneCount: 99 },
    });
    expect(res.status).toBe(400);
    expect(res.data.message).toBe('Validation failed');
    expect(res.data.data.map((issue: { path: string }) => issue.path).sort()).toEqual(['parameters.sceneCount', 'targetStage']);
  });

  it('limits titles by their UTF-8 length', async () => {
    const res = await running.client.post('/api/pipeline/advance', { title: 'Ж'.repeat(128), targetStage: 'extraction' });
    expect(res.status).toBe(400);
    expect(res.data.data).toHaveLength(1);
    expect(res.data.data[0]).toMatchObject({ path: 'title', msg: 'title must be at most 255 bytes' });

    const fits = await running.client.post('/api/pipeline/status', { title: 'Ж'.repeat(127) });
    expect(fits.status).toBe(200);
  });

  it('searches Wikipedia', async () => {
    running.source.hits = [{ title: 'Albert Einstein', pageId: 736, snippet: 'Physicist', url: 'https://en.wikipedia.org/wiki/Albert_Einstein' }];
    const res = await running.client.get('/api/wiki/search', { params: { query: 'einstein' } });
    expect(res.status).toBe(200);
    expect(res.data.data).toEqual(running.source.hits);

    const invalid = await running.client.get('/api/wiki/search');
    expect(invalid.status).toBe(400);
  });

  it('404s unknown routes', async () => {
    const res = await running.client.get('/api/nope');
    expect(res.status).toBe(404);
    expect(res.data.message).toBe('Route not found: GET /api/nope');
  });
});

describe('pipeline HTTP API with failing image backends', () => {
  let running: Running;

  beforeAll(async () => {
    running = await start({
      primary: failingImageBackend('replicate', () => new Error('Invalid API key')),
      fallback: failingImageBackend('fal', () => new Error('Invalid API key')),
    });
  });

  afterAll(async () => {
    await stop(running);
  });

  it('serves a rendered panel for placeholder scenes', async () => {
    const advance = await running.client.post('/api/pipeline/advance', { ...einstein, targetStage: 'images' });
    expect(advance.status).toBe(200);
    expect(advance.data.data.stages[3].status).toBe('partial');

    const fingerprint: string = advance.data.data.stages[3].fingerprint;
    const res = await running.client.get(`/api/pipeline/en/Albert%20Einstein/images/${fingerprint}/1`, {
      responseType: 'arraybuffer',
    });
    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('image/png');
    expect(res.headers['x-image-kind']).toBe('placeholder');
    expect(Buffer.from(res.data).subarray(0, 8).equals(PNG_SIGNATURE)).toBe(true);

    const record = await running.client.get(`/api/pipeline/en/Albert%20Einstein/records/images/${fingerprint}`);
    expect(record.data.data.payload.artifacts[0]).toMatchObject({ kind: 'placeholder', reason: 'PROVIDER_AUTH: Invalid API key' });
  });
});
