import dotenv from 'dotenv';
import path from 'path';

// Load .env from the project root before anything reads process.env
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import type { Server as HttpServer } from 'http';
import { env } from './config/env';
import { buildPipelineConfig } from './config/pipelineConfig';
import { disconnectRedis } from './config/redisClient';
import { createApp } from './app/app';
import { createStageStore } from './repository';
import { createPipelineServices } from './services';
import { logger } from './utils/logger';

const SHUTDOWN_GRACE_MS = 10000;

async function main(): Promise<void> {
  const config = buildPipelineConfig(env);
  const store = await createStageStore(config.store);
  const { coordinator, contentSource } = createPipelineServices(config, store);

  const app = createApp({
    coordinator,
    contentSource,
    allowedOrigins: env.allowedOrigins,
    trustProxy: env.nodeEnv === 'production',
  });

  const server: HttpServer = app.listen(env.port, () => {
    logger.info(
      {
        port: env.port,
        store: config.store.kind,
        textProvider: config.text.provider,
        imageProviders: [config.image.primary, config.image.fallback],
      },
      'Comic pipeline API running'
    );
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    const timer = setTimeout(() => {
      logger.warn('Forcing exit after grace period');
      process.exit(1);
    }, SHUTDOWN_GRACE_MS);
    timer.unref();
    server.close((err) => {
      if (err) logger.error({ err }, 'HTTP server close failed');
      disconnectRedis()
        .catch((redisErr: unknown) => logger.error({ err: redisErr }, 'Redis disconnect failed'))
        .finally(() => process.exit(err ? 1 : 0));
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start');
  process.exit(1);
});
