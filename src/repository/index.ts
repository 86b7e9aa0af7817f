/**
 * Repository Layer - Central Export
 */
import { PipelineConfig } from '../config/pipelineConfig';
import { connectRedis, toStageStoreClient } from '../config/redisClient';
import { FileStageStore } from './fileStageStore';
import { RedisStageStore } from './redisStageStore';
import { StageStore } from './stageStore';

export * from './stageStore';
export * from './fileStageStore';
export * from './redisStageStore';

export async function createStageStore(config: PipelineConfig['store']): Promise<StageStore> {
  if (config.kind === 'redis') {
    if (!config.redisUrl) {
      throw new Error('STAGE_STORE=redis requires REDIS_URL');
    }
    const redis = await connectRedis(config.redisUrl);
    return new RedisStageStore(toStageStoreClient(redis), config.redisPrefix);
  }
  return new FileStageStore(config.directory);
}
