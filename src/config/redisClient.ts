import { createClient } from 'redis';
import { StageStoreRedisClient, StageStoreRedisTransaction } from '../repository/redisStageStore';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errorHandler';
import { StoreUnavailableError } from '../utils/pipelineErrors';

type RedisClient = ReturnType<typeof createClient>;
type RedisTransaction = ReturnType<RedisClient['multi']>;

const log = logger.child({ component: 'redis' });
const ERROR_THROTTLE_MS = 30000; // log at most once every 30s
export const CONNECT_TIMEOUT_MS = 5000;
export const MAX_RECONNECT_ATTEMPTS = 10;
const MAX_RECONNECT_DELAY_MS = 3000;

let client: RedisClient | null = null;
let lastErrorLog = 0;

/**
 * Never retries before the first successful connect, and gives up after
 * MAX_RECONNECT_ATTEMPTS once connected. Returning an Error closes the client.
 */
export function createReconnectStrategy(isReady: () => boolean): (retries: number) => number | Error {
  return (retries) => {
    if (!isReady()) return new Error('Redis unreachable');
    if (retries >= MAX_RECONNECT_ATTEMPTS) {
      return new Error(`Redis reconnect gave up after ${MAX_RECONNECT_ATTEMPTS} attempts`);
    }
    return Math.min(100 * 2 ** retries, MAX_RECONNECT_DELAY_MS);
  };
}

// No offline queue: commands sent while disconnected reject at once instead of piling up
export function redisClientOptions(url: string, isReady: () => boolean) {
  return {
    url,
    disableOfflineQueue: true,
    socket: {
      connectTimeout: CONNECT_TIMEOUT_MS,
      reconnectStrategy: createReconnectStrategy(isReady),
    },
  };
}

/**
 * Connects the shared client. Unlike a cache, the stage store cannot run without
 * Redis, so a failed connect rejects instead of degrading.
 */
export async function connectRedis(url: string): Promise<RedisClient> {
  if (client) return client;
  let ready = false;
  const created = createClient(redisClientOptions(url, () => ready));
  created.on('ready', () => {
    ready = true;
  });
  created.on('error', (err: unknown) => {
    const now = Date.now();
    if (now - lastErrorLog > ERROR_THROTTLE_MS) {
      lastErrorLog = now;
      log.error({ err: errorMessage(err) }, 'Redis client error');
    }
  });
  const redacted = url.replace(/\/\/[^@]*@/, '//***@');
  try {
    await created.connect();
  } catch (err) {
    throw new StoreUnavailableError(`Failed to connect to Redis at ${redacted}`, err);
  }
  log.info({ url: redacted }, 'Redis connected');
  client = created;
  return created;
}

export async function disconnectRedis(): Promise<void> {
  if (!client) return;
  const current = client;
  client = null;
  await current.quit();
}

function toStageStoreTransaction(multi: RedisTransaction): StageStoreRedisTransaction {
  const transaction: StageStoreRedisTransaction = {
    set: (key, value) => {
      multi.set(key, value);
      return transaction;
    },
    sAdd: (key, member) => {
      multi.sAdd(key, member);
      return transaction;
    },
    exec: () => multi.exec(),
  };
  return transaction;
}

export function toStageStoreClient(redis: RedisClient): StageStoreRedisClient {
  return {
    get: (key) => redis.get(key),
    set: (key, value) => redis.set(key, value),
    sMembers: (key) => redis.sMembers(key),
    multi: () => toStageStoreTransaction(redis.multi()),
  };
}
