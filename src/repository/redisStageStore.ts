import { StageName, StageNameSchema, StageRecord, Topic } from '../types/stage';
import { StoreUnavailableError } from '../utils/pipelineErrors';
import { topicKey } from '../utils/topic';
import { logger } from '../utils/logger';
import { StageStore, parseStoredRecord, parseStoredRecordFor, sortRecords } from './stageStore';

const log = logger.child({ component: 'store', store: 'redis' });

/** Queued commands sent as one MULTI/EXEC block. */
export interface StageStoreRedisTransaction {
  set(key: string, value: string): StageStoreRedisTransaction;
  sAdd(key: string, member: string): StageStoreRedisTransaction;
  exec(): Promise<unknown>;
}

/** The handful of Redis commands the store needs; see config/redisClient for the adapter. */
export interface StageStoreRedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  sMembers(key: string): Promise<string[]>;
  multi(): StageStoreRedisTransaction;
}

export class RedisStageStore implements StageStore {
  constructor(
    private readonly client: StageStoreRedisClient,
    private readonly prefix = 'comic:'
  ) {}

  private recordKey(topic: Topic, stage: StageName, fingerprint: string): string {
    return `${this.prefix}stage:${topicKey(topic)}:${stage}:${fingerprint}`;
  }

  private indexKey(topic: Topic): string {
    return `${this.prefix}topic:${topicKey(topic)}:records`;
  }

  private exportKey(topic: Topic, fingerprint: string): string {
    return `${this.prefix}export:${topicKey(topic)}:${fingerprint}`;
  }

  private async run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      log.error({ err, operation }, 'Redis command failed');
      throw new StoreUnavailableError(`Redis ${operation} failed`, err);
    }
  }

  private async readJson(key: string): Promise<unknown | null> {
    const value = await this.run('GET', () => this.client.get(key));
    if (value === null) return null;
    try {
      return JSON.parse(value);
    } catch (err) {
      throw new StoreUnavailableError(`Corrupt JSON under ${key}`, err);
    }
  }

  async get<S extends StageName>(topic: Topic, stage: S, fingerprint: string): Promise<StageRecord<S> | null> {
    const key = this.recordKey(topic, stage, fingerprint);
    const raw = await this.readJson(key);
    return raw === null ? null : parseStoredRecordFor(raw, stage, key);
  }

  async put<S extends StageName>(record: StageRecord<S>): Promise<void> {
    const key = this.recordKey(record.topic, record.stage, record.fingerprint);
    // Record and index entry land together or not at all
    await this.run('MULTI', () =>
      this.client
        .multi()
        .set(key, JSON.stringify(record))
        .sAdd(this.indexKey(record.topic), `${record.stage}:${record.fingerprint}`)
        .exec()
    );
  }

  async list(topic: Topic): Promise<StageRecord[]> {
    const members = await this.run('SMEMBERS', () => this.client.sMembers(this.indexKey(topic)));
    const records: StageRecord[] = [];
    for (const member of [...members].sort()) {
      const [stageName, fingerprint] = member.split(':');
      const stage = StageNameSchema.safeParse(stageName);
      if (!stage.success || !fingerprint) {
        throw new StoreUnavailableError(`Corrupt index entry "${member}" for ${topic.title}`);
      }
      const key = this.recordKey(topic, stage.data, fingerprint);
      const raw = await this.readJson(key);
      if (raw !== null) records.push(parseStoredRecord(raw, key));
    }
    return sortRecords(records);
  }

  async saveExport(topic: Topic, fingerprint: string, document: unknown): Promise<void> {
    const key = this.exportKey(topic, fingerprint);
    await this.run('SET', () => this.client.set(key, JSON.stringify(document)));
  }

  async getExport(topic: Topic, fingerprint: string): Promise<unknown | null> {
    return this.readJson(this.exportKey(topic, fingerprint));
  }
}
