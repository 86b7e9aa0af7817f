import { ZodError } from 'zod';
import {
  StageName,
  StageRecord,
  StageRecordEnvelopeSchema,
  StageStatus,
  StagePayloads,
  Topic,
  stagePayloadParsers,
  stageRank,
} from '../types/stage';
import { digestPayload } from '../utils/fingerprint';
import { StoreUnavailableError } from '../utils/pipelineErrors';

/**
 * Persistence for stage outputs, keyed by (topic, stage, fingerprint).
 * Every medium failure surfaces as StoreUnavailableError; a missing record is `null`.
 */
export interface StageStore {
  get<S extends StageName>(topic: Topic, stage: S, fingerprint: string): Promise<StageRecord<S> | null>;
  put<S extends StageName>(record: StageRecord<S>): Promise<void>;
  list(topic: Topic): Promise<StageRecord[]>;
  saveExport(topic: Topic, fingerprint: string, document: unknown): Promise<void>;
  getExport(topic: Topic, fingerprint: string): Promise<unknown | null>;
}

export function createStageRecord<S extends StageName>(
  topic: Topic,
  stage: S,
  fingerprint: string,
  payload: StagePayloads[S],
  status: StageStatus,
  now: Date = new Date()
): StageRecord<S> {
  return {
    topic: { title: topic.title, language: topic.language },
    stage,
    fingerprint,
    digest: digestPayload(payload),
    status,
    createdAt: now.toISOString(),
    payload,
  };
}

function describe(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}

/** Validates a stored record against the schema of the stage it was requested for. */
export function parseStoredRecordFor<S extends StageName>(raw: unknown, stage: S, source: string): StageRecord<S> {
  try {
    const envelope = StageRecordEnvelopeSchema.parse(raw);
    if (envelope.stage !== stage) {
      throw new Error(`expected a ${stage} record, found ${envelope.stage}`);
    }
    const payload: StagePayloads[S] = stagePayloadParsers[stage](envelope.payload);
    return { ...envelope, stage, payload };
  } catch (err) {
    throw new StoreUnavailableError(`Corrupt stage record at ${source}: ${describe(err)}`, err);
  }
}

export function parseStoredRecord(raw: unknown, source: string): StageRecord {
  let stage: StageName;
  try {
    stage = StageRecordEnvelopeSchema.parse(raw).stage;
  } catch (err) {
    throw new StoreUnavailableError(`Corrupt stage record at ${source}: ${describe(err)}`, err);
  }
  return parseStoredRecordFor(raw, stage, source);
}

export function sortRecords(records: StageRecord[]): StageRecord[] {
  return [...records].sort((a, b) => {
    const byStage = stageRank(a.stage) - stageRank(b.stage);
    if (byStage !== 0) return byStage;
    return a.createdAt < b.createdAt ? -1 : a.createdAt > b.createdAt ? 1 : 0;
  });
}
