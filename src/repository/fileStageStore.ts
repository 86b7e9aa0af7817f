import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { STAGE_ORDER, StageName, StageRecord, Topic } from '../types/stage';
import { KeyedMutex } from '../utils/keyedMutex';
import { StoreUnavailableError } from '../utils/pipelineErrors';
import { shortHash } from '../utils/fingerprint';
import { logger } from '../utils/logger';
import { topicKey } from '../utils/topic';
import { StageStore, parseStoredRecord, parseStoredRecordFor, sortRecords } from './stageStore';

const log = logger.child({ component: 'store', store: 'file' });

const FINGERPRINT_PATTERN = /^[a-f0-9]{8,64}$/;
const EXPORTS_DIR = 'exports';
const FOLDER_PREFIX_BYTES = 64;

// fs errors can come from another realm (Jest's sandbox), so `instanceof Error` is not reliable
function errorCode(err: unknown): unknown {
  return typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
}

function isMissing(err: unknown): boolean {
  const code = errorCode(err);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

function readablePrefix(value: string, maxBytes: number): string {
  let prefix = '';
  for (const char of value.replace(/[^\p{L}\p{N}_-]+/gu, '_')) {
    if (Buffer.byteLength(prefix + char) > maxBytes) break;
    prefix += char;
  }
  return prefix;
}

/**
 * Folder name for a topic: a readable title prefix capped in bytes plus a hash of the
 * full topic key. Filesystems cap names at 255 bytes; the full title stays in each record.
 */
export function topicFolderName(topic: Topic): string {
  return `${readablePrefix(topic.title, FOLDER_PREFIX_BYTES)}-${shortHash(topicKey(topic))}`;
}

/**
 * Stage records as JSON files:
 * `<root>/<language>/<title prefix>-<topic hash>/<stage>/<fingerprint>.json`
 */
export class FileStageStore implements StageStore {
  private readonly root: string;
  private readonly locks = new KeyedMutex();

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private topicDir(topic: Topic): string {
    return path.join(this.root, readablePrefix(topic.language, FOLDER_PREFIX_BYTES), topicFolderName(topic));
  }

  private recordPath(topic: Topic, stage: StageName, fingerprint: string): string {
    return path.join(this.topicDir(topic), stage, `${fingerprint}.json`);
  }

  private exportPath(topic: Topic, fingerprint: string): string {
    return path.join(this.topicDir(topic), EXPORTS_DIR, `${fingerprint}.json`);
  }

  private async readJson(file: string): Promise<unknown | null> {
    let text: string;
    try {
      text = await fs.readFile(file, 'utf8');
    } catch (err) {
      if (isMissing(err)) return null;
      throw new StoreUnavailableError(`Failed to read ${file}`, err);
    }
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new StoreUnavailableError(`Corrupt JSON in ${file}`, err);
    }
  }

  // Write to a temp file then rename, so readers never see a partial record
  private async writeJson(file: string, value: unknown): Promise<void> {
    await this.locks.runExclusive(file, async () => {
      const tmp = `${file}.${uuidv4()}.tmp`;
      try {
        await fs.mkdir(path.dirname(file), { recursive: true });
        await fs.writeFile(tmp, JSON.stringify(value, null, 2), 'utf8');
        await fs.rename(tmp, file);
      } catch (err) {
        await fs.rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
          log.warn({ err: cleanupErr, tmp }, 'Failed to remove temp file');
        });
        throw new StoreUnavailableError(`Failed to write ${file}`, err);
      }
    });
  }

  async get<S extends StageName>(topic: Topic, stage: S, fingerprint: string): Promise<StageRecord<S> | null> {
    if (!FINGERPRINT_PATTERN.test(fingerprint)) return null;
    const file = this.recordPath(topic, stage, fingerprint);
    const raw = await this.readJson(file);
    return raw === null ? null : parseStoredRecordFor(raw, stage, file);
  }

  async put<S extends StageName>(record: StageRecord<S>): Promise<void> {
    if (!FINGERPRINT_PATTERN.test(record.fingerprint)) {
      throw new StoreUnavailableError(`Refusing to store record with fingerprint "${record.fingerprint}"`);
    }
    const file = this.recordPath(record.topic, record.stage, record.fingerprint);
    await this.writeJson(file, record);
    log.debug({ stage: record.stage, fingerprint: record.fingerprint, title: record.topic.title }, 'Stage record written');
  }

  async list(topic: Topic): Promise<StageRecord[]> {
    const records: StageRecord[] = [];
    for (const stage of STAGE_ORDER) {
      const dir = path.join(this.topicDir(topic), stage);
      let entries: string[];
      try {
        entries = await fs.readdir(dir);
      } catch (err) {
        if (isMissing(err)) continue;
        throw new StoreUnavailableError(`Failed to list ${dir}`, err);
      }
      for (const entry of entries.filter((name) => name.endsWith('.json')).sort()) {
        const file = path.join(dir, entry);
        const raw = await this.readJson(file);
        if (raw !== null) records.push(parseStoredRecord(raw, file));
      }
    }
    return sortRecords(records);
  }

  async saveExport(topic: Topic, fingerprint: string, document: unknown): Promise<void> {
    if (!FINGERPRINT_PATTERN.test(fingerprint)) {
      throw new StoreUnavailableError(`Refusing to store export with fingerprint "${fingerprint}"`);
    }
    await this.writeJson(this.exportPath(topic, fingerprint), document);
  }

  async getExport(topic: Topic, fingerprint: string): Promise<unknown | null> {
    if (!FINGERPRINT_PATTERN.test(fingerprint)) return null;
    return this.readJson(this.exportPath(topic, fingerprint));
  }
}
