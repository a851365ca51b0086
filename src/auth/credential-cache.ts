/**
 * Credential Cache
 *
 * Key-value store of credential records keyed by stage id, mirrored to a
 * single JSON document on disk. Durable writes are best effort: the
 * in-memory view is authoritative for the process lifetime and a failed
 * write only produces a warning.
 */

import type { CacheDocument, CredentialRecord } from '../types.js';
import { toErrorMessage } from '../utils/errors.js';
import { readJsonSafe } from '../utils/read-json-safe.js';
import { writeJsonAtomic } from '../utils/write-json-atomic.js';

export type CredentialCacheOptions = {
  /** Cache file; null runs memory-only */
  filePath: string | null;
  log?: (msg: string) => void;
  /** PersistenceDegraded warnings. Default: console.warn */
  warn?: (msg: string) => void;
};

/**
 * A record is fresh while its expiry lies strictly in the future.
 * Expiry equal to `now` counts as expired.
 */
export function isFresh(record: CredentialRecord | undefined, now: number = Date.now()): record is CredentialRecord {
  if (!record) return false;
  return record.expiresAt === null || record.expiresAt > now;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCredentialRecord(value: unknown): value is CredentialRecord {
  if (!isRecord(value)) return false;
  return (
    typeof value.stageId === 'string' &&
    typeof value.secret === 'string' &&
    (value.expiresAt === null || typeof value.expiresAt === 'number')
  );
}

/**
 * Extract valid records from a parsed document. Returns null when the
 * document itself has the wrong shape.
 */
function parseDocument(data: unknown): Map<string, CredentialRecord> | null {
  if (!isRecord(data)) return null;
  if (data.version !== 1 || !isRecord(data.records)) return null;

  const records = new Map<string, CredentialRecord>();
  for (const [key, value] of Object.entries(data.records)) {
    if (isCredentialRecord(value) && value.stageId === key) {
      records.set(key, { stageId: value.stageId, secret: value.secret, expiresAt: value.expiresAt });
    }
  }
  return records;
}

export class CredentialCache {
  private readonly records: Map<string, CredentialRecord>;
  private filePath: string | null;
  private readonly log: (msg: string) => void;
  private readonly warn: (msg: string) => void;
  private writeChain: Promise<unknown> = Promise.resolve();

  private constructor(
    filePath: string | null,
    records: Map<string, CredentialRecord>,
    log: (msg: string) => void,
    warn: (msg: string) => void
  ) {
    this.filePath = filePath;
    this.records = records;
    this.log = log;
    this.warn = warn;
  }

  /**
   * Load the cache from disk.
   *
   * Missing or corrupt files start an empty store and a fresh file is
   * written. If that write fails too, the cache stays memory-only.
   */
  static async open(options: CredentialCacheOptions): Promise<CredentialCache> {
    const log = options.log ?? (() => {});
    const warn = options.warn ?? ((msg: string) => console.warn(msg));
    const { filePath } = options;

    if (!filePath) {
      log('[Cache] No writable location, using in-memory cache only');
      return new CredentialCache(null, new Map(), log, warn);
    }

    let loaded: Map<string, CredentialRecord> | null = null;
    try {
      const data = await readJsonSafe(filePath, null);
      if (data !== null) {
        loaded = parseDocument(data);
        if (!loaded) {
          warn(`[Cache] PersistenceDegraded: unrecognized cache format in ${filePath}, starting fresh`);
        }
      }
    } catch (e) {
      warn(`[Cache] PersistenceDegraded: failed to load ${filePath}: ${toErrorMessage(e)}, starting fresh`);
    }

    if (loaded) {
      log(`[Cache] Loaded ${loaded.size} record(s) from ${filePath}`);
      return new CredentialCache(filePath, loaded, log, warn);
    }

    const cache = new CredentialCache(filePath, new Map(), log, warn);
    try {
      await writeJsonAtomic(filePath, cache.snapshot());
      log(`[Cache] Created new cache file ${filePath}`);
    } catch (e) {
      warn(`[Cache] PersistenceDegraded: cannot create ${filePath}: ${toErrorMessage(e)}; continuing in memory only`);
      cache.filePath = null;
    }
    return cache;
  }

  get(stageId: string): CredentialRecord | undefined {
    const record = this.records.get(stageId);
    return record ? { ...record } : undefined;
  }

  /**
   * Replace one stage's record and persist the whole document.
   * Resolves true when the durable write succeeded; never rejects.
   */
  async put(stageId: string, record: Omit<CredentialRecord, 'stageId'>): Promise<boolean> {
    this.records.set(stageId, { stageId, secret: record.secret, expiresAt: record.expiresAt });

    const filePath = this.filePath;
    if (!filePath) return false;

    const snapshot = this.snapshot();
    const write = this.writeChain.then(async () => {
      try {
        await writeJsonAtomic(filePath, snapshot);
        return true;
      } catch (e) {
        this.warn(`[Cache] PersistenceDegraded: failed to save ${filePath}: ${toErrorMessage(e)}`);
        return false;
      }
    });
    this.writeChain = write;
    return write;
  }

  isPersistent(): boolean {
    return this.filePath !== null;
  }

  getFilePath(): string | null {
    return this.filePath;
  }

  /** Whole-document snapshot with keys sorted for stable output */
  snapshot(): CacheDocument {
    const records: Record<string, CredentialRecord> = {};
    for (const key of [...this.records.keys()].sort()) {
      const record = this.records.get(key);
      if (record) {
        records[key] = { stageId: record.stageId, secret: record.secret, expiresAt: record.expiresAt };
      }
    }
    return { version: 1, records };
  }
}
