// Cache stores — in-memory map and a JSON-file store with atomic writes

import { createHash } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger, errorMessage } from '../utils/logger.js';

const log = createLogger('CacheStore');

export interface CacheEntry<T = unknown> {
  key: string;
  value: T;
  createdAt: number;   // epoch ms
  ttlDays: number;
}

export interface CacheStore {
  read(key: string): Promise<CacheEntry | undefined>;
  write(entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<void>;
  keys(): Promise<string[]>;
}

export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>();

  async read(key: string): Promise<CacheEntry | undefined> {
    return this.entries.get(key);
  }

  async write(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.key, entry);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async keys(): Promise<string[]> {
    return [...this.entries.keys()];
  }
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return value !== null
    && typeof value === 'object'
    && 'key' in value && typeof value.key === 'string'
    && 'createdAt' in value && typeof value.createdAt === 'number'
    && 'ttlDays' in value && typeof value.ttlDays === 'number'
    && 'value' in value;
}

/**
 * One JSON file per key under `dir`. Writes go to a temp file and are renamed
 * into place; writes to the same key are chained so they land in call order.
 */
export class FileCacheStore implements CacheStore {
  private pending = new Map<string, Promise<void>>();
  private ready: Promise<void> | null = null;

  constructor(private readonly dir: string) {}

  private ensureDir(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.dir, { recursive: true }).then(() => undefined);
    }
    return this.ready;
  }

  private pathFor(key: string): string {
    const digest = createHash('sha256').update(key).digest('hex').slice(0, 32);
    return join(this.dir, `${digest}.json`);
  }

  async read(key: string): Promise<CacheEntry | undefined> {
    await this.pending.get(key);
    let text: string;
    try {
      text = await readFile(this.pathFor(key), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
    const parsed = parseEntry(text, key);
    if (!parsed || parsed.key !== key) return undefined;
    return parsed;
  }

  write(entry: CacheEntry): Promise<void> {
    return this.serialize(entry.key, async () => {
      await this.ensureDir();
      const target = this.pathFor(entry.key);
      const tmp = `${target}.${process.pid}.${Date.now()}.tmp`;
      await writeFile(tmp, JSON.stringify(entry), 'utf-8');
      await rename(tmp, target);
    });
  }

  delete(key: string): Promise<void> {
    return this.serialize(key, () => rm(this.pathFor(key), { force: true }));
  }

  async keys(): Promise<string[]> {
    let files: string[];
    try {
      files = await readdir(this.dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    const keys: string[] = [];
    for (const file of files.filter((f) => f.endsWith('.json'))) {
      const parsed = parseEntry(await readFile(join(this.dir, file), 'utf-8'), file);
      if (parsed) keys.push(parsed.key);
    }
    return keys;
  }

  private serialize(key: string, op: () => Promise<void>): Promise<void> {
    const previous = this.pending.get(key) ?? Promise.resolve();
    const next = previous.then(op);
    const settled: Promise<void> = next.then(
      () => this.release(key, settled),
      () => this.release(key, settled),
    );
    this.pending.set(key, settled);
    return next;
  }

  private release(key: string, settled: Promise<void>): void {
    if (this.pending.get(key) === settled) this.pending.delete(key);
  }
}

/** A truncated or hand-edited file reads as absent; the next write replaces it. */
function parseEntry(text: string, label: string): CacheEntry | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    log.warn('Unreadable cache file, ignoring it', { entry: label, error: errorMessage(err) });
    return undefined;
  }
  return isCacheEntry(parsed) ? parsed : undefined;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
