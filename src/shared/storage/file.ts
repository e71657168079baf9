// File-backed storage for Node.js (wraps memory with JSON persistence)

import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from '../../utils/logger.ts';
import type { KeyValueStore } from './interface.ts';
import { MemoryKeyValueStore } from './memory.ts';

type PersistShape<V> = {
  version: 1;
  entries: Record<string, V>;
};

export type FileKeyValueStoreOptions = {
  now?: () => number;
};

/**
 * Every mutation is written through to `persistPath` before the returned promise
 * settles. Writes are serialized and land via rename, so a crash mid-write leaves
 * the previous file intact. A corrupt file is renamed to `<path>.corrupt-<ms>` and
 * the store starts empty.
 */
export class FileKeyValueStore<V = unknown> implements KeyValueStore<V> {
  private memory = new MemoryKeyValueStore<V>();
  private readonly persistPath: string;
  private readonly now: () => number;
  private loading: Promise<void> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(persistPath: string, options: FileKeyValueStoreOptions = {}) {
    this.persistPath = persistPath;
    this.now = options.now ?? (() => Date.now());
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    if (!existsSync(this.persistPath)) {
      await logger.debug('file_store', {
        message: 'No persisted file yet',
        path: this.persistPath,
      });
      return;
    }

    const raw = await readFile(this.persistPath, 'utf8');
    if (raw.trim() === '') {
      return;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      await this.quarantine(error instanceof Error ? error.message : String(error));
      return;
    }
    if (!isPersistShape<V>(data)) {
      await this.quarantine('unexpected file shape');
      return;
    }

    for (const [key, value] of Object.entries(data.entries)) {
      await this.memory.set(key, value);
    }
    await logger.debug('file_store', {
      message: 'Loaded persisted entries',
      path: this.persistPath,
      count: this.memory.size,
    });
  }

  private async quarantine(reason: string): Promise<void> {
    const target = `${this.persistPath}.corrupt-${this.now()}`;
    await rename(this.persistPath, target);
    await logger.error('file_store', {
      message: 'Storage file is corrupt, moved aside and starting empty',
      path: this.persistPath,
      movedTo: target,
      reason,
    });
  }

  private save(): Promise<void> {
    const next = this.writeChain.then(async () => {
      const entries: Record<string, V> = {};
      for (const key of await this.memory.keys()) {
        const value = await this.memory.get(key);
        if (value !== null) {
          entries[key] = value;
        }
      }
      const obj: PersistShape<V> = { version: 1, entries };
      await mkdir(dirname(this.persistPath), { recursive: true });
      const tmp = `${this.persistPath}.${process.pid}.tmp`;
      await writeFile(tmp, JSON.stringify(obj, null, 2), { encoding: 'utf8', mode: 0o600 });
      await rename(tmp, this.persistPath);
    });
    // A failed write must not poison later writes; the caller still sees this one fail.
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  async get(key: string): Promise<V | null> {
    await this.ensureLoaded();
    return this.memory.get(key);
  }

  async set(key: string, value: V): Promise<void> {
    await this.ensureLoaded();
    await this.memory.set(key, value);
    await this.save();
  }

  async delete(key: string): Promise<boolean> {
    await this.ensureLoaded();
    const removed = await this.memory.delete(key);
    if (removed) {
      await this.save();
    }
    return removed;
  }

  async keys(prefix?: string): Promise<string[]> {
    await this.ensureLoaded();
    return this.memory.keys(prefix);
  }

  async clear(): Promise<void> {
    await this.ensureLoaded();
    await this.memory.clear();
    await this.save();
  }
}

function isPersistShape<V>(value: unknown): value is PersistShape<V> {
  if (typeof value !== 'object' || value === null || !('entries' in value)) {
    return false;
  }
  const { entries } = value;
  return typeof entries === 'object' && entries !== null && !Array.isArray(entries);
}
