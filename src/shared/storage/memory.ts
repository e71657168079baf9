// In-memory storage implementation (suitable for development and testing)

import type { KeyValueStore } from './interface.ts';

export class MemoryKeyValueStore<V = unknown> implements KeyValueStore<V> {
  protected entries = new Map<string, V>();

  async get(key: string): Promise<V | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: V): Promise<void> {
    this.entries.set(key, value);
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async keys(prefix?: string): Promise<string[]> {
    const all = Array.from(this.entries.keys());
    return prefix ? all.filter((k) => k.startsWith(prefix)) : all;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
