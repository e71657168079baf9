// Key-value persistence used by the credential store and the response cache

/**
 * Minimal async key-value store. Values must be JSON-serializable so the file
 * backend can persist them.
 */
export interface KeyValueStore<V = unknown> {
  get(key: string): Promise<V | null>;

  set(key: string, value: V): Promise<void>;

  delete(key: string): Promise<boolean>;

  /** Keys currently stored, optionally restricted to a prefix. */
  keys(prefix?: string): Promise<string[]>;

  clear(): Promise<void>;
}
