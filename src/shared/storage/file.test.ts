import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileKeyValueStore } from './file.ts';

describe('FileKeyValueStore', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'kv-store-'));
    path = join(dir, 'nested', 'store.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty when no file exists', async () => {
    const store = new FileKeyValueStore<string>(path);

    expect(await store.get('missing')).toBeNull();
    expect(await store.keys()).toEqual([]);
  });

  it('writes through and reloads in a new instance', async () => {
    const first = new FileKeyValueStore<{ n: number }>(path);
    await first.set('a', { n: 1 });
    await first.set('b', { n: 2 });
    await first.delete('a');

    const persisted: unknown = JSON.parse(await readFile(path, 'utf8'));
    expect(persisted).toEqual({ version: 1, entries: { b: { n: 2 } } });

    const second = new FileKeyValueStore<{ n: number }>(path);
    expect(await second.get('b')).toEqual({ n: 2 });
    expect(await second.get('a')).toBeNull();
  });

  it('filters keys by prefix', async () => {
    const store = new FileKeyValueStore<number>(path);
    await store.set('search|1', 1);
    await store.set('search|2', 2);
    await store.set('artist|1', 3);

    expect((await store.keys('search|')).sort()).toEqual(['search|1', 'search|2']);
  });

  it('persists a clear', async () => {
    const store = new FileKeyValueStore<number>(path);
    await store.set('a', 1);
    await store.clear();

    expect(await new FileKeyValueStore<number>(path).keys()).toEqual([]);
  });

  it('moves a file that is not valid JSON aside and starts empty', async () => {
    const broken = join(dir, 'broken.json');
    await writeFile(broken, '{"entries": ', 'utf8');
    const store = new FileKeyValueStore<number>(broken, { now: () => 1234 });

    expect(await store.get('a')).toBeNull();
    expect(await readFile(`${broken}.corrupt-1234`, 'utf8')).toBe('{"entries": ');

    await store.set('a', 1);
    expect(await new FileKeyValueStore<number>(broken).get('a')).toBe(1);
  });

  it('moves a file with the wrong shape aside', async () => {
    const wrong = join(dir, 'wrong.json');
    await writeFile(wrong, '{"entries": [1, 2]}', 'utf8');
    const store = new FileKeyValueStore<number>(wrong, { now: () => 99 });

    expect(await store.keys()).toEqual([]);
    expect(await readdir(dir)).toEqual(['wrong.json.corrupt-99']);
  });

  it('retries a failed read on the next operation', async () => {
    // A directory at the path makes readFile fail with EISDIR.
    const blocked = join(dir, 'blocked.json');
    await mkdir(blocked);
    const store = new FileKeyValueStore<number>(blocked);

    await expect(store.get('a')).rejects.toThrow();

    await rm(blocked, { recursive: true });
    expect(await store.get('a')).toBeNull();
  });
});
