import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileEntityStore, MemoryEntityStore } from '../../chat/storage.js';

describe('FileEntityStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'loomchat-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates its directory on first write and reads documents back', async () => {
    const store = new FileEntityStore(join(dir, 'chats'));

    expect(await store.list()).toEqual([]);
    await store.write('abc', '{"id":"abc"}');

    expect(await store.read('abc')).toBe('{"id":"abc"}');
    expect(await store.list()).toEqual(['abc']);
  });

  it('lists only json documents', async () => {
    const store = new FileEntityStore(dir);
    await writeFile(join(dir, 'notes.txt'), 'x');
    await store.write('one', '{}');

    expect(await store.list()).toEqual(['one']);
  });

  it('returns undefined for missing documents and ignores missing removals', async () => {
    const store = new FileEntityStore(dir);

    expect(await store.read('ghost')).toBeUndefined();
    await expect(store.remove('ghost')).resolves.toBeUndefined();
  });

  it('removes documents', async () => {
    const store = new FileEntityStore(dir);
    await store.write('gone', '{}');

    await store.remove('gone');

    expect(await store.read('gone')).toBeUndefined();
  });
});

describe('MemoryEntityStore', () => {
  it('keeps the latest text per id', async () => {
    const store = new MemoryEntityStore();

    await store.write('a', '1');
    await store.write('a', '2');
    await store.remove('missing');

    expect(await store.read('a')).toBe('2');
    expect(await store.read('missing')).toBeUndefined();
    expect(await store.list()).toEqual(['a']);
  });
});
