import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FilesystemCacheStore } from './filesystem-cache.store';

describe('FilesystemCacheStore', () => {
  let dir: string;
  let store: FilesystemCacheStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'relay-store-'));
    store = new FilesystemCacheStore(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns null for a key it never stored', async () => {
    expect(await store.get('test/ubuntu-latest-abc')).toBeNull();
  });

  it('replaces an entry and leaves no temp files behind', async () => {
    await store.put('test/ubuntu-latest-abc', Buffer.from('first'));
    await store.put('test/ubuntu-latest-abc', Buffer.from('second'));

    expect((await store.get('test/ubuntu-latest-abc'))?.toString()).toBe('second');

    const [shard] = await readdir(dir);
    expect(shard).toBeDefined();
    const files = await readdir(join(dir, shard ?? ''));
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^[0-9a-f]{64}\.entry$/);
  });

  it('keeps keys apart', async () => {
    await store.put('fmt/k', Buffer.from('fmt'));
    await store.put('clippy/k', Buffer.from('clippy'));

    expect((await store.get('fmt/k'))?.toString()).toBe('fmt');
    expect((await store.get('clippy/k'))?.toString()).toBe('clippy');
  });
});
