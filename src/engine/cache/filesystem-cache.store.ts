import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { CacheStore } from './cache-store';

/**
 * One file per key under `dir`, named by the key's SHA-256 so any key is a safe file name.
 * Writes go to a temp file first and are renamed into place.
 */
export class FilesystemCacheStore implements CacheStore {
  constructor(private readonly dir: string) {}

  private pathFor(key: string): string {
    const digest = createHash('sha256').update(key).digest('hex');
    return join(this.dir, digest.slice(0, 2), `${digest}.entry`);
  }

  async get(key: string): Promise<Buffer | null> {
    try {
      return await readFile(this.pathFor(key));
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw err;
    }
  }

  async put(key: string, data: Buffer): Promise<void> {
    const target = this.pathFor(key);
    const dir = join(target, '..');
    await mkdir(dir, { recursive: true });
    const temp = join(dir, `.${randomUUID()}.tmp`);
    try {
      await writeFile(temp, data);
      await rename(temp, target);
    } catch (err) {
      await rm(temp, { force: true });
      throw err;
    }
  }
}
