import type { EngineConfig } from '../../config/engine.config';
import { CacheStore, MemoryCacheStore } from './cache-store';
import { FilesystemCacheStore } from './filesystem-cache.store';
import { PostgresCacheStore } from './postgres-cache.store';

export function createCacheStore(config: EngineConfig): CacheStore {
  switch (config.cacheDriver) {
    case 'memory':
      return new MemoryCacheStore();
    case 'filesystem':
      return new FilesystemCacheStore(config.cacheDir);
    case 'postgres':
      if (!config.databaseUrl) {
        throw new Error('CACHE_DRIVER=postgres needs DATABASE_URL');
      }
      return new PostgresCacheStore(config.databaseUrl);
  }
}
