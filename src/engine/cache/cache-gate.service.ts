import { Inject, Injectable, Logger } from '@nestjs/common';
import type { CacheDeclaration, JobDeclaration } from '../../declaration/declaration.types';
import type { JobEnvironment } from '../environment/job-environment';
import { CacheWriteError, errorMessage } from '../errors';
import { ActionRegistryService } from '../steps/actions/action-registry.service';
import { computeFingerprint, DEFAULT_KEY_TEMPLATE, renderCacheKey } from './cache-key';
import { packSnapshot, unpackSnapshot } from './cache-snapshot';
import { CACHE_STORE, CacheStore } from './cache-store';

export interface CacheRestore {
  key: string;
  hit: boolean;
  files: number;
}

export interface CacheSave {
  key: string;
  saved: boolean;
  error?: string;
}

/**
 * Restores a job's cache entry into its workspace once its sources are there (at the first
 * cache step, or the first command without one) and saves it back after every step
 * succeeded. The key's fingerprint is read from the workspace. Neither direction can fail a job: a miss or an unreadable
 * entry means an empty start, a failed write is logged and reported.
 */
@Injectable()
export class CacheGateService {
  private readonly logger = new Logger(CacheGateService.name);

  constructor(
    @Inject(CACHE_STORE) private readonly store: CacheStore,
    private readonly actions: ActionRegistryService,
  ) {}

  /** Explicit job `cache:` block first, then what a cache step declares, then defaults. */
  resolveSettings(job: JobDeclaration): CacheDeclaration {
    let fromStep: Partial<CacheDeclaration> = {};
    for (const step of job.steps) {
      if (step.kind !== 'action') continue;
      const handler = this.actions.find(step.uses);
      if (handler?.cacheSettings) {
        fromStep = handler.cacheSettings(step);
        break;
      }
    }
    const key = job.cache?.key ?? fromStep.key;
    return {
      ...(key !== undefined && { key }),
      paths: job.cache?.paths.length ? job.cache.paths : (fromStep.paths ?? []),
      fingerprint: job.cache?.fingerprint.length
        ? job.cache.fingerprint
        : (fromStep.fingerprint ?? []),
    };
  }

  /** Index of the step the entry is restored before. */
  restorePoint(job: JobDeclaration): number {
    const cacheStep = job.steps.findIndex(
      (step) => step.kind === 'action' && this.actions.find(step.uses)?.cacheSettings !== undefined,
    );
    if (cacheStep >= 0) return cacheStep;
    const command = job.steps.findIndex((step) => step.kind === 'command');
    return command >= 0 ? command : 0;
  }

  /** Key for the job, fingerprinting the files under `root` (its workspace, when run). */
  async keyFor(job: JobDeclaration, root: string | undefined): Promise<string> {
    const settings = this.resolveSettings(job);
    const fingerprint = await computeFingerprint(root, settings.fingerprint);
    return renderCacheKey(settings.key ?? DEFAULT_KEY_TEMPLATE, {
      job: job.id,
      runner: job.runsOn,
      fingerprint,
    });
  }

  async restore(job: JobDeclaration, env: JobEnvironment): Promise<CacheRestore> {
    const key = await this.keyFor(job, env.workspace);
    let restore: CacheRestore = { key, hit: false, files: 0 };
    try {
      const bytes = await this.store.get(key);
      if (bytes) {
        const files = await unpackSnapshot(env.workspace, bytes);
        restore = { key, hit: true, files };
      }
    } catch (err) {
      this.logger.warn(`Ignoring cache entry ${key} for ${job.id}: ${errorMessage(err)}`);
    }
    env.cacheRestore = restore;
    return restore;
  }

  async save(job: JobDeclaration, env: JobEnvironment, key: string): Promise<CacheSave> {
    const { paths } = this.resolveSettings(job);
    try {
      const bytes = await packSnapshot(env.workspace, paths);
      await this.store.put(key, bytes);
      return { key, saved: true };
    } catch (err) {
      const error = new CacheWriteError(key, err);
      this.logger.warn(error.message);
      return { key, saved: false, error: error.message };
    }
  }
}
