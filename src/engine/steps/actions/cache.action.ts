import { Injectable } from '@nestjs/common';
import type { ActionStep, CacheDeclaration, StepParams } from '../../../declaration/declaration.types';
import { ActionContext, ActionHandler, ActionOutcome, paramList, succeeded } from './action.types';

const RUST_CACHE = 'Swatinem/rust-cache';

/**
 * Cache steps do no I/O of their own: the job runner restores the job's entry right before
 * the first cache step, keyed on the checked-out lock files, and saves it after the last step. The step reports what the restore found
 * and, through cacheSettings(), tells the cache gate which paths to capture.
 */
@Injectable()
export class CacheAction implements ActionHandler {
  readonly addresses = [
    { name: RUST_CACHE, versions: ['v1', 'v2'] },
    { name: 'actions/cache', versions: ['v3', 'v4'] },
  ] as const;

  async run({ env, log }: ActionContext): Promise<ActionOutcome> {
    const restore = env.cacheRestore;
    if (!restore) {
      log('system', 'Cache was not restored for this job');
      return succeeded();
    }
    const summary = restore.hit
      ? `Cache hit for ${restore.key} (${restore.files} files)`
      : `Cache miss for ${restore.key}`;
    log('system', summary);
    return succeeded(`${summary}\n`);
  }

  cacheSettings(step: ActionStep): Partial<CacheDeclaration> {
    if (step.uses.name === RUST_CACHE) return rustSettings(step.with);
    const key = step.with.key === undefined ? undefined : String(step.with.key);
    return { paths: paramList(step.with.path), ...(key !== undefined && { key }) };
  }
}

/** target/ plus any extra directories, keyed on the lock file. */
function rustSettings(params: StepParams): Partial<CacheDeclaration> {
  const prefix = params['prefix-key'] === undefined ? 'rust' : String(params['prefix-key']);
  return {
    key: `${prefix}-{runner}-{fingerprint}`,
    paths: ['target', ...paramList(params['cache-directories'])],
    fingerprint: ['Cargo.lock', 'Cargo.toml'],
  };
}
