import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { cp } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { engineConfig } from '../../../config/engine.config';
import type { TriggerEvent } from '../../../declaration/declaration.types';
import { errorMessage } from '../../errors';
import { runProcess } from '../process-runner';
import { ActionContext, ActionHandler, ActionOutcome, failed, succeeded } from './action.types';

/** Engine state kept next to the sources; never copied into a workspace. */
const SKIPPED_ENTRIES = new Set(['.relay', 'node_modules']);

/**
 * Brings the event's sources into the job workspace. A local source tree is copied;
 * otherwise the repository is fetched at the event's commit with git.
 * Exports CI_REF, CI_COMMIT, CI_EVENT and CI_REPOSITORY for later steps.
 */
@Injectable()
export class CheckoutAction implements ActionHandler {
  readonly addresses = [{ name: 'actions/checkout', versions: ['v2', 'v3', 'v4'] }] as const;

  constructor(
    @Inject(engineConfig.KEY) private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  async run({ step, env, signal, log }: ActionContext): Promise<ActionOutcome> {
    const { event } = env;
    const repository = stringParam(step.with.repository) ?? event.repository;
    const ref = stringParam(step.with.ref) ?? checkoutRef(event);

    env.exportVar('CI_EVENT', event.kind);
    env.exportVar('CI_REF', event.ref);
    env.exportVar('CI_COMMIT', event.commit);
    if (repository) env.exportVar('CI_REPOSITORY', repository);

    if (event.sourceDir && !step.with.repository) {
      const source = resolve(event.sourceDir);
      log('system', `Copying ${source} into workspace`);
      try {
        await cp(source, env.workspace, {
          recursive: true,
          force: true,
          filter: (path) => !SKIPPED_ENTRIES.has(basename(path)),
        });
      } catch (err) {
        return failed(`Checkout failed: ${errorMessage(err)}`);
      }
      return succeeded();
    }

    if (!repository) {
      return failed('Checkout failed: the event names neither a source directory nor a repository');
    }

    const url = repositoryUrl(repository, this.config.gitBaseUrl);
    log('system', `Fetching ${url} at ${ref}`);
    const script = [
      'git init -q .',
      `git fetch -q --depth 1 ${shellQuote(url)} ${shellQuote(ref)}`,
      'git checkout -q FETCH_HEAD',
    ].join(' && ');
    const result = await runProcess(script, {
      cwd: env.workspace,
      env: env.resolveVars(step.env),
      signal,
      killGraceMs: this.config.killGraceMs,
      onLine: log,
    });
    return { exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr };
  }
}

/** The commit when the event names one, else its ref, else the remote's HEAD. */
export function checkoutRef(event: TriggerEvent): string {
  return event.commit || event.ref || 'HEAD';
}

/** A bare `owner/name` is a repository on the configured git host; anything else is used as is. */
export function repositoryUrl(repository: string, gitBaseUrl: string): string {
  return /^[\w.-]+\/[\w.-]+$/.test(repository) ? `${gitBaseUrl}/${repository}.git` : repository;
}

function stringParam(value: string | number | boolean | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : String(value);
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
