import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { engineConfig } from '../../config/engine.config';
import type { JobDeclaration, TriggerEvent } from '../../declaration/declaration.types';
import { EnvironmentProvisionError, errorMessage } from '../errors';
import { JobEnvironment } from './job-environment';

/** Host variables a job inherits; everything else from the parent process stays out. */
const INHERITED_VARS = ['PATH', 'LANG', 'LC_ALL', 'TZ', 'SHELL', 'TERM', 'USER'];

/**
 * Allocates a fresh directory tree per job run:
 *   <workRoot>/<job>-XXXXXX/{workspace,home,tools}
 * and removes it when the job is done.
 */
@Injectable()
export class EnvironmentProvisionerService {
  private readonly logger = new Logger(EnvironmentProvisionerService.name);

  constructor(
    @Inject(engineConfig.KEY) private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  async provision(
    job: JobDeclaration,
    pipelineEnv: Record<string, string>,
    event: TriggerEvent,
  ): Promise<JobEnvironment> {
    if (!this.config.runnerLabels.includes(job.runsOn)) {
      throw new EnvironmentProvisionError(
        `No runner for "${job.runsOn}" (available: ${this.config.runnerLabels.join(', ')})`,
      );
    }

    let root: string;
    try {
      await mkdir(this.config.workRoot, { recursive: true });
      root = await mkdtemp(join(this.config.workRoot, `${job.id}-`));
    } catch (err) {
      throw new EnvironmentProvisionError(
        `Cannot allocate environment for job ${job.id}: ${errorMessage(err)}`,
        err,
      );
    }

    const layout = {
      root,
      workspace: join(root, 'workspace'),
      home: join(root, 'home'),
      tools: join(root, 'tools'),
    };
    try {
      await Promise.all([
        mkdir(layout.workspace),
        mkdir(layout.home),
        mkdir(layout.tools),
      ]);
    } catch (err) {
      await rm(root, { recursive: true, force: true });
      throw new EnvironmentProvisionError(
        `Cannot allocate environment for job ${job.id}: ${errorMessage(err)}`,
        err,
      );
    }

    const baseVars: Record<string, string> = {};
    for (const name of INHERITED_VARS) {
      const value = process.env[name];
      if (value !== undefined) baseVars[name] = value;
    }
    Object.assign(baseVars, {
      CI: 'true',
      HOME: layout.home,
      TMPDIR: layout.tools,
      RELAY_JOB: job.id,
      RELAY_RUNNER: job.runsOn,
      RELAY_WORKSPACE: layout.workspace,
      ...pipelineEnv,
      ...job.env,
    });

    this.logger.debug(`Provisioned ${job.runsOn} environment for ${job.id} at ${root}`);
    return new JobEnvironment(job.id, job.runsOn, layout, event, baseVars);
  }

  async teardown(env: JobEnvironment): Promise<void> {
    if (this.config.keepWorkspaces) {
      this.logger.log(`Keeping environment of ${env.jobId} at ${env.layout.root}`);
      return;
    }
    try {
      await rm(env.layout.root, { recursive: true, force: true });
    } catch (err) {
      this.logger.warn(`Failed to remove ${env.layout.root}: ${errorMessage(err)}`);
    }
  }
}
