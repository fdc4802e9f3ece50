import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { engineConfig } from '../../config/engine.config';
import type { StepDeclaration } from '../../declaration/declaration.types';
import type { JobEnvironment } from '../environment/job-environment';
import { StepCancelledError, StepFailure } from '../errors';
import { ActionRegistryService } from './actions/action-registry.service';
import { runProcess } from './process-runner';
import type { StepExecutionOptions, StepOutput } from './step.types';

/**
 * Executes a single step inside a job environment and judges it by exit code alone.
 * Output is captured verbatim for diagnostics and never inspected.
 *
 * @throws UnknownActionError when an action reference resolves to no handler
 * @throws StepFailure on a non-zero exit
 * @throws StepCancelledError when the signal aborted the step
 */
@Injectable()
export class StepExecutorService {
  constructor(
    private readonly actions: ActionRegistryService,
    @Inject(engineConfig.KEY) private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  async execute(
    step: StepDeclaration,
    env: JobEnvironment,
    options: StepExecutionOptions = {},
  ): Promise<StepOutput> {
    const { signal } = options;
    const log = options.log ?? (() => {});
    const startedAt = Date.now();

    if (signal?.aborted) throw new StepCancelledError();

    let exitCode: number;
    let stdout: string;
    let stderr: string;

    if (step.kind === 'action') {
      const handler = this.actions.resolve(step.uses);
      ({ exitCode, stdout, stderr } = await handler.run({ step, env, signal, log }));
    } else {
      const result = await runProcess(step.run, {
        cwd: env.workspace,
        env: env.resolveVars(step.env),
        shell: step.shell,
        signal,
        killGraceMs: this.config.killGraceMs,
        onLine: log,
      });
      ({ exitCode, stdout, stderr } = result);
    }

    if (signal?.aborted) throw new StepCancelledError(stdout, stderr);
    if (exitCode !== 0) throw new StepFailure(exitCode, stdout, stderr);
    return { exitCode, stdout, stderr, durationMs: Date.now() - startedAt };
  }
}
