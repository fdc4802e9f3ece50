import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { engineConfig, MAX_TIMER_MS } from '../../config/engine.config';
import { DeclarationService } from '../../declaration/declaration.service';
import {
  JobDeclaration,
  jobDisplayName,
  PipelineDeclaration,
  TriggerEvent,
} from '../../declaration/declaration.types';
import { errorMessage } from '../errors';
import { JobRunnerService } from '../jobs/job-runner.service';
import {
  CancelReason,
  failsPipeline,
  LogLine,
  PipelineResult,
  PipelineStatus,
  RunResult,
} from '../run-result';
import { PipelineRunState } from './pipeline-state';

/** Extra time a cancelled job gets, past the kill grace period, to report back. */
const SETTLE_MARGIN_MS = 1_000;

export interface PipelineRunOptions {
  /** Job ids to run; all jobs when empty */
  jobs?: readonly string[];
  /** Cancels every running job; the verdict is then failed */
  signal?: AbortSignal;
  onLog?: (line: LogLine) => void;
  onJobStart?: (job: JobDeclaration) => void;
  onJobComplete?: (result: RunResult) => void;
  onStatusChange?: (status: PipelineStatus) => void;
}

/**
 * Fans a pipeline out into one job runner per job, all started at once (jobs have no
 * dependencies on each other), and folds their outcomes into a verdict.
 *
 * - any failing job moves the run to `failed` right away; with `fail-fast` the other
 *   jobs are cancelled, otherwise they run to completion
 * - every job is bounded by its timeout plus the kill grace period; one that has not
 *   reported by then is recorded as cancelled
 * - the result always lists every selected job, in declaration order
 */
@Injectable()
export class PipelineSchedulerService {
  private readonly logger = new Logger(PipelineSchedulerService.name);

  constructor(
    private readonly runner: JobRunnerService,
    private readonly declarations: DeclarationService,
    @Inject(engineConfig.KEY) private readonly config: ConfigType<typeof engineConfig>,
  ) {}

  async run(
    pipeline: PipelineDeclaration,
    event: TriggerEvent,
    options: PipelineRunOptions = {},
  ): Promise<PipelineResult> {
    const jobs = this.declarations.selectJobs(pipeline, options.jobs ?? []);
    const name = pipeline.name ?? 'pipeline';
    const startedAt = new Date();

    const state = new PipelineRunState(name, (_from, to) => options.onStatusChange?.(to));
    const controllers = new Map<string, AbortController>();
    let cancelled = false;

    const cancelAll = (reason: CancelReason) => {
      for (const controller of controllers.values()) {
        if (!controller.signal.aborted) controller.abort(reason);
      }
    };

    const onExternalAbort = () => {
      cancelled = true;
      this.logger.warn(`Cancelling ${name}: ${controllers.size} job(s) signalled`);
      state.transition('failed');
      cancelAll('signal');
    };

    state.transition('running');
    for (const job of jobs) controllers.set(job.id, new AbortController());

    if (options.signal?.aborted) onExternalAbort();
    else options.signal?.addEventListener('abort', onExternalAbort, { once: true });

    try {
      const results = await Promise.all(
        jobs.map(async (job) => {
          const controller = controllers.get(job.id) ?? new AbortController();
          options.onJobStart?.(job);
          const result = await this.runBounded(job, pipeline, event, controller, options.onLog);
          options.onJobComplete?.(result);

          if (failsPipeline(result)) {
            if (state.status === 'running') {
              this.logger.warn(`Job ${job.id} ${result.status}; ${name} is failed`);
              state.transition('failed');
            }
            if (pipeline.failFast && result.status === 'failure') cancelAll('fail-fast');
          }
          return result;
        }),
      );

      if (state.status === 'running') state.transition('succeeded');
      const status = state.status === 'succeeded' ? 'succeeded' : 'failed';

      return {
        name,
        status,
        event,
        jobs: results,
        failedJobs: results.filter(failsPipeline).map((result) => result.jobId),
        cancelled,
        startedAt: startedAt.toISOString(),
        completedAt: new Date().toISOString(),
      };
    } finally {
      options.signal?.removeEventListener('abort', onExternalAbort);
    }
  }

  /** Runs a job under its timeout; forces a Cancelled result if it does not settle. */
  private runBounded(
    job: JobDeclaration,
    pipeline: PipelineDeclaration,
    event: TriggerEvent,
    controller: AbortController,
    onLog?: (line: LogLine) => void,
  ): Promise<RunResult> {
    const timeoutMs = Math.min(
      job.timeoutMinutes ? job.timeoutMinutes * 60_000 : this.config.jobTimeoutMs,
      MAX_TIMER_MS,
    );
    const timers: ReturnType<typeof setTimeout>[] = [];
    let settled = false;

    timers.push(
      setTimeout(() => {
        if (controller.signal.aborted) return;
        this.logger.warn(`Job ${job.id} timed out after ${timeoutMs}ms`);
        controller.abort('timeout');
      }, timeoutMs),
    );

    const running = this.runner
      .run(job, { event, pipelineEnv: pipeline.env, signal: controller.signal, onLog })
      .catch((err: unknown) => {
        this.logger.error(`Job ${job.id} crashed: ${errorMessage(err)}`);
        return syntheticResult(job, 'failure', null, errorMessage(err));
      });

    const forced = new Promise<RunResult>((resolve) => {
      const arm = () => {
        if (settled) return;
        const reason: unknown = controller.signal.reason;
        timers.push(
          setTimeout(() => {
            this.logger.error(`Job ${job.id} did not stop after cancellation; recording it as cancelled`);
            resolve(
              syntheticResult(job, 'cancelled', reason === 'timeout' ? 'timeout' : 'signal', 'Forced cancellation'),
            );
          }, Math.min(this.config.killGraceMs + SETTLE_MARGIN_MS, MAX_TIMER_MS)),
        );
      };
      if (controller.signal.aborted) arm();
      else controller.signal.addEventListener('abort', arm, { once: true });
    });

    return Promise.race([running, forced]).finally(() => {
      settled = true;
      for (const timer of timers) clearTimeout(timer);
    });
  }
}

function syntheticResult(
  job: JobDeclaration,
  status: 'failure' | 'cancelled',
  cancelReason: CancelReason | null,
  message: string,
): RunResult {
  const now = new Date().toISOString();
  const result: RunResult = {
    jobId: job.id,
    name: jobDisplayName(job),
    status,
    exitCode: null,
    failedStep: null,
    error: { kind: status === 'cancelled' ? 'cancelled' : 'internal', message },
    cancelReason,
    continueOnError: job.continueOnError,
    steps: [],
    logs: [],
    cache: null,
    startedAt: now,
    completedAt: now,
    durationMs: 0,
  };
  return Object.freeze(result);
}
