import { Injectable, Logger } from '@nestjs/common';
import {
  describeStep,
  JobDeclaration,
  jobDisplayName,
  TriggerEvent,
} from '../../declaration/declaration.types';
import { CacheGateService, CacheRestore } from '../cache/cache-gate.service';
import { EnvironmentProvisionerService } from '../environment/environment-provisioner.service';
import type { JobEnvironment } from '../environment/job-environment';
import { EngineError, errorMessage, StepCancelledError, StepFailure } from '../errors';
import {
  CacheReport,
  CancelReason,
  isCancelReason,
  JobStatus,
  LogLine,
  RunErrorKind,
  RunResult,
  StepResult,
} from '../run-result';
import { StepExecutorService } from '../steps/step-executor.service';
import type { LogStreamName } from '../steps/step.types';

export interface JobRunContext {
  event: TriggerEvent;
  pipelineEnv: Record<string, string>;
  signal?: AbortSignal;
  onLog?: (line: LogLine) => void;
}

interface JobOutcome {
  status: JobStatus;
  exitCode: number | null;
  failedStep: RunResult['failedStep'];
  error: RunResult['error'];
  cancelReason: CancelReason | null;
}

function cancelReasonOf(signal: AbortSignal | undefined): CancelReason {
  const reason: unknown = signal?.reason;
  return isCancelReason(reason) ? reason : 'signal';
}

/**
 * Runs one job: fresh environment, steps in order (fail-fast) with the cache restored once
 * the sources are in place, cache save.
 * Never throws for anything a job can do wrong; every outcome comes back as a RunResult.
 */
@Injectable()
export class JobRunnerService {
  private readonly logger = new Logger(JobRunnerService.name);

  constructor(
    private readonly provisioner: EnvironmentProvisionerService,
    private readonly cacheGate: CacheGateService,
    private readonly executor: StepExecutorService,
  ) {}

  async run(job: JobDeclaration, context: JobRunContext): Promise<RunResult> {
    const { signal } = context;
    const startedAt = new Date();
    const logs: LogLine[] = [];
    const steps: StepResult[] = [];
    let cache: CacheReport | null = null;

    const emit = (stepIndex: number | null, stream: LogStreamName, line: string) => {
      const entry: LogLine = {
        jobId: job.id,
        stepIndex,
        stream,
        line,
        timestamp: new Date().toISOString(),
      };
      logs.push(entry);
      context.onLog?.(entry);
    };

    const finish = (outcome: JobOutcome): RunResult => {
      const completedAt = new Date();
      for (let index = steps.length; index < job.steps.length; index++) {
        steps.push(skippedStep(job, index));
      }
      emit(null, 'system', `Job ${job.id} finished: ${outcome.status}`);
      const result: RunResult = {
        jobId: job.id,
        name: jobDisplayName(job),
        ...outcome,
        continueOnError: job.continueOnError,
        steps: Object.freeze(steps),
        logs: Object.freeze(logs),
        cache,
        startedAt: startedAt.toISOString(),
        completedAt: completedAt.toISOString(),
        durationMs: completedAt.getTime() - startedAt.getTime(),
      };
      return Object.freeze(result);
    };

    const cancelled = (): RunResult => {
      const reason = cancelReasonOf(signal);
      return finish({
        status: 'cancelled',
        exitCode: null,
        failedStep: null,
        error: { kind: 'cancelled', message: `Cancelled (${reason})` },
        cancelReason: reason,
      });
    };

    if (signal?.aborted) return cancelled();

    let env: JobEnvironment;
    try {
      env = await this.provisioner.provision(job, context.pipelineEnv, context.event);
    } catch (err) {
      this.logger.error(`Job ${job.id}: ${errorMessage(err)}`);
      emit(null, 'system', errorMessage(err));
      return finish({
        status: 'failure',
        exitCode: null,
        failedStep: null,
        error: { kind: errorKind(err), message: errorMessage(err) },
        cancelReason: null,
      });
    }

    const restoreCache = async (): Promise<CacheRestore> => {
      const restored = await this.cacheGate.restore(job, env);
      cache = { key: restored.key, hit: restored.hit, saved: false };
      emit(null, 'system', `Cache ${restored.hit ? 'hit' : 'miss'}: ${restored.key}`);
      return restored;
    };

    try {
      const restorePoint = this.cacheGate.restorePoint(job);
      let restored: CacheRestore | null = null;

      for (const [index, step] of job.steps.entries()) {
        if (signal?.aborted) return cancelled();
        if (index === restorePoint) restored = await restoreCache();

        const name = describeStep(step, index);
        emit(index, 'system', `Step ${index + 1}/${job.steps.length}: ${name}`);
        try {
          const output = await this.executor.execute(step, env, {
            signal,
            log: (stream, line) => emit(index, stream, line),
          });
          steps.push({ index, name, status: 'success', ...output });
        } catch (err) {
          if (err instanceof StepCancelledError) {
            steps.push(stepResult(index, name, 'cancelled', null, err.stdout, err.stderr));
            return cancelled();
          }
          const exitCode = err instanceof StepFailure ? err.exitCode : null;
          steps.push(
            stepResult(
              index,
              name,
              'failure',
              exitCode,
              err instanceof StepFailure ? err.stdout : '',
              err instanceof StepFailure ? err.stderr : errorMessage(err),
            ),
          );
          emit(index, 'system', `Step failed: ${errorMessage(err)}`);
          return finish({
            status: 'failure',
            exitCode,
            failedStep: { index, name },
            error: { kind: errorKind(err), message: errorMessage(err) },
            cancelReason: null,
          });
        }
      }

      if (signal?.aborted) return cancelled();

      const restore = restored ?? (await restoreCache());
      const saved = await this.cacheGate.save(job, env, restore.key);
      cache = {
        key: restore.key,
        hit: restore.hit,
        saved: saved.saved,
        ...(saved.error !== undefined ? { error: saved.error } : {}),
      };
      emit(null, 'system', saved.saved ? `Cache saved: ${saved.key}` : `Cache not saved: ${saved.error}`);
      if (signal?.aborted) return cancelled();

      return finish({
        status: 'success',
        exitCode: 0,
        failedStep: null,
        error: null,
        cancelReason: null,
      });
    } finally {
      await this.provisioner.teardown(env);
    }
  }
}

function errorKind(err: unknown): RunErrorKind {
  return err instanceof EngineError ? err.kind : 'internal';
}

function stepResult(
  index: number,
  name: string,
  status: StepResult['status'],
  exitCode: number | null,
  stdout: string,
  stderr: string,
): StepResult {
  return { index, name, status, exitCode, stdout, stderr, durationMs: 0 };
}

function skippedStep(job: JobDeclaration, index: number): StepResult {
  const step = job.steps[index];
  const name = step ? describeStep(step, index) : `step ${index + 1}`;
  return stepResult(index, name, 'skipped', null, '', '');
}
