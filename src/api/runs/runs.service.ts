import { Injectable, Logger, NotFoundException, OnModuleDestroy } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { PipelineRun } from '../../database/entities/pipeline-run.entity';
import { JobRun, StoredStepResult } from '../../database/entities/job-run.entity';
import { JobLog } from '../../database/entities/job-log.entity';
import { PipelinesService } from '../pipelines/pipelines.service';
import { DeclarationService } from '../../declaration/declaration.service';
import { jobDisplayName } from '../../declaration/declaration.types';
import type { PipelineDeclaration, TriggerEvent } from '../../declaration/declaration.types';
import { PipelineSchedulerService } from '../../engine/scheduler/pipeline-scheduler.service';
import { errorMessage } from '../../engine/errors';
import type { LogLine, PipelineStatus, RunResult } from '../../engine/run-result';
import { LogStreamService } from '../../streaming/log-stream.service';

const LOG_INSERT_CHUNK = 500;

interface ActiveRun {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * trigger pipeline runs, cancel them, get run status, and get job logs.
 * A run executes in this process; its rows are updated as the scheduler reports back.
 */
@Injectable()
export class RunsService implements OnModuleDestroy {
  private readonly logger = new Logger(RunsService.name);
  private readonly active = new Map<string, ActiveRun>();

  constructor(
    private readonly dataSource: DataSource,
    private readonly pipelinesService: PipelinesService,
    private readonly declarations: DeclarationService,
    private readonly scheduler: PipelineSchedulerService,
    private readonly logStream: LogStreamService,
  ) {}

  async findAll(pipelineId?: string): Promise<PipelineRun[]> {
    const repo = this.dataSource.getRepository(PipelineRun);
    return repo.find({
      where: pipelineId ? { pipeline_id: pipelineId } : undefined,
      order: { created_at: 'DESC' },
      take: 100,
    });
  }

  async findOne(runId: string): Promise<PipelineRun | null> {
    return this.dataSource.getRepository(PipelineRun).findOne({
      where: { id: runId },
    });
  }

  // Run with its jobs in declaration order
  async findOneWithJobs(runId: string): Promise<{ run: PipelineRun; jobs: JobRun[] } | null> {
    const run = await this.dataSource.getRepository(PipelineRun).findOne({
      where: { id: runId },
      relations: ['jobs'],
    });
    if (!run) return null;
    const jobs = [...(run.jobs ?? [])].sort((a, b) => a.position - b.position);
    return { run, jobs };
  }

  async getJobLogs(jobRunId: string): Promise<JobLog[]> {
    return this.dataSource.getRepository(JobLog).find({
      where: { job_run_id: jobRunId },
      order: { timestamp: 'ASC', id: 'ASC' },
    });
  }

  isActive(runId: string): boolean {
    return this.active.has(runId);
  }

  /** Resolves once the run stopped executing here; immediately when it is not. */
  async waitFor(runId: string): Promise<void> {
    await this.active.get(runId)?.done;
  }

  /**
   * Creates the run and one pending row per selected job, then executes in the background.
   * Throws DeclarationError when the stored declaration is invalid or a job name is unknown.
   */
  async triggerRun(
    pipelineId: string,
    event: TriggerEvent,
    jobs: readonly string[] = [],
  ): Promise<PipelineRun> {
    const pipeline = await this.pipelinesService.findOne(pipelineId);
    if (!pipeline) throw new NotFoundException('Pipeline not found');

    const declaration = this.pipelinesService.declarationOf(pipeline);
    const selected = this.declarations.selectJobs(declaration, jobs);
    // checkout falls back to the repository the pipeline is registered for
    if (!event.repository && !event.sourceDir) event = { ...event, repository: pipeline.repository };

    const run = await this.dataSource.getRepository(PipelineRun).save(
      this.dataSource.getRepository(PipelineRun).create({
        pipeline_id: pipelineId,
        trigger_type: event.kind,
        trigger_metadata: {
          ref: event.ref,
          commit: event.commit,
          ...(event.repository !== undefined && { repository: event.repository }),
          ...(jobs.length > 0 && { jobs: [...jobs] }),
        },
        status: 'pending',
      }),
    );

    const jobRepo = this.dataSource.getRepository(JobRun);
    const rows = await jobRepo.save(
      selected.map((job) =>
        jobRepo.create({
          pipeline_run_id: run.id,
          job_key: job.id,
          name: jobDisplayName(job),
          position: declaration.jobs.indexOf(job),
          status: 'pending',
        }),
      ),
    );

    const controller = new AbortController();
    const done = this.execute(run, declaration, event, jobs, rows, controller.signal)
      .catch((err: unknown) => {
        this.logger.error(`Run ${run.id} aborted: ${errorMessage(err)}`);
        return this.markFailed(run.id);
      })
      .finally(() => {
        this.active.delete(run.id);
      });
    this.active.set(run.id, { controller, done });

    return run;
  }

  /** Signals every job of an active run; false when the run is not executing here. */
  cancelRun(runId: string): boolean {
    const entry = this.active.get(runId);
    if (!entry) return false;
    this.logger.log(`Cancelling run ${runId}`);
    entry.controller.abort('signal');
    return true;
  }

  async onModuleDestroy(): Promise<void> {
    const entries = [...this.active.values()];
    for (const entry of entries) entry.controller.abort('signal');
    await Promise.all(entries.map((entry) => entry.done));
  }

  private async execute(
    run: PipelineRun,
    declaration: PipelineDeclaration,
    event: TriggerEvent,
    jobs: readonly string[],
    rows: JobRun[],
    signal: AbortSignal,
  ): Promise<void> {
    const runRepo = this.dataSource.getRepository(PipelineRun);
    const jobRepo = this.dataSource.getRepository(JobRun);
    const rowIds = new Map(rows.map((row) => [row.job_key, row.id]));
    const writes: Promise<void>[] = [];

    const track = (what: string, write: () => Promise<unknown>) => {
      writes.push(
        write().then(
          () => undefined,
          (err: unknown) => {
            this.logger.error(`Failed to record ${what} of run ${run.id}: ${errorMessage(err)}`);
          },
        ),
      );
    };

    const onStatusChange = (status: PipelineStatus) =>
      track('status', () =>
        runRepo.update(run.id, {
          status,
          ...(status === 'running' && { started_at: new Date() }),
        }),
      );

    const result = await this.scheduler.run(declaration, event, {
      jobs,
      signal,
      onLog: (line: LogLine) => this.logStream.publish(run.id, line),
      onStatusChange,
      onJobStart: (job) => {
        const id = rowIds.get(job.id);
        if (id) track(`start of ${job.id}`, () => jobRepo.update(id, { status: 'running', started_at: new Date() }));
      },
      onJobComplete: (jobResult) => {
        const id = rowIds.get(jobResult.jobId);
        if (id) track(`result of ${jobResult.jobId}`, () => this.recordJob(id, jobResult));
      },
    });

    await Promise.all(writes);
    await runRepo.update(run.id, {
      status: result.status,
      failed_jobs: result.failedJobs,
      cancelled: result.cancelled,
      completed_at: new Date(result.completedAt),
    });
    this.logger.log(
      `Run ${run.id} ${result.status}` +
        (result.failedJobs.length ? ` (failed: ${result.failedJobs.join(', ')})` : ''),
    );
  }

  private async recordJob(jobRunId: string, result: RunResult): Promise<void> {
    const steps: StoredStepResult[] = result.steps.map((step) => ({
      index: step.index,
      name: step.name,
      status: step.status,
      exitCode: step.exitCode,
      durationMs: step.durationMs,
    }));

    await this.dataSource.getRepository(JobRun).update(jobRunId, {
      status: result.status,
      exit_code: result.exitCode,
      failed_step_index: result.failedStep?.index ?? null,
      failed_step_name: result.failedStep?.name ?? null,
      error_kind: result.error?.kind ?? null,
      error_message: result.error?.message ?? null,
      cancel_reason: result.cancelReason,
      cache_key: result.cache?.key ?? null,
      cache_hit: result.cache?.hit ?? null,
      cache_saved: result.cache?.saved ?? null,
      steps,
      started_at: new Date(result.startedAt),
      completed_at: new Date(result.completedAt),
    });

    const logRepo = this.dataSource.getRepository(JobLog);
    const lines = result.logs.map((line) => ({
      job_run_id: jobRunId,
      step_index: line.stepIndex,
      stream: line.stream,
      log_line: line.line,
      timestamp: new Date(line.timestamp),
    }));
    for (let i = 0; i < lines.length; i += LOG_INSERT_CHUNK) {
      await logRepo.insert(lines.slice(i, i + LOG_INSERT_CHUNK));
    }
  }

  private async markFailed(runId: string): Promise<void> {
    try {
      await this.dataSource
        .getRepository(PipelineRun)
        .update(runId, { status: 'failed', completed_at: new Date() });
    } catch (err) {
      this.logger.error(`Failed to mark run ${runId} failed: ${errorMessage(err)}`);
    }
  }
}
