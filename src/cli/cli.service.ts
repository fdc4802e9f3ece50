import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { DeclarationService } from '../declaration/declaration.service';
import { jobDisplayName } from '../declaration/declaration.types';
import { DeclarationError } from '../engine/errors';
import { PipelineSchedulerService } from '../engine/scheduler/pipeline-scheduler.service';
import type { PipelineResult } from '../engine/run-result';
import { LogStreamService } from '../streaming/log-stream.service';
import type { CliCommand } from './cli-args';

export interface CliOutput {
  stdout(line: string): void;
  stderr(line: string): void;
}

export const processOutput: CliOutput = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

export interface CliRunOptions {
  /** Aborting it cancels every running job (SIGINT/SIGTERM) */
  signal?: AbortSignal;
  out?: CliOutput;
}

/** `relay run` and `relay validate`; returns the process exit code. */
@Injectable()
export class CliService {
  constructor(
    private readonly declarations: DeclarationService,
    private readonly scheduler: PipelineSchedulerService,
    private readonly logStream: LogStreamService,
  ) {}

  async execute(command: CliCommand, options: CliRunOptions = {}): Promise<number> {
    const out = options.out ?? processOutput;
    try {
      switch (command.command) {
        case 'help':
          return 0;
        case 'validate':
          return await this.validate(command.file, out);
        case 'run':
          return await this.run(command, out, options.signal);
      }
    } catch (err) {
      if (err instanceof DeclarationError) {
        out.stderr(err.message);
        return 1;
      }
      throw err;
    }
  }

  private async validate(file: string, out: CliOutput): Promise<number> {
    const pipeline = await this.declarations.load(file);
    out.stdout(`${pipeline.name ?? file}: ${pipeline.jobs.length} job(s), on ${pipeline.triggers.join(', ')}`);
    for (const job of pipeline.jobs) {
      out.stdout(`  ${job.id} (${job.runsOn}): ${jobDisplayName(job)}, ${job.steps.length} step(s)`);
    }
    return 0;
  }

  private async run(
    command: Extract<CliCommand, { command: 'run' }>,
    out: CliOutput,
    signal?: AbortSignal,
  ): Promise<number> {
    const pipeline = await this.declarations.load(command.file);
    if (!this.declarations.isTriggeredBy(pipeline, command.event.kind)) {
      out.stderr(`${pipeline.name ?? command.file} is not triggered by ${command.event.kind}; nothing to run`);
      return 0;
    }

    const runId = randomUUID();
    const subscription = this.logStream
      .getLogStreamForRun(runId)
      .subscribe((event) => out.stdout(`[${event.jobId}] ${event.line}`));

    let result: PipelineResult;
    try {
      result = await this.scheduler.run(pipeline, command.event, {
        jobs: command.jobs,
        signal,
        onLog: (line) => this.logStream.publish(runId, line),
      });
    } finally {
      subscription.unsubscribe();
    }

    report(result, out);
    return result.status === 'succeeded' ? 0 : 1;
  }
}

function report(result: PipelineResult, out: CliOutput): void {
  out.stdout('');
  for (const job of result.jobs) {
    const detail = job.failedStep
      ? ` at step ${job.failedStep.index + 1} (${job.failedStep.name})`
      : job.cancelReason
        ? ` (${job.cancelReason})`
        : '';
    const allowed = job.status !== 'success' && job.continueOnError ? ' [continue-on-error]' : '';
    out.stdout(`${job.jobId}: ${job.status}${detail}${allowed}`);
  }
  out.stdout(`${result.name}: ${result.status}${result.cancelled ? ' (cancelled)' : ''}`);
  if (result.failedJobs.length) out.stderr(`Failed jobs: ${result.failedJobs.join(', ')}`);
}
