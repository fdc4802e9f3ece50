import type { TriggerEvent } from '../declaration/declaration.types';
import type { EngineErrorKind } from './errors';
import type { LogStreamName } from './steps/step.types';

export type JobStatus = 'success' | 'failure' | 'cancelled';

export type StepStatus = JobStatus | 'skipped';

export type PipelineStatus = 'pending' | 'running' | 'succeeded' | 'failed';

/** Why a job was cancelled; carried as the AbortSignal reason. */
export type CancelReason = 'signal' | 'timeout' | 'fail-fast';

export type RunErrorKind = EngineErrorKind | 'cancelled' | 'internal';

export interface LogLine {
  jobId: string;
  /** null for lines the runner writes outside any step */
  stepIndex: number | null;
  stream: LogStreamName;
  line: string;
  timestamp: string;
}

export interface StepResult {
  index: number;
  name: string;
  status: StepStatus;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface CacheReport {
  key: string;
  hit: boolean;
  saved: boolean;
  error?: string;
}

/** Outcome of one job run. Frozen once the runner returns it. */
export interface RunResult {
  jobId: string;
  name: string;
  status: JobStatus;
  exitCode: number | null;
  failedStep: { index: number; name: string } | null;
  error: { kind: RunErrorKind; message: string } | null;
  cancelReason: CancelReason | null;
  continueOnError: boolean;
  steps: readonly StepResult[];
  logs: readonly LogLine[];
  cache: CacheReport | null;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}

export interface PipelineResult {
  name: string;
  status: Exclude<PipelineStatus, 'pending' | 'running'>;
  event: TriggerEvent;
  /** Every selected job's outcome, in declaration order */
  jobs: readonly RunResult[];
  failedJobs: string[];
  cancelled: boolean;
  startedAt: string;
  completedAt: string;
}

export function isCancelReason(value: unknown): value is CancelReason {
  return value === 'signal' || value === 'timeout' || value === 'fail-fast';
}

/** A job counts against the verdict unless it succeeded or may fail. */
export function failsPipeline(result: RunResult): boolean {
  return result.status !== 'success' && !result.continueOnError;
}
