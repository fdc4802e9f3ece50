import type { OutputStream } from './process-runner';

export type LogStreamName = OutputStream | 'system';

export type LogLineSink = (stream: LogStreamName, line: string) => void;

export interface StepOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface StepExecutionOptions {
  signal?: AbortSignal;
  log?: LogLineSink;
}
