import { ActionRef, formatActionRef } from '../declaration/declaration.types';

export type EngineErrorKind =
  | 'declaration'
  | 'unknown_action'
  | 'step_failure'
  | 'step_cancelled'
  | 'cache_write'
  | 'environment_provision';

/**
 * Base for every failure the engine reports. `kind` is what ends up in RunResult.error
 * and in the job_runs table, so it must stay stable.
 */
export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The declaration document is malformed, or a run selected a job it does not have. */
export class DeclarationError extends EngineError {
  readonly kind = 'declaration';

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
  }
}

export class UnknownActionError extends EngineError {
  readonly kind = 'unknown_action';

  constructor(readonly ref: ActionRef) {
    super(`Unknown action: ${formatActionRef(ref)}`);
  }
}

/** Non-zero exit of a step. Never retried. */
export class StepFailure extends EngineError {
  readonly kind = 'step_failure';

  constructor(
    readonly exitCode: number,
    readonly stdout: string,
    readonly stderr: string,
    message = `Process exited with code ${exitCode}`,
  ) {
    super(message);
  }
}

export class StepCancelledError extends EngineError {
  readonly kind = 'step_cancelled';

  constructor(
    readonly stdout = '',
    readonly stderr = '',
  ) {
    super('Step cancelled');
  }
}

/** Logged and reported on the job's cache report; never fails the job. */
export class CacheWriteError extends EngineError {
  readonly kind = 'cache_write';

  constructor(
    readonly key: string,
    cause: unknown,
  ) {
    super(`Failed to save cache entry ${key}: ${errorMessage(cause)}`, { cause });
  }
}

export class EnvironmentProvisionError extends EngineError {
  readonly kind = 'environment_provision';

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
