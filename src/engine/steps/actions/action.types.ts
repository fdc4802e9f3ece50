import type {
  ActionStep,
  CacheDeclaration,
  StepParams,
} from '../../../declaration/declaration.types';
import type { JobEnvironment } from '../../environment/job-environment';
import type { LogLineSink } from '../step.types';

export interface ActionContext {
  step: ActionStep;
  env: JobEnvironment;
  signal?: AbortSignal;
  log: LogLineSink;
}

export interface ActionOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** An action name plus the versions it answers to; `*` accepts any version. */
export interface ActionAddress {
  name: string;
  versions: readonly string[] | '*';
}

export interface ActionHandler {
  readonly addresses: readonly ActionAddress[];
  run(context: ActionContext): Promise<ActionOutcome>;
  /** Cache actions describe what the job's cache entry covers. */
  cacheSettings?(step: ActionStep): Partial<CacheDeclaration>;
}

export const ACTION_HANDLERS = Symbol('ACTION_HANDLERS');

export function succeeded(stdout = ''): ActionOutcome {
  return { exitCode: 0, stdout, stderr: '' };
}

export function failed(stderr: string, exitCode = 1): ActionOutcome {
  return { exitCode, stdout: '', stderr };
}

/** `a, b` / multi-line parameter values into a list. */
export function paramList(value: StepParams[string] | undefined): string[] {
  if (value === undefined) return [];
  return String(value)
    .split(/[\n,]/)
    .map((item) => item.trim())
    .filter(Boolean);
}
