/**
 * Pipeline declaration model.
 * Built once from the YAML document at load time and treated as read-only for the
 * whole run; the scheduler and runners never mutate it.
 */

export type TriggerKind = 'push' | 'pull_request' | 'manual';

export type StepParams = Record<string, string | number | boolean>;

/** Reusable action address, written `name@version` in the document. */
export interface ActionRef {
  name: string;
  version: string;
}

interface StepBase {
  name?: string;
  env: Record<string, string>;
}

export interface ActionStep extends StepBase {
  kind: 'action';
  uses: ActionRef;
  with: StepParams;
}

export interface CommandStep extends StepBase {
  kind: 'command';
  run: string;
  /** Shell binary to run the command with; `sh` when not set. */
  shell?: string;
}

export type StepDeclaration = ActionStep | CommandStep;

export interface CacheDeclaration {
  /** Key template; tokens: {job}, {runner}, {fingerprint}. */
  key?: string;
  /** Workspace-relative paths captured into the entry. */
  paths: string[];
  /** Source-relative files hashed into {fingerprint}, e.g. lock files. */
  fingerprint: string[];
}

export interface JobDeclaration {
  id: string;
  name?: string;
  runsOn: string;
  env: Record<string, string>;
  timeoutMinutes?: number;
  /** A failure of this job is reported but does not fail the pipeline. */
  continueOnError: boolean;
  cache?: CacheDeclaration;
  steps: StepDeclaration[];
}

export interface PipelineDeclaration {
  name?: string;
  triggers: TriggerKind[];
  env: Record<string, string>;
  /** Cancel the remaining jobs as soon as one fails. */
  failFast: boolean;
  jobs: JobDeclaration[];
}

export interface TriggerEvent {
  kind: TriggerKind;
  /** Full ref, e.g. refs/heads/main */
  ref: string;
  /** Commit SHA */
  commit: string;
  /** Repository URL or owner/name; used by checkout when no source tree is given */
  repository?: string;
  /** Local directory holding the checked-out sources */
  sourceDir?: string;
}

export function formatActionRef(ref: ActionRef): string {
  return `${ref.name}@${ref.version}`;
}

export function describeStep(step: StepDeclaration, index: number): string {
  if (step.name) return step.name;
  if (step.kind === 'action') return formatActionRef(step.uses);
  const firstLine = step.run.split('\n')[0] ?? '';
  return firstLine.trim() || `step ${index + 1}`;
}

export function jobDisplayName(job: JobDeclaration): string {
  return job.name ?? job.id;
}
