import { delimiter } from 'node:path';
import type { TriggerEvent } from '../../declaration/declaration.types';

export interface InstalledToolchain {
  name: string;
  version: string;
  components: string[];
}

export interface CacheRestoreReport {
  key: string;
  hit: boolean;
  files: number;
}

export interface EnvironmentLayout {
  root: string;
  workspace: string;
  home: string;
  tools: string;
}

/**
 * One job's private execution environment. Actions mutate it (PATH, exported variables,
 * installed toolchains); the changes are visible to later steps of the same job only,
 * since every job gets its own instance.
 */
export class JobEnvironment {
  readonly toolchains = new Map<string, InstalledToolchain>();
  cacheRestore: CacheRestoreReport | null = null;

  private readonly vars: Record<string, string>;
  private readonly exported: Record<string, string> = {};
  private readonly pathEntries: string[] = [];

  constructor(
    readonly jobId: string,
    readonly runner: string,
    readonly layout: EnvironmentLayout,
    readonly event: TriggerEvent,
    baseVars: Record<string, string>,
  ) {
    this.vars = { ...baseVars };
  }

  get workspace(): string {
    return this.layout.workspace;
  }

  exportVar(name: string, value: string): void {
    this.exported[name] = value;
  }

  /** Later calls win: the most recently installed tool is found first. */
  prependPath(dir: string): void {
    const existing = this.pathEntries.indexOf(dir);
    if (existing !== -1) this.pathEntries.splice(existing, 1);
    this.pathEntries.unshift(dir);
  }

  /** Variables for a process: base < exported by actions < step overrides. */
  resolveVars(stepEnv: Record<string, string> = {}): Record<string, string> {
    const merged: Record<string, string> = { ...this.vars, ...this.exported };
    const basePath = merged.PATH ?? '';
    merged.PATH = [...this.pathEntries, ...(basePath ? [basePath] : [])].join(delimiter);
    return { ...merged, ...stepEnv };
  }
}
