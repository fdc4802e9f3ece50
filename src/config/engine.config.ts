import { registerAs } from '@nestjs/config';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export type CacheDriver = 'memory' | 'filesystem' | 'postgres';

export interface EngineConfig {
  cacheDriver: CacheDriver;
  /** Root directory of the filesystem cache store */
  cacheDir: string;
  /** Parent directory of per-job isolated environments */
  workRoot: string;
  /** Where installed toolchains live: <root>/<name>/<version>/bin */
  toolchainRoot: string;
  /** Environment labels this host can provision (runs-on values) */
  runnerLabels: string[];
  /** Job timeout when the declaration sets none */
  jobTimeoutMs: number;
  /** Time between SIGTERM and SIGKILL when a step is cancelled */
  killGraceMs: number;
  keepWorkspaces: boolean;
  /** Host a bare `owner/name` repository is fetched from */
  gitBaseUrl: string;
  databaseUrl?: string;
}

const DEFAULT_RUNNER_LABELS = ['ubuntu-latest', 'ubuntu-22.04', 'ubuntu-24.04', 'local'];
const DEFAULT_JOB_TIMEOUT_MS = 60 * 60_000;
const DEFAULT_KILL_GRACE_MS = 5_000;
const DEFAULT_GIT_BASE_URL = 'https://github.com';

/** Longest delay `setTimeout` honours; larger values fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

function intFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function durationFromEnv(value: string | undefined, fallback: number): number {
  return Math.min(intFromEnv(value, fallback), MAX_TIMER_MS);
}

function listFromEnv(value: string | undefined, fallback: string[]): string[] {
  const items = (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length ? items : fallback;
}

function cacheDriverFromEnv(value: string | undefined, fallback: CacheDriver): CacheDriver {
  if (value === 'memory' || value === 'filesystem' || value === 'postgres') return value;
  return fallback;
}

/** Builds the engine settings from an env map; `process.env` in production. */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const stateDir = env.RELAY_HOME ?? join(process.cwd(), '.relay');
  return {
    cacheDriver: cacheDriverFromEnv(
      env.CACHE_DRIVER,
      env.DATABASE_URL ? 'postgres' : 'filesystem',
    ),
    cacheDir: env.CACHE_DIR ?? join(stateDir, 'cache'),
    workRoot: env.WORK_ROOT ?? join(tmpdir(), 'relay-ci'),
    toolchainRoot: env.TOOLCHAIN_ROOT ?? join(stateDir, 'toolchains'),
    runnerLabels: listFromEnv(env.RUNNER_LABELS, DEFAULT_RUNNER_LABELS),
    jobTimeoutMs: durationFromEnv(env.JOB_TIMEOUT_MS, DEFAULT_JOB_TIMEOUT_MS),
    killGraceMs: durationFromEnv(env.KILL_GRACE_MS, DEFAULT_KILL_GRACE_MS),
    keepWorkspaces: env.KEEP_WORKSPACES === 'true',
    gitBaseUrl: (env.GIT_BASE_URL ?? DEFAULT_GIT_BASE_URL).replace(/\/+$/, ''),
    databaseUrl: env.DATABASE_URL,
  };
}

export const engineConfig = registerAs('engine', () => loadEngineConfig());
