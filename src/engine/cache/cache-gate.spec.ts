import { Logger } from '@nestjs/common';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ActionStep, JobDeclaration } from '../../declaration/declaration.types';
import { JobEnvironment } from '../environment/job-environment';
import { ActionRegistryService } from '../steps/actions/action-registry.service';
import { CacheAction } from '../steps/actions/cache.action';
import { CacheGateService } from './cache-gate.service';
import { computeFingerprint } from './cache-key';
import { CacheStore, MemoryCacheStore } from './cache-store';

const rustJob: JobDeclaration = {
  id: 'test',
  runsOn: 'ubuntu-latest',
  env: {},
  continueOnError: false,
  steps: [
    { kind: 'action', uses: { name: 'Swatinem/rust-cache', version: 'v2' }, with: {}, env: {} },
    { kind: 'command', run: 'cargo test', env: {} },
  ],
};

describe('CacheGateService', () => {
  let root: string;
  let sourceDir: string;
  let store: MemoryCacheStore;
  let gate: CacheGateService;

  const gateWith = (cacheStore: CacheStore) =>
    new CacheGateService(cacheStore, new ActionRegistryService([new CacheAction()]));

  async function makeEnv(name: string): Promise<JobEnvironment> {
    const base = join(root, name);
    const layout = {
      root: base,
      workspace: join(base, 'workspace'),
      home: join(base, 'home'),
      tools: join(base, 'tools'),
    };
    await mkdir(layout.workspace, { recursive: true });
    // what checkout would have brought in
    await writeFile(join(layout.workspace, 'Cargo.lock'), await readFile(join(sourceDir, 'Cargo.lock')));
    return new JobEnvironment(
      'test',
      'ubuntu-latest',
      layout,
      { kind: 'push', ref: 'refs/heads/main', commit: 'abc123', sourceDir },
      {},
    );
  }

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'relay-gate-'));
    sourceDir = join(root, 'src');
    await mkdir(sourceDir);
    await writeFile(join(sourceDir, 'Cargo.lock'), 'version = 3\n');
    store = new MemoryCacheStore();
    gate = gateWith(store);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('resolveSettings', () => {
    it('takes key, paths and fingerprint from a rust cache step', () => {
      expect(gate.resolveSettings(rustJob)).toEqual({
        key: 'rust-{runner}-{fingerprint}',
        paths: ['target'],
        fingerprint: ['Cargo.lock', 'Cargo.toml'],
      });
    });

    it('lets the job cache block override what the step declares', () => {
      const job = { ...rustJob, cache: { paths: ['vendor'], fingerprint: [] } };
      expect(gate.resolveSettings(job)).toEqual({
        key: 'rust-{runner}-{fingerprint}',
        paths: ['vendor'],
        fingerprint: ['Cargo.lock', 'Cargo.toml'],
      });
    });

    it('captures nothing for a job without cache settings', () => {
      const job = { ...rustJob, steps: rustJob.steps.slice(1) };
      expect(gate.resolveSettings(job)).toEqual({ paths: [], fingerprint: [] });
    });
  });

  it('keys entries by job, runner and lock file fingerprint', async () => {
    const fingerprint = await computeFingerprint(sourceDir, ['Cargo.lock', 'Cargo.toml']);
    expect(await gate.keyFor(rustJob, sourceDir)).toBe(`test/rust-ubuntu-latest-${fingerprint}`);
  });

  it('restores before the first cache step, or the first command without one', () => {
    expect(gate.restorePoint(rustJob)).toBe(0);

    const checkout: ActionStep = {
      kind: 'action',
      uses: { name: 'actions/checkout', version: 'v4' },
      with: {},
      env: {},
    };
    const [cacheStep, command] = rustJob.steps;
    if (!cacheStep || !command) throw new Error('rustJob has two steps');
    expect(gate.restorePoint({ ...rustJob, steps: [checkout, command, cacheStep] })).toBe(2);
    expect(gate.restorePoint({ ...rustJob, steps: [checkout, command] })).toBe(1);
    expect(gate.restorePoint({ ...rustJob, steps: [checkout] })).toBe(0);
  });

  it('fingerprints the lock file in the workspace', async () => {
    const env = await makeEnv('first');
    const before = await gate.restore(rustJob, env);
    await writeFile(join(env.workspace, 'Cargo.lock'), 'version = 4\n');

    const after = await gate.restore(rustJob, env);
    expect(after.key).not.toBe(before.key);
    expect(after.key).toBe(await gate.keyFor(rustJob, env.workspace));
  });

  it('reports a miss on an empty store', async () => {
    const env = await makeEnv('first');
    const restore = await gate.restore(rustJob, env);

    expect(restore.hit).toBe(false);
    expect(restore.files).toBe(0);
    expect(env.cacheRestore).toEqual(restore);
  });

  it('restores what a previous job saved, and restoring twice is idempotent', async () => {
    const first = await makeEnv('first');
    const { key } = await gate.restore(rustJob, first);
    await mkdir(join(first.workspace, 'target', 'debug'), { recursive: true });
    await writeFile(join(first.workspace, 'target', 'debug', 'app'), 'binary');

    expect(await gate.save(rustJob, first, key)).toEqual({ key, saved: true });

    const second = await makeEnv('second');
    expect(await gate.restore(rustJob, second)).toEqual({ key, hit: true, files: 1 });
    expect(await gate.restore(rustJob, second)).toEqual({ key, hit: true, files: 1 });
    expect(await readFile(join(second.workspace, 'target', 'debug', 'app'), 'utf8')).toBe('binary');
  });

  it('treats a corrupt entry as a miss', async () => {
    const key = await gate.keyFor(rustJob, sourceDir);
    await store.put(key, Buffer.from('garbage'));

    const restore = await gate.restore(rustJob, await makeEnv('first'));
    expect(restore).toEqual({ key, hit: false, files: 0 });
  });

  it('treats an unreachable store as a miss', async () => {
    const failing = gateWith({
      get: () => Promise.reject(new Error('connection refused')),
      put: () => Promise.resolve(),
    });

    const restore = await failing.restore(rustJob, await makeEnv('first'));
    expect(restore.hit).toBe(false);
  });

  it('reports a failed write without throwing', async () => {
    const failing = gateWith({
      get: () => Promise.resolve(null),
      put: () => Promise.reject(new Error('disk full')),
    });
    const env = await makeEnv('first');
    const key = await failing.keyFor(rustJob, sourceDir);

    expect(await failing.save(rustJob, env, key)).toEqual({
      key,
      saved: false,
      error: `Failed to save cache entry ${key}: disk full`,
    });
  });
});
