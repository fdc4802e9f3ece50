import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createTestEngine, TestEngine } from '../engine/testing/test-engine';
import { LogStreamService } from '../streaming/log-stream.service';
import { CliOutput, CliService } from './cli.service';

const PIPELINE = `
name: CI
on: push
jobs:
  test:
    runs-on: ubuntu-latest
    steps:
      - run: echo tests passed
  fmt:
    runs-on: ubuntu-latest
    steps:
      - run: FMT_EXIT
`;

describe('CliService', () => {
  let engine: TestEngine;
  let cli: CliService;
  let stdout: string[];
  let stderr: string[];
  const out: CliOutput = {
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
  };

  beforeEach(async () => {
    engine = await createTestEngine();
    cli = new CliService(engine.declarations, engine.scheduler, new LogStreamService());
    stdout = [];
    stderr = [];
  });

  afterEach(async () => {
    await engine.close();
  });

  async function declaration(fmtExit: number): Promise<string> {
    const file = join(engine.root, 'ci.yml');
    await writeFile(file, PIPELINE.replace('FMT_EXIT', `exit ${fmtExit}`));
    return file;
  }

  const runCommand = (file: string, jobs: string[] = [], kind: 'push' | 'pull_request' = 'push') =>
    cli.execute(
      { command: 'run', file, jobs, event: { ...engine.event, kind }, verbose: false },
      { out },
    );

  it('exits 0 when the pipeline succeeds and prints job output with its job id', async () => {
    const code = await runCommand(await declaration(0));

    expect(code).toBe(0);
    expect(stdout).toContain('[test] tests passed');
    expect(stdout).toContain('test: success');
    expect(stdout).toContain('fmt: success');
    expect(stdout.at(-1)).toBe('CI: succeeded');
    expect(stderr).toEqual([]);
  });

  it('exits 1 and names the failing jobs on stderr', async () => {
    const code = await runCommand(await declaration(1));

    expect(code).toBe(1);
    expect(stdout).toContain('fmt: failure at step 1 (exit 1)');
    expect(stdout.at(-1)).toBe('CI: failed');
    expect(stderr).toEqual(['Failed jobs: fmt']);
  });

  it('runs only the selected jobs', async () => {
    const code = await runCommand(await declaration(1), ['test']);

    expect(code).toBe(0);
    expect(stdout).not.toContain('fmt: failure at step 1 (exit 1)');
  });

  it('rejects an unknown job name', async () => {
    const code = await runCommand(await declaration(0), ['lint']);

    expect(code).toBe(1);
    expect(stderr).toEqual(['Unknown job(s): lint']);
  });

  it('runs nothing for an event the pipeline is not triggered by', async () => {
    const code = await runCommand(await declaration(1), [], 'pull_request');

    expect(code).toBe(0);
    expect(stderr).toEqual(['CI is not triggered by pull_request; nothing to run']);
  });

  it('validates a declaration and lists its jobs', async () => {
    const code = await cli.execute(
      { command: 'validate', file: await declaration(0), verbose: false },
      { out },
    );

    expect(code).toBe(0);
    expect(stdout).toEqual([
      'CI: 2 job(s), on push',
      '  test (ubuntu-latest): test, 1 step(s)',
      '  fmt (ubuntu-latest): fmt, 1 step(s)',
    ]);
  });

  it('exits 1 on an invalid declaration', async () => {
    const file = join(engine.root, 'broken.yml');
    await writeFile(file, 'jobs:\n  test:\n    steps: []\n');

    const code = await cli.execute({ command: 'validate', file, verbose: false }, { out });

    expect(code).toBe(1);
    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toMatch(/^Invalid pipeline in .*broken\.yml:/);
  });
});
