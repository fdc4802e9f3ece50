import { Test } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { JobLog, JobRun, Pipeline, PipelineRun } from '../../database/entities';
import { DeclarationService } from '../../declaration/declaration.service';
import type { TriggerEvent } from '../../declaration/declaration.types';
import { PipelineSchedulerService } from '../../engine/scheduler/pipeline-scheduler.service';
import { succeeded } from '../../engine/steps/actions/action.types';
import { CheckoutAction } from '../../engine/steps/actions/checkout.action';
import { createTestEngine, TestEngine } from '../../engine/testing/test-engine';
import { LogStreamEvent, LogStreamService } from '../../streaming/log-stream.service';
import { PipelinesService } from '../pipelines/pipelines.service';
import { RunsService } from './runs.service';

type Row = Record<string, unknown>;

/** Just enough of a TypeORM repository for RunsService, kept in memory. */
class FakeRepository {
  readonly rows: Row[] = [];
  private seq = 0;

  constructor(private readonly prefix: string) {}

  create(data: Row): Row {
    return { ...data };
  }

  async save(data: Row | Row[]): Promise<Row | Row[]> {
    for (const row of Array.isArray(data) ? data : [data]) {
      if (row.id === undefined) {
        row.id = `${this.prefix}-${++this.seq}`;
        this.rows.push(row);
      }
    }
    return data;
  }

  async update(id: string, patch: Row): Promise<{ affected: number }> {
    const row = this.rows.find((candidate) => candidate.id === id);
    if (row) Object.assign(row, patch);
    return { affected: row ? 1 : 0 };
  }

  async insert(rows: Row[]): Promise<void> {
    for (const row of rows) this.rows.push({ id: `${this.prefix}-${++this.seq}`, ...row });
  }

  async findOne({ where }: { where: Row }): Promise<Row | null> {
    return this.rows.find((row) => matches(row, where)) ?? null;
  }

  async find({ where }: { where?: Row } = {}): Promise<Row[]> {
    return this.rows.filter((row) => !where || matches(row, where));
  }
}

function matches(row: Row, where: Row): boolean {
  return Object.entries(where).every(([key, value]) => row[key] === value);
}

const DECLARATION = `
name: CI
jobs:
  test:
    runs-on: ubuntu-latest
    steps:
      - run: echo tests passed
  fmt:
    runs-on: ubuntu-latest
    steps:
      - run: FMT_COMMAND
`;

describe('RunsService', () => {
  let engine: TestEngine;
  let runs: RunsService;
  let repos: Map<unknown, FakeRepository>;
  let streamed: LogStreamEvent[];

  const repo = (entity: unknown): FakeRepository => {
    const found = repos.get(entity);
    if (!found) throw new Error('no fake repository for entity');
    return found;
  };

  async function setup(fmtCommand: string) {
    engine = await createTestEngine();
    repos = new Map<unknown, FakeRepository>([
      [Pipeline, new FakeRepository('pipeline')],
      [PipelineRun, new FakeRepository('run')],
      [JobRun, new FakeRepository('job')],
      [JobLog, new FakeRepository('log')],
    ]);
    repo(Pipeline).rows.push({
      id: 'pipeline-1',
      name: 'rust-library',
      repository: 'example/rust-library',
      declaration: DECLARATION.replace('FMT_COMMAND', fmtCommand),
    });

    const logStream = new LogStreamService();
    streamed = [];
    logStream.getLogStream().subscribe((event) => streamed.push(event));

    const moduleRef = await Test.createTestingModule({
      providers: [
        { provide: DataSource, useValue: { getRepository: repo } },
        { provide: DeclarationService, useValue: engine.declarations },
        { provide: PipelineSchedulerService, useValue: engine.scheduler },
        { provide: LogStreamService, useValue: logStream },
        PipelinesService,
        RunsService,
      ],
    }).compile();
    runs = moduleRef.get(RunsService);
  }

  afterEach(async () => {
    await engine.close();
  });

  it('records the verdict, every job result and its log lines', async () => {
    await setup('exit 1');

    const run = await runs.triggerRun('pipeline-1', engine.event);
    expect(repo(JobRun).rows.map((row) => [row.job_key, row.position])).toEqual([
      ['test', 0],
      ['fmt', 1],
    ]);

    await runs.waitFor(run.id);
    expect(runs.isActive(run.id)).toBe(false);

    const [runRow] = repo(PipelineRun).rows;
    expect(runRow).toMatchObject({
      trigger_type: 'push',
      trigger_metadata: { ref: 'refs/heads/main', commit: 'abc123' },
      status: 'failed',
      failed_jobs: ['fmt'],
      cancelled: false,
    });
    expect(runRow?.started_at).toBeInstanceOf(Date);
    expect(runRow?.completed_at).toBeInstanceOf(Date);

    const [test, fmt] = repo(JobRun).rows;
    expect(test).toMatchObject({ status: 'success', exit_code: 0, error_kind: null });
    expect(fmt).toMatchObject({
      status: 'failure',
      exit_code: 1,
      failed_step_index: 0,
      failed_step_name: 'exit 1',
      error_kind: 'step_failure',
    });
    expect(fmt?.steps).toEqual([
      expect.objectContaining({ index: 0, name: 'exit 1', status: 'failure', exitCode: 1 }),
    ]);

    expect(repo(JobLog).rows).toContainEqual(
      expect.objectContaining({ job_run_id: test?.id, stream: 'stdout', log_line: 'tests passed' }),
    );
    expect(streamed).toContainEqual(
      expect.objectContaining({ runId: run.id, jobId: 'test', line: 'tests passed' }),
    );
  });

  it('creates rows only for the selected jobs', async () => {
    await setup('exit 1');

    const run = await runs.triggerRun('pipeline-1', engine.event, ['test']);
    await runs.waitFor(run.id);

    expect(repo(JobRun).rows.map((row) => row.job_key)).toEqual(['test']);
    expect(repo(PipelineRun).rows[0]).toMatchObject({ status: 'succeeded', failed_jobs: [] });
  });

  it('cancels an executing run', async () => {
    await setup('sleep 10');

    const run = await runs.triggerRun('pipeline-1', engine.event);
    await new Promise((resolve) => setTimeout(resolve, 200));
    expect(runs.cancelRun(run.id)).toBe(true);
    await runs.waitFor(run.id);

    expect(repo(PipelineRun).rows[0]).toMatchObject({ status: 'failed', cancelled: true });
    expect(repo(JobRun).rows[1]).toMatchObject({ status: 'cancelled', cancel_reason: 'signal' });
    expect(runs.cancelRun(run.id)).toBe(false);
  });

  it('checks out the repository the pipeline is registered for on a manual run', async () => {
    await setup('echo ok');
    repo(Pipeline).rows[0] = {
      ...repo(Pipeline).rows[0],
      declaration: 'jobs:\n  build:\n    runs-on: ubuntu-latest\n    steps:\n      - uses: actions/checkout@v4\n      - run: echo built\n',
    };
    const checkedOut: TriggerEvent[] = [];
    jest.spyOn(engine.moduleRef.get(CheckoutAction), 'run').mockImplementation(async ({ env }) => {
      checkedOut.push(env.event);
      return succeeded();
    });

    const run = await runs.triggerRun('pipeline-1', { kind: 'manual', ref: '', commit: '' });
    await runs.waitFor(run.id);

    expect(checkedOut).toEqual([
      { kind: 'manual', ref: '', commit: '', repository: 'example/rust-library' },
    ]);
    expect(repo(PipelineRun).rows[0]).toMatchObject({
      status: 'succeeded',
      trigger_metadata: { ref: '', commit: '', repository: 'example/rust-library' },
    });
  });

  it('refuses an unknown pipeline', async () => {
    await setup('echo ok');
    await expect(runs.triggerRun('pipeline-2', engine.event)).rejects.toThrow('Pipeline not found');
  });
});
