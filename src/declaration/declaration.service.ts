import { Injectable } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { parse, stringify, YAMLError } from 'yaml';
import { ZodError } from 'zod';
import { DeclarationError, errorMessage } from '../engine/errors';
import { RawJob, RawStep, rawPipelineSchema, splitActionRef } from './declaration.schema';
import type {
  JobDeclaration,
  PipelineDeclaration,
  StepDeclaration,
  TriggerKind,
} from './declaration.types';
import { formatActionRef } from './declaration.types';

/**
 * Loads pipeline declarations (YAML) into the engine model and writes them back.
 * parse(serialize(p)) yields p: job order, step order and every parameter survive.
 */
@Injectable()
export class DeclarationService {
  async load(file: string): Promise<PipelineDeclaration> {
    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (err) {
      throw new DeclarationError(`Cannot read declaration ${file}: ${errorMessage(err)}`);
    }
    return this.parse(text, file);
  }

  parse(text: string, source = 'declaration'): PipelineDeclaration {
    let document: unknown;
    try {
      document = parse(text);
    } catch (err) {
      if (err instanceof YAMLError) {
        throw new DeclarationError(`Invalid YAML in ${source}`, [err.message]);
      }
      throw err;
    }

    const result = rawPipelineSchema.safeParse(document ?? {});
    if (!result.success) {
      throw new DeclarationError(`Invalid pipeline in ${source}`, formatIssues(result.error));
    }

    const raw = result.data;
    return {
      ...(raw.name !== undefined && { name: raw.name }),
      triggers: dedupe(raw.on),
      env: raw.env,
      failFast: raw['fail-fast'],
      jobs: Object.entries(raw.jobs).map(([id, job]) => toJob(id, job)),
    };
  }

  /** Back to the document shape; only fields that are set are written. */
  toDocument(pipeline: PipelineDeclaration): Record<string, unknown> {
    const jobs: Record<string, unknown> = {};
    for (const job of pipeline.jobs) {
      jobs[job.id] = {
        ...(job.name !== undefined && { name: job.name }),
        'runs-on': job.runsOn,
        ...(hasKeys(job.env) && { env: job.env }),
        ...(job.timeoutMinutes !== undefined && { 'timeout-minutes': job.timeoutMinutes }),
        ...(job.continueOnError && { 'continue-on-error': true }),
        ...(job.cache && {
          cache: {
            ...(job.cache.key !== undefined && { key: job.cache.key }),
            paths: job.cache.paths,
            fingerprint: job.cache.fingerprint,
          },
        }),
        steps: job.steps.map(stepToDocument),
      };
    }

    return {
      ...(pipeline.name !== undefined && { name: pipeline.name }),
      on: pipeline.triggers,
      ...(hasKeys(pipeline.env) && { env: pipeline.env }),
      ...(pipeline.failFast && { 'fail-fast': true }),
      jobs,
    };
  }

  serialize(pipeline: PipelineDeclaration): string {
    return stringify(this.toDocument(pipeline));
  }

  /** Selects the jobs a run should execute; every requested name must exist. */
  selectJobs(pipeline: PipelineDeclaration, names: readonly string[]): JobDeclaration[] {
    if (names.length === 0) return pipeline.jobs;
    const known = new Set(pipeline.jobs.map((job) => job.id));
    const unknown = names.filter((name) => !known.has(name));
    if (unknown.length) {
      throw new DeclarationError(`Unknown job(s): ${unknown.join(', ')}`);
    }
    const wanted = new Set(names);
    return pipeline.jobs.filter((job) => wanted.has(job.id));
  }

  isTriggeredBy(pipeline: PipelineDeclaration, kind: TriggerKind): boolean {
    return kind === 'manual' || pipeline.triggers.includes(kind);
  }
}

function toJob(id: string, raw: RawJob): JobDeclaration {
  return {
    id,
    ...(raw.name !== undefined && { name: raw.name }),
    runsOn: raw['runs-on'],
    env: raw.env,
    ...(raw['timeout-minutes'] !== undefined && { timeoutMinutes: raw['timeout-minutes'] }),
    continueOnError: raw['continue-on-error'],
    ...(raw.cache && {
      cache: {
        ...(raw.cache.key !== undefined && { key: raw.cache.key }),
        paths: raw.cache.paths,
        fingerprint: raw.cache.fingerprint,
      },
    }),
    steps: raw.steps.map(toStep),
  };
}

function toStep(raw: RawStep): StepDeclaration {
  const base = {
    ...(raw.name !== undefined && { name: raw.name }),
    env: raw.env,
  };
  if (raw.uses !== undefined) {
    // the schema already checked the pattern
    const uses = splitActionRef(raw.uses) ?? { name: raw.uses, version: '' };
    return { kind: 'action', ...base, uses, with: raw.with };
  }
  return {
    kind: 'command',
    ...base,
    run: raw.run ?? '',
    ...(raw.shell !== undefined && { shell: raw.shell }),
  };
}

function stepToDocument(step: StepDeclaration): Record<string, unknown> {
  const doc: Record<string, unknown> = {};
  if (step.name !== undefined) doc.name = step.name;
  if (step.kind === 'action') {
    doc.uses = formatActionRef(step.uses);
    if (hasKeys(step.with)) doc.with = step.with;
  } else {
    doc.run = step.run;
    if (step.shell !== undefined) doc.shell = step.shell;
  }
  if (hasKeys(step.env)) doc.env = step.env;
  return doc;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function hasKeys(record: Record<string, unknown>): boolean {
  return Object.keys(record).length > 0;
}

function dedupe(kinds: TriggerKind[]): TriggerKind[] {
  return [...new Set(kinds)];
}
