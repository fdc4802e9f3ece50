import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import type { TriggerEvent, TriggerKind } from '../declaration/declaration.types';

export const USAGE = `Usage:
  relay run <declaration-file> [--job <name>]... [--event push|pull_request|manual]
            [--ref <ref>] [--commit <sha>] [--source <dir>] [--verbose]
  relay validate <declaration-file>`;

export type CliCommand =
  | { command: 'run'; file: string; jobs: string[]; event: TriggerEvent; verbose: boolean }
  | { command: 'validate'; file: string; verbose: boolean }
  | { command: 'help' };

export class CliUsageError extends Error {}

const TRIGGER_KINDS: readonly TriggerKind[] = ['push', 'pull_request', 'manual'];

function isTriggerKind(value: string): value is TriggerKind {
  return TRIGGER_KINDS.some((kind) => kind === value);
}

/**
 * `run` defaults to a manual event over the current directory: checkout copies `--source`
 * (or the cwd) into each job's workspace.
 */
export function parseCliArgs(argv: string[], cwd = process.cwd()): CliCommand {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }
  const { values, positionals } = parsed;
  if (values.help) return { command: 'help' };

  const [command, file, ...extra] = positionals;
  if (!command) throw new CliUsageError('Missing command');
  if (command !== 'run' && command !== 'validate') {
    throw new CliUsageError(`Unknown command: ${command}`);
  }
  if (!file) throw new CliUsageError(`${command}: missing <declaration-file>`);
  if (extra.length) throw new CliUsageError(`Unexpected argument: ${extra[0]}`);

  const verbose = values.verbose ?? false;
  if (command === 'validate') return { command, file, verbose };

  const kind = values.event ?? 'manual';
  if (!isTriggerKind(kind)) {
    throw new CliUsageError(`--event must be one of ${TRIGGER_KINDS.join(', ')}, got ${kind}`);
  }

  return {
    command,
    file,
    jobs: values.job ?? [],
    event: {
      kind,
      ref: values.ref ?? '',
      commit: values.commit ?? '',
      sourceDir: resolve(cwd, values.source ?? '.'),
    },
    verbose,
  };
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      job: { type: 'string', short: 'j', multiple: true },
      event: { type: 'string' },
      ref: { type: 'string' },
      commit: { type: 'string' },
      source: { type: 'string' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}
