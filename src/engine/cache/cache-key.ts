import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

export const DEFAULT_KEY_TEMPLATE = '{runner}-{fingerprint}';

const MISSING_FILE_MARKER = '<missing>';

/**
 * SHA-256 over the fingerprint files, in declared order. A missing file (or no source
 * tree at all) contributes a fixed marker, so the result is stable either way.
 */
export async function computeFingerprint(
  sourceDir: string | undefined,
  files: readonly string[],
): Promise<string> {
  const hash = createHash('sha256');
  for (const file of files) {
    hash.update(file);
    hash.update('\0');
    if (sourceDir === undefined) {
      hash.update(MISSING_FILE_MARKER);
    } else {
      try {
        hash.update(await readFile(join(sourceDir, file)));
      } catch {
        hash.update(MISSING_FILE_MARKER);
      }
    }
    hash.update('\0');
  }
  return hash.digest('hex').slice(0, 16);
}

export interface KeyVariables {
  job: string;
  runner: string;
  fingerprint: string;
}

/**
 * `<job id>/<template with {job}, {runner}, {fingerprint} substituted>`.
 * The job id prefix keeps every job in its own key namespace.
 */
export function renderCacheKey(template: string, vars: KeyVariables): string {
  const rendered = template.replace(/\{(job|runner|fingerprint)\}/g, (_match, name: string) => {
    if (name === 'job') return vars.job;
    if (name === 'runner') return vars.runner;
    return vars.fingerprint;
  });
  return `${vars.job}/${rendered}`;
}
