import { chmod, lstat, mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, normalize, posix, relative, sep } from 'node:path';
import { promisify } from 'node:util';
import { gunzip, gzip } from 'node:zlib';
import { z } from 'zod';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

const SNAPSHOT_VERSION = 1;

const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  files: z.array(
    z.object({
      path: z.string().min(1),
      mode: z.number().int().nonnegative(),
      data: z.string(),
    }),
  ),
});

export type Snapshot = z.infer<typeof snapshotSchema>;

/** Entry bytes that cannot be decoded; the gate treats them as a miss. */
export class CorruptSnapshotError extends Error {
  constructor(reason: string) {
    super(`Corrupt cache snapshot: ${reason}`);
    this.name = 'CorruptSnapshotError';
  }
}

async function lstatOrNull(path: string) {
  try {
    return await lstat(path);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
}

/** Symlinks are skipped; only regular files are captured. */
async function collect(root: string, absolute: string, out: Snapshot['files']): Promise<void> {
  const info = await lstatOrNull(absolute);
  if (!info) return;

  if (info.isDirectory()) {
    const names = (await readdir(absolute)).sort();
    for (const name of names) await collect(root, join(absolute, name), out);
    return;
  }
  if (!info.isFile()) return;

  out.push({
    path: relative(root, absolute).split(sep).join(posix.sep),
    mode: info.mode & 0o777,
    data: (await readFile(absolute)).toString('base64'),
  });
}

/** Captures the given root-relative paths (files or directories) into one blob. */
export async function packSnapshot(root: string, paths: readonly string[]): Promise<Buffer> {
  const files: Snapshot['files'] = [];
  for (const path of paths) {
    const absolute = join(root, path);
    if (isOutside(root, absolute)) continue;
    await collect(root, absolute, files);
  }
  const snapshot: Snapshot = { version: SNAPSHOT_VERSION, files };
  return gzipAsync(Buffer.from(JSON.stringify(snapshot), 'utf8'));
}

export async function readSnapshot(bytes: Buffer): Promise<Snapshot> {
  let json: unknown;
  try {
    json = JSON.parse((await gunzipAsync(bytes)).toString('utf8'));
  } catch (err) {
    throw new CorruptSnapshotError(err instanceof Error ? err.message : String(err));
  }
  const parsed = snapshotSchema.safeParse(json);
  if (!parsed.success) throw new CorruptSnapshotError(parsed.error.issues[0]?.message ?? 'invalid');
  for (const file of parsed.data.files) {
    if (isAbsolute(file.path) || file.path.split('/').includes('..')) {
      throw new CorruptSnapshotError(`path escapes the workspace: ${file.path}`);
    }
  }
  return parsed.data;
}

/** Writes the snapshot's files under root; returns how many were restored. */
export async function unpackSnapshot(root: string, bytes: Buffer): Promise<number> {
  const snapshot = await readSnapshot(bytes);
  for (const file of snapshot.files) {
    const target = join(root, file.path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, Buffer.from(file.data, 'base64'));
    await chmod(target, file.mode);
  }
  return snapshot.files.length;
}

function isOutside(root: string, absolute: string): boolean {
  const rel = relative(normalize(root), normalize(absolute));
  return rel.startsWith('..') || isAbsolute(rel);
}
