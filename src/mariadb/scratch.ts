import { rm, writeFile } from 'fs/promises';
import { join, resolve } from 'path';

const SCRATCH_PREFIX = '.mariadb_statement';

/**
 * Path of a driver's scratch file. `id` is fixed for the lifetime of a driver
 * so drivers sharing a directory never write to the same file.
 */
export function scratchFilePath(dir: string, id: string): string {
  return join(resolve(dir), `${SCRATCH_PREFIX}-${id}`);
}

/**
 * Write `content` to `path`, hand the path to `fn`, and remove the file once
 * `fn` settles, whichever way it settles.
 */
export async function withScratchFile<T>(
  path: string,
  content: string,
  fn: (path: string) => Promise<T>
): Promise<T> {
  const text = content.endsWith('\n') ? content : content + '\n';
  await writeFile(path, text, { encoding: 'utf-8', mode: 0o600 });

  try {
    return await fn(path);
  } finally {
    await rm(path, { force: true });
  }
}
