import { promises as fs } from 'fs';
import os from 'os';
import { dirname, join } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';

export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ tmpdir: dirname(path) });
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, path);
}

/**
 * Points `linkPath` at `target`, replacing whatever link was there.
 * The new link is created under a temporary name and renamed into place.
 */
export async function replaceSymlink(target: string, linkPath: string): Promise<void> {
  await ensureDir(linkPath);
  const tempPath = await tmpName({ tmpdir: dirname(linkPath), prefix: '.link-' });
  await fs.symlink(target, tempPath);
  try {
    await fs.rename(tempPath, linkPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/** Expands a leading `~` to the home directory. */
export function expandHome(path: string): string {
  if (path === '~') return os.homedir();
  if (path.startsWith('~/')) return join(os.homedir(), path.slice(2));
  return path;
}
