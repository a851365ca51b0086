/**
 * Atomic JSON File Writing
 *
 * The token cache is always replaced as a whole document, so it is written
 * to a sibling temp file and renamed over the destination.
 */

import { existsSync } from 'fs';
import { chmod, mkdir, rename, unlink, writeFile } from 'fs/promises';
import path from 'path';

interface WriteOptions {
  /** File mode (permissions) to set. Default: 0o600 (the cache holds secrets) */
  mode?: number;
  /** Whether to create parent directories. Default: true */
  createDir?: boolean;
}

/**
 * Write JSON to a file atomically.
 *
 * The temp file lives in the destination directory; rename() is only atomic
 * within a single filesystem.
 */
export async function writeJsonAtomic(filepath: string, data: unknown, options: WriteOptions = {}): Promise<void> {
  const { mode = 0o600, createDir = true } = options;

  const dir = path.dirname(filepath);
  if (createDir && !existsSync(dir)) {
    await mkdir(dir, { recursive: true });
  }

  const tempPath = `${filepath}.tmp.${process.pid}.${Date.now()}`;

  try {
    await writeFile(tempPath, JSON.stringify(data, null, 2), { encoding: 'utf-8', mode });
    await chmod(tempPath, mode);
    await rename(tempPath, filepath);
  } catch (e) {
    await unlink(tempPath).catch(() => undefined);
    throw e;
  }
}
