/**
 * Write-then-rename file persistence. A reader sees either the old file
 * or the new one, never a partial write.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { randomBytes } from 'crypto';

export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;
  try {
    await fs.writeFile(tmpPath, data);
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}

/** Move a file, copying across filesystems where rename cannot. */
export async function moveFile(from: string, to: string): Promise<void> {
  await fs.mkdir(path.dirname(to), { recursive: true });
  try {
    await fs.rename(from, to);
  } catch (err) {
    if (!isFsError(err, 'EXDEV')) throw err;
    await fs.copyFile(from, to);
    await fs.rm(from, { force: true });
  }
}

/** True for a Node fs error with the given code (e.g. "ENOENT"). */
export function isFsError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}
