import { randomUUID } from 'node:crypto';
import { promises as fsPromises } from 'node:fs';
import path from 'node:path';

/**
 * Writes `contents` to `targetPath` through a temp file in the same
 * directory followed by rename, so a crash never leaves a partially written
 * file at the committed path. On failure the previous file is preserved.
 */
export async function writeFileAtomic(
  targetPath: string,
  contents: string,
): Promise<void> {
  const directory = path.dirname(targetPath);
  const tempPath = path.join(
    directory,
    `.tmp-${path.basename(targetPath)}-${randomUUID()}`,
  );

  try {
    await fsPromises.mkdir(directory, { recursive: true });
    await fsPromises.writeFile(tempPath, contents, 'utf8');
    await fsPromises.rename(tempPath, targetPath);
  } catch (error) {
    await removeIfPresent(tempPath);
    throw error;
  }
}

export async function removeIfPresent(targetPath: string): Promise<boolean> {
  try {
    await fsPromises.unlink(targetPath);
    return true;
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
