import { randomBytes } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

const FILE_MODE = 0o600;
const DIR_MODE = 0o700;

export const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Replaces `filepath` with `data` by writing a sibling temporary file and
 * renaming it into place, so readers see either the old or the new contents.
 */
export const writeFileAtomic = async (filepath: string, data: string | Uint8Array) => {
  const dir = path.dirname(filepath);
  await mkdir(dir, { recursive: true, mode: DIR_MODE });

  const tmpPath = path.join(dir, `.${path.basename(filepath)}.${randomBytes(6).toString('hex')}.tmp`);
  try {
    await writeFile(tmpPath, data, { mode: FILE_MODE });
    await rename(tmpPath, filepath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
};
