import { mkdir, open, readdir, readFile, rename, rm } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import { bytesToHex, randomBytes } from '@noble/hashes/utils';

import { logger } from './logger.ts';
import { headerSchema, type ProgressState, stateSchema } from './ProgressState.ts';
import { CorruptProgressFileError, IntegrityMismatchError, PersistenceError } from './RecoverError.ts';

export class ProgressFS {
  /**
   * Low-level function to read the progress file.
   * Returns `undefined` if there is no file. The fingerprint is checked before the rest of the file is validated.
   */
  static async read(path: string, fingerprint: string): Promise<ProgressState | undefined> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw new CorruptProgressFileError(path, error);
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new CorruptProgressFileError(path, error);
    }

    const header = headerSchema.safeParse(data);
    if (!header.success) {
      throw new CorruptProgressFileError(path, header.error);
    }
    if (header.data.target_fingerprint !== fingerprint) {
      throw new IntegrityMismatchError(header.data.target_fingerprint, fingerprint);
    }

    const state = stateSchema.safeParse(data);
    if (!state.success) {
      throw new CorruptProgressFileError(path, state.error);
    }

    return state.data;
  }

  /**
   * Low-level function to write the progress file.
   * The state is written to a temporary file beside the target, flushed, then renamed over it,
   * so the existing file is either fully replaced or left as it was.
   */
  static async write(path: string, state: ProgressState): Promise<void> {
    const data = JSON.stringify(state, null, 2) + '\n';
    const tmpPath = join(dirname(path), `${basename(path)}.${bytesToHex(randomBytes(6))}.tmp`);

    try {
      await mkdir(dirname(path), { recursive: true });

      const file = await open(tmpPath, 'w');
      try {
        await file.writeFile(data, 'utf-8');
        await file.sync();
      } finally {
        await file.close();
      }

      await rename(tmpPath, path);
    } catch (error) {
      await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn('Unable to remove temporary progress file', { path: tmpPath, error: String(cleanupError) });
      });
      throw new PersistenceError(path, error);
    }
  }

  /** Delete the progress file and any temporary files left beside it by an interrupted write. */
  static async remove(path: string): Promise<void> {
    const dir = dirname(path);
    const prefix = `${basename(path)}.`;

    let stale: string[] = [];
    try {
      stale = (await readdir(dir)).filter((name) => name.startsWith(prefix) && name.endsWith('.tmp'));
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw new PersistenceError(path, error);
      }
    }

    try {
      await rm(path, { force: true });
      for (const name of stale) {
        await rm(join(dir, name), { force: true });
      }
    } catch (error) {
      throw new PersistenceError(path, error);
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
