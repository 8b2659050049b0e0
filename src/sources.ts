import { readdir, readFile } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';

import type { RawPassphrase } from './credentials.ts';
import { RecoverError } from './RecoverError.ts';

/**
 * Read candidate passphrases from a text file, one per line.
 * Lines are trimmed; empty lines and lines starting with `#` are skipped.
 */
export async function readPassphraseFile(path: string): Promise<RawPassphrase[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new RecoverError(`Unable to read passphrase file "${path}"`, { cause: error });
  }

  const name = basename(path);
  const entries: RawPassphrase[] = [];

  text.split(/\r?\n/).forEach((line, index) => {
    const value = line.trim();
    if (value && !value.startsWith('#')) {
      entries.push({ value, source: `${name}:${index + 1}` });
    }
  });

  return entries;
}

/** List every regular file directly inside a directory as a candidate keyfile, sorted by name. */
export async function readKeyfileDirectory(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });

    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort()
      .map((name) => join(resolve(dir), name));
  } catch (error) {
    throw new RecoverError(`Unable to read keyfile directory "${dir}"`, { cause: error });
  }
}
