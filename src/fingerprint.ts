import { createReadStream } from 'node:fs';

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex } from '@noble/hashes/utils';

import { RecoverError } from './RecoverError.ts';

/** Hex SHA-256 of a file's contents, read as a stream. */
export async function fingerprintFile(path: string): Promise<string> {
  const hash = sha256.create();

  try {
    for await (const chunk of createReadStream(path)) {
      if (chunk instanceof Uint8Array) {
        hash.update(chunk);
      }
    }
  } catch (error) {
    throw new RecoverError(`Unable to read target database "${path}"`, { cause: error });
  }

  return bytesToHex(hash.digest());
}
