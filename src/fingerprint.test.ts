import { test } from 'node:test';
import { notStrictEqual, rejects, strictEqual } from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { fingerprintFile } from './fingerprint.ts';
import { RecoverError } from './RecoverError.ts';

test('fingerprintFile hashes the file contents', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'kdbx-recover-'));
  try {
    const path = join(dir, 'vault.kdbx');

    await writeFile(path, 'abc');
    const before = await fingerprintFile(path);
    strictEqual(before, 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');

    await writeFile(path, 'abd');
    notStrictEqual(await fingerprintFile(path), before);

    await writeFile(path, '');
    strictEqual(await fingerprintFile(path), 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('fingerprintFile reports a missing target', async () => {
  await rejects(fingerprintFile('/nonexistent/vault.kdbx'), RecoverError);
});
