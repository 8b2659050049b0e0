import { test } from 'node:test';
import { deepStrictEqual, rejects, strictEqual } from 'node:assert/strict';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ProgressFS } from './ProgressFS.ts';
import { createProgressState } from './ProgressState.ts';
import { CorruptProgressFileError, IntegrityMismatchError, PersistenceError } from './RecoverError.ts';

const FINGERPRINT = 'a'.repeat(64);
const OTHER_FINGERPRINT = 'b'.repeat(64);

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), 'kdbx-recover-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test('ProgressFS.read returns undefined without a file', async () => {
  await withTempDir(async (dir) => {
    strictEqual(await ProgressFS.read(join(dir, 'progress.json'), FINGERPRINT), undefined);
  });
});

test('ProgressFS writes and reads back a state', async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, 'nested', 'progress.json');
    const state = createProgressState({ path: '/db/vault.kdbx', fingerprint: FINGERPRINT }, 8);
    state.attempts.push({ id: '[null,null,null]', outcome: 'failed', attempted_at: new Date('2026-01-02T03:04:05.000Z') });

    await ProgressFS.write(path, state);

    deepStrictEqual(await ProgressFS.read(path, FINGERPRINT), state);
    deepStrictEqual(await readdir(join(dir, 'nested')), ['progress.json']);

    const raw = JSON.parse(await readFile(path, 'utf-8'));
    strictEqual(raw.attempts[0].attempted_at, '2026-01-02T03:04:05.000Z');
  });
});

test('ProgressFS.read rejects a different fingerprint before validating the rest', async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, 'progress.json');
    await writeFile(path, JSON.stringify({ version: 9, target_fingerprint: OTHER_FINGERPRINT, future: true }));

    await rejects(ProgressFS.read(path, FINGERPRINT), IntegrityMismatchError);
  });
});

test('ProgressFS.read rejects malformed files', async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, 'progress.json');

    await writeFile(path, '{"version": 1, "target_fing');
    await rejects(ProgressFS.read(path, FINGERPRINT), CorruptProgressFileError);

    await writeFile(path, JSON.stringify({ version: 1 }));
    await rejects(ProgressFS.read(path, FINGERPRINT), CorruptProgressFileError);

    await writeFile(path, JSON.stringify({ version: 1, target_fingerprint: FINGERPRINT, attempts: 'nope' }));
    await rejects(ProgressFS.read(path, FINGERPRINT), CorruptProgressFileError);

    const succeededWithoutWinner = {
      ...createProgressState({ path: '/db/vault.kdbx', fingerprint: FINGERPRINT }, 1),
      status: 'succeeded',
    };
    await writeFile(path, JSON.stringify(succeededWithoutWinner));
    await rejects(ProgressFS.read(path, FINGERPRINT), CorruptProgressFileError);
  });
});

test('ProgressFS.read keeps the latest record per combination', async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, 'progress.json');
    const state = createProgressState({ path: '/db/vault.kdbx', fingerprint: FINGERPRINT }, 2);
    state.attempts.push(
      { id: 'x', outcome: 'untried', attempted_at: new Date('2026-01-01T00:00:00.000Z') },
      { id: 'y', outcome: 'failed', attempted_at: new Date('2026-01-01T00:00:01.000Z') },
      { id: 'x', outcome: 'errored', attempted_at: new Date('2026-01-01T00:00:02.000Z') },
    );
    await writeFile(path, JSON.stringify(state));

    const read = await ProgressFS.read(path, FINGERPRINT);
    deepStrictEqual(read?.attempts.map((a) => [a.id, a.outcome]), [['x', 'errored'], ['y', 'failed']]);
  });
});

test('ProgressFS.write leaves the existing file alone when it fails', async () => {
  await withTempDir(async (dir) => {
    // A non-empty directory where the file should be makes the final rename fail.
    const path = join(dir, 'progress.json');
    await mkdir(path);
    await writeFile(join(path, 'keep'), 'x');

    const state = createProgressState({ path: '/db/vault.kdbx', fingerprint: FINGERPRINT }, 1);
    await rejects(ProgressFS.write(path, state), PersistenceError);

    deepStrictEqual(await readdir(dir), ['progress.json']);
    deepStrictEqual(await readdir(path), ['keep']);
  });
});

test('ProgressFS.remove deletes the file and stale temporary files', async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, 'progress.json');
    await writeFile(path, '{}');
    await writeFile(join(dir, 'progress.json.0123456789ab.tmp'), '{');
    await writeFile(join(dir, 'other.json'), '{}');

    await ProgressFS.remove(path);
    deepStrictEqual(await readdir(dir), ['other.json']);

    // Removing again is not an error.
    await ProgressFS.remove(path);
    await ProgressFS.remove(join(dir, 'missing', 'progress.json'));
  });
});
