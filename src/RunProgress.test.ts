import { test } from 'node:test';
import { deepStrictEqual, strictEqual } from 'node:assert/strict';

import { createRunProgressStore, estimateRemaining, formatDuration, type RunProgress } from './RunProgress.ts';

test('createRunProgressStore starts idle', () => {
  const store = createRunProgressStore();

  deepStrictEqual(store.getState(), {
    status: 'idle',
    total: 0,
    attempted: 0,
    skipped: 0,
    current: null,
    startedAt: null,
  });
});

test('estimateRemaining uses the pace of this run', () => {
  const progress: RunProgress = {
    status: 'running',
    total: 100,
    attempted: 10,
    skipped: 40,
    current: null,
    startedAt: new Date('2026-01-01T00:00:00.000Z'),
  };

  // 10 attempts in 20s, 50 left.
  strictEqual(estimateRemaining(progress, new Date('2026-01-01T00:00:20.000Z')), 100_000);
  strictEqual(estimateRemaining({ ...progress, attempted: 0 }), null);
  strictEqual(estimateRemaining({ ...progress, startedAt: null }), null);
});

test('formatDuration', () => {
  strictEqual(formatDuration(3_000), '3s');
  strictEqual(formatDuration(123_000), '2m 03s');
  strictEqual(formatDuration(3_723_000), '1h 02m 03s');
});
