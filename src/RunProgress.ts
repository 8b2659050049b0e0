import { createStore, type StoreApi } from 'zustand/vanilla';

export type RunnerStatus = 'idle' | 'running' | 'succeeded' | 'exhausted' | 'aborted';

/** Live counters of a run, for display only. */
export interface RunProgress {
  status: RunnerStatus;
  /** Size of the whole combination space. */
  total: number;
  /** Attempts made by this run. */
  attempted: number;
  /** Combinations resolved by earlier runs. */
  skipped: number;
  /** Description of the combination being attempted. */
  current: string | null;
  startedAt: Date | null;
}

export function createRunProgressStore(): StoreApi<RunProgress> {
  return createStore<RunProgress>()(() => ({
    status: 'idle',
    total: 0,
    attempted: 0,
    skipped: 0,
    current: null,
    startedAt: null,
  }));
}

/** Milliseconds left at the average pace of this run so far, or `null` before the first attempt. */
export function estimateRemaining(progress: RunProgress, now: Date = new Date()): number | null {
  if (!progress.startedAt || !progress.attempted) {
    return null;
  }

  const elapsed = now.getTime() - progress.startedAt.getTime();
  const remaining = Math.max(0, progress.total - progress.skipped - progress.attempted);

  return Math.round((elapsed / progress.attempted) * remaining);
}

/** Format a duration as `1h 02m 03s`, `2m 03s` or `3s`. */
export function formatDuration(ms: number): string {
  const seconds = Math.round(ms / 1000);
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;

  if (h) {
    return `${h}h ${String(m).padStart(2, '0')}m ${String(s).padStart(2, '0')}s`;
  }
  if (m) {
    return `${m}m ${String(s).padStart(2, '0')}s`;
  }
  return `${s}s`;
}
