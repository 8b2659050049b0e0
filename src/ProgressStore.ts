import { produce } from 'immer';

import type { Combination } from './combinations.ts';
import { logger } from './logger.ts';
import { ProgressFS } from './ProgressFS.ts';
import {
  type AttemptOutcome,
  type AttemptRecord,
  createProgressState,
  type ProgressState,
  type ProgressStatus,
  type RecoveryTarget,
} from './ProgressState.ts';

export interface ProgressSummary {
  status: ProgressStatus;
  total: number;
  attempted: number;
  failed: number;
  errored: number;
  /** Percent of `total` resolved, 0-100. */
  percent: number;
  winner: string | null;
  startedAt: Date;
  updatedAt: Date;
}

/**
 * Durable record of attempted combinations for one progress file.
 *
 * States are immutable: every operation takes a state and returns the next
 * one, which is only returned once it is safely on disk.
 */
export class ProgressStore {
  /** Position of each combination in the attempts of the latest saved state. */
  private index?: { attempts: readonly AttemptRecord[]; positions: Map<string, number> };

  constructor(readonly path: string) {}

  /** Load the saved state for the target, or a fresh one if there is none. */
  async load(target: RecoveryTarget, totalCombinations = 0): Promise<ProgressState> {
    const saved = await ProgressFS.read(this.path, target.fingerprint);

    if (!saved) {
      return createProgressState(target, totalCombinations);
    }

    if (saved.target_path !== target.path) {
      logger.warn('Target database was moved since the last run', {
        previous: saved.target_path,
        current: target.path,
      });
    }

    return produce(saved, (draft) => {
      draft.target_path = target.path;
      draft.total_combinations = totalCombinations || draft.total_combinations;
    });
  }

  /** Record the outcome of one attempt and save it. */
  async recordAttempt(state: ProgressState, combination: Combination, outcome: AttemptOutcome): Promise<ProgressState> {
    const { positions, position } = this.locate(state, combination.id);

    const next = produce(state, (draft) => {
      const now = new Date();
      upsertAttempt(draft.attempts, position, { id: combination.id, outcome, attempted_at: now });
      draft.status = 'running';
      draft.updated_at = now;
    });

    await ProgressFS.write(this.path, next);
    this.reindex(next, positions, combination.id, position);
    return next;
  }

  /** Record the winning combination and save it. */
  async markSucceeded(state: ProgressState, combination: Combination): Promise<ProgressState> {
    const { positions, position } = this.locate(state, combination.id);

    const next = produce(state, (draft) => {
      const now = new Date();
      upsertAttempt(draft.attempts, position, { id: combination.id, outcome: 'succeeded', attempted_at: now });
      draft.status = 'succeeded';
      draft.winner = combination.id;
      draft.updated_at = now;
    });

    await ProgressFS.write(this.path, next);
    this.reindex(next, positions, combination.id, position);
    return next;
  }

  /** Mark the combination space as tried without success and save it. */
  async markExhausted(state: ProgressState): Promise<ProgressState> {
    const next = produce(state, (draft) => {
      draft.status = 'exhausted';
      draft.updated_at = new Date();
    });

    await ProgressFS.write(this.path, next);
    return next;
  }

  /** Delete the saved state unconditionally. */
  async reset(): Promise<void> {
    await ProgressFS.remove(this.path);
  }

  /** Where the record for `id` goes in the attempts of `state`. Rebuilt when `state` is not the latest saved one. */
  private locate(state: ProgressState, id: string): { positions: Map<string, number>; position: number } {
    let index = this.index;

    if (!index || index.attempts !== state.attempts) {
      const positions = new Map<string, number>();
      state.attempts.forEach((attempt, i) => positions.set(attempt.id, i));
      index = { attempts: state.attempts, positions };
      this.index = index;
    }

    const { positions } = index;
    return { positions, position: positions.get(id) ?? state.attempts.length };
  }

  private reindex(next: ProgressState, positions: Map<string, number>, id: string, position: number): void {
    positions.set(id, position);
    this.index = { attempts: next.attempts, positions };
  }

  summarize(state: ProgressState): ProgressSummary {
    let failed = 0;
    let errored = 0;

    for (const { outcome } of state.attempts) {
      if (outcome === 'failed') failed++;
      if (outcome === 'errored') errored++;
    }

    const attempted = state.attempts.filter((attempt) => attempt.outcome !== 'untried').length;
    const total = state.total_combinations;

    return {
      status: state.status,
      total,
      attempted,
      failed,
      errored,
      percent: total ? Math.min(100, (attempted / total) * 100) : 0,
      winner: state.winner,
      startedAt: state.started_at,
      updatedAt: state.updated_at,
    };
  }
}

/** Replace the record at `position`, or append it when `position` is past the end. */
function upsertAttempt(attempts: AttemptRecord[], position: number, record: AttemptRecord): void {
  if (position < attempts.length) {
    attempts[position] = record;
  } else {
    attempts.push(record);
  }
}
