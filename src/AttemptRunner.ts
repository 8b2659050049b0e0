import type { StoreApi } from 'zustand/vanilla';

import { type Combination, describeCombination } from './combinations.ts';
import { logger } from './logger.ts';
import type { UnlockProbe } from './probe.ts';
import { type AttemptOutcome, isResolved, type ProgressState, type RecoveryTarget } from './ProgressState.ts';
import type { ProgressStore } from './ProgressStore.ts';
import { ProbeTimeoutError, type ProbeToolUnavailableError, RecoverError } from './RecoverError.ts';
import { createRunProgressStore, type RunnerStatus, type RunProgress } from './RunProgress.ts';

/** Allowed runner status changes. Terminal statuses have none. */
const TRANSITIONS: Record<RunnerStatus, readonly RunnerStatus[]> = {
  idle: ['running'],
  running: ['succeeded', 'exhausted', 'aborted'],
  succeeded: [],
  exhausted: [],
  aborted: [],
};

/** A finite, restartable sequence of combinations that knows its own size. */
export interface CombinationSource extends Iterable<Combination> {
  count(): number;
}

export interface RunOptions {
  target: RecoveryTarget;
  /** Time allowed for each attempt. */
  timeoutMs: number;
  /** Checked between attempts; once aborted the run stops without losing progress. */
  signal?: AbortSignal;
}

export type RunOutcome =
  | { status: 'succeeded'; combination: Combination; state: ProgressState }
  | { status: 'exhausted'; state: ProgressState }
  | { status: 'aborted'; reason: 'interrupted'; state: ProgressState }
  | { status: 'aborted'; reason: 'tool-error'; error: ProbeToolUnavailableError; state: ProgressState };

/**
 * Tries every combination in order, one at a time, until one unlocks the target.
 *
 * Combinations already resolved in the progress file are skipped, so an
 * interrupted run picks up where it stopped. Every result is saved before the
 * next attempt starts; a save that fails stops the run with a `PersistenceError`.
 */
export class AttemptRunner {
  readonly progress: StoreApi<RunProgress> = createRunProgressStore();
  private log = logger.child({ component: 'runner' });

  constructor(private store: ProgressStore, private probe: UnlockProbe) {}

  async run(source: CombinationSource, opts: RunOptions): Promise<RunOutcome> {
    const { target, timeoutMs, signal } = opts;
    const total = source.count();

    let state = await this.store.load(target, total);

    const resolved = new Map<string, AttemptOutcome>();
    for (const attempt of state.attempts) {
      if (isResolved(attempt.outcome)) {
        resolved.set(attempt.id, attempt.outcome);
      }
    }

    this.transition('running');
    this.progress.setState({ total, startedAt: new Date() });

    if (resolved.size) {
      this.log.info('Resuming from saved progress', { resolved: resolved.size, total });
    } else {
      this.log.info('Starting recovery', { total });
    }

    for (const combination of source) {
      const previous = resolved.get(combination.id);

      if (previous === 'succeeded') {
        this.transition('succeeded');
        return { status: 'succeeded', combination, state };
      }
      if (previous) {
        this.progress.setState(({ skipped }) => ({ skipped: skipped + 1 }));
        continue;
      }

      if (signal?.aborted) {
        return this.interrupted(state);
      }

      const label = describeCombination(combination);
      this.progress.setState({ current: label });
      this.log.debug('Attempting', { combination: label });

      const result = await this.probe.attempt(target.path, combination, timeoutMs);

      if (result.kind === 'success') {
        state = await this.store.markSucceeded(state, combination);
        this.progress.setState(({ attempted }) => ({ attempted: attempted + 1, current: null }));
        this.transition('succeeded');
        this.log.info('Unlocked', { combination: label });
        return { status: 'succeeded', combination, state };
      }

      // The interrupt may have reached the tool too, so any other answer is not trusted.
      if (signal?.aborted) {
        return this.interrupted(state);
      }

      if (result.kind === 'tool-error') {
        this.transition('aborted');
        this.log.error(result.error.message);
        return { status: 'aborted', reason: 'tool-error', error: result.error, state };
      }

      if (result.kind === 'timed-out') {
        this.log.warn(new ProbeTimeoutError(label, timeoutMs).message);
      }

      const outcome: AttemptOutcome = result.kind === 'failure' ? 'failed' : 'errored';
      state = await this.store.recordAttempt(state, combination, outcome);
      resolved.set(combination.id, outcome);
      this.progress.setState(({ attempted }) => ({ attempted: attempted + 1, current: null }));
    }

    state = await this.store.markExhausted(state);
    this.transition('exhausted');
    this.log.info('No combination unlocked the database', { total });

    return { status: 'exhausted', state };
  }

  /** Subscribe to progress changes. The subscription ends on `close()` or when the signal aborts. */
  listen(
    listener: (progress: RunProgress, prev: RunProgress) => void,
    opts?: { signal?: AbortSignal },
  ): { close: () => void; [Symbol.dispose]: () => void } {
    const unsubscribe = this.progress.subscribe(listener);
    opts?.signal?.addEventListener('abort', close);

    function close(): void {
      opts?.signal?.removeEventListener('abort', close);
      unsubscribe();
    }

    return {
      close,
      [Symbol.dispose]: close,
    };
  }

  private interrupted(state: ProgressState): RunOutcome {
    this.transition('aborted');
    this.log.info('Interrupted; progress saved', { attempts: state.attempts.length });
    return { status: 'aborted', reason: 'interrupted', state };
  }

  private transition(next: RunnerStatus): void {
    const current = this.progress.getState().status;

    if (!TRANSITIONS[current].includes(next)) {
      throw new RecoverError(`Invalid runner transition: ${current} -> ${next}`);
    }

    this.progress.setState({ status: next });
  }
}
