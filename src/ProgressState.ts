import { z } from 'zod';

/** Progress file format version. */
export const PROGRESS_VERSION = 1;

export type AttemptOutcome = 'untried' | 'failed' | 'errored' | 'succeeded';

export type ProgressStatus = 'running' | 'succeeded' | 'exhausted';

export interface AttemptRecord {
  /** Combination identity. */
  id: string;
  /** `failed` means the combination was rejected; `errored` means the attempt timed out. */
  outcome: AttemptOutcome;
  attempted_at: Date;
}

const attemptSchema: z.ZodType<AttemptRecord, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  outcome: z.enum(['untried', 'failed', 'errored', 'succeeded']),
  attempted_at: z.coerce.date(),
});

/** The database being recovered. */
export interface RecoveryTarget {
  path: string;
  /** Hex SHA-256 of the database contents. */
  fingerprint: string;
}

export interface ProgressState {
  version: number;
  target_path: string;
  target_fingerprint: string;
  status: ProgressStatus;
  /** Size of the combination space the last time a run started. */
  total_combinations: number;
  attempts: AttemptRecord[];
  /** Identity of the combination that unlocked the database. */
  winner: string | null;
  started_at: Date;
  updated_at: Date;
}

/** Fields read before anything else, so a changed target is detected even if the rest of the file is from a newer format. */
export const headerSchema = z.object({
  version: z.number().int().positive(),
  target_fingerprint: z.string().regex(/^[0-9a-f]{64}$/),
});

export const stateSchema: z.ZodType<ProgressState, z.ZodTypeDef, unknown> = z.object({
  version: z.literal(PROGRESS_VERSION),
  target_path: z.string(),
  target_fingerprint: z.string().regex(/^[0-9a-f]{64}$/),
  status: z.enum(['running', 'succeeded', 'exhausted']),
  total_combinations: z.number().int().nonnegative(),
  attempts: attemptSchema.array(),
  winner: z.string().nullable(),
  started_at: z.coerce.date(),
  updated_at: z.coerce.date(),
})
  .refine((state) => state.status !== 'succeeded' || state.winner !== null, {
    message: 'A succeeded run must name its winning combination',
    path: ['winner'],
  })
  .transform((state) => {
    // Keep one record per combination, the latest one, at the position of the first.
    const latest = new Map<string, AttemptRecord>();
    for (const attempt of state.attempts) {
      latest.set(attempt.id, attempt);
    }
    state.attempts = [...latest.values()];
    return state;
  });

export function createProgressState(target: RecoveryTarget, totalCombinations: number): ProgressState {
  const now = new Date();

  return {
    version: PROGRESS_VERSION,
    target_path: target.path,
    target_fingerprint: target.fingerprint,
    status: 'running',
    total_combinations: totalCombinations,
    attempts: [],
    winner: null,
    started_at: now,
    updated_at: now,
  };
}

/** Whether an outcome is final, i.e. the combination must not be attempted again. */
export function isResolved(outcome: AttemptOutcome): boolean {
  return outcome === 'failed' || outcome === 'errored' || outcome === 'succeeded';
}
