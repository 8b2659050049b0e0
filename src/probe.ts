import type { Combination } from './combinations.ts';
import type { ProbeToolUnavailableError } from './RecoverError.ts';

/** What the unlock tool said about one combination. */
export type ProbeResult =
  | { kind: 'success' }
  | { kind: 'failure'; exitCode: number }
  | { kind: 'timed-out' }
  | { kind: 'tool-error'; error: ProbeToolUnavailableError };

/**
 * Tries to unlock a database with one combination.
 *
 * This is the only judge of whether a combination is correct; nothing else
 * looks inside the database.
 */
export interface UnlockProbe {
  attempt(targetPath: string, combination: Combination, timeoutMs: number): Promise<ProbeResult>;
}
