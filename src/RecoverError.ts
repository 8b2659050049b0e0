/** Process exit status for each way a run can end. */
export const EXIT_CODES = {
  success: 0,
  usage: 1,
  exhausted: 2,
  aborted: 3,
  interrupted: 130,
} as const;

/** Base class for errors the CLI reports to the user instead of crashing. */
export class RecoverError extends Error {
  readonly exitCode: number;

  constructor(message: string, opts?: { cause?: unknown; exitCode?: number }) {
    super(message, { cause: opts?.cause });
    this.name = 'RecoverError';
    this.exitCode = opts?.exitCode ?? EXIT_CODES.usage;
  }
}

/** The target database no longer matches the fingerprint stored in the progress file. */
export class IntegrityMismatchError extends RecoverError {
  constructor(readonly expected: string, readonly actual: string) {
    super(
      `Target database has changed since the last run (stored fingerprint ${expected}, current ${actual}).`,
      { exitCode: EXIT_CODES.aborted },
    );
    this.name = 'IntegrityMismatchError';
  }
}

export class CorruptProgressFileError extends RecoverError {
  constructor(readonly path: string, cause?: unknown) {
    super(
      `Progress file "${path}" is unreadable. Run "kdbx-recover reset" to delete it and start over.`,
      { cause, exitCode: EXIT_CODES.aborted },
    );
    this.name = 'CorruptProgressFileError';
  }
}

/** The progress file could not be written. The attempt that triggered the write is not recorded. */
export class PersistenceError extends RecoverError {
  constructor(readonly path: string, cause?: unknown) {
    super(`Failed to save progress to "${path}": ${describe(cause)}`, { cause, exitCode: EXIT_CODES.aborted });
    this.name = 'PersistenceError';
  }
}

export class ProbeTimeoutError extends RecoverError {
  constructor(readonly label: string, readonly timeoutMs: number) {
    super(`Attempt ${label} timed out after ${timeoutMs}ms.`, { exitCode: EXIT_CODES.aborted });
    this.name = 'ProbeTimeoutError';
  }
}

/** The unlock tool could not be run at all, so no attempt can succeed. */
export class ProbeToolUnavailableError extends RecoverError {
  constructor(readonly executable: string, cause?: unknown) {
    super(`Unable to run "${executable}": ${describe(cause)}`, { cause, exitCode: EXIT_CODES.aborted });
    this.name = 'ProbeToolUnavailableError';
  }
}

function describe(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
