import { z } from 'zod';

import { RecoverError } from './RecoverError.ts';

export const DEFAULT_PROGRESS_FILE = '.recovery_progress.json';
export const DEFAULT_TIMEOUT_SECONDS = 30;
export const DEFAULT_EXECUTABLE = 'keepassxc-cli';
export const DEFAULT_TOKEN_SLOTS = '1,2';

/** Environment variables read when the matching option is not given. */
export const ENV = {
  progressFile: 'KDBX_RECOVER_PROGRESS_FILE',
  timeout: 'KDBX_RECOVER_TIMEOUT',
  executable: 'KEEPASSXC_CLI',
} as const;

/** Settings of a run after validation. */
export interface RunConfig {
  timeoutMs: number;
  executable: string;
  /** Token slots to try; empty unless token attempts are enabled. */
  slots: number[];
}

const slotListSchema = z.string().transform((value, ctx) => {
  const slots: number[] = [];

  for (const part of value.split(',')) {
    const slot = Number(part.trim());
    if (!part.trim() || !Number.isInteger(slot) || slot < 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${part.trim()}" is not a token slot number` });
      return z.NEVER;
    }
    slots.push(slot);
  }

  return slots;
});

const runOptionsSchema = z.object({
  timeout: z.coerce.number({ invalid_type_error: 'must be a number of seconds' }).positive().max(24 * 60 * 60),
  cli: z.string().trim().min(1),
  yubikey: z.boolean().default(false),
  yubikeySlots: slotListSchema,
});

/** Validate the run options given on the command line. */
export function parseRunConfig(raw: {
  timeout: string;
  cli: string;
  yubikey?: boolean;
  yubikeySlots: string;
}): RunConfig {
  const result = runOptionsSchema.safeParse(raw);

  if (!result.success) {
    const problems = result.error.issues.map((issue) => `--${toKebab(String(issue.path[0]))} ${issue.message}`);
    throw new RecoverError(`Invalid options: ${problems.join('; ')}`);
  }

  const { timeout, cli, yubikey, yubikeySlots } = result.data;

  return {
    timeoutMs: Math.round(timeout * 1000),
    executable: cli,
    slots: yubikey ? yubikeySlots : [],
  };
}

function toKebab(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}
