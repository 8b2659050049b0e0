import { resolve } from 'node:path';

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex } from '@noble/hashes/utils';

import { RecoverError } from './RecoverError.ts';
import { SecretText, type WipeableBytes } from './SecretText.ts';

/** A candidate passphrase. Only its digest and source label are ever written to disk or logged. */
export class Passphrase {
  /** Hex SHA-256 of the UTF-8 passphrase. */
  readonly digest: string;
  /** Where the passphrase came from, e.g. `words.txt:12`. */
  readonly source: string;
  readonly #secret: SecretText;

  constructor(value: string, source: string) {
    this.digest = bytesToHex(sha256(value));
    this.source = source;
    this.#secret = new SecretText(value);
  }

  reveal(): WipeableBytes {
    return this.#secret.reveal();
  }

  [Symbol.dispose](): void {
    this.#secret[Symbol.dispose]();
  }
}

/** A passphrase as given by the user, optionally tagged with where it came from. */
export type RawPassphrase = string | { value: string; source: string };

/** `null` is the "absent" option of a dimension and is always first when present. */
export type FactorList<T> = readonly (T | null)[];

export interface CredentialSet {
  passphrases: FactorList<Passphrase>;
  /** Absolute keyfile paths. */
  keyfiles: FactorList<string>;
  /** Hardware token challenge-response slots. */
  slots: FactorList<number>;
}

export interface CredentialInput {
  passphrases?: Iterable<RawPassphrase>;
  keyfiles?: Iterable<string>;
  slots?: Iterable<number>;
  /** Try combinations without a passphrase. Default: `true`. */
  includeNoPassphrase?: boolean;
  /** Try combinations without a keyfile. Default: `true`. */
  includeNoKeyfile?: boolean;
  /** Try combinations without a hardware token. Default: `true`. */
  includeNoToken?: boolean;
}

/**
 * Normalize raw credentials into three factor lists.
 *
 * Each dimension is deduplicated (first occurrence wins) and gets the absent
 * option at index 0 when its inclusion flag is set. A dimension with no values
 * and no absent option is left out of the search: it becomes absent-only so
 * the other dimensions still combine. Only when no dimension has any values
 * does it stay empty, and so does the cross product.
 */
export function buildCredentialSet(input: CredentialInput): CredentialSet {
  const {
    includeNoPassphrase = true,
    includeNoKeyfile = true,
    includeNoToken = true,
  } = input;

  const passphrases = normalizePassphrases(input.passphrases ?? []);
  const keyfiles = normalizeKeyfiles(input.keyfiles ?? []);
  const slots = normalizeSlots(input.slots ?? []);
  const anyValues = passphrases.length + keyfiles.length + slots.length > 0;

  return {
    passphrases: withAbsent(passphrases, includeNoPassphrase, anyValues),
    keyfiles: withAbsent(keyfiles, includeNoKeyfile, anyValues),
    slots: withAbsent(slots, includeNoToken, anyValues),
  };
}

/** Number of non-absent values in each dimension. */
export function countFactors(set: CredentialSet): { passphrases: number; keyfiles: number; slots: number } {
  return {
    passphrases: set.passphrases.filter((p) => p !== null).length,
    keyfiles: set.keyfiles.filter((k) => k !== null).length,
    slots: set.slots.filter((s) => s !== null).length,
  };
}

function withAbsent<T>(values: T[], includeAbsent: boolean, anyValues: boolean): FactorList<T> {
  if (includeAbsent || (!values.length && anyValues)) {
    return [null, ...values];
  }
  return values;
}

function normalizePassphrases(raw: Iterable<RawPassphrase>): Passphrase[] {
  const seen = new Set<string>();
  const result: Passphrase[] = [];

  let position = 0;
  for (const entry of raw) {
    position++;
    const { value, source } = typeof entry === 'string' ? { value: entry, source: `#${position}` } : entry;

    // An empty password is the same as no password.
    if (!value || seen.has(value)) {
      continue;
    }

    seen.add(value);
    result.push(new Passphrase(value, source));
  }

  return result;
}

function normalizeKeyfiles(raw: Iterable<string>): string[] {
  const paths = new Set<string>();

  for (const path of raw) {
    if (path) {
      paths.add(resolve(path));
    }
  }

  return [...paths];
}

function normalizeSlots(raw: Iterable<number>): number[] {
  const slots = new Set<number>();

  for (const slot of raw) {
    if (!Number.isInteger(slot) || slot < 1) {
      throw new RecoverError(`Invalid token slot "${slot}". Slots are positive integers.`);
    }
    slots.add(slot);
  }

  return [...slots];
}
