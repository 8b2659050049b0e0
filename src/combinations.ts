import { basename } from 'node:path';

import { z } from 'zod';

import type { CredentialSet, FactorList, Passphrase } from './credentials.ts';

/** One (passphrase, keyfile, token slot) triple to try. `null` means the factor is not used. */
export interface Combination {
  readonly passphrase: Passphrase | null;
  readonly keyfile: string | null;
  readonly slot: number | null;
  /** Canonical identity. Stable across runs and safe to persist (contains no secrets). */
  readonly id: string;
  /** Number of factors that are used (0-3). */
  readonly factors: number;
}

export function createCombination(
  passphrase: Passphrase | null,
  keyfile: string | null,
  slot: number | null,
): Combination {
  return Object.freeze({
    passphrase,
    keyfile,
    slot,
    id: combinationId(passphrase?.digest ?? null, keyfile, slot),
    factors: Number(passphrase !== null) + Number(keyfile !== null) + Number(slot !== null),
  });
}

export function combinationId(passphraseDigest: string | null, keyfile: string | null, slot: number | null): string {
  return JSON.stringify([passphraseDigest, keyfile, slot]);
}

/** Human-readable description for logs and output. Never includes the passphrase itself. */
export function describeCombination(combination: Combination): string {
  const parts: string[] = [];

  if (combination.passphrase) {
    parts.push(`passphrase ${combination.passphrase.source}`);
  }
  if (combination.keyfile) {
    parts.push(`keyfile ${basename(combination.keyfile)}`);
  }
  if (combination.slot !== null) {
    parts.push(`token slot ${combination.slot}`);
  }

  return parts.length ? parts.join(', ') : 'no credentials';
}

const idSchema = z.tuple([z.string().nullable(), z.string().nullable(), z.number().int().nullable()]);

/**
 * Describe a saved combination identity, e.g. the winner in a progress file.
 * The passphrase can only be shown by its digest.
 */
export function describeCombinationId(id: string): string {
  let data: unknown;
  try {
    data = JSON.parse(id);
  } catch {
    return id;
  }

  const parsed = idSchema.safeParse(data);
  if (!parsed.success) {
    return id;
  }

  const [digest, keyfile, slot] = parsed.data;
  const parts: string[] = [];

  if (digest !== null) {
    parts.push(`passphrase sha256:${digest.slice(0, 12)}`);
  }
  if (keyfile !== null) {
    parts.push(`keyfile ${keyfile}`);
  }
  if (slot !== null) {
    parts.push(`token slot ${slot}`);
  }

  return parts.length ? parts.join(', ') : 'no credentials';
}

type Dimension = 'passphrase' | 'keyfile' | 'slot';

const DIMENSIONS: readonly Dimension[] = ['passphrase', 'keyfile', 'slot'];

/**
 * Subsets of dimensions in attempt order: by number of factors, then
 * passphrase before keyfile before token slot.
 */
const TIERS: readonly (readonly Dimension[])[] = [
  [],
  ['passphrase'],
  ['keyfile'],
  ['slot'],
  ['passphrase', 'keyfile'],
  ['passphrase', 'slot'],
  ['keyfile', 'slot'],
  ['passphrase', 'keyfile', 'slot'],
];

/**
 * The cross product of a credential set, simplest combinations first.
 *
 * Iteration is lazy and can be restarted; every iteration yields the same
 * sequence. Within a subset of dimensions the token slot varies fastest and
 * the passphrase slowest.
 */
export class CombinationSpace implements Iterable<Combination> {
  constructor(private set: CredentialSet) {}

  *[Symbol.iterator](): Iterator<Combination> {
    const passphrases = present(this.set.passphrases);
    const keyfiles = present(this.set.keyfiles);
    const slots = present(this.set.slots);

    for (const dims of this.subsets()) {
      const ps = dims.includes('passphrase') ? passphrases : [null];
      const ks = dims.includes('keyfile') ? keyfiles : [null];
      const ss = dims.includes('slot') ? slots : [null];

      for (const passphrase of ps) {
        for (const keyfile of ks) {
          for (const slot of ss) {
            yield createCombination(passphrase, keyfile, slot);
          }
        }
      }
    }
  }

  /** Total number of combinations, without enumerating them. */
  count(): number {
    const sizes: Record<Dimension, number> = {
      passphrase: present(this.set.passphrases).length,
      keyfile: present(this.set.keyfiles).length,
      slot: present(this.set.slots).length,
    };

    let total = 0;
    for (const dims of this.subsets()) {
      total += dims.reduce((product, dim) => product * sizes[dim], 1);
    }
    return total;
  }

  /** Subsets whose unused dimensions allow the absent option and whose used dimensions have values. */
  private subsets(): (readonly Dimension[])[] {
    const lists: Record<Dimension, FactorList<unknown>> = {
      passphrase: this.set.passphrases,
      keyfile: this.set.keyfiles,
      slot: this.set.slots,
    };

    return TIERS.filter((dims) => {
      for (const dim of DIMENSIONS) {
        const list = lists[dim];
        const used = dims.includes(dim);
        if (used && !list.some((value) => value !== null)) {
          return false;
        }
        if (!used && !list.includes(null)) {
          return false;
        }
      }
      return true;
    });
  }
}

function present<T>(list: FactorList<T>): T[] {
  return list.filter((value): value is T => value !== null);
}
