import { test } from 'node:test';
import { deepStrictEqual, ok, strictEqual } from 'node:assert/strict';

import {
  type Combination,
  CombinationSpace,
  combinationId,
  describeCombination,
  describeCombinationId,
} from './combinations.ts';
import { buildCredentialSet, type CredentialInput } from './credentials.ts';

function shape(combination: Combination): [string | null, string | null, number | null] {
  return [combination.passphrase?.source ?? null, combination.keyfile, combination.slot];
}

function enumerate(input: CredentialInput): Combination[] {
  return [...new CombinationSpace(buildCredentialSet(input))];
}

test('passphrases only: the empty combination comes first', () => {
  const combinations = enumerate({ passphrases: ['a', 'b'] });

  deepStrictEqual(combinations.map(shape), [
    [null, null, null],
    ['#1', null, null],
    ['#2', null, null],
  ]);
});

test('all three dimensions are ordered by tier', () => {
  const combinations = enumerate({ passphrases: ['a'], keyfiles: ['/keys/k'], slots: [1] });

  deepStrictEqual(combinations.map(shape), [
    [null, null, null],
    ['#1', null, null],
    [null, '/keys/k', null],
    [null, null, 1],
    ['#1', '/keys/k', null],
    ['#1', null, 1],
    [null, '/keys/k', 1],
    ['#1', '/keys/k', 1],
  ]);
  deepStrictEqual(combinations.map((c) => c.factors), [0, 1, 1, 1, 2, 2, 2, 3]);
});

test('token slot varies fastest within a tier', () => {
  const combinations = enumerate({
    passphrases: ['a', 'b'],
    slots: [1, 2],
    includeNoPassphrase: false,
    includeNoToken: false,
  });

  deepStrictEqual(combinations.map(shape), [
    ['#1', null, 1],
    ['#1', null, 2],
    ['#2', null, 1],
    ['#2', null, 2],
  ]);
});

test('nothing to try when a required dimension is empty and no other has values', () => {
  const space = new CombinationSpace(buildCredentialSet({ passphrases: [], includeNoPassphrase: false }));

  deepStrictEqual([...space], []);
  strictEqual(space.count(), 0);
});

test('a required dimension without values reduces to the other dimensions', () => {
  const withoutTokens = new CombinationSpace(buildCredentialSet({ passphrases: ['a'], includeNoToken: false }));
  deepStrictEqual([...withoutTokens].map(shape), [
    [null, null, null],
    ['#1', null, null],
  ]);
  strictEqual(withoutTokens.count(), 2);

  const withoutPassphrases = new CombinationSpace(
    buildCredentialSet({ keyfiles: ['/keys/k'], includeNoPassphrase: false, includeNoKeyfile: false }),
  );
  deepStrictEqual([...withoutPassphrases].map(shape), [[null, '/keys/k', null]]);
  strictEqual(withoutPassphrases.count(), 1);
});

test('required passphrase excludes passphrase-less tiers', () => {
  const combinations = enumerate({ passphrases: ['a'], keyfiles: ['/keys/k'], includeNoPassphrase: false });

  deepStrictEqual(combinations.map(shape), [
    ['#1', null, null],
    ['#1', '/keys/k', null],
  ]);
});

test('count matches enumeration, iteration is repeatable and free of duplicates', () => {
  const space = new CombinationSpace(buildCredentialSet({
    passphrases: ['a', 'b', 'c', 'a'],
    keyfiles: ['/k/1', '/k/2'],
    slots: [1, 2],
  }));

  const first = [...space].map((c) => c.id);
  const second = [...space].map((c) => c.id);

  // (3 + 1) * (2 + 1) * (2 + 1)
  strictEqual(space.count(), 36);
  strictEqual(first.length, 36);
  deepStrictEqual(second, first);
  strictEqual(new Set(first).size, first.length);

  const factors = [...space].map((c) => c.factors);
  for (let i = 1; i < factors.length; i++) {
    ok(factors[i - 1] <= factors[i], `tier order broken at ${i}`);
  }
});

test('combination ids encode the digest, path and slot', () => {
  const [, withPassphrase] = enumerate({ passphrases: ['abc'] });

  strictEqual(
    withPassphrase.id,
    combinationId('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad', null, null),
  );
  strictEqual(combinationId(null, '/k/1', 2), '[null,"/k/1",2]');
  ok(Object.isFrozen(withPassphrase));
});

test('describeCombination never shows the passphrase', () => {
  const combinations = enumerate({
    passphrases: [{ value: 'secret', source: 'words.txt:3' }],
    keyfiles: ['/keys/backup.key'],
    slots: [2],
  });

  strictEqual(describeCombination(combinations[0]), 'no credentials');
  strictEqual(describeCombination(combinations[7]), 'passphrase words.txt:3, keyfile backup.key, token slot 2');
});

test('describeCombinationId decodes saved identities', () => {
  strictEqual(describeCombinationId('[null,null,null]'), 'no credentials');
  strictEqual(
    describeCombinationId(combinationId('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad', '/k/1', 2)),
    'passphrase sha256:ba7816bf8f01, keyfile /k/1, token slot 2',
  );
  strictEqual(describeCombinationId('not json'), 'not json');
  strictEqual(describeCombinationId('[1,2]'), '[1,2]');
});
