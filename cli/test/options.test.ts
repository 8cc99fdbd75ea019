import test from 'node:test';
import assert from 'node:assert/strict';
import { CommanderError } from 'commander';

import { buildProgram, parseCliOptions } from '../options.js';
import { ALL_CONTAINERS } from '../types.js';
import { testConfig } from './fakeApi.js';

function quietProgram() {
  return buildProgram()
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
    });
}

function parse(args: string[], env: Record<string, string> = {}) {
  return parseCliOptions(args, testConfig(env), quietProgram());
}

test('no container flags means every container is searched', () => {
  const options = parse(['--api-key', 'test-key', 'Mithril Ore']);

  assert.deepEqual(options.containers, ALL_CONTAINERS);
  assert.equal(options.apiKey, 'test-key');
  assert.equal(options.character, undefined);
  assert.deepEqual(options.filters, {
    itemName: 'Mithril Ore',
    regex: false,
    rarity: undefined,
    type: undefined,
    weightClass: undefined,
    slot: undefined,
  });
  assert.equal(options.json, false);
  assert.equal(options.maxItemsPerRequest, undefined);
});

test('container flags narrow the search to the chosen containers', () => {
  assert.deepEqual(parse(['-k', 'test-key', '-b', '-m']).containers, ['bank', 'materials']);
  assert.deepEqual(parse(['-k', 'test-key', '--shared', '--legendary']).containers, [
    'sharedInventory',
    'legendaryArmory',
  ]);
});

test('--character with and without a name', () => {
  const named = parse(['-k', 'test-key', '--character', 'Zara', 'Zojja Visor']);
  assert.deepEqual(named.containers, ['characters']);
  assert.equal(named.character, 'Zara');
  assert.equal(named.filters.itemName, 'Zojja Visor');

  const bare = parse(['-k', 'test-key', '--bank', '--character']);
  assert.deepEqual(bare.containers, ['characters', 'bank']);
  assert.equal(bare.character, undefined);
});

test('filter flags map onto item filters', () => {
  const options = parse([
    '-k',
    'test-key',
    '-r',
    'Exotic',
    '--slot',
    'Ring',
    '-t',
    'Armor',
    '-w',
    'Heavy',
    '-x',
    '^mith',
    '--max-ids',
    '50',
    '--json',
    '-v',
  ]);

  assert.deepEqual(options.filters, {
    itemName: '^mith',
    regex: true,
    rarity: 'Exotic',
    type: 'Armor',
    weightClass: 'Heavy',
    slot: 'Ring',
  });
  assert.equal(options.maxItemsPerRequest, 50);
  assert.equal(options.json, true);
  assert.equal(options.verbose, true);
  assert.equal(options.debug, false);
});

test('the API key can come from configuration', () => {
  assert.equal(parse([], { GW2_API_KEY: 'env-key' }).apiKey, 'env-key');
  assert.equal(parse(['-k', 'flag-key'], { GW2_API_KEY: 'env-key' }).apiKey, 'flag-key');
});

test('a missing API key is a usage error', () => {
  assert.throws(() => parse(['Mithril Ore']), (error: unknown) => {
    assert.ok(error instanceof CommanderError);
    assert.equal(error.message, 'error: an API key is required (--api-key or GW2_API_KEY)');
    return true;
  });
});

test('invalid patterns and ceilings are rejected before any request', () => {
  assert.throws(() => parse(['-k', 'test-key', '-x', '(unclosed']), CommanderError);
  assert.throws(() => parse(['-k', 'test-key', '--slot', '[Ring']), CommanderError);
  assert.throws(() => parse(['-k', 'test-key', '--max-ids', '0']), CommanderError);
  assert.doesNotThrow(() => parse(['-k', 'test-key', '(unclosed']));
});
