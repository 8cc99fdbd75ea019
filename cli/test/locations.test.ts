import test from 'node:test';
import assert from 'node:assert/strict';

import { LookupPreconditionError } from '../lib/errors.js';
import {
  bankLocation,
  describeLocation,
  materialStorageLocation,
  partialMaterialStorageLocation,
  slotName,
} from '../services/locations.js';
import type { ItemDetails, MaterialCategory } from '../types.js';

const categories = new Map<number, MaterialCategory>([
  [5, { id: 5, name: 'Cooking Materials', items: [20, 21, 22, 23, 24, 25, 26, 27, 28, 29, 30, 31, 32] }],
]);

test('bank slots are numbered per tab of 30', () => {
  assert.deepEqual(bankLocation(0), { kind: 'bank', tab: 1, slot: 1 });
  assert.deepEqual(bankLocation(29), { kind: 'bank', tab: 1, slot: 30 });
  assert.deepEqual(bankLocation(30), { kind: 'bank', tab: 2, slot: 1 });
  assert.deepEqual(bankLocation(64), { kind: 'bank', tab: 3, slot: 5 });
});

test('material storage position comes from the category item order, 10 per row', () => {
  assert.deepEqual(materialStorageLocation(categories, { id: 32, category: 5, count: 4 }), {
    kind: 'materialStorage',
    categoryName: 'Cooking Materials',
    row: 2,
    slot: 3,
  });
  assert.deepEqual(materialStorageLocation(categories, { id: 20, category: 5, count: 1 }), {
    kind: 'materialStorage',
    categoryName: 'Cooking Materials',
    row: 1,
    slot: 1,
  });
});

test('material storage lookups fail with LookupPreconditionError when data is missing', () => {
  assert.throws(
    () => materialStorageLocation(new Map(), { id: 20, category: 5, count: 1 }),
    LookupPreconditionError,
  );
  assert.throws(
    () => materialStorageLocation(categories, { id: 99, category: 5, count: 1 }),
    /Item 99 is not listed in material category "Cooking Materials"/,
  );
});

test('partial material locations keep the category name when it is known', () => {
  assert.deepEqual(partialMaterialStorageLocation(categories, { id: 99, category: 5, count: 1 }), {
    kind: 'materialStorage',
    categoryName: 'Cooking Materials',
  });
  assert.deepEqual(partialMaterialStorageLocation(new Map(), { id: 99, category: 5, count: 1 }), {
    kind: 'materialStorage',
    categoryName: undefined,
  });
});

test('describeLocation renders every location kind', () => {
  assert.equal(
    describeLocation({ kind: 'inventory', character: 'Zara', bag: 2, slot: 5 }),
    "Zara's inventory, bag 2, slot 5",
  );
  assert.equal(describeLocation({ kind: 'equipped', character: 'Zara', slot: 'Helm' }), 'Equipped by Zara (Helm)');
  assert.equal(describeLocation({ kind: 'bank', tab: 1, slot: 1 }), 'Bank tab 1, slot 1');
  assert.equal(describeLocation({ kind: 'sharedInventory', slot: 3 }), 'Shared inventory slot 3');
  assert.equal(
    describeLocation({ kind: 'materialStorage', categoryName: 'Cooking Materials', row: 2, slot: 3 }),
    'Material storage, Cooking Materials, row 2, slot 3',
  );
  assert.equal(
    describeLocation({ kind: 'materialStorage', categoryName: 'Cooking Materials' }),
    'Material storage, Cooking Materials',
  );
  assert.equal(describeLocation({ kind: 'materialStorage' }), 'Material storage');
  assert.equal(describeLocation({ kind: 'legendaryArmory', slot: 4 }), 'Legendary armory slot 4');
});

test('upgrade locations describe the parent item and where it sits', () => {
  const parent: ItemDetails = {
    item: { id: 55, slot: 'Helm' },
    location: { kind: 'equipped', character: 'Zara', slot: 'Helm' },
    count: 1,
  };
  const upgrade = { kind: 'upgrade' as const, parent };

  assert.equal(describeLocation(upgrade), 'Upgrade in item 55, Equipped by Zara (Helm)');
  assert.equal(
    describeLocation(upgrade, (id) => (id === 55 ? 'Zojja Visor' : undefined)),
    'Upgrade in Zojja Visor, Equipped by Zara (Helm)',
  );
});

test('only equipped locations carry a slot name', () => {
  assert.equal(slotName({ kind: 'equipped', character: 'Zara', slot: 'Ring1' }), 'Ring1');
  assert.equal(slotName({ kind: 'bank', tab: 1, slot: 1 }), undefined);
  assert.equal(slotName({ kind: 'inventory', character: 'Zara', bag: 1, slot: 1 }), undefined);
});
