import { LookupPreconditionError } from '../lib/errors.js';
import type { ItemDetails, Location, MaterialCategory, MaterialEntry } from '../types.js';

export const BANK_TAB_SIZE = 30;
export const MATERIAL_ROW_SIZE = 10;

export type NameLookup = (id: number) => string | undefined;

export function bankLocation(index: number): Location {
  return {
    kind: 'bank',
    tab: Math.floor(index / BANK_TAB_SIZE) + 1,
    slot: (index % BANK_TAB_SIZE) + 1,
  };
}

// Throws LookupPreconditionError when the category is unknown or does not list the item.
export function materialStorageLocation(
  categories: ReadonlyMap<number, MaterialCategory>,
  entry: MaterialEntry,
): Location {
  const category = categories.get(entry.category);
  if (!category) {
    throw new LookupPreconditionError(`Material category ${entry.category} is unknown`);
  }

  const index = category.items.indexOf(entry.id);
  if (index < 0) {
    throw new LookupPreconditionError(`Item ${entry.id} is not listed in material category "${category.name}"`);
  }

  return {
    kind: 'materialStorage',
    categoryName: category.name,
    row: Math.floor(index / MATERIAL_ROW_SIZE) + 1,
    slot: (index % MATERIAL_ROW_SIZE) + 1,
  };
}

export function partialMaterialStorageLocation(
  categories: ReadonlyMap<number, MaterialCategory>,
  entry: MaterialEntry,
): Location {
  return {
    kind: 'materialStorage',
    categoryName: categories.get(entry.category)?.name,
  };
}

export function slotName(location: Location): string | undefined {
  return location.kind === 'equipped' ? location.slot : undefined;
}

export function describeLocation(location: Location, nameOf: NameLookup = () => undefined): string {
  switch (location.kind) {
    case 'inventory':
      return `${location.character}'s inventory, bag ${location.bag}, slot ${location.slot}`;
    case 'equipped':
      return `Equipped by ${location.character} (${location.slot})`;
    case 'bank':
      return `Bank tab ${location.tab}, slot ${location.slot}`;
    case 'sharedInventory':
      return `Shared inventory slot ${location.slot}`;
    case 'materialStorage': {
      if (!location.categoryName) {
        return 'Material storage';
      }
      if (location.row === undefined || location.slot === undefined) {
        return `Material storage, ${location.categoryName}`;
      }
      return `Material storage, ${location.categoryName}, row ${location.row}, slot ${location.slot}`;
    }
    case 'legendaryArmory':
      return `Legendary armory slot ${location.slot}`;
    case 'upgrade':
      return `Upgrade in ${parentName(location.parent, nameOf)}, ${describeLocation(location.parent.location, nameOf)}`;
  }
}

function parentName(parent: ItemDetails, nameOf: NameLookup): string {
  return nameOf(parent.item.id) ?? `item ${parent.item.id}`;
}
