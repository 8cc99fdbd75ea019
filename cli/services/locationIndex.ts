import { LookupPreconditionError } from '../lib/errors.js';
import { Logger } from '../lib/logger.js';
import { bankLocation, materialStorageLocation, partialMaterialStorageLocation } from './locations.js';
import type {
  AccountContext,
  Character,
  ContainerId,
  ItemDetails,
  ItemReference,
  Location,
  LocationMap,
} from '../types.js';

const log = Logger.scope('index');

export interface LocationIndex {
  locationMap: LocationMap;
  lookedUpItems: ReadonlySet<number>;
  pendingIds: string[];
}

export interface IndexOptions {
  containers: ContainerId[];
  character?: string;
}

type IndexSource = Pick<
  AccountContext,
  'characters' | 'bank' | 'sharedInventory' | 'materials' | 'materialCategories' | 'legendaryArmory'
>;

export function claimLookup(
  seen: ReadonlySet<number>,
  id: number,
): { seen: ReadonlySet<number>; isNew: boolean } {
  if (seen.has(id)) {
    return { seen, isNew: false };
  }
  const next = new Set(seen);
  next.add(id);
  return { seen: next, isNew: true };
}

export function isAllCharacters(character: string | undefined): boolean {
  return character === undefined || character.trim().length === 0 || character.trim().toLowerCase() === 'all';
}

export function selectCharacters(characters: Character[], character: string | undefined): Character[] {
  if (isAllCharacters(character)) {
    return characters;
  }
  const wanted = (character ?? '').trim().toLowerCase();
  return characters.filter((entry) => entry.name.toLowerCase() === wanted);
}

class IndexBuilder {
  readonly locationMap: LocationMap = new Map();
  readonly pendingIds: string[] = [];

  constructor(private seen: ReadonlySet<number>) {}

  get lookedUpItems(): ReadonlySet<number> {
    return this.seen;
  }

  register(item: ItemReference, location: Location): ItemDetails {
    const details: ItemDetails = {
      item,
      location,
      count: item.count ?? 1,
      statId: item.stats?.id,
      binding: item.binding,
      boundTo: item.bound_to,
    };

    const existing = this.locationMap.get(item.id);
    if (existing) {
      existing.push(details);
    } else {
      this.locationMap.set(item.id, [details]);
    }

    const claim = claimLookup(this.seen, item.id);
    this.seen = claim.seen;
    if (claim.isNew) {
      this.pendingIds.push(String(item.id));
    }

    for (const nestedId of [...(item.upgrades ?? []), ...(item.infusions ?? [])]) {
      this.register({ id: nestedId }, { kind: 'upgrade', parent: details });
    }

    return details;
  }

  slots(slots: Array<ItemReference | null>, locate: (index: number) => Location): void {
    slots.forEach((item, index) => {
      if (item) {
        this.register(item, locate(index));
      }
    });
  }
}

function indexCharacters(builder: IndexBuilder, characters: Character[], requested: string | undefined): void {
  const selected = selectCharacters(characters, requested);
  if (selected.length === 0 && !isAllCharacters(requested)) {
    log.warn(`No character named "${requested}" on this account`);
  }

  for (const character of selected) {
    for (const item of character.equipment) {
      builder.register(item, { kind: 'equipped', character: character.name, slot: item.slot ?? 'Unknown' });
    }

    character.bags.forEach((bag, bagIndex) => {
      if (!bag) {
        return;
      }
      builder.slots(bag.inventory, (slotIndex) => ({
        kind: 'inventory',
        character: character.name,
        bag: bagIndex + 1,
        slot: slotIndex + 1,
      }));
    });
  }
}

function indexMaterials(builder: IndexBuilder, source: IndexSource): void {
  for (const entry of source.materials ?? []) {
    if (entry.count === 0) {
      continue;
    }

    let location: Location;
    try {
      location = materialStorageLocation(source.materialCategories, entry);
    } catch (error) {
      if (!(error instanceof LookupPreconditionError)) {
        throw error;
      }
      log.debug(error.message);
      location = partialMaterialStorageLocation(source.materialCategories, entry);
    }

    builder.register({ id: entry.id, count: entry.count, binding: entry.binding }, location);
  }
}

export function buildLocationIndex(
  source: IndexSource,
  options: IndexOptions,
  seen: ReadonlySet<number> = new Set(),
): LocationIndex {
  const builder = new IndexBuilder(seen);
  const containers = new Set(options.containers);

  if (containers.has('characters') && source.characters) {
    indexCharacters(builder, source.characters, options.character);
  }
  if (containers.has('bank') && source.bank) {
    builder.slots(source.bank, bankLocation);
  }
  if (containers.has('sharedInventory') && source.sharedInventory) {
    builder.slots(source.sharedInventory, (index) => ({ kind: 'sharedInventory', slot: index + 1 }));
  }
  if (containers.has('materials')) {
    indexMaterials(builder, source);
  }
  if (containers.has('legendaryArmory') && source.legendaryArmory) {
    source.legendaryArmory.forEach((entry, index) => {
      builder.register({ id: entry.id, count: entry.count }, { kind: 'legendaryArmory', slot: index + 1 });
    });
  }

  log.debug(`indexed ${builder.locationMap.size} distinct item(s), ${builder.pendingIds.length} to look up`);

  return {
    locationMap: builder.locationMap,
    lookedUpItems: builder.lookedUpItems,
    pendingIds: builder.pendingIds,
  };
}
