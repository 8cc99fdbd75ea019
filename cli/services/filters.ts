import { Logger } from '../lib/logger.js';
import { slotName } from './locations.js';
import type { FoundItems, ItemDefinition, ItemDetails, ItemFilters, LocationMap } from '../types.js';

const log = Logger.scope('filter');

export interface CompiledFilters {
  rarity?: string;
  type?: string;
  weightClass?: string;
  name?: (name: string) => boolean;
  slot?: RegExp;
}

function lower(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed.toLowerCase() : undefined;
}

export function compileFilters(filters: ItemFilters): CompiledFilters {
  const compiled: CompiledFilters = {
    rarity: lower(filters.rarity),
    type: lower(filters.type),
    weightClass: lower(filters.weightClass),
  };

  const itemName = filters.itemName;
  if (itemName !== undefined && itemName.length > 0) {
    if (filters.regex) {
      const pattern = new RegExp(itemName, 'i');
      compiled.name = (name) => pattern.test(name.toLowerCase());
    } else {
      const wanted = itemName.toLowerCase();
      compiled.name = (name) => name.toLowerCase() === wanted;
    }
  }

  if (filters.slot !== undefined && filters.slot.length > 0) {
    compiled.slot = new RegExp(filters.slot, 'i');
  }

  return compiled;
}

export function matchesDefinition(definition: ItemDefinition, filters: CompiledFilters): boolean {
  if (filters.rarity && definition.rarity.toLowerCase() !== filters.rarity) {
    return false;
  }

  if (filters.weightClass) {
    const weightClass = definition.details?.weight_class;
    if (definition.type !== 'Armor' || !weightClass || weightClass.toLowerCase() !== filters.weightClass) {
      return false;
    }
  }

  if (filters.type) {
    const detailType = definition.details?.type?.toLowerCase();
    if (definition.type.toLowerCase() !== filters.type && detailType !== filters.type) {
      return false;
    }
  }

  if (filters.name && !filters.name(definition.name)) {
    return false;
  }

  return true;
}

export function matchesSlot(occurrences: ItemDetails[], pattern: RegExp | undefined): boolean {
  if (!pattern) {
    return true;
  }
  return occurrences.some((details) => {
    const slot = slotName(details.location);
    return slot !== undefined && pattern.test(slot);
  });
}

export function displayName(
  definition: ItemDefinition,
  details: ItemDetails,
  statsTable: ReadonlyMap<number, string>,
): string {
  let name = definition.name;

  const statName = details.statId === undefined ? undefined : statsTable.get(details.statId);
  if (statName) {
    name += ` [${statName}]`;
  }

  if (details.boundTo) {
    name += ` (bound to ${details.boundTo})`;
  } else if (details.binding === 'Account') {
    name += ' (account bound)';
  }

  return details.count > 1 ? `(${details.count}) ${name}` : name;
}

export function filterItems(
  locationMap: LocationMap,
  definitions: ReadonlyMap<number, ItemDefinition>,
  statsTable: ReadonlyMap<number, string>,
  filters: ItemFilters,
): FoundItems {
  const compiled = compileFilters(filters);
  const found: FoundItems = new Map();

  for (const [id, occurrences] of locationMap) {
    const definition = definitions.get(id);
    if (!definition) {
      log.debug(`no definition for item ${id}, skipping`);
      continue;
    }

    if (!matchesDefinition(definition, compiled) || !matchesSlot(occurrences, compiled.slot)) {
      continue;
    }

    for (const details of occurrences) {
      const key = displayName(definition, details, statsTable);
      const group = found.get(key);
      if (group) {
        group.push(details);
      } else {
        found.set(key, [details]);
      }
    }
  }

  return found;
}
