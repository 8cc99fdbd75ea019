export type ContainerId = 'characters' | 'bank' | 'sharedInventory' | 'materials' | 'legendaryArmory';

export const ALL_CONTAINERS: ContainerId[] = ['characters', 'bank', 'sharedInventory', 'materials', 'legendaryArmory'];

export type Binding = 'Account' | 'Character';

export interface ItemReference {
  id: number;
  count?: number;
  binding?: Binding;
  bound_to?: string;
  slot?: string;
  stats?: {
    id: number;
  };
  upgrades?: number[];
  infusions?: number[];
}

export interface ItemDefinition {
  id: number;
  name: string;
  type: string;
  rarity: string;
  details?: {
    type?: string;
    weight_class?: string;
  };
}

export interface CharacterBag {
  id: number;
  size: number;
  inventory: Array<ItemReference | null>;
}

export interface Character {
  name: string;
  equipment: ItemReference[];
  bags: Array<CharacterBag | null>;
}

export interface MaterialEntry {
  id: number;
  category: number;
  count: number;
  binding?: Binding;
}

export interface MaterialCategory {
  id: number;
  name: string;
  items: number[];
}

export interface LegendaryArmoryEntry {
  id: number;
  count: number;
}

export type Location =
  | { kind: 'inventory'; character: string; bag: number; slot: number }
  | { kind: 'equipped'; character: string; slot: string }
  | { kind: 'bank'; tab: number; slot: number }
  | { kind: 'sharedInventory'; slot: number }
  | { kind: 'materialStorage'; categoryName?: string; row?: number; slot?: number }
  | { kind: 'legendaryArmory'; slot: number }
  | { kind: 'upgrade'; parent: ItemDetails };

export interface ItemDetails {
  item: ItemReference;
  location: Location;
  count: number;
  statId?: number;
  binding?: Binding;
  boundTo?: string;
}

export type LocationMap = Map<number, ItemDetails[]>;

export type FoundItems = Map<string, ItemDetails[]>;

export interface AccountContext {
  characters?: Character[];
  bank?: Array<ItemReference | null>;
  sharedInventory?: Array<ItemReference | null>;
  materials?: MaterialEntry[];
  materialCategories: Map<number, MaterialCategory>;
  legendaryArmory?: LegendaryArmoryEntry[];
  statsTable: Map<number, string>;
  definitions: Map<number, ItemDefinition>;
  locationMap: LocationMap;
  lookedUpItems: ReadonlySet<number>;
  found: FoundItems;
}

export interface ItemFilters {
  itemName?: string;
  regex: boolean;
  rarity?: string;
  type?: string;
  weightClass?: string;
  slot?: string;
}

export interface SearchOptions {
  apiKey: string;
  containers: ContainerId[];
  character?: string;
  filters: ItemFilters;
  maxItemsPerRequest?: number;
  json: boolean;
  verbose: boolean;
  debug: boolean;
}

export function createAccountContext(): AccountContext {
  return {
    materialCategories: new Map(),
    statsTable: new Map(),
    definitions: new Map(),
    locationMap: new Map(),
    lookedUpItems: new Set(),
    found: new Map(),
  };
}
