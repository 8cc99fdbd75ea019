import { clampItemsPerRequest } from '../config.js';
import type { AppConfig } from '../config.js';
import { getResourceRequests } from '../connectors/index.js';
import { RequestBatch } from '../lib/batch.js';
import type { Transport } from '../lib/http.js';
import { filterItems } from './filters.js';
import { fetchItemDefinitions, indexDefinitions } from './itemLookup.js';
import { buildLocationIndex } from './locationIndex.js';
import { createAccountContext } from '../types.js';
import type { AccountContext, FoundItems, SearchOptions } from '../types.js';

export function createBatch(transport: Transport, apiKey: string): RequestBatch {
  return new RequestBatch(transport, { Authorization: `Bearer ${apiKey}` });
}

export async function fetchAccountResources(
  batch: RequestBatch,
  config: AppConfig,
  options: SearchOptions,
  context: AccountContext,
): Promise<void> {
  for (const request of getResourceRequests(options.containers, config.apiBaseUrl, context)) {
    batch.submit(request);
  }
  await batch.sync();
}

export async function resolveItems(
  batch: RequestBatch,
  config: AppConfig,
  options: SearchOptions,
  context: AccountContext,
): Promise<string[]> {
  const index = buildLocationIndex(
    context,
    { containers: options.containers, character: options.character },
    context.lookedUpItems,
  );
  context.locationMap = index.locationMap;
  context.lookedUpItems = index.lookedUpItems;

  const limit = clampItemsPerRequest(options.maxItemsPerRequest ?? config.maxItemsPerRequest);
  const fetched = await fetchItemDefinitions(batch, config.apiBaseUrl, index.pendingIds, limit);
  context.definitions = indexDefinitions(context.definitions, fetched);

  return index.pendingIds;
}

export function applyFilters(context: AccountContext, options: SearchOptions): FoundItems {
  context.found = filterItems(context.locationMap, context.definitions, context.statsTable, options.filters);
  return context.found;
}

export async function searchAccount(
  options: SearchOptions,
  config: AppConfig,
  transport: Transport,
): Promise<AccountContext> {
  const context = createAccountContext();
  const batch = createBatch(transport, options.apiKey);

  await fetchAccountResources(batch, config, options, context);
  await resolveItems(batch, config, options, context);
  applyFilters(context, options);

  return context;
}
