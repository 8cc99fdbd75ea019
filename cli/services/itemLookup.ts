import { clampItemsPerRequest } from '../config.js';
import { itemsRequest } from '../connectors/items.js';
import { Logger } from '../lib/logger.js';
import type { RequestBatch } from '../lib/batch.js';
import type { ItemDefinition } from '../types.js';

const log = Logger.scope('lookup');

export function chunkIds(ids: string[], size: number): string[][] {
  const limit = clampItemsPerRequest(size);
  const chunks: string[][] = [];
  for (let start = 0; start < ids.length; start += limit) {
    chunks.push(ids.slice(start, start + limit));
  }
  return chunks;
}

export async function fetchItemDefinitions(
  batch: RequestBatch,
  baseUrl: string,
  pendingIds: string[],
  maxItemsPerRequest: number,
): Promise<ItemDefinition[]> {
  const chunks = chunkIds(pendingIds, maxItemsPerRequest);
  if (chunks.length === 0) {
    return [];
  }

  log.debug(`looking up ${pendingIds.length} item(s) in ${chunks.length} chunk(s)`);
  const handles = chunks.map((ids) => batch.submit(itemsRequest(baseUrl, ids)));
  await batch.sync();

  return handles.flatMap((handle) => handle.value());
}

export function indexDefinitions(
  known: ReadonlyMap<number, ItemDefinition>,
  fetched: ItemDefinition[],
): Map<number, ItemDefinition> {
  const definitions = new Map(known);
  for (const definition of fetched) {
    definitions.set(definition.id, definition);
  }
  return definitions;
}
