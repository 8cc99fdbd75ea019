import { z } from 'zod';
import { API_MAX_IDS_PER_REQUEST } from '../config.js';
import { jsonRequest } from './api.js';
import { itemDefinitionSchema } from './schemas.js';
import type { ApiRequest } from '../lib/batch.js';
import type { ItemDefinition } from '../types.js';

export function itemsRequest(baseUrl: string, ids: string[]): ApiRequest<ItemDefinition[]> {
  if (ids.length === 0 || ids.length > API_MAX_IDS_PER_REQUEST) {
    throw new RangeError(`An items request takes 1 to ${API_MAX_IDS_PER_REQUEST} ids, got ${ids.length}`);
  }

  return jsonRequest({
    label: `items (${ids.length})`,
    baseUrl,
    path: 'items',
    query: { ids: ids.join(',') },
    schema: z.array(itemDefinitionSchema),
  });
}
