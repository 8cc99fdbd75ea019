import { z } from 'zod';
import { jsonRequest } from './api.js';
import { itemStatSchema } from './schemas.js';
import type { ApiRequest } from '../lib/batch.js';
import type { AccountContext } from '../types.js';

export type StatsTable = Map<number, string>;

export function buildStatsTable(stats: Array<{ id: number; name: string }>): StatsTable {
  const table: StatsTable = new Map();
  for (const stat of stats) {
    const name = stat.name.trim();
    if (name.length > 0) {
      table.set(stat.id, name);
    }
  }
  return table;
}

export function itemStatsRequest(baseUrl: string, context: AccountContext): ApiRequest<StatsTable> {
  const request = jsonRequest({
    label: 'itemstats',
    baseUrl,
    path: 'itemstats',
    query: { ids: 'all' },
    schema: z.array(itemStatSchema),
  });

  return {
    ...request,
    parse: (response, url) => buildStatsTable(request.parse(response, url)),
    onComplete: (table) => {
      context.statsTable = table;
    },
  };
}
