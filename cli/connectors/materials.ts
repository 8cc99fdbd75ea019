import { z } from 'zod';
import { jsonRequest } from './api.js';
import { materialCategorySchema } from './schemas.js';
import type { ApiRequest } from '../lib/batch.js';
import type { AccountContext, MaterialCategory } from '../types.js';

export function indexCategories(categories: MaterialCategory[]): Map<number, MaterialCategory> {
  const byId = new Map<number, MaterialCategory>();
  for (const category of categories) {
    byId.set(category.id, category);
  }
  return byId;
}

export function materialCategoriesRequest(
  baseUrl: string,
  context: AccountContext,
): ApiRequest<Map<number, MaterialCategory>> {
  const request = jsonRequest({
    label: 'materials',
    baseUrl,
    path: 'materials',
    query: { ids: 'all' },
    schema: z.array(materialCategorySchema),
  });

  return {
    ...request,
    parse: (response, url) => indexCategories(request.parse(response, url)),
    onComplete: (categories) => {
      context.materialCategories = categories;
    },
  };
}
