import { bankRequest, legendaryArmoryRequest, materialStorageRequest, sharedInventoryRequest } from './account.js';
import { charactersRequest } from './characters.js';
import { itemStatsRequest } from './itemstats.js';
import { materialCategoriesRequest } from './materials.js';
import type { ApiRequest } from '../lib/batch.js';
import type { AccountContext, ContainerId } from '../types.js';

type RequestFactory = (baseUrl: string, context: AccountContext) => ApiRequest<unknown>[];

const containerRequests: Record<ContainerId, RequestFactory> = {
  characters: (baseUrl, context) => [charactersRequest(baseUrl, context)],
  bank: (baseUrl, context) => [bankRequest(baseUrl, context)],
  sharedInventory: (baseUrl, context) => [sharedInventoryRequest(baseUrl, context)],
  materials: (baseUrl, context) => [
    materialStorageRequest(baseUrl, context),
    materialCategoriesRequest(baseUrl, context),
  ],
  legendaryArmory: (baseUrl, context) => [legendaryArmoryRequest(baseUrl, context)],
};

export function getResourceRequests(
  containers: ContainerId[],
  baseUrl: string,
  context: AccountContext,
): ApiRequest<unknown>[] {
  return [
    itemStatsRequest(baseUrl, context),
    ...containers.flatMap((container) => containerRequests[container](baseUrl, context)),
  ];
}
