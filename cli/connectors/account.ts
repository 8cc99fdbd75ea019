import { z } from 'zod';
import { jsonRequest } from './api.js';
import { containerSlotsSchema, legendaryArmoryEntrySchema, materialEntrySchema } from './schemas.js';
import type { ApiRequest } from '../lib/batch.js';
import type { AccountContext, ItemReference, LegendaryArmoryEntry, MaterialEntry } from '../types.js';

export function bankRequest(baseUrl: string, context: AccountContext): ApiRequest<Array<ItemReference | null>> {
  return jsonRequest({
    label: 'bank',
    baseUrl,
    path: 'account/bank',
    schema: containerSlotsSchema,
    onComplete: (slots) => {
      context.bank = slots;
    },
  });
}

export function sharedInventoryRequest(
  baseUrl: string,
  context: AccountContext,
): ApiRequest<Array<ItemReference | null>> {
  return jsonRequest({
    label: 'shared inventory',
    baseUrl,
    path: 'account/inventory',
    schema: containerSlotsSchema,
    onComplete: (slots) => {
      context.sharedInventory = slots;
    },
  });
}

export function materialStorageRequest(baseUrl: string, context: AccountContext): ApiRequest<MaterialEntry[]> {
  return jsonRequest({
    label: 'material storage',
    baseUrl,
    path: 'account/materials',
    schema: z.array(materialEntrySchema),
    onComplete: (entries) => {
      context.materials = entries;
    },
  });
}

export function legendaryArmoryRequest(
  baseUrl: string,
  context: AccountContext,
): ApiRequest<LegendaryArmoryEntry[]> {
  return jsonRequest({
    label: 'legendary armory',
    baseUrl,
    path: 'account/legendaryarmory',
    schema: z.array(legendaryArmoryEntrySchema),
    onComplete: (entries) => {
      context.legendaryArmory = entries;
    },
  });
}
