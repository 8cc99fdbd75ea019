import { z } from 'zod';

const id = z.number().int();

export const itemReferenceSchema = z.object({
  id,
  count: z.number().int().optional(),
  binding: z.enum(['Account', 'Character']).optional(),
  bound_to: z.string().optional(),
  slot: z.string().optional(),
  stats: z.object({ id }).optional(),
  upgrades: z.array(id).optional(),
  infusions: z.array(id).optional(),
});

export const containerSlotsSchema = z.array(itemReferenceSchema.nullable());

export const characterSchema = z.object({
  name: z.string(),
  equipment: z.array(itemReferenceSchema).default([]),
  bags: z
    .array(
      z
        .object({
          id,
          size: z.number().int(),
          inventory: containerSlotsSchema,
        })
        .nullable(),
    )
    .default([]),
});

export const materialEntrySchema = z.object({
  id,
  category: id,
  count: z.number().int(),
  binding: z.enum(['Account', 'Character']).optional(),
});

export const materialCategorySchema = z.object({
  id,
  name: z.string(),
  items: z.array(id),
});

export const legendaryArmoryEntrySchema = z.object({
  id,
  count: z.number().int(),
});

export const itemStatSchema = z.object({
  id,
  name: z.string(),
});

export const itemDefinitionSchema = z.object({
  id,
  name: z.string(),
  type: z.string(),
  rarity: z.string(),
  details: z
    .object({
      type: z.string().optional(),
      weight_class: z.string().optional(),
    })
    .optional(),
});
