/**
 * Shapes of the InvenTree REST records this tool reads and writes
 */

import { z } from 'zod';

const decimal = z
  .union([z.string().trim().min(1), z.number()])
  .transform((v) => Number(v))
  .pipe(z.number().finite());

export const companySchema = z.object({
  pk: z.number(),
  name: z.string(),
  description: z.string().nullish(),
  is_manufacturer: z.boolean(),
  is_supplier: z.boolean(),
});

export const categorySchema = z.object({
  pk: z.number(),
  name: z.string(),
  parent: z.number().nullable().default(null),
});

export const partSchema = z.object({
  pk: z.number(),
  name: z.string(),
  IPN: z.string().nullish(),
  description: z.string().nullish(),
  category: z.number().nullish(),
  image: z.string().nullish(),
  assembly: z.boolean().default(false),
  component: z.boolean().default(false),
});

export const manufacturerPartSchema = z.object({
  pk: z.number(),
  part: z.number(),
  manufacturer: z.number(),
  MPN: z.string(),
});

export const supplierPartSchema = z.object({
  pk: z.number(),
  part: z.number(),
  supplier: z.number(),
  SKU: z.string(),
  MPN: z.string().nullish(),
  active: z.boolean().default(true),
});

export const priceBreakSchema = z.object({
  pk: z.number(),
  part: z.number(),
  quantity: decimal,
  price: decimal.nullable(),
  price_currency: z.string().nullish(),
});

export const bomItemSchema = z.object({
  pk: z.number(),
  part: z.number(),
  sub_part: z.number(),
  quantity: decimal,
  reference: z.string().nullish().transform((v) => v ?? ''),
});

export type Company = z.infer<typeof companySchema>;
export type PartCategory = z.infer<typeof categorySchema>;
export type Part = z.infer<typeof partSchema>;
export type ManufacturerPart = z.infer<typeof manufacturerPartSchema>;
export type SupplierPart = z.infer<typeof supplierPartSchema>;
export type PriceBreakRecord = z.infer<typeof priceBreakSchema>;
export type BomItem = z.infer<typeof bomItemSchema>;

/**
 * List endpoints answer with a plain array, or with a page when `limit` is sent
 */
export const pageSchema = z.object({ results: z.array(z.unknown()) });
