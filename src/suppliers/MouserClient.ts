import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { MouserConfig } from '../config';
import { SupplierApiError, httpStatusOf, toErrorMessage } from '../errors';
import { logger } from '../logger';
import type { PartInfo, PriceBreak } from '../types';
import { emptyToUndefined, parsePrice, type SupplierClient } from './SupplierClient';

const SEARCH_URL = 'https://api.mouser.com/api/v1/search/partnumber';

const INACTIVE_LIFECYCLE = /obsolete|end of life|discontinued/i;

export const mouserPartSchema = z.object({
  Manufacturer: z.string().nullish(),
  ManufacturerPartNumber: z.string().nullish(),
  MouserPartNumber: z.string().nullish(),
  Description: z.string().nullish(),
  DataSheetUrl: z.string().nullish(),
  ImagePath: z.string().nullish(),
  Category: z.string().nullish(),
  ProductDetailUrl: z.string().nullish(),
  AvailabilityInStock: z.union([z.string(), z.number()]).nullish(),
  LifecycleStatus: z.string().nullish(),
  PriceBreaks: z
    .array(
      z.object({
        Quantity: z.coerce.number(),
        Price: z.union([z.string(), z.number()]),
        Currency: z.string().nullish(),
      })
    )
    .nullish(),
});

export type MouserPart = z.infer<typeof mouserPartSchema>;

const searchResponseSchema = z.object({
  Errors: z
    .array(
      z.object({
        Code: z.string().nullish(),
        Message: z.string().nullish(),
      })
    )
    .nullish(),
  SearchResults: z
    .object({
      NumberOfResult: z.number().nullish(),
      Parts: z.array(mouserPartSchema).nullish(),
    })
    .nullish(),
});

function parseStock(value: string | number | null | undefined): number | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const n = typeof value === 'number' ? value : parseInt(value.replace(/[^\d]/g, ''), 10);
  return Number.isFinite(n) ? n : undefined;
}

export function convertMouserPart(part: MouserPart): PartInfo {
  const pricing: PriceBreak[] = [];
  for (const priceBreak of part.PriceBreaks ?? []) {
    const price = parsePrice(priceBreak.Price);
    if (price !== null) {
      pricing.push({
        quantity: priceBreak.Quantity,
        price,
        currency: emptyToUndefined(priceBreak.Currency),
      });
    }
  }

  return {
    supplierKey: 'mouser',
    supplierName: 'Mouser',
    manufacturerName: part.Manufacturer?.trim() ?? '',
    manufacturerPartNumber: part.ManufacturerPartNumber?.trim() ?? '',
    supplierPartNumber: part.MouserPartNumber?.trim() ?? '',
    description: part.Description?.trim() ?? '',
    datasheetUrl: emptyToUndefined(part.DataSheetUrl),
    imageUrl: emptyToUndefined(part.ImagePath),
    productUrl: emptyToUndefined(part.ProductDetailUrl),
    category: emptyToUndefined(part.Category),
    stock: parseStock(part.AvailabilityInStock),
    pricing,
    active: !INACTIVE_LIFECYCLE.test(part.LifecycleStatus ?? ''),
  };
}

/**
 * Mouser Search API client (part number search)
 */
export class MouserClient implements SupplierClient {
  readonly key = 'mouser' as const;
  readonly name = 'Mouser';

  private config: MouserConfig;
  private http: AxiosInstance;

  constructor(config: MouserConfig, http?: AxiosInstance, timeoutMs = 30000) {
    this.config = config;
    this.http = http ?? axios.create({ timeout: timeoutMs });
  }

  async getPartInfo(partNumber: string): Promise<PartInfo | null> {
    let data: unknown;
    try {
      const response = await this.http.post(
        SEARCH_URL,
        { SearchByPartRequest: { mouserPartNumber: partNumber, partSearchOptions: '' } },
        { params: { apiKey: this.config.partApiKey } }
      );
      data = response.data;
    } catch (error) {
      const status = httpStatusOf(error);
      logger.error({ supplier: this.key, status, error: toErrorMessage(error) }, 'Mouser search failed');
      throw new SupplierApiError(this.key, `Mouser search for ${partNumber} failed: ${toErrorMessage(error)}`, status);
    }

    const result = searchResponseSchema.parse(data);
    const errors = result.Errors ?? [];
    if (errors.length > 0) {
      const message = errors.map((e) => e.Message || e.Code || 'unknown error').join('; ');
      throw new SupplierApiError(this.key, `Mouser search for ${partNumber} failed: ${message}`);
    }

    const parts = result.SearchResults?.Parts ?? [];
    if (parts.length === 0) {
      logger.debug({ partNumber }, 'No Mouser match');
      return null;
    }

    const wanted = partNumber.trim().toLowerCase();
    const exact = parts.find(
      (p) =>
        p.MouserPartNumber?.toLowerCase() === wanted || p.ManufacturerPartNumber?.toLowerCase() === wanted
    );
    return convertMouserPart(exact ?? parts[0]);
  }
}
