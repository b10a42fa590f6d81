import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { DigikeyConfig } from '../config';
import { SupplierApiError, httpStatusOf, toErrorMessage } from '../errors';
import { logger } from '../logger';
import type { PartInfo, PriceBreak } from '../types';
import { DigikeyTokenStore, type CachedToken } from './digikeyTokenStore';
import { emptyToUndefined, parsePrice, type SupplierClient } from './SupplierClient';

const PRODUCTION_URL = 'https://api.digikey.com';
const SANDBOX_URL = 'https://sandbox-api.digikey.com';

// Refresh this long before the server-side expiry
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const tokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.coerce.number(),
});

const priceBreakSchema = z.object({
  BreakQuantity: z.coerce.number(),
  UnitPrice: z.coerce.number(),
});

const variationSchema = z.object({
  DigiKeyProductNumber: z.string(),
  PackageType: z.object({ Name: z.string().nullish() }).nullish(),
  StandardPricing: z.array(priceBreakSchema).nullish(),
});

export const digikeyProductSchema = z.object({
  Description: z
    .object({
      ProductDescription: z.string().nullish(),
      DetailedDescription: z.string().nullish(),
    })
    .nullish(),
  Manufacturer: z.object({ Name: z.string().nullish() }).nullish(),
  ManufacturerProductNumber: z.string().nullish(),
  ProductUrl: z.string().nullish(),
  DatasheetUrl: z.string().nullish(),
  PhotoUrl: z.string().nullish(),
  QuantityAvailable: z.coerce.number().nullish(),
  ProductStatus: z.object({ Status: z.string().nullish() }).nullish(),
  Discontinued: z.boolean().nullish(),
  EndOfLife: z.boolean().nullish(),
  Category: z.object({ Name: z.string().nullish() }).nullish(),
  ProductVariations: z.array(variationSchema).nullish(),
});

export type DigikeyProduct = z.infer<typeof digikeyProductSchema>;

const productDetailsSchema = z.object({ Product: digikeyProductSchema });

const keywordSearchSchema = z.object({
  Products: z.array(digikeyProductSchema).nullish(),
  ExactMatches: z.array(digikeyProductSchema).nullish(),
});

/**
 * Convert a DigiKey v4 product to a PartInfo.
 *
 * The variation matching `requestedNumber` supplies SKU, packaging and
 * pricing; otherwise the first variation does.
 */
export function convertDigikeyProduct(product: DigikeyProduct, requestedNumber: string): PartInfo {
  const variations = product.ProductVariations ?? [];
  const wanted = requestedNumber.trim().toLowerCase();
  const variation =
    variations.find((v) => v.DigiKeyProductNumber.toLowerCase() === wanted) ?? variations[0];

  const pricing: PriceBreak[] = [];
  for (const price of variation?.StandardPricing ?? []) {
    const unitPrice = parsePrice(price.UnitPrice);
    if (unitPrice !== null) {
      pricing.push({ quantity: price.BreakQuantity, price: unitPrice, currency: 'USD' });
    }
  }

  const status = product.ProductStatus?.Status ?? 'Active';
  const active = status.toLowerCase() === 'active' && !product.Discontinued && !product.EndOfLife;

  return {
    supplierKey: 'digikey',
    supplierName: 'DigiKey',
    manufacturerName: product.Manufacturer?.Name?.trim() ?? '',
    manufacturerPartNumber: product.ManufacturerProductNumber?.trim() ?? '',
    supplierPartNumber: variation?.DigiKeyProductNumber ?? '',
    description:
      product.Description?.ProductDescription?.trim() ?? product.Description?.DetailedDescription?.trim() ?? '',
    datasheetUrl: emptyToUndefined(product.DatasheetUrl),
    imageUrl: emptyToUndefined(product.PhotoUrl),
    productUrl: emptyToUndefined(product.ProductUrl),
    category: emptyToUndefined(product.Category?.Name),
    packaging: emptyToUndefined(variation?.PackageType?.Name),
    stock: product.QuantityAvailable ?? undefined,
    pricing,
    active,
  };
}

/**
 * DigiKey Product Information API v4 client
 */
export class DigikeyClient implements SupplierClient {
  readonly key = 'digikey' as const;
  readonly name = 'DigiKey';

  private config: DigikeyConfig;
  private http: AxiosInstance;
  private tokenStore: DigikeyTokenStore;
  private token: CachedToken | null = null;

  constructor(config: DigikeyConfig, http?: AxiosInstance, timeoutMs = 30000) {
    this.config = config;
    this.http = http ?? axios.create({ timeout: timeoutMs });
    this.tokenStore = new DigikeyTokenStore(config.storagePath);
  }

  private get baseUrl(): string {
    return this.config.sandbox ? SANDBOX_URL : PRODUCTION_URL;
  }

  async getPartInfo(partNumber: string): Promise<PartInfo | null> {
    const details = await this.getProductDetails(partNumber);
    if (details) {
      return convertDigikeyProduct(details, partNumber);
    }

    // Direct lookup only knows DigiKey numbers; fall back to keyword search
    const hit = await this.keywordSearch(partNumber);
    const hitNumber = hit?.ProductVariations?.[0]?.DigiKeyProductNumber;
    if (!hit || !hitNumber) {
      logger.debug({ partNumber }, 'No DigiKey match');
      return null;
    }

    const hitDetails = await this.getProductDetails(hitNumber);
    return convertDigikeyProduct(hitDetails ?? hit, hitNumber);
  }

  private async getProductDetails(productNumber: string): Promise<DigikeyProduct | null> {
    const url = `${this.baseUrl}/products/v4/search/${encodeURIComponent(productNumber)}/productdetails`;
    try {
      const response = await this.http.get(url, { headers: await this.headers() });
      return productDetailsSchema.parse(response.data).Product;
    } catch (error) {
      if (httpStatusOf(error) === 404) {
        return null;
      }
      throw this.wrap(error, `product details for ${productNumber}`);
    }
  }

  private async keywordSearch(keywords: string): Promise<DigikeyProduct | null> {
    try {
      const response = await this.http.post(
        `${this.baseUrl}/products/v4/search/keyword`,
        { Keywords: keywords, Limit: 1, Offset: 0 },
        { headers: await this.headers() }
      );
      const result = keywordSearchSchema.parse(response.data);
      return result.ExactMatches?.[0] ?? result.Products?.[0] ?? null;
    } catch (error) {
      if (httpStatusOf(error) === 404) {
        return null;
      }
      throw this.wrap(error, `keyword search for ${keywords}`);
    }
  }

  private async headers(): Promise<Record<string, string>> {
    const accessToken = await this.getAccessToken();
    return {
      Authorization: `Bearer ${accessToken}`,
      'X-DIGIKEY-Client-Id': this.config.clientId,
      'X-DIGIKEY-Locale-Site': 'US',
      'X-DIGIKEY-Locale-Language': 'en',
      'X-DIGIKEY-Locale-Currency': 'USD',
    };
  }

  private isFresh(token: CachedToken | null): token is CachedToken {
    return token !== null && token.expiresAt - TOKEN_EXPIRY_MARGIN_MS > Date.now();
  }

  async getAccessToken(): Promise<string> {
    if (this.isFresh(this.token)) {
      return this.token.accessToken;
    }

    const stored = await this.tokenStore.load();
    if (this.isFresh(stored)) {
      this.token = stored;
      return stored.accessToken;
    }

    const parsed = await this.requestToken();
    const token: CachedToken = {
      accessToken: parsed.access_token,
      expiresAt: Date.now() + parsed.expires_in * 1000,
    };
    this.token = token;
    await this.tokenStore.save(token);
    logger.debug({ expiresIn: parsed.expires_in }, 'Obtained DigiKey access token');
    return token.accessToken;
  }

  private async requestToken(): Promise<z.infer<typeof tokenResponseSchema>> {
    const body = new URLSearchParams({
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      grant_type: 'client_credentials',
    });

    try {
      const response = await this.http.post(`${this.baseUrl}/v1/oauth2/token`, body.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      });
      return tokenResponseSchema.parse(response.data);
    } catch (error) {
      throw this.wrap(error, 'OAuth token request');
    }
  }

  private wrap(error: unknown, what: string): SupplierApiError {
    if (error instanceof SupplierApiError) {
      return error;
    }
    const status = httpStatusOf(error);
    logger.error({ supplier: this.key, status, error: toErrorMessage(error) }, `DigiKey ${what} failed`);
    return new SupplierApiError(this.key, `DigiKey ${what} failed: ${toErrorMessage(error)}`, status);
  }
}
