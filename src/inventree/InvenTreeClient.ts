import axios, { type AxiosInstance, type Method } from 'axios';
import path from 'path';
import { z } from 'zod';
import type { InvenTreeConfig } from '../config';
import { InventoryApiError, httpStatusOf, toErrorMessage } from '../errors';
import { logger } from '../logger';
import type {
  BomItemPatch,
  CompanyFilter,
  InventoryGateway,
  NewBomItem,
  NewCompany,
  NewManufacturerPart,
  NewPart,
  NewPriceBreak,
  NewSupplierPart,
  PartFilter,
  SupplierPartFilter,
  SupplierPartPatch,
} from './InventoryGateway';
import {
  bomItemSchema,
  categorySchema,
  companySchema,
  manufacturerPartSchema,
  pageSchema,
  partSchema,
  priceBreakSchema,
  supplierPartSchema,
  type BomItem,
  type Company,
  type ManufacturerPart,
  type Part,
  type PartCategory,
  type PriceBreakRecord,
  type SupplierPart,
} from './schemas';

export interface InvenTreeClientOptions {
  /** Client for the InvenTree API; defaults to one built from the config */
  http?: AxiosInstance;
  /** Client used to fetch part images from supplier CDNs */
  download?: AxiosInstance;
  timeoutMs?: number;
}

interface DownloadedImage {
  data: ArrayBuffer;
  contentType: string;
  filename: string;
}

type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Protocol-relative supplier image links (`//media.example.com/x.jpg`) need a scheme
 */
export function normalizeImageUrl(url: string): string {
  return url.startsWith('//') ? `https:${url}` : url;
}

export function imageFilename(url: string): string {
  let base = '';
  try {
    base = path.posix.basename(new URL(url).pathname);
  } catch {
    base = '';
  }
  if (!base) {
    return 'image.jpg';
  }
  return path.posix.extname(base) ? base : `${base}.jpg`;
}

/**
 * REST client for the InvenTree API (token authentication)
 */
export class InvenTreeClient implements InventoryGateway {
  private http: AxiosInstance;
  private download: AxiosInstance;

  constructor(config: InvenTreeConfig, options: InvenTreeClientOptions = {}) {
    const timeout = options.timeoutMs ?? 30000;
    this.http =
      options.http ??
      axios.create({
        baseURL: config.serverUrl.replace(/\/+$/, ''),
        timeout,
        headers: {
          Authorization: `Token ${config.token}`,
          Accept: 'application/json',
        },
      });
    this.download = options.download ?? axios.create({ timeout });
  }

  private async send(method: Method, url: string, params?: QueryParams, data?: unknown): Promise<unknown> {
    try {
      const response = await this.http.request({ method, url, params, data });
      logger.debug({ method, url, params, status: response.status }, 'InvenTree request');
      return response.data;
    } catch (error) {
      const status = httpStatusOf(error);
      const detail = axios.isAxiosError(error) ? error.response?.data : undefined;
      logger.error({ method, url, status, detail }, 'InvenTree request failed');
      throw new InventoryApiError(
        method,
        url,
        `InvenTree ${method} ${url} failed: ${toErrorMessage(error)}${detail ? ` (${JSON.stringify(detail)})` : ''}`,
        status,
        detail
      );
    }
  }

  private async list<T extends z.ZodTypeAny>(url: string, schema: T, params: QueryParams): Promise<z.infer<T>[]> {
    const data = await this.send('GET', url, params);
    const items = Array.isArray(data) ? data : pageSchema.parse(data).results;
    return z.array(schema).parse(items);
  }

  private async one<T extends z.ZodTypeAny>(
    method: Method,
    url: string,
    schema: T,
    data?: unknown
  ): Promise<z.infer<T>> {
    return schema.parse(await this.send(method, url, undefined, data));
  }

  // Companies

  async findCompanies(filter: CompanyFilter): Promise<Company[]> {
    return this.list('/api/company/', companySchema, { ...filter });
  }

  async createCompany(data: NewCompany): Promise<Company> {
    logger.info({ name: data.name }, 'Creating company');
    return this.one('POST', '/api/company/', companySchema, data);
  }

  // Categories

  async findCategories(filter: { name: string; parent?: number }): Promise<PartCategory[]> {
    return this.list('/api/part/category/', categorySchema, { ...filter });
  }

  async createCategory(data: { name: string; parent?: number }): Promise<PartCategory> {
    logger.info({ name: data.name }, 'Creating part category');
    return this.one('POST', '/api/part/category/', categorySchema, data);
  }

  // Parts

  async findParts(filter: PartFilter): Promise<Part[]> {
    return this.list('/api/part/', partSchema, { ...filter });
  }

  async createPart(data: NewPart): Promise<Part> {
    logger.info({ name: data.name }, 'Creating part');
    return this.one('POST', '/api/part/', partSchema, data);
  }

  async uploadPartImage(pk: number, imageUrl: string): Promise<boolean> {
    const image = await this.fetchImage(normalizeImageUrl(imageUrl));
    if (!image) {
      return false;
    }

    const form = new FormData();
    form.append('image', new Blob([image.data], { type: image.contentType }), image.filename);
    try {
      await this.send('PATCH', `/api/part/${pk}/`, undefined, form);
    } catch (error) {
      logger.warn({ part: pk, status: httpStatusOf(error), error: toErrorMessage(error) }, 'Part image upload rejected');
      return false;
    }
    logger.info({ part: pk, filename: image.filename }, 'Uploaded part image');
    return true;
  }

  private async fetchImage(url: string): Promise<DownloadedImage | null> {
    try {
      const response = await this.download.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
      const contentType = response.headers['content-type'];
      return {
        data: response.data,
        contentType: typeof contentType === 'string' ? contentType : 'image/jpeg',
        filename: imageFilename(url),
      };
    } catch (error) {
      logger.warn({ url, status: httpStatusOf(error), error: toErrorMessage(error) }, 'Could not download part image');
      return null;
    }
  }

  // Manufacturer parts

  async findManufacturerParts(filter: { manufacturer: number; MPN: string }): Promise<ManufacturerPart[]> {
    return this.list('/api/company/part/manufacturer/', manufacturerPartSchema, { ...filter });
  }

  async createManufacturerPart(data: NewManufacturerPart): Promise<ManufacturerPart> {
    logger.info({ MPN: data.MPN }, 'Creating manufacturer part');
    return this.one('POST', '/api/company/part/manufacturer/', manufacturerPartSchema, data);
  }

  // Supplier parts

  async findSupplierParts(filter: SupplierPartFilter): Promise<SupplierPart[]> {
    return this.list('/api/company/part/', supplierPartSchema, { ...filter });
  }

  async createSupplierPart(data: NewSupplierPart): Promise<SupplierPart> {
    logger.info({ SKU: data.SKU }, 'Creating supplier part');
    return this.one('POST', '/api/company/part/', supplierPartSchema, data);
  }

  async updateSupplierPart(pk: number, patch: SupplierPartPatch): Promise<SupplierPart> {
    logger.info({ supplierPart: pk, patch }, 'Updating supplier part');
    return this.one('PATCH', `/api/company/part/${pk}/`, supplierPartSchema, patch);
  }

  // Price breaks

  async listPriceBreaks(supplierPartId: number): Promise<PriceBreakRecord[]> {
    return this.list('/api/company/price-break/', priceBreakSchema, { part: supplierPartId });
  }

  async createPriceBreak(data: NewPriceBreak): Promise<PriceBreakRecord> {
    return this.one('POST', '/api/company/price-break/', priceBreakSchema, data);
  }

  async deletePriceBreak(pk: number): Promise<void> {
    await this.send('DELETE', `/api/company/price-break/${pk}/`);
  }

  // BOM

  async findBomItems(filter: { part: number; sub_part: number }): Promise<BomItem[]> {
    return this.list('/api/bom/', bomItemSchema, { ...filter });
  }

  async createBomItem(data: NewBomItem): Promise<BomItem> {
    return this.one('POST', '/api/bom/', bomItemSchema, data);
  }

  async updateBomItem(pk: number, patch: BomItemPatch): Promise<BomItem> {
    return this.one('PATCH', `/api/bom/${pk}/`, bomItemSchema, patch);
  }
}
