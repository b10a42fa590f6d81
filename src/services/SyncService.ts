import { validateConfig, type AppConfig } from '../config';
import { toErrorMessage } from '../errors';
import { InvenTreeClient } from '../inventree/InvenTreeClient';
import type { InventoryGateway } from '../inventree/InventoryGateway';
import type { Company, Part, PriceBreakRecord, SupplierPart } from '../inventree/schemas';
import { logger } from '../logger';
import { createSupplierClients, type SupplierClient } from '../suppliers';
import type {
  AssemblyPartResult,
  BomBuildSummary,
  BomItemResult,
  BomLine,
  BomLineResult,
  PartInfo,
  SupplierKey,
  SupplierPartChanges,
  SupplierPartSyncResult,
  SyncPartResult,
} from '../types';
import { normalizeSupplierKey } from '../utils/validators';
import { diffSupplierPart, hasChanges, normalizePricing, PRICE_TOLERANCE } from './partDiff';

const UNKNOWN_MANUFACTURER = 'Unknown';

export interface BomBuildHooks {
  onAssembly?: (assembly: AssemblyPartResult) => void;
  onLineStart?: (line: BomLine, index: number, total: number) => void;
  onLine?: (result: BomLineResult, index: number, total: number) => void;
}

interface Upserted<T> {
  record: T;
  created: boolean;
}

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function sameCode(a: string | null | undefined, b: string): boolean {
  return (a ?? '').trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Reconciles supplier catalog records with the inventory server.
 *
 * Every write is preceded by a lookup, so running the same operation twice
 * against unchanged supplier data performs no writes the second time.
 */
export class SyncService {
  private inventree: InventoryGateway;
  private suppliers = new Map<SupplierKey, SupplierClient>();

  constructor(inventree: InventoryGateway, suppliers: SupplierClient[]) {
    this.inventree = inventree;
    for (const supplier of suppliers) {
      this.suppliers.set(supplier.key, supplier);
    }
  }

  static fromConfig(config: AppConfig): SyncService {
    validateConfig(config);
    const inventree = new InvenTreeClient(config.inventree, { timeoutMs: config.requestTimeoutMs });
    return new SyncService(inventree, createSupplierClients(config));
  }

  getConfiguredSuppliers(): SupplierKey[] {
    return Array.from(this.suppliers.keys());
  }

  /**
   * Look a part number up at one supplier, or at each configured supplier in
   * turn. The first match wins.
   */
  async getPartFromSupplier(partNumber: string, supplier?: SupplierKey): Promise<PartInfo | null> {
    if (supplier) {
      const client = this.suppliers.get(supplier);
      if (!client) {
        logger.warn({ supplier }, 'Supplier is not configured');
        return null;
      }
      return client.getPartInfo(partNumber);
    }

    for (const client of this.suppliers.values()) {
      const info = await client.getPartInfo(partNumber);
      if (info) {
        return info;
      }
    }
    return null;
  }

  /**
   * Find a part at the suppliers and create or update it in InvenTree.
   * Resolves to null, without touching InvenTree, when no supplier lists it.
   */
  async syncPart(partNumber: string, supplier?: SupplierKey): Promise<SyncPartResult | null> {
    const info = await this.getPartFromSupplier(partNumber, supplier);
    if (!info) {
      return null;
    }
    return this.syncPartInfo(info);
  }

  async syncPartInfo(info: PartInfo): Promise<SyncPartResult> {
    logger.debug({ supplier: info.supplierKey, sku: info.supplierPartNumber }, 'Syncing part');

    const manufacturer = await this.getOrCreateCompany(info.manufacturerName || UNKNOWN_MANUFACTURER, 'manufacturer');
    const categoryId = info.category ? (await this.getOrCreateCategory(info.category)).pk : undefined;
    const part = await this.getOrCreatePart(info, categoryId);
    const manufacturerPart = await this.getOrCreateManufacturerPart(part.record, manufacturer.record, info);
    const supplierCompany = await this.getOrCreateCompany(info.supplierName, 'supplier');

    let supplierPartUpdated = false;
    const existing = (await this.inventree.findSupplierParts({
      supplier: supplierCompany.record.pk,
      SKU: info.supplierPartNumber,
    })).find((sp) => sameCode(sp.SKU, info.supplierPartNumber));

    let supplierPart: SupplierPart;
    if (existing) {
      supplierPart = existing;
      const breaks = await this.inventree.listPriceBreaks(existing.pk);
      const changes = diffSupplierPart(existing, breaks, info);
      if (hasChanges(changes)) {
        await this.applySupplierPartChanges(existing, breaks, info, changes);
        supplierPartUpdated = true;
      }
    } else {
      supplierPart = await this.inventree.createSupplierPart({
        part: part.record.pk,
        supplier: supplierCompany.record.pk,
        manufacturer_part: manufacturerPart.record.pk,
        SKU: info.supplierPartNumber,
        MPN: info.manufacturerPartNumber,
        description: info.description,
        link: info.productUrl ?? '',
        note: `Synced from ${info.supplierName}`,
        active: info.active,
        ...(info.packaging ? { packaging: info.packaging } : {}),
        ...(info.stock !== undefined && { available: info.stock }),
      });
      for (const priceBreak of normalizePricing(info.pricing)) {
        await this.inventree.createPriceBreak({
          part: supplierPart.pk,
          quantity: priceBreak.quantity,
          price: priceBreak.price,
          ...(priceBreak.currency ? { price_currency: priceBreak.currency } : {}),
        });
      }
    }

    return {
      supplier: info.supplierKey,
      manufacturer: manufacturer.record.name,
      manufacturerPartNumber: info.manufacturerPartNumber,
      supplierPartNumber: info.supplierPartNumber,
      description: info.description,
      partId: part.record.pk,
      supplierPartId: supplierPart.pk,
      created: {
        manufacturer: manufacturer.created,
        supplier: supplierCompany.created,
        part: part.created,
        manufacturerPart: manufacturerPart.created,
        supplierPart: !existing,
      },
      imageUploaded: part.imageUploaded,
      supplierPartUpdated,
    };
  }

  private async getOrCreateCompany(name: string, role: 'manufacturer' | 'supplier'): Promise<Upserted<Company>> {
    const isManufacturer = role === 'manufacturer';
    const matches = await this.inventree.findCompanies(
      isManufacturer ? { name, is_manufacturer: true } : { name, is_supplier: true }
    );
    const found = matches.find((c) => sameName(c.name, name));
    if (found) {
      return { record: found, created: false };
    }

    const record = await this.inventree.createCompany({
      name,
      ...(!isManufacturer && { description: `Supplier: ${name}` }),
      is_manufacturer: isManufacturer,
      is_supplier: !isManufacturer,
      is_customer: false,
    });
    return { record, created: true };
  }

  private async getOrCreateCategory(name: string): Promise<{ pk: number }> {
    const found = (await this.inventree.findCategories({ name })).find((c) => sameName(c.name, name));
    return found ?? this.inventree.createCategory({ name });
  }

  private async getOrCreatePart(
    info: PartInfo,
    categoryId: number | undefined
  ): Promise<Upserted<Part> & { imageUploaded: boolean }> {
    const name = info.manufacturerPartNumber || info.supplierPartNumber;
    const found = (await this.inventree.findParts({ name })).find((p) => p.name === name);

    if (found) {
      let imageUploaded = false;
      if (info.imageUrl && !found.image) {
        imageUploaded = await this.uploadImage(found.pk, info.imageUrl);
      }
      return { record: found, created: false, imageUploaded };
    }

    const record = await this.inventree.createPart({
      name,
      description: info.description,
      ...(categoryId !== undefined && { category: categoryId }),
      ...(info.datasheetUrl ? { link: info.datasheetUrl } : {}),
      component: true,
      assembly: false,
      purchaseable: true,
      active: true,
    });
    const imageUploaded = info.imageUrl ? await this.uploadImage(record.pk, info.imageUrl) : false;
    return { record, created: true, imageUploaded };
  }

  // A missing image never blocks the rest of the sync
  private async uploadImage(partId: number, imageUrl: string): Promise<boolean> {
    try {
      return await this.inventree.uploadPartImage(partId, imageUrl);
    } catch (error) {
      logger.warn({ part: partId, error: toErrorMessage(error) }, 'Could not upload part image');
      return false;
    }
  }

  private async getOrCreateManufacturerPart(part: Part, manufacturer: Company, info: PartInfo) {
    const mpn = info.manufacturerPartNumber || info.supplierPartNumber;
    const found = (await this.inventree.findManufacturerParts({ manufacturer: manufacturer.pk, MPN: mpn })).find(
      (mp) => sameCode(mp.MPN, mpn)
    );
    if (found) {
      return { record: found, created: false };
    }

    const record = await this.inventree.createManufacturerPart({
      part: part.pk,
      manufacturer: manufacturer.pk,
      MPN: mpn,
      description: info.description,
      link: info.datasheetUrl ?? '',
      note: `Synced from ${info.supplierName}`,
    });
    return { record, created: true };
  }

  private async applySupplierPartChanges(
    stored: SupplierPart,
    storedBreaks: PriceBreakRecord[],
    live: PartInfo,
    changes: SupplierPartChanges
  ): Promise<void> {
    if (changes.active) {
      await this.inventree.updateSupplierPart(stored.pk, { active: changes.active.new });
    }

    if (changes.pricing) {
      for (const record of storedBreaks) {
        await this.inventree.deletePriceBreak(record.pk);
      }
      for (const priceBreak of changes.pricing.new) {
        await this.inventree.createPriceBreak({
          part: stored.pk,
          quantity: priceBreak.quantity,
          price: priceBreak.price,
          ...(priceBreak.currency ? { price_currency: priceBreak.currency } : {}),
        });
      }
    }

    logger.info({ supplierPart: stored.pk, sku: live.supplierPartNumber, fields: Object.keys(changes) }, 'Updated supplier part');
  }

  /**
   * Re-validate stored supplier parts against the live supplier APIs,
   * yielding one result per supplier part as it is processed.
   */
  async *syncAllSupplierParts(supplier?: SupplierKey): AsyncGenerator<SupplierPartSyncResult> {
    const companies = await this.inventree.findCompanies({ is_supplier: true });
    const companyNames = new Map(companies.map((c) => [c.pk, c.name]));

    let supplierParts: SupplierPart[];
    if (supplier) {
      const client = this.suppliers.get(supplier);
      if (!client) {
        throw new Error(`Supplier '${supplier}' is not configured`);
      }
      const matching = companies.filter((c) => normalizeSupplierKey(c.name) === client.key);
      if (matching.length === 0) {
        logger.info({ supplier }, 'Supplier has no company in InvenTree; nothing to sync');
        return;
      }
      supplierParts = [];
      for (const company of matching) {
        supplierParts.push(...(await this.inventree.findSupplierParts({ supplier: company.pk })));
      }
    } else {
      supplierParts = await this.inventree.findSupplierParts({});
    }

    logger.info({ count: supplierParts.length, supplier }, 'Syncing supplier parts');

    for (const stored of supplierParts) {
      yield await this.resyncSupplierPart(stored, companyNames.get(stored.supplier) ?? `#${stored.supplier}`);
    }
  }

  private async resyncSupplierPart(stored: SupplierPart, supplierName: string): Promise<SupplierPartSyncResult> {
    const base = { supplierPartId: stored.pk, sku: stored.SKU, supplier: supplierName };

    const key = normalizeSupplierKey(supplierName);
    const client = key ? this.suppliers.get(key) : undefined;
    if (!client) {
      return { ...base, status: 'skipped', message: 'No configured API for this supplier' };
    }

    let live: PartInfo | null;
    let breaks: PriceBreakRecord[];
    try {
      live = await client.getPartInfo(stored.SKU);
      breaks = live ? await this.inventree.listPriceBreaks(stored.pk) : [];
    } catch (error) {
      return { ...base, status: 'error', message: toErrorMessage(error) };
    }

    if (!live) {
      return { ...base, status: 'not_found', message: 'Not found at supplier' };
    }
    if (!sameCode(live.supplierPartNumber, stored.SKU)) {
      return {
        ...base,
        status: 'not_found',
        message: `Supplier returned ${live.supplierPartNumber} instead`,
      };
    }

    const changes = diffSupplierPart(stored, breaks, live);
    if (!hasChanges(changes)) {
      return { ...base, status: 'up_to_date', message: 'Up to date' };
    }

    try {
      await this.applySupplierPartChanges(stored, breaks, live, changes);
    } catch (error) {
      return { ...base, status: 'update_failed', message: toErrorMessage(error), changes };
    }
    return { ...base, status: 'updated', message: `Updated: ${Object.keys(changes).join(', ')}`, changes };
  }

  /**
   * Look up an assembly part by IPN, creating it when absent
   */
  async createAssemblyPart(partNumber: string): Promise<AssemblyPartResult> {
    const found = (await this.inventree.findParts({ IPN: partNumber })).find((p) => p.IPN === partNumber);
    if (found) {
      return { partId: found.pk, name: found.name, description: found.description ?? '', exists: true };
    }

    const part = await this.inventree.createPart({
      name: partNumber,
      IPN: partNumber,
      description: `Assembly: ${partNumber}`,
      component: false,
      assembly: true,
      purchaseable: false,
      active: true,
      revision: 'R100',
    });
    return { partId: part.pk, name: part.name, description: part.description ?? '', exists: false };
  }

  async addBomItem(
    assemblyPartId: number,
    subPartId: number,
    quantity: number,
    reference = ''
  ): Promise<BomItemResult> {
    const existing = (await this.inventree.findBomItems({ part: assemblyPartId, sub_part: subPartId })).find(
      (item) => item.part === assemblyPartId && item.sub_part === subPartId
    );

    if (!existing) {
      const created = await this.inventree.createBomItem({
        part: assemblyPartId,
        sub_part: subPartId,
        quantity,
        ...(reference ? { reference } : {}),
      });
      return { bomItemId: created.pk, outcome: 'created' };
    }

    const sameQuantity = Math.abs(existing.quantity - quantity) <= PRICE_TOLERANCE;
    const sameReference = existing.reference.trim() === reference.trim();
    if (sameQuantity && sameReference) {
      return { bomItemId: existing.pk, outcome: 'unchanged' };
    }

    await this.inventree.updateBomItem(existing.pk, { quantity, reference });
    return { bomItemId: existing.pk, outcome: 'updated' };
  }

  /**
   * Create (or reuse) the assembly and add every BOM line to it. A failing
   * line is recorded and the remaining lines are still processed.
   */
  async buildBom(assemblyNumber: string, lines: BomLine[], hooks: BomBuildHooks = {}): Promise<BomBuildSummary> {
    const assembly = await this.createAssemblyPart(assemblyNumber);
    hooks.onAssembly?.(assembly);
    const results: BomLineResult[] = [];

    for (const [index, line] of lines.entries()) {
      hooks.onLineStart?.(line, index, lines.length);
      const result = await this.processBomLine(assembly.partId, line);
      results.push(result);
      hooks.onLine?.(result, index, lines.length);
    }

    const count = (status: BomLineResult['status']) => results.filter((r) => r.status === status).length;
    return {
      assembly,
      results,
      added: count('added'),
      updated: count('updated'),
      unchanged: count('unchanged'),
      notFound: count('not_found'),
      failed: count('error'),
    };
  }

  private async processBomLine(assemblyPartId: number, line: BomLine): Promise<BomLineResult> {
    const key = normalizeSupplierKey(line.supplier);
    const supplier = key && this.suppliers.has(key) ? key : undefined;
    // An SPN from a supplier without a configured client means nothing to the others
    const foreignSpn = Boolean(line.supplier) && !supplier;
    const partNumber = foreignSpn ? line.mpn || line.spn : line.spn || line.mpn;

    try {
      let part: SyncPartResult | null = null;
      if (!foreignSpn) {
        part = await this.syncPart(partNumber, supplier);
        if (!part && line.spn && line.mpn && line.mpn !== line.spn) {
          part = await this.syncPart(line.mpn);
        }
      } else if (line.mpn) {
        part = await this.syncPart(line.mpn);
      }
      if (!part) {
        return { line, partNumber, status: 'not_found', message: `Part not found: ${partNumber}` };
      }

      const bomItem = await this.addBomItem(assemblyPartId, part.partId, line.quantity, line.designators);
      const status = bomItem.outcome === 'created' ? 'added' : bomItem.outcome;
      return { line, partNumber, status, message: `${status}: ${part.manufacturerPartNumber}`, part };
    } catch (error) {
      logger.error({ row: line.row, partNumber, error: toErrorMessage(error) }, 'BOM line failed');
      return { line, partNumber, status: 'error', message: toErrorMessage(error) };
    }
  }
}
