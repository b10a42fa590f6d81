/**
 * Supplier Part Re-sync Tests
 *
 * Walks every stored supplier part and compares it with the live catalog.
 */

import { SyncService } from '../services/SyncService';
import type { SupplierKey, SupplierPartSyncResult } from '../types';
import { FakeInventory } from './utils/FakeInventory';
import { FakeSupplier, makePartInfo } from './utils/FakeSupplier';

async function collect(service: SyncService, supplier?: SupplierKey): Promise<SupplierPartSyncResult[]> {
  const results: SupplierPartSyncResult[] = [];
  for await (const result of service.syncAllSupplierParts(supplier)) {
    results.push(result);
  }
  return results;
}

describe('SyncService.syncAllSupplierParts', () => {
  let inventory: FakeInventory;
  let digikey: FakeSupplier;
  let service: SyncService;

  beforeEach(() => {
    inventory = new FakeInventory();
    digikey = new FakeSupplier('digikey');
    service = new SyncService(inventory, [digikey]);
  });

  it('reports a status for every stored supplier part', async () => {
    const dk = inventory.seedCompany('DigiKey', 'supplier');
    const mouser = inventory.seedCompany('Mouser Electronics', 'supplier');
    const lcsc = inventory.seedCompany('LCSC', 'supplier');
    inventory.seedSupplierPart(dk, 'DK-UP', true, [[1, 0.5]]);
    inventory.seedSupplierPart(dk, 'DK-DRIFT', true, [[1, 0.5]]);
    inventory.seedSupplierPart(dk, 'DK-GONE', true, []);
    inventory.seedSupplierPart(dk, 'DK-ERR', true, []);
    inventory.seedSupplierPart(dk, 'DK-ALIAS', true, []);
    inventory.seedSupplierPart(mouser, '595-LM358DR', true, []);
    inventory.seedSupplierPart(lcsc, 'C7950', true, []);

    digikey.add(makePartInfo({ supplierPartNumber: 'DK-UP', manufacturerPartNumber: 'UP-1', pricing: [{ quantity: 1, price: 0.5 }] }));
    digikey.add(
      makePartInfo({
        supplierPartNumber: 'DK-DRIFT',
        manufacturerPartNumber: 'DRIFT-1',
        active: false,
        pricing: [{ quantity: 1, price: 0.45 }],
      })
    );
    digikey.failOn('DK-ERR', new Error('DigiKey product details for DK-ERR failed: timeout'));
    digikey.add(makePartInfo({ supplierPartNumber: 'DK-OTHER', manufacturerPartNumber: 'OTHER-1' }), 'DK-ALIAS');

    const results = await collect(service);

    expect(results.map((r) => [r.sku, r.status, r.message])).toEqual([
      ['DK-UP', 'up_to_date', 'Up to date'],
      ['DK-DRIFT', 'updated', 'Updated: active, pricing'],
      ['DK-GONE', 'not_found', 'Not found at supplier'],
      ['DK-ERR', 'error', 'DigiKey product details for DK-ERR failed: timeout'],
      ['DK-ALIAS', 'not_found', 'Supplier returned DK-OTHER instead'],
      ['595-LM358DR', 'skipped', 'No configured API for this supplier'],
      ['C7950', 'skipped', 'No configured API for this supplier'],
    ]);
    expect(results[1].changes).toEqual({
      active: { old: true, new: false },
      pricing: {
        old: [{ quantity: 1, price: 0.5, currency: undefined }],
        new: [{ quantity: 1, price: 0.45 }],
      },
    });
    expect(results[5].supplier).toBe('Mouser Electronics');
  });

  it('applies drift to the stored supplier part', async () => {
    const dk = inventory.seedCompany('DigiKey', 'supplier');
    const stored = inventory.seedSupplierPart(dk, 'DK-DRIFT', true, [[1, 0.5], [10, 0.4]]);
    digikey.add(makePartInfo({ supplierPartNumber: 'DK-DRIFT', active: false }));

    await collect(service);

    expect(stored.active).toBe(false);
    expect(inventory.priceBreaks.map((b) => [b.quantity, b.price])).toEqual([
      [1, 0.5],
      [10, 0.42],
    ]);
  });

  it('performs no writes when nothing drifted', async () => {
    const dk = inventory.seedCompany('DigiKey', 'supplier');
    inventory.seedSupplierPart(dk, '296-1395-1-ND', true, [[1, 0.5], [10, 0.42]]);
    digikey.add(makePartInfo());

    const results = await collect(service);

    expect(results.map((r) => r.status)).toEqual(['up_to_date']);
    expect(inventory.writes).toEqual([]);
  });

  it('reports update_failed when writing the change is rejected', async () => {
    const dk = inventory.seedCompany('DigiKey', 'supplier');
    inventory.seedSupplierPart(dk, 'DK-1', true, []);
    digikey.add(makePartInfo({ supplierPartNumber: 'DK-1', active: false, pricing: [] }));
    inventory.failWrites.add('updateSupplierPart');

    const [result] = await collect(service);

    expect(result.status).toBe('update_failed');
    expect(result.message).toBe('updateSupplierPart rejected');
    expect(result.changes).toEqual({ active: { old: true, new: false } });
  });

  it('limits the run to one supplier when asked', async () => {
    const dk = inventory.seedCompany('DigiKey', 'supplier');
    const lcsc = inventory.seedCompany('LCSC', 'supplier');
    inventory.seedSupplierPart(dk, '296-1395-1-ND', true, [[1, 0.5], [10, 0.42]]);
    inventory.seedSupplierPart(lcsc, 'C7950', true, []);
    digikey.add(makePartInfo());

    const results = await collect(service, 'digikey');

    expect(results.map((r) => r.sku)).toEqual(['296-1395-1-ND']);
  });

  it('matches supplier companies by normalized name when filtering', async () => {
    const mouser = new FakeSupplier('mouser', [
      makePartInfo({ supplierKey: 'mouser', supplierName: 'Mouser', supplierPartNumber: '595-LM358DR' }),
    ]);
    service = new SyncService(inventory, [digikey, mouser]);
    const long = inventory.seedCompany('Mouser Electronics', 'supplier');
    const short = inventory.seedCompany('Mouser', 'supplier');
    const dk = inventory.seedCompany('DigiKey', 'supplier');
    inventory.seedSupplierPart(long, '595-LM358DR', true, [[1, 0.5], [10, 0.42]]);
    inventory.seedSupplierPart(short, '595-NE555DR', true, []);
    inventory.seedSupplierPart(dk, '296-1395-1-ND', true, []);

    const results = await collect(service, 'mouser');

    expect(results.map((r) => [r.supplier, r.sku, r.status])).toEqual([
      ['Mouser Electronics', '595-LM358DR', 'up_to_date'],
      ['Mouser', '595-NE555DR', 'not_found'],
    ]);
  });

  it('yields nothing when the supplier has no company in the inventory', async () => {
    const lcsc = inventory.seedCompany('LCSC', 'supplier');
    inventory.seedSupplierPart(lcsc, 'C7950', true, []);

    expect(await collect(service, 'digikey')).toEqual([]);
  });

  it('rejects a supplier filter for an unconfigured supplier', async () => {
    await expect(collect(service, 'mouser')).rejects.toThrow("Supplier 'mouser' is not configured");
  });
});
