/**
 * BOM Tests
 *
 * BOM file parsing and building an assembly from BOM lines.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { delimiterFor, parseBomRows, parseBomText, readBomFile } from '../services/bomFile';
import { SyncService } from '../services/SyncService';
import type { BomLine, BomLineResult } from '../types';
import { FakeInventory } from './utils/FakeInventory';
import { FakeSupplier, makePartInfo } from './utils/FakeSupplier';

function line(overrides: Partial<BomLine>): BomLine {
  return { row: 2, supplier: '', spn: '', mpn: '', quantity: 1, designators: '', ...overrides };
}

describe('BOM file parsing', () => {
  it('maps columns by header name and numbers rows as file lines', () => {
    const parsed = parseBomRows([
      ['Supplier', 'SPN', 'MPN', 'Qty', 'Designators'],
      ['DigiKey', 'DK-A', 'MPN-A', '2', 'R1, R2'],
      ['', '', '', '', ''],
      ['Mouser', '', '', '3', 'U1'],
      ['', '', 'MPN-C', '', 'C1'],
    ]);

    expect(parsed.lines).toEqual([
      { row: 2, supplier: 'DigiKey', spn: 'DK-A', mpn: 'MPN-A', quantity: 2, designators: 'R1, R2' },
      { row: 5, supplier: '', spn: '', mpn: 'MPN-C', quantity: 1, designators: 'C1' },
    ]);
    expect(parsed.skipped).toEqual(['Row 4: No MPN or SPN']);
  });

  it('accepts alternative header names in any case', () => {
    const parsed = parseBomRows([
      ['supplier name', 'Supplier Part Number', 'Manufacturer Part Number', 'QUANTITY', 'Reference'],
      ['Mouser', '595-LM358DR', 'LM358DR', 4, 'U3'],
    ]);

    expect(parsed.lines).toEqual([
      { row: 2, supplier: 'Mouser', spn: '595-LM358DR', mpn: 'LM358DR', quantity: 4, designators: 'U3' },
    ]);
  });

  it('defaults an unreadable quantity to one', () => {
    const parsed = parseBomRows([
      ['MPN', 'Qty'],
      ['MPN-A', 'lots'],
    ]);

    expect(parsed.lines[0].quantity).toBe(1);
  });

  it('returns nothing for an empty sheet', () => {
    expect(parseBomRows([])).toEqual({ lines: [], skipped: [] });
  });

  it('parses quoted CSV fields', () => {
    const parsed = parseBomText('Supplier,SKU,MPN,Qty,Designators\nDigiKey,DK-A,MPN-A,4,"R1, R2"\n', ',');

    expect(parsed.lines).toEqual([
      { row: 2, supplier: 'DigiKey', spn: 'DK-A', mpn: 'MPN-A', quantity: 4, designators: 'R1, R2' },
    ]);
  });

  it('picks the delimiter from the file extension', () => {
    expect(delimiterFor('total_bom.tsv')).toBe('\t');
    expect(delimiterFor('BOM.TSV')).toBe('\t');
    expect(delimiterFor('bom.csv')).toBe(',');
    expect(delimiterFor('bom.txt')).toBe(',');
  });

  describe('readBomFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bom-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reads a tab-separated file', () => {
      const file = path.join(dir, 'total_bom.tsv');
      fs.writeFileSync(file, 'Supplier\tSPN\tMPN\tQty\tDesignators\nMouser\t595-LM358DR\tLM358DR\t1\tU1, U2\n');

      expect(readBomFile(file).lines).toEqual([
        { row: 2, supplier: 'Mouser', spn: '595-LM358DR', mpn: 'LM358DR', quantity: 1, designators: 'U1, U2' },
      ]);
    });

    it('throws for a missing file', () => {
      const file = path.join(dir, 'missing.csv');

      expect(() => readBomFile(file)).toThrow(`File not found: ${file}`);
    });
  });
});

describe('SyncService.buildBom', () => {
  let inventory: FakeInventory;
  let digikey: FakeSupplier;
  let mouser: FakeSupplier;
  let service: SyncService;

  beforeEach(() => {
    inventory = new FakeInventory();
    digikey = new FakeSupplier('digikey', [
      makePartInfo({ supplierPartNumber: 'DK-A', manufacturerPartNumber: 'MPN-A' }),
    ]);
    mouser = new FakeSupplier('mouser', [
      makePartInfo({
        supplierKey: 'mouser',
        supplierName: 'Mouser',
        supplierPartNumber: 'M-B',
        manufacturerPartNumber: 'MPN-B',
      }),
    ]);
    service = new SyncService(inventory, [digikey, mouser]);
  });

  it('creates the assembly and adds one BOM item per line', async () => {
    const summary = await service.buildBom('PCB-1', [
      line({ row: 2, supplier: 'DigiKey', spn: 'DK-A', mpn: 'MPN-A', quantity: 2, designators: 'R1, R2' }),
      line({ row: 3, supplier: 'Mouser', spn: 'M-B', mpn: 'MPN-B', designators: 'U1' }),
    ]);

    expect(summary.assembly).toEqual({ partId: 1, name: 'PCB-1', description: 'Assembly: PCB-1', exists: false });
    expect(summary.results.map((r) => r.status)).toEqual(['added', 'added']);
    expect(summary.results.map((r) => r.message)).toEqual(['added: MPN-A', 'added: MPN-B']);
    expect(summary).toMatchObject({ added: 2, updated: 0, unchanged: 0, notFound: 0, failed: 0 });
    expect(inventory.bomItems.map((item) => [item.part, item.quantity, item.reference])).toEqual([
      [1, 2, 'R1, R2'],
      [1, 1, 'U1'],
    ]);
    expect(inventory.parts[0]).toMatchObject({ name: 'PCB-1', IPN: 'PCB-1', assembly: true, component: false });
  });

  it('asks only the supplier named on the line', async () => {
    await service.buildBom('PCB-1', [line({ supplier: 'Mouser', spn: 'M-B' })]);

    expect(digikey.lookups).toEqual([]);
    expect(mouser.lookups).toEqual(['M-B']);
  });

  it('falls back to the MPN across all suppliers when the SPN is unknown', async () => {
    const summary = await service.buildBom('PCB-1', [line({ supplier: 'DigiKey', spn: 'DK-MISSING', mpn: 'MPN-B' })]);

    expect(summary.results[0].status).toBe('added');
    expect(digikey.lookups).toEqual(['DK-MISSING', 'MPN-B']);
    expect(mouser.lookups).toEqual(['MPN-B']);
  });

  it('searches by MPN when the line names a supplier without a configured client', async () => {
    digikey.add(makePartInfo({ supplierPartNumber: 'DK-WRONG', manufacturerPartNumber: 'WRONG-PART' }), 'C7950');

    const summary = await service.buildBom('PCB-1', [line({ supplier: 'LCSC', spn: 'C7950', mpn: 'MPN-B' })]);

    expect(summary.results[0]).toMatchObject({ partNumber: 'MPN-B', status: 'added', message: 'added: MPN-B' });
    expect(digikey.lookups).toEqual(['MPN-B']);
    expect(mouser.lookups).toEqual(['MPN-B']);
  });

  it('does not look up an SPN from a supplier without a configured client', async () => {
    const summary = await service.buildBom('PCB-1', [line({ supplier: 'LCSC', spn: 'C7950' })]);

    expect(summary.results[0]).toMatchObject({
      partNumber: 'C7950',
      status: 'not_found',
      message: 'Part not found: C7950',
    });
    expect(digikey.lookups).toEqual([]);
    expect(mouser.lookups).toEqual([]);
  });

  it('records missing parts and keeps going', async () => {
    const summary = await service.buildBom('PCB-1', [
      line({ row: 2, mpn: 'MISSING' }),
      line({ row: 3, supplier: 'DigiKey', spn: 'DK-A' }),
    ]);

    expect(summary.results[0]).toMatchObject({
      partNumber: 'MISSING',
      status: 'not_found',
      message: 'Part not found: MISSING',
    });
    expect(summary.results[1].status).toBe('added');
    expect(summary).toMatchObject({ added: 1, notFound: 1, failed: 0 });
  });

  it('records supplier failures per line and keeps going', async () => {
    digikey.failOn('DK-E', new Error('DigiKey product details for DK-E failed: timeout'));

    const summary = await service.buildBom('PCB-1', [
      line({ row: 2, supplier: 'DigiKey', spn: 'DK-E' }),
      line({ row: 3, supplier: 'Mouser', spn: 'M-B' }),
    ]);

    expect(summary.results.map((r) => [r.status, r.message])).toEqual([
      ['error', 'DigiKey product details for DK-E failed: timeout'],
      ['added', 'added: MPN-B'],
    ]);
    expect(summary.failed).toBe(1);
  });

  it('is idempotent when the same BOM is applied twice', async () => {
    const lines = [
      line({ row: 2, supplier: 'DigiKey', spn: 'DK-A', quantity: 2, designators: 'R1, R2' }),
      line({ row: 3, supplier: 'Mouser', spn: 'M-B', designators: 'U1' }),
    ];
    await service.buildBom('PCB-1', lines);
    inventory.resetLog();

    const summary = await service.buildBom('PCB-1', lines);

    expect(summary.assembly.exists).toBe(true);
    expect(summary.results.map((r) => r.status)).toEqual(['unchanged', 'unchanged']);
    expect(inventory.writes).toEqual([]);
    expect(inventory.bomItems).toHaveLength(2);
  });

  it('updates an existing BOM item whose quantity or designators changed', async () => {
    await service.buildBom('PCB-1', [line({ supplier: 'DigiKey', spn: 'DK-A', quantity: 2, designators: 'R1, R2' })]);

    const summary = await service.buildBom('PCB-1', [
      line({ supplier: 'DigiKey', spn: 'DK-A', quantity: 3, designators: 'R1, R2, R3' }),
    ]);

    expect(summary.results[0].status).toBe('updated');
    expect(inventory.bomItems).toEqual([
      { pk: expect.any(Number), part: 1, sub_part: 4, quantity: 3, reference: 'R1, R2, R3' },
    ]);
  });

  it('reports progress through the hooks', async () => {
    const events: string[] = [];
    const seen: BomLineResult[] = [];

    await service.buildBom('PCB-1', [line({ supplier: 'DigiKey', spn: 'DK-A' }), line({ mpn: 'MISSING' })], {
      onAssembly: (assembly) => events.push(`assembly:${assembly.partId}`),
      onLineStart: (bomLine, index, total) => events.push(`start:${bomLine.spn || bomLine.mpn}:${index}/${total}`),
      onLine: (result, index) => {
        events.push(`done:${index}`);
        seen.push(result);
      },
    });

    expect(events).toEqual(['assembly:1', 'start:DK-A:0/2', 'done:0', 'start:MISSING:1/2', 'done:1']);
    expect(seen.map((r) => r.status)).toEqual(['added', 'not_found']);
  });
});
