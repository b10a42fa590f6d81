import fs from 'fs';
import path from 'path';
import * as XLSX from 'xlsx';
import type { BomLine, ParsedBom } from '../types';

const COLUMN_ALIASES = {
  supplier: ['supplier', 'supplier name'],
  spn: ['spn', 'sku', 'supplier part number'],
  mpn: ['mpn', 'manufacturer part number'],
  quantity: ['qty', 'quantity'],
  designators: ['designators', 'designator', 'reference', 'references'],
} as const;

type BomColumn = keyof typeof COLUMN_ALIASES;

function cellText(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value).trim();
}

function parseQuantity(value: string): number {
  if (!value) {
    return 1;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : 1;
}

/**
 * Turn sheet rows (header first) into BOM lines.
 *
 * Rows are numbered as file lines, the header being line 1. Blank rows are
 * ignored; rows with neither MPN nor SPN are reported in `skipped`.
 */
export function parseBomRows(rows: unknown[][]): ParsedBom {
  const [header = [], ...body] = rows;
  const headers = header.map((h) => cellText(h).toLowerCase());

  const columnIndex = (column: BomColumn): number => {
    const aliases: readonly string[] = COLUMN_ALIASES[column];
    return headers.findIndex((h) => aliases.includes(h));
  };
  const indexes: Record<BomColumn, number> = {
    supplier: columnIndex('supplier'),
    spn: columnIndex('spn'),
    mpn: columnIndex('mpn'),
    quantity: columnIndex('quantity'),
    designators: columnIndex('designators'),
  };

  const lines: BomLine[] = [];
  const skipped: string[] = [];

  body.forEach((row, i) => {
    const rowNumber = i + 2;
    const get = (column: BomColumn): string => (indexes[column] >= 0 ? cellText(row[indexes[column]]) : '');

    if (row.every((cell) => cellText(cell) === '')) {
      return;
    }

    const spn = get('spn');
    const mpn = get('mpn');
    if (!mpn && !spn) {
      skipped.push(`Row ${rowNumber}: No MPN or SPN`);
      return;
    }

    lines.push({
      row: rowNumber,
      supplier: get('supplier'),
      spn,
      mpn,
      quantity: parseQuantity(get('quantity')),
      designators: get('designators'),
    });
  });

  return { lines, skipped };
}

/**
 * Parse delimited text; the delimiter is a tab for `.tsv` files and a comma otherwise
 */
export function parseBomText(text: string, delimiter: string): ParsedBom {
  const options = { type: 'string' as const, raw: true, FS: delimiter };
  const workbook = XLSX.read(text.replace(/^\uFEFF/, ''), options);
  const sheet = workbook.Sheets[workbook.SheetNames[0]];
  if (!sheet) {
    return { lines: [], skipped: [] };
  }
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '', blankrows: true, raw: true });
  return parseBomRows(rows);
}

export function delimiterFor(filePath: string): string {
  return path.extname(filePath).toLowerCase() === '.tsv' ? '\t' : ',';
}

export function readBomFile(filePath: string): ParsedBom {
  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }
  const text = fs.readFileSync(filePath, 'utf-8');
  return parseBomText(text, delimiterFor(filePath));
}
