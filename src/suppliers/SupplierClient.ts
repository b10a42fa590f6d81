import type { PartInfo, SupplierKey } from '../types';

/**
 * A supplier catalog that can resolve a part number to a normalized record.
 *
 * `getPartInfo` accepts either a supplier part number or a manufacturer part
 * number. It resolves to `null` when the supplier has no match and rejects
 * only when the supplier API itself fails.
 */
export interface SupplierClient {
  readonly key: SupplierKey;
  /** Company name used for the supplier in InvenTree */
  readonly name: string;
  getPartInfo(partNumber: string): Promise<PartInfo | null>;
}

// "1,234" or "12,345,678": commas grouping thousands, no decimals
const THOUSANDS_ONLY = /^-?[1-9]\d{0,2}(,\d{3})+$/;

/**
 * Parse a supplier-formatted price ("$1,234.50", "0,12 €", 0.5) to a number
 */
export function parsePrice(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  let cleaned = value.replace(/[^\d.,-]/g, '');
  if (!cleaned) {
    return null;
  }

  const lastComma = cleaned.lastIndexOf(',');
  const lastDot = cleaned.lastIndexOf('.');
  if (lastDot === -1 && THOUSANDS_ONLY.test(cleaned)) {
    cleaned = cleaned.replace(/,/g, '');
  } else if (lastComma > lastDot) {
    // Comma is the decimal separator
    cleaned = cleaned.replace(/\./g, '').replace(',', '.');
  } else {
    cleaned = cleaned.replace(/,/g, '');
  }

  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

export function emptyToUndefined(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
