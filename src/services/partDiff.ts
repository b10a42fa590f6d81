import type { PriceBreakRecord, SupplierPart } from '../inventree/schemas';
import type { PartInfo, PriceBreak, SupplierPartChanges } from '../types';

export const PRICE_TOLERANCE = 1e-6;

/**
 * One break per quantity (last one wins), ordered by quantity
 */
export function normalizePricing(breaks: PriceBreak[]): PriceBreak[] {
  const byQuantity = new Map<number, PriceBreak>();
  for (const b of breaks) {
    byQuantity.set(b.quantity, b);
  }
  return Array.from(byQuantity.values()).sort((a, b) => a.quantity - b.quantity);
}

export function storedPricing(records: PriceBreakRecord[]): PriceBreak[] {
  const breaks: PriceBreak[] = [];
  for (const record of records) {
    if (record.price !== null && Number.isFinite(record.price)) {
      breaks.push({
        quantity: record.quantity,
        price: record.price,
        currency: record.price_currency ?? undefined,
      });
    }
  }
  return normalizePricing(breaks);
}

export function samePricing(a: PriceBreak[], b: PriceBreak[]): boolean {
  const left = normalizePricing(a);
  const right = normalizePricing(b);
  if (left.length !== right.length) {
    return false;
  }
  return left.every(
    (breakA, i) =>
      breakA.quantity === right[i].quantity && Math.abs(breakA.price - right[i].price) <= PRICE_TOLERANCE
  );
}

/**
 * Field-level drift between a stored supplier part and the live supplier record.
 * Pricing is only compared when the supplier reports any.
 */
export function diffSupplierPart(
  stored: SupplierPart,
  storedBreaks: PriceBreakRecord[],
  live: PartInfo
): SupplierPartChanges {
  const changes: SupplierPartChanges = {};

  if (stored.active !== live.active) {
    changes.active = { old: stored.active, new: live.active };
  }

  if (live.pricing.length > 0) {
    const oldPricing = storedPricing(storedBreaks);
    const newPricing = normalizePricing(live.pricing);
    if (!samePricing(oldPricing, newPricing)) {
      changes.pricing = { old: oldPricing, new: newPricing };
    }
  }

  return changes;
}

export function hasChanges(changes: SupplierPartChanges): boolean {
  return Object.keys(changes).length > 0;
}

export function formatPricing(breaks: PriceBreak[]): string {
  if (breaks.length === 0) {
    return '(none)';
  }
  return breaks.map((b) => `${b.quantity}@${b.price}`).join(', ');
}
