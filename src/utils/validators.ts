/**
 * Shared validation utilities
 */

import { SUPPLIER_KEYS, type SupplierKey } from '../types';

/**
 * Validate that a string is not empty
 */
export function validateNonEmpty(value: string, fieldName: string): void {
  if (!value || value.trim().length === 0) {
    throw new Error(`${fieldName} cannot be empty`);
  }
}

/**
 * Validate a --supplier option value
 */
export function parseSupplierOption(value: string | undefined): SupplierKey | undefined {
  if (value === undefined) {
    return undefined;
  }
  const key = value.trim().toLowerCase();
  if (!isSupplierKey(key)) {
    throw new Error(`Invalid supplier '${value}'. Must be one of: ${SUPPLIER_KEYS.join(', ')}`);
  }
  return key;
}

export function isSupplierKey(value: string): value is SupplierKey {
  return SUPPLIER_KEYS.some((key) => key === value);
}

/**
 * Map a free-form supplier name ("Digi-Key", "Mouser Electronics") to a key
 */
export function normalizeSupplierKey(name: string | undefined): SupplierKey | null {
  if (!name) {
    return null;
  }
  const compact = name.toLowerCase().replace(/[^a-z0-9]/g, '');
  if (compact.startsWith('digikey')) {
    return 'digikey';
  }
  if (compact.startsWith('mouser')) {
    return 'mouser';
  }
  return null;
}

/**
 * Mask a secret for display (show first 8 chars only)
 */
export function sanitizeSecret(secret: string): string {
  return secret.substring(0, 8) + '...';
}
