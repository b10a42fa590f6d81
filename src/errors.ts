import axios from 'axios';
import type { SupplierKey } from './types';

/**
 * Raised when required settings are missing. Always thrown before any
 * network call is made.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class SupplierApiError extends Error {
  readonly supplier: SupplierKey;
  readonly status?: number;

  constructor(supplier: SupplierKey, message: string, status?: number) {
    super(message);
    this.name = 'SupplierApiError';
    this.supplier = supplier;
    this.status = status;
  }
}

export class InventoryApiError extends Error {
  readonly method: string;
  readonly path: string;
  readonly status?: number;
  readonly detail?: unknown;

  constructor(method: string, path: string, message: string, status?: number, detail?: unknown) {
    super(message);
    this.name = 'InventoryApiError';
    this.method = method;
    this.path = path;
    this.status = status;
    this.detail = detail;
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * HTTP status of a failed axios request, if the server answered at all
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (axios.isAxiosError(error)) {
    return error.response?.status;
  }
  return undefined;
}
