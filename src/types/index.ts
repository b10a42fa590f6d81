/**
 * Shared types for supplier records and sync results
 */

export type SupplierKey = 'digikey' | 'mouser';

export const SUPPLIER_KEYS: readonly SupplierKey[] = ['digikey', 'mouser'];

export interface PriceBreak {
  quantity: number;
  price: number;
  currency?: string;
}

/**
 * Supplier record normalized across catalog APIs
 */
export interface PartInfo {
  supplierKey: SupplierKey;
  supplierName: string;
  manufacturerName: string;
  manufacturerPartNumber: string;
  supplierPartNumber: string;
  description: string;
  datasheetUrl?: string;
  imageUrl?: string;
  productUrl?: string;
  category?: string;
  packaging?: string;
  stock?: number;
  pricing: PriceBreak[];
  active: boolean;
}

export interface FieldChange<T> {
  old: T;
  new: T;
}

export interface SupplierPartChanges {
  active?: FieldChange<boolean>;
  pricing?: FieldChange<PriceBreak[]>;
}

export interface SyncPartResult {
  supplier: SupplierKey;
  manufacturer: string;
  manufacturerPartNumber: string;
  supplierPartNumber: string;
  description: string;
  partId: number;
  supplierPartId: number;
  created: {
    manufacturer: boolean;
    supplier: boolean;
    part: boolean;
    manufacturerPart: boolean;
    supplierPart: boolean;
  };
  imageUploaded: boolean;
  supplierPartUpdated: boolean;
}

export type SupplierPartSyncStatus =
  | 'up_to_date'
  | 'updated'
  | 'not_found'
  | 'skipped'
  | 'update_failed'
  | 'error';

export interface SupplierPartSyncResult {
  status: SupplierPartSyncStatus;
  supplierPartId: number;
  sku: string;
  supplier: string;
  message: string;
  changes?: SupplierPartChanges;
}

export interface AssemblyPartResult {
  partId: number;
  name: string;
  description: string;
  exists: boolean;
}

export type BomItemOutcome = 'created' | 'updated' | 'unchanged';

export interface BomItemResult {
  bomItemId: number;
  outcome: BomItemOutcome;
}

/**
 * One usable row of a BOM file
 */
export interface BomLine {
  row: number;
  supplier: string;
  spn: string;
  mpn: string;
  quantity: number;
  designators: string;
}

export interface ParsedBom {
  lines: BomLine[];
  skipped: string[];
}

export type BomLineStatus = 'added' | 'updated' | 'unchanged' | 'not_found' | 'error';

export interface BomLineResult {
  line: BomLine;
  partNumber: string;
  status: BomLineStatus;
  message: string;
  part?: SyncPartResult;
}

export interface BomBuildSummary {
  assembly: AssemblyPartResult;
  results: BomLineResult[];
  added: number;
  updated: number;
  unchanged: number;
  notFound: number;
  failed: number;
}
