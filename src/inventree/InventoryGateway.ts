import type {
  BomItem,
  Company,
  ManufacturerPart,
  Part,
  PartCategory,
  PriceBreakRecord,
  SupplierPart,
} from './schemas';

export interface CompanyFilter {
  name?: string;
  is_manufacturer?: boolean;
  is_supplier?: boolean;
}

export interface NewCompany {
  name: string;
  description?: string;
  is_manufacturer: boolean;
  is_supplier: boolean;
  is_customer: boolean;
}

export interface PartFilter {
  name?: string;
  IPN?: string;
  category?: number;
}

export interface NewPart {
  name: string;
  description: string;
  IPN?: string;
  category?: number;
  revision?: string;
  link?: string;
  component: boolean;
  assembly: boolean;
  purchaseable: boolean;
  active: boolean;
}

export interface NewManufacturerPart {
  part: number;
  manufacturer: number;
  MPN: string;
  description: string;
  link: string;
  note: string;
}

export interface SupplierPartFilter {
  supplier?: number;
  SKU?: string;
  part?: number;
}

export interface NewSupplierPart {
  part: number;
  supplier: number;
  manufacturer_part: number;
  SKU: string;
  MPN: string;
  description: string;
  link: string;
  note: string;
  active: boolean;
  packaging?: string;
  available?: number;
}

export interface SupplierPartPatch {
  active?: boolean;
}

export interface NewPriceBreak {
  part: number;
  quantity: number;
  price: number;
  price_currency?: string;
}

export interface NewBomItem {
  part: number;
  sub_part: number;
  quantity: number;
  reference?: string;
}

export interface BomItemPatch {
  quantity?: number;
  reference?: string;
}

/**
 * The slice of the inventory server the reconciliation logic talks to.
 *
 * `find*` methods return every record the server matches for the filter;
 * callers still check exact equality on the key fields.
 */
export interface InventoryGateway {
  findCompanies(filter: CompanyFilter): Promise<Company[]>;
  createCompany(data: NewCompany): Promise<Company>;

  findCategories(filter: { name: string; parent?: number }): Promise<PartCategory[]>;
  createCategory(data: { name: string; parent?: number }): Promise<PartCategory>;

  findParts(filter: PartFilter): Promise<Part[]>;
  createPart(data: NewPart): Promise<Part>;
  /** Download `imageUrl` and attach it to the part. Resolves false when the image cannot be fetched. */
  uploadPartImage(pk: number, imageUrl: string): Promise<boolean>;

  findManufacturerParts(filter: { manufacturer: number; MPN: string }): Promise<ManufacturerPart[]>;
  createManufacturerPart(data: NewManufacturerPart): Promise<ManufacturerPart>;

  findSupplierParts(filter: SupplierPartFilter): Promise<SupplierPart[]>;
  createSupplierPart(data: NewSupplierPart): Promise<SupplierPart>;
  updateSupplierPart(pk: number, patch: SupplierPartPatch): Promise<SupplierPart>;

  listPriceBreaks(supplierPartId: number): Promise<PriceBreakRecord[]>;
  createPriceBreak(data: NewPriceBreak): Promise<PriceBreakRecord>;
  deletePriceBreak(pk: number): Promise<void>;

  findBomItems(filter: { part: number; sub_part: number }): Promise<BomItem[]>;
  createBomItem(data: NewBomItem): Promise<BomItem>;
  updateBomItem(pk: number, patch: BomItemPatch): Promise<BomItem>;
}
