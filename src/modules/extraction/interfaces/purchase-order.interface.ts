import type { ExtractedField, FieldFlag } from './extracted-field.interface';

export type ExtractionMode = 'basic' | 'advanced';

export interface Party {
  name: ExtractedField<string>;
  address: ExtractedField<string>;
  contact: ExtractedField<string>;
}

export interface LineItem {
  description: ExtractedField<string>;
  quantity: ExtractedField<number>;
  unitPrice: ExtractedField<number>;
  lineTotal: ExtractedField<number>;
  /** Extracted line total, or quantity × unit price when the document omits it. */
  computedTotal: number | null;
}

export interface TaxLine {
  description: ExtractedField<string>;
  rate: ExtractedField<number>;
  amount: ExtractedField<number>;
}

export interface AdvancedCharges {
  taxLines: TaxLine[];
  discountAmount: ExtractedField<number>;
  shippingCost: ExtractedField<number>;
  grandTotal: ExtractedField<number>;
}

export interface PurchaseOrderRecord {
  mode: ExtractionMode;
  orderNumber: ExtractedField<string>;
  orderDate: ExtractedField<string>;
  expiryDate: ExtractedField<string>;
  customer: Party;
  vendor: Party;
  lineItems: LineItem[];
  /** Only populated in advanced mode. */
  advanced: AdvancedCharges | null;
}

export interface ParsedPurchaseOrder {
  record: PurchaseOrderRecord;
  flags: FieldFlag[];
}

export interface PlainParty {
  name: string | null;
  address: string | null;
  contact: string | null;
}

export interface PlainLineItem {
  description: string | null;
  quantity: number | null;
  unit_price: number | null;
  line_total: number | null;
}

export interface PlainTaxLine {
  description: string | null;
  rate: number | null;
  amount: number | null;
}

export interface PlainPurchaseOrder {
  order_number: string | null;
  order_date: string | null;
  expiry_date: string | null;
  customer: PlainParty;
  vendor: PlainParty;
  line_items: PlainLineItem[];
  tax_lines?: PlainTaxLine[];
  discount_amount?: number | null;
  shipping_cost?: number | null;
  grand_total?: number | null;
}
