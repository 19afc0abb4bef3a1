import type { ExtractionMode } from './interfaces';

export type FieldType = 'string' | 'number' | 'date';

export interface FieldSpec {
  /** Key path in the JSON the model returns; `[]` marks a table column. */
  path: string;
  type: FieldType;
  description: string;
}

export const BASIC_FIELDS: readonly FieldSpec[] = [
  { path: 'order_number', type: 'string', description: 'Purchase order number' },
  { path: 'order_date', type: 'date', description: 'Date the order was issued' },
  { path: 'expiry_date', type: 'date', description: 'Date the order expires, if stated' },
  { path: 'customer.name', type: 'string', description: 'Buyer / customer name' },
  { path: 'customer.address', type: 'string', description: 'Buyer full address' },
  { path: 'customer.contact', type: 'string', description: 'Buyer contact: person, email or phone' },
  { path: 'vendor.name', type: 'string', description: 'Supplier / vendor name' },
  { path: 'vendor.address', type: 'string', description: 'Supplier full address' },
  { path: 'vendor.contact', type: 'string', description: 'Supplier contact: person, email or phone' },
  { path: 'line_items[].description', type: 'string', description: 'Item or service description' },
  { path: 'line_items[].quantity', type: 'number', description: 'Ordered quantity' },
  { path: 'line_items[].unit_price', type: 'number', description: 'Price per unit' },
  { path: 'line_items[].line_total', type: 'number', description: 'Line amount as printed' },
];

export const ADVANCED_ONLY_FIELDS: readonly FieldSpec[] = [
  { path: 'tax_lines[].description', type: 'string', description: 'Tax label, e.g. VAT 20%' },
  { path: 'tax_lines[].rate', type: 'number', description: 'Tax rate in percent' },
  { path: 'tax_lines[].amount', type: 'number', description: 'Tax amount' },
  { path: 'discount_amount', type: 'number', description: 'Total discount applied to the order' },
  { path: 'shipping_cost', type: 'number', description: 'Shipping / freight charge' },
  { path: 'grand_total', type: 'number', description: 'Final amount payable including tax' },
];

export const fieldsForMode = (mode: ExtractionMode): readonly FieldSpec[] =>
  mode === 'advanced' ? [...BASIC_FIELDS, ...ADVANCED_ONLY_FIELDS] : BASIC_FIELDS;
