import {
  valueOf,
  type LineItem,
  type Party,
  type PlainParty,
  type PlainPurchaseOrder,
  type PurchaseOrderRecord,
} from '../interfaces';

const plainParty = (party: Party): PlainParty => ({
  name: valueOf(party.name),
  address: valueOf(party.address),
  contact: valueOf(party.contact),
});

const plainLineItem = (item: LineItem) => ({
  description: valueOf(item.description),
  quantity: valueOf(item.quantity),
  unit_price: valueOf(item.unitPrice),
  line_total: valueOf(item.lineTotal),
});

/** Snake_case JSON view of a record; missing and invalid fields render as null. */
export function toPlainPurchaseOrder(record: PurchaseOrderRecord): PlainPurchaseOrder {
  const plain: PlainPurchaseOrder = {
    order_number: valueOf(record.orderNumber),
    order_date: valueOf(record.orderDate),
    expiry_date: valueOf(record.expiryDate),
    customer: plainParty(record.customer),
    vendor: plainParty(record.vendor),
    line_items: record.lineItems.map(plainLineItem),
  };

  if (record.advanced) {
    plain.tax_lines = record.advanced.taxLines.map((line) => ({
      description: valueOf(line.description),
      rate: valueOf(line.rate),
      amount: valueOf(line.amount),
    }));
    plain.discount_amount = valueOf(record.advanced.discountAmount);
    plain.shipping_cost = valueOf(record.advanced.shippingCost);
    plain.grand_total = valueOf(record.advanced.grandTotal);
  }

  return plain;
}
