import { Injectable } from '@nestjs/common';

import { ParseError } from '../errors';
import {
  valueOf,
  type AdvancedCharges,
  type ExtractedField,
  type ExtractionMode,
  type FieldFlag,
  type LineItem,
  type ParsedPurchaseOrder,
  type Party,
  type TaxLine,
} from '../interfaces';
import { isRecord, locateJson } from './json-locator';
import { toNumberField, toTextField } from './value-coercion';

type JsonRecord = Record<string, unknown>;

/** Alternative keys models commonly use for the same field. */
const ALIASES: Record<string, readonly string[]> = {
  order_number: ['po_number', 'purchase_order_number', 'orderNumber'],
  order_date: ['po_date', 'date', 'orderDate'],
  expiry_date: ['expiration_date', 'valid_until', 'expiryDate'],
  line_items: ['items', 'lineItems'],
  unit_price: ['unitPrice', 'price'],
  line_total: ['lineTotal', 'total', 'amount'],
  tax_lines: ['taxes', 'taxLines'],
  discount_amount: ['discount', 'discountAmount'],
  shipping_cost: ['shipping', 'shippingCost'],
  grand_total: ['total_amount', 'grandTotal'],
};

const pick = (source: JsonRecord, key: string): unknown => {
  if (key in source) return source[key];
  const alias = (ALIASES[key] ?? []).find((candidate) => candidate in source);
  return alias === undefined ? undefined : source[alias];
};

const roundCents = (value: number): number => Math.round(value * 100) / 100;

/** Collects a flag for every field that ends up missing or invalid. */
class FieldReader {
  readonly flags: FieldFlag[] = [];

  text(source: JsonRecord, key: string, path = key): ExtractedField<string> {
    return this.track(path, toTextField(pick(source, key)));
  }

  number(source: JsonRecord, key: string, path = key): ExtractedField<number> {
    return this.track(path, toNumberField(pick(source, key)));
  }

  flag(flag: FieldFlag): void {
    this.flags.push(flag);
  }

  private track<T>(path: string, field: ExtractedField<T>): ExtractedField<T> {
    if (field.state === 'missing') this.flags.push({ path, state: 'missing' });
    if (field.state === 'invalid') this.flags.push({ path, state: 'invalid', raw: field.raw });
    return field;
  }
}

@Injectable()
export class ResponseParserService {
  /**
   * Turns raw model output into a purchase-order record. Field-level problems become
   * `missing` / `invalid` fields; only a response without a complete JSON object, or with a
   * line-item table that is not an array, fails.
   */
  parse(rawText: string, mode: ExtractionMode): ParsedPurchaseOrder {
    const location = locateJson(rawText);
    if (location.status === 'truncated') {
      throw new ParseError('Model response ends inside an unclosed JSON object', rawText);
    }
    if (location.status === 'absent') {
      throw new ParseError('No JSON object found in the model response', rawText);
    }
    const payload = location.value;

    const reader = new FieldReader();

    const record = {
      mode,
      orderNumber: reader.text(payload, 'order_number'),
      orderDate: reader.text(payload, 'order_date'),
      expiryDate: reader.text(payload, 'expiry_date'),
      customer: this.readParty(reader, payload, 'customer'),
      vendor: this.readParty(reader, payload, 'vendor'),
      lineItems: this.readLineItems(reader, payload, rawText),
      advanced: mode === 'advanced' ? this.readAdvanced(reader, payload) : null,
    };

    return { record, flags: reader.flags };
  }

  private readParty(reader: FieldReader, payload: JsonRecord, key: 'customer' | 'vendor'): Party {
    const raw = pick(payload, key);
    let source: JsonRecord = {};

    if (isRecord(raw)) {
      source = raw;
    } else if (typeof raw === 'string') {
      source = { name: raw };
    } else if (raw !== undefined && raw !== null) {
      reader.flag({ path: key, state: 'invalid', raw: JSON.stringify(raw) });
    }

    return {
      name: reader.text(source, 'name', `${key}.name`),
      address: reader.text(source, 'address', `${key}.address`),
      contact: reader.text(source, 'contact', `${key}.contact`),
    };
  }

  private readLineItems(reader: FieldReader, payload: JsonRecord, rawText: string): LineItem[] {
    const raw = pick(payload, 'line_items');

    if (raw === undefined || raw === null) {
      reader.flag({ path: 'line_items', state: 'missing' });
      return [];
    }

    if (!Array.isArray(raw)) {
      throw new ParseError('line_items must be an array', rawText);
    }

    const items: LineItem[] = [];
    raw.forEach((row: unknown, index) => {
      const path = `line_items[${index}]`;
      if (!isRecord(row)) {
        reader.flag({ path, state: 'invalid', raw: JSON.stringify(row) });
        return;
      }

      const description = reader.text(row, 'description', `${path}.description`);
      const quantity = reader.number(row, 'quantity', `${path}.quantity`);
      const unitPrice = reader.number(row, 'unit_price', `${path}.unit_price`);
      const lineTotal = reader.number(row, 'line_total', `${path}.line_total`);
      const qty = valueOf(quantity);
      const price = valueOf(unitPrice);

      items.push({
        description,
        quantity,
        unitPrice,
        lineTotal,
        computedTotal:
          valueOf(lineTotal) ?? (qty !== null && price !== null ? roundCents(qty * price) : null),
      });
    });

    return items;
  }

  private readAdvanced(reader: FieldReader, payload: JsonRecord): AdvancedCharges {
    return {
      taxLines: this.readTaxLines(reader, payload),
      discountAmount: reader.number(payload, 'discount_amount'),
      shippingCost: reader.number(payload, 'shipping_cost'),
      grandTotal: reader.number(payload, 'grand_total'),
    };
  }

  private readTaxLines(reader: FieldReader, payload: JsonRecord): TaxLine[] {
    const raw = pick(payload, 'tax_lines');

    if (raw === undefined || raw === null) {
      reader.flag({ path: 'tax_lines', state: 'missing' });
      return [];
    }

    if (!Array.isArray(raw)) {
      reader.flag({ path: 'tax_lines', state: 'invalid', raw: JSON.stringify(raw) });
      return [];
    }

    const lines: TaxLine[] = [];
    raw.forEach((row: unknown, index) => {
      const path = `tax_lines[${index}]`;
      if (!isRecord(row)) {
        reader.flag({ path, state: 'invalid', raw: JSON.stringify(row) });
        return;
      }

      lines.push({
        description: reader.text(row, 'description', `${path}.description`),
        rate: reader.number(row, 'rate', `${path}.rate`),
        amount: reader.number(row, 'amount', `${path}.amount`),
      });
    });

    return lines;
  }
}
