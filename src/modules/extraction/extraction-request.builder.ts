import { Injectable } from '@nestjs/common';

import { RequestBuildError } from './errors';
import type { ExtractionMode, ExtractionRequest, PageImage } from './interfaces';
import { fieldsForMode, type FieldSpec } from './purchase-order.fields';

export const USER_PROMPT =
  'Extract the purchase order information as specified in your instructions. This is a PDF document converted to images.';

@Injectable()
export class ExtractionRequestBuilder {
  build(pages: readonly PageImage[], mode: ExtractionMode): ExtractionRequest {
    if (pages.length === 0) {
      throw new RequestBuildError('An extraction request needs at least one page image');
    }

    const fields = fieldsForMode(mode);

    return {
      mode,
      pages,
      instruction: this.buildInstruction(fields, mode),
      prompt: USER_PROMPT,
      fields: fields.map((field) => field.path),
    };
  }

  private buildInstruction(fields: readonly FieldSpec[], mode: ExtractionMode): string {
    const intro = `You are an expert document extraction system specializing in purchase orders.
Read every page image of the attached purchase order and extract the fields below into a single JSON object.`;

    const fieldList = [
      'FIELDS (use these keys exactly; "[]" means an array of objects with the listed keys):',
      ...fields.map((field) => `- ${field.path} (${this.describeType(field)}): ${field.description}`),
    ].join('\n');

    const rules = `Rules:
- If a field is not present in the document, use null for it.
- line_items is always an array; use [] when the order has no item table.
- Numbers must be plain JSON numbers with a dot as decimal separator and no currency symbols.
- Dates use the ISO format YYYY-MM-DD.
- Copy text values as they appear; do not invent or summarize.
- Intelligently handle different PO layouts and formatting anomalies.

Provide ONLY the JSON output with no additional explanation.`;

    const advancedNote =
      mode === 'advanced'
        ? 'List every tax line separately in tax_lines, and report discount_amount, shipping_cost and grand_total even when they appear only in the totals box.'
        : undefined;

    return [intro, fieldList, advancedNote, rules].filter(Boolean).join('\n\n');
  }

  private describeType(field: FieldSpec): string {
    return field.type === 'date' ? 'string, YYYY-MM-DD' : field.type;
  }
}
