import {
  invalid,
  missing,
  present,
  type ExtractedField,
} from '../interfaces/extracted-field.interface';

// Optional currency code or symbol, a signed amount, then an optional code, symbol or percent sign.
const NUMERIC_TEXT = /^(?:[A-Za-z]{3}|\p{Sc})?\s*([-+]?\d[\d.,' ]*)\s*(?:[A-Za-z]{3}|\p{Sc}|%)?$/u;
const THOUSANDS_WITH_COMMAS = /^[-+]?\d{1,3}(?:,\d{3})+$/;

const describe = (value: unknown): string =>
  typeof value === 'string' ? value : JSON.stringify(value);

export function toTextField(value: unknown): ExtractedField<string> {
  if (value === undefined || value === null) return missing();
  if (typeof value === 'string') return present(value);
  if (typeof value === 'number' || typeof value === 'boolean') return present(String(value));
  return invalid(describe(value));
}

export function toNumberField(value: unknown): ExtractedField<number> {
  if (value === undefined || value === null) return missing();

  if (typeof value === 'number') {
    return Number.isFinite(value) ? present(value) : invalid(String(value));
  }

  if (typeof value === 'string') {
    if (value.trim() === '') return missing();
    const parsed = parseNumericText(value);
    return parsed === null ? invalid(value) : present(parsed);
  }

  return invalid(describe(value));
}

/** `"$1,250.00"` → 1250, `"12,5"` → 12.5, `"EUR 1.234,50"` → 1234.5; null when not a number. */
export function parseNumericText(text: string): number | null {
  const match = NUMERIC_TEXT.exec(text.trim());
  if (!match) return null;

  let digits = (match[1] ?? '').replace(/[' ]/g, '');
  const lastComma = digits.lastIndexOf(',');
  const lastDot = digits.lastIndexOf('.');

  if (lastComma !== -1 && lastDot !== -1) {
    digits =
      lastComma > lastDot
        ? digits.replace(/\./g, '').replace(',', '.')
        : digits.replace(/,/g, '');
  } else if (lastComma !== -1) {
    digits = THOUSANDS_WITH_COMMAS.test(digits) ? digits.replace(/,/g, '') : digits.replace(',', '.');
  } else if (digits.split('.').length > 2) {
    digits = digits.replace(/\./g, '');
  }

  const parsed = Number(digits);
  return Number.isFinite(parsed) ? parsed : null;
}
