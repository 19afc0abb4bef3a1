export type ExtractedField<T> =
  | { state: 'present'; value: T }
  | { state: 'missing' }
  | { state: 'invalid'; raw: string };

export const present = <T>(value: T): ExtractedField<T> => ({ state: 'present', value });
export const missing = <T>(): ExtractedField<T> => ({ state: 'missing' });
export const invalid = <T>(raw: string): ExtractedField<T> => ({ state: 'invalid', raw });

export const valueOf = <T>(field: ExtractedField<T>): T | null =>
  field.state === 'present' ? field.value : null;

export interface FieldFlag {
  /** Dotted path in the plain record, e.g. `line_items[2].unit_price`. */
  path: string;
  state: 'missing' | 'invalid';
  raw?: string;
}
