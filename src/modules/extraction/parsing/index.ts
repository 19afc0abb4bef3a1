export * from './json-locator';
export * from './plain-record';
export * from './response-parser.service';
export * from './value-coercion';
