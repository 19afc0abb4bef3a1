export * from './extracted-field.interface';
export * from './extraction-request.interface';
export * from './extraction-result.interface';
export * from './page-image.interface';
export * from './purchase-order.interface';
