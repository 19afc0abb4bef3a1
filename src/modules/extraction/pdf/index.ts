export * from './pdf-rasterizer.service';
export * from './pdf-renderer.interface';
export * from './pdfjs.renderer';
