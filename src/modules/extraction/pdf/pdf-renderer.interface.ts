import type { PageImage } from '../interfaces';

export const PDF_RENDERER = Symbol('PDF_RENDERER');

export interface OpenedPdf {
  readonly pageCount: number;
  /** Renders a 1-based page at `scale` (1 = 72 dpi). */
  renderPage(pageNumber: number, scale: number): Promise<PageImage>;
  close(): Promise<void>;
}

export interface PdfRenderer {
  /** Throws `DocumentDecodeError` for corrupt or locked documents. */
  open(data: Uint8Array, password?: string): Promise<OpenedPdf>;
}
