import { Inject, Injectable, Logger } from '@nestjs/common';

import { DocumentDecodeError, isExtractionError } from '../errors';
import type { PageImage } from '../interfaces';
import { PDF_RENDERER, type PdfRenderer } from './pdf-renderer.interface';

export const RASTERIZER_OPTIONS = Symbol('RASTERIZER_OPTIONS');

export interface RasterizerOptions {
  dpi: number;
  /** 0 renders every page. */
  maxPages: number;
}

export interface RasterizedDocument {
  pages: PageImage[];
  /** Pages in the source document, which can exceed `pages.length` when `maxPages` applies. */
  pageCount: number;
  truncated: boolean;
}

const PDF_POINTS_PER_INCH = 72;

@Injectable()
export class PdfRasterizerService {
  private readonly logger = new Logger(PdfRasterizerService.name);

  constructor(
    @Inject(PDF_RENDERER) private readonly renderer: PdfRenderer,
    @Inject(RASTERIZER_OPTIONS) private readonly options: RasterizerOptions,
  ) {}

  async rasterize(data: Uint8Array, password?: string): Promise<RasterizedDocument> {
    const pdf = await this.renderer.open(data, password);

    try {
      const pageCount = pdf.pageCount;
      const limit =
        this.options.maxPages > 0 ? Math.min(pageCount, this.options.maxPages) : pageCount;
      const scale = this.options.dpi / PDF_POINTS_PER_INCH;

      if (limit < pageCount) {
        this.logger.warn(`Document has ${pageCount} pages; rendering the first ${limit}`);
      }

      const pages: PageImage[] = [];
      for (let pageNumber = 1; pageNumber <= limit; pageNumber++) {
        pages.push(await this.renderPage(() => pdf.renderPage(pageNumber, scale), pageNumber));
      }

      this.logger.log(`🖼️ Rendered ${pages.length} page(s) at ${this.options.dpi} dpi`);
      return { pages, pageCount, truncated: limit < pageCount };
    } finally {
      await pdf.close();
    }
  }

  private async renderPage(render: () => Promise<PageImage>, pageNumber: number): Promise<PageImage> {
    try {
      return await render();
    } catch (error) {
      if (isExtractionError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new DocumentDecodeError(`Could not render page ${pageNumber}: ${message}`, 'invalid', {
        cause: error,
      });
    }
  }
}
