import './canvas-globals';

import path from 'node:path';
import { Injectable, Logger } from '@nestjs/common';
import { createCanvas, type Canvas, type SKRSContext2D } from '@napi-rs/canvas';
import { PDFDocument } from 'pdf-lib';
import * as pdfjs from 'pdfjs-dist/legacy/build/pdf';
import type { PDFDocumentProxy } from 'pdfjs-dist/types/src/display/api';

import { DocumentDecodeError } from '../errors';
import type { PageImage } from '../interfaces';
import type { OpenedPdf, PdfRenderer } from './pdf-renderer.interface';

pdfjs.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/legacy/build/pdf.worker.js');

const pdfjsRoot = path.dirname(require.resolve('pdfjs-dist/package.json'));

interface CanvasAndContext {
  canvas: Canvas;
  context: SKRSContext2D;
}

/** Canvas factory handed to pdf.js for the scratch canvases it needs while painting. */
class NapiCanvasFactory {
  create(width: number, height: number): CanvasAndContext {
    const canvas = createCanvas(Math.max(1, Math.ceil(width)), Math.max(1, Math.ceil(height)));
    return { canvas, context: canvas.getContext('2d') };
  }

  reset(target: CanvasAndContext, width: number, height: number): void {
    target.canvas.width = Math.max(1, Math.ceil(width));
    target.canvas.height = Math.max(1, Math.ceil(height));
  }

  destroy(target: CanvasAndContext): void {
    target.canvas.width = 0;
    target.canvas.height = 0;
  }
}

@Injectable()
export class PdfJsRenderer implements PdfRenderer {
  private readonly logger = new Logger(PdfJsRenderer.name);

  async open(data: Uint8Array, password?: string): Promise<OpenedPdf> {
    const canvasFactory = new NapiCanvasFactory();
    const params = {
      // pdf.js transfers the buffer to its worker, so hand it a copy.
      data: new Uint8Array(data),
      password,
      canvasFactory,
      isEvalSupported: false,
      useSystemFonts: false,
      verbosity: 0,
      standardFontDataUrl: path.join(pdfjsRoot, 'standard_fonts/'),
      cMapUrl: path.join(pdfjsRoot, 'cmaps/'),
      cMapPacked: true,
    };

    let pdf: PDFDocumentProxy;
    try {
      pdf = await pdfjs.getDocument(params).promise;
    } catch (error) {
      throw toDecodeError(error);
    }

    const pageCount = await this.countPages(data, pdf.numPages);

    return {
      pageCount,
      renderPage: async (pageNumber: number, scale: number): Promise<PageImage> => {
        const page = await pdf.getPage(pageNumber);
        try {
          const viewport = page.getViewport({ scale });
          const { canvas, context } = canvasFactory.create(viewport.width, viewport.height);
          await page.render({ canvasContext: context, viewport }).promise;
          const png = await canvas.encode('png');

          return {
            pageNumber,
            width: canvas.width,
            height: canvas.height,
            mediaType: 'image/png',
            data: png,
          };
        } finally {
          page.cleanup();
        }
      },
      close: () => pdf.destroy(),
    };
  }

  /** pdf.js reports an empty page tree as one page, so a single page is checked against the tree itself. */
  private async countPages(data: Uint8Array, reported: number): Promise<number> {
    if (reported !== 1) return reported;

    try {
      const doc = await PDFDocument.load(data, { ignoreEncryption: true, updateMetadata: false });
      return doc.isEncrypted ? reported : doc.getPageCount();
    } catch (error) {
      this.logger.debug(`Could not read the page tree, keeping ${reported} page: ${String(error)}`);
      return reported;
    }
  }
}

function toDecodeError(error: unknown): DocumentDecodeError {
  const name = error instanceof Error ? error.name : '';
  const message = error instanceof Error ? error.message : String(error);

  if (name === 'PasswordException') {
    return new DocumentDecodeError(`PDF is encrypted: ${message}`, 'encrypted', { cause: error });
  }

  return new DocumentDecodeError(`Not a readable PDF: ${message}`, 'invalid', { cause: error });
}
