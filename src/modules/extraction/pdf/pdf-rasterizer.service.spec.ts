import { FakePdfRenderer } from '../../../../test/fixtures';
import { DocumentDecodeError } from '../errors';
import { PdfRasterizerService } from './pdf-rasterizer.service';

const bytes = new Uint8Array([0x25, 0x50, 0x44, 0x46]);

describe('PdfRasterizerService', () => {
  it('renders every page in order at the configured resolution', async () => {
    const renderer = new FakePdfRenderer(3);
    const rasterizer = new PdfRasterizerService(renderer, { dpi: 144, maxPages: 0 });

    const result = await rasterizer.rasterize(bytes);

    expect(result.pages.map((page) => page.pageNumber)).toEqual([1, 2, 3]);
    expect(result.pageCount).toBe(3);
    expect(result.truncated).toBe(false);
    expect(renderer.rendered).toEqual([
      { pageNumber: 1, scale: 2 },
      { pageNumber: 2, scale: 2 },
      { pageNumber: 3, scale: 2 },
    ]);
    expect(renderer.closed).toBe(1);
  });

  it('returns an empty sequence for a document without pages', async () => {
    const rasterizer = new PdfRasterizerService(new FakePdfRenderer(0), { dpi: 72, maxPages: 0 });

    await expect(rasterizer.rasterize(bytes)).resolves.toEqual({ pages: [], pageCount: 0, truncated: false });
  });

  it('stops at the page cap', async () => {
    const renderer = new FakePdfRenderer(5);
    const rasterizer = new PdfRasterizerService(renderer, { dpi: 72, maxPages: 2 });

    const result = await rasterizer.rasterize(bytes);

    expect(result.pages).toHaveLength(2);
    expect(result.pageCount).toBe(5);
    expect(result.truncated).toBe(true);
  });

  it('passes decode errors from the renderer through', async () => {
    const failure = new DocumentDecodeError('PDF is encrypted: No password given', 'encrypted');
    const rasterizer = new PdfRasterizerService(new FakePdfRenderer(1, { open: failure }), {
      dpi: 144,
      maxPages: 0,
    });

    await expect(rasterizer.rasterize(bytes)).rejects.toBe(failure);
  });

  it('turns a page that cannot be painted into a decode error and still closes the document', async () => {
    const renderer = new FakePdfRenderer(2, { page: 2 });
    const rasterizer = new PdfRasterizerService(renderer, { dpi: 144, maxPages: 0 });

    const error = await rasterizer.rasterize(bytes).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DocumentDecodeError);
    expect(error instanceof DocumentDecodeError && error.message).toBe(
      'Could not render page 2: bad content stream',
    );
    expect(error instanceof DocumentDecodeError && error.reason).toBe('invalid');
    expect(renderer.closed).toBe(1);
  });
});
