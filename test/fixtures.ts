import type { ExtractionRequest, PageImage } from '../src/modules/extraction/interfaces';
import type { OpenedPdf, PdfRenderer } from '../src/modules/extraction/pdf/pdf-renderer.interface';
import type { VisionModel } from '../src/modules/extraction/vision/vision-model.interface';

export const pageImage = (pageNumber = 1): PageImage => ({
  pageNumber,
  width: 100,
  height: 140,
  mediaType: 'image/png',
  data: Buffer.from(`page-${pageNumber}`),
});

/** Replays a fixed list of answers; an Error entry is thrown instead of returned. */
export class ScriptedVisionModel implements VisionModel {
  readonly name = 'fake:vision';
  readonly requests: ExtractionRequest[] = [];

  constructor(private readonly script: Array<string | Error>) {}

  get calls(): number {
    return this.requests.length;
  }

  async complete(request: ExtractionRequest): Promise<string> {
    const step = this.script[Math.min(this.requests.length, this.script.length - 1)];
    this.requests.push(request);
    if (step === undefined) throw new Error('ScriptedVisionModel has an empty script');
    if (step instanceof Error) throw step;
    return step;
  }
}

export class FakePdfRenderer implements PdfRenderer {
  readonly rendered: Array<{ pageNumber: number; scale: number }> = [];
  closed = 0;

  constructor(
    private readonly pageCount: number,
    private readonly failures: { open?: Error; page?: number } = {},
  ) {}

  async open(): Promise<OpenedPdf> {
    if (this.failures.open) throw this.failures.open;

    return {
      pageCount: this.pageCount,
      renderPage: async (pageNumber: number, scale: number) => {
        if (this.failures.page === pageNumber) throw new Error('bad content stream');
        this.rendered.push({ pageNumber, scale });
        return pageImage(pageNumber);
      },
      close: async () => {
        this.closed += 1;
      },
    };
  }
}
