import type { PageImage } from './page-image.interface';
import type { ExtractionMode } from './purchase-order.interface';

export interface ExtractionRequest {
  readonly mode: ExtractionMode;
  /** Never empty. */
  readonly pages: readonly PageImage[];
  /** System instruction listing the fields to extract for `mode`. */
  readonly instruction: string;
  /** User-turn text sent after the page images. */
  readonly prompt: string;
  readonly fields: readonly string[];
}
