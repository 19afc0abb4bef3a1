export interface PageImage {
  /** 1-based page number in the source document. */
  pageNumber: number;
  width: number;
  height: number;
  mediaType: 'image/png';
  data: Buffer;
}
