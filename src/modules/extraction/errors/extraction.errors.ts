export type ExtractionErrorKind =
  | 'DocumentDecodeError'
  | 'RequestBuildError'
  | 'TransportError'
  | 'AuthError'
  | 'ThrottledError'
  | 'UpstreamError'
  | 'ParseError';

export abstract class ExtractionError extends Error {
  abstract readonly kind: ExtractionErrorKind;
  readonly retryable: boolean = false;
  /** Number of upstream attempts made before the error surfaced, when known. */
  attempts?: number;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type DocumentDecodeReason = 'invalid' | 'encrypted' | 'empty';

export class DocumentDecodeError extends ExtractionError {
  readonly kind = 'DocumentDecodeError';

  constructor(
    message: string,
    readonly reason: DocumentDecodeReason,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class RequestBuildError extends ExtractionError {
  readonly kind = 'RequestBuildError';

  constructor(message: string) {
    super(message);
  }
}

export class TransportError extends ExtractionError {
  readonly kind = 'TransportError';
  override readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class AuthError extends ExtractionError {
  readonly kind = 'AuthError';

  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export class ThrottledError extends ExtractionError {
  readonly kind = 'ThrottledError';
  override readonly retryable = true;

  constructor(
    message: string,
    readonly retryAfterMs: number | null,
  ) {
    super(message);
  }
}

export class UpstreamError extends ExtractionError {
  readonly kind = 'UpstreamError';

  constructor(
    message: string,
    readonly status: number | null,
    readonly body?: string,
  ) {
    super(message);
  }
}

export class ParseError extends ExtractionError {
  readonly kind = 'ParseError';

  constructor(
    message: string,
    readonly rawText: string,
  ) {
    super(message);
  }
}

export const isExtractionError = (error: unknown): error is ExtractionError =>
  error instanceof ExtractionError;
