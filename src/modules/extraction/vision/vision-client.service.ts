import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  ExtractionError,
  isExtractionError,
  ThrottledError,
  TransportError,
  UpstreamError,
} from '../errors';
import type { ExtractionRequest } from '../interfaces';
import { VISION_MODEL, type VisionModel } from './vision-model.interface';

export const VISION_CLIENT_OPTIONS = Symbol('VISION_CLIENT_OPTIONS');

export interface VisionClientOptions {
  /** Extra attempts allowed after the first one for transport and throttling failures. */
  maxRetries: number;
  /** Linear backoff step: the n-th retry waits `backoffMs * n`. */
  backoffMs: number;
  /** A throttled response asking for a longer wait than this is surfaced instead of retried. */
  maxThrottleDelayMs: number;
  /** Also retry 5xx upstream answers. Off by default. */
  retryUpstream?: boolean;
}

export interface VisionResponse {
  text: string;
  attempts: number;
  model: string;
}

@Injectable()
export class VisionClientService {
  private readonly logger = new Logger(VisionClientService.name);

  constructor(
    @Inject(VISION_MODEL) private readonly model: VisionModel,
    @Inject(VISION_CLIENT_OPTIONS) private readonly options: VisionClientOptions,
  ) {}

  get modelName(): string {
    return this.model.name;
  }

  async extract(request: ExtractionRequest): Promise<VisionResponse> {
    for (let attempt = 1; ; attempt++) {
      try {
        const text = await this.model.complete(request);
        return { text, attempts: attempt, model: this.model.name };
      } catch (error) {
        const failure = this.normalize(error);
        failure.attempts = attempt;

        const wait = this.retryDelay(failure, attempt);
        if (wait === null) {
          this.logger.error(`Vision attempt ${attempt} failed with ${failure.kind}: ${failure.message}`);
          throw failure;
        }

        this.logger.warn(
          `Vision attempt ${attempt} failed with ${failure.kind}: ${failure.message}. Retrying in ${wait}ms`,
        );
        await this.delay(wait);
      }
    }
  }

  private retryDelay(error: ExtractionError, attempt: number): number | null {
    if (attempt > this.options.maxRetries) {
      return null;
    }

    const backoff = this.options.backoffMs * attempt;

    if (error instanceof TransportError) {
      return backoff;
    }

    if (error instanceof ThrottledError) {
      const wait = error.retryAfterMs ?? backoff;
      return wait > this.options.maxThrottleDelayMs ? null : wait;
    }

    if (error instanceof UpstreamError && this.options.retryUpstream) {
      return error.status !== null && error.status >= 500 ? backoff : null;
    }

    return null;
  }

  private normalize(error: unknown): ExtractionError {
    if (isExtractionError(error)) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new UpstreamError(`Vision model failed unexpectedly: ${message}`, null);
  }

  private async delay(ms: number): Promise<void> {
    if (ms <= 0) return;
    await new Promise((resolve) => setTimeout(resolve, ms));
  }
}
