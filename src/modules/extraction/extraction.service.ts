import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  AuthError,
  DocumentDecodeError,
  ExtractionError,
  isExtractionError,
  ParseError,
  UpstreamError,
} from './errors';
import { ExtractionRequestBuilder } from './extraction-request.builder';
import { ExtractionRun } from './extraction-run';
import type {
  ExtractionFailure,
  ExtractionMode,
  ExtractionResult,
} from './interfaces';
import { ResponseParserService } from './parsing/response-parser.service';
import { toPlainPurchaseOrder } from './parsing/plain-record';
import { PdfRasterizerService } from './pdf/pdf-rasterizer.service';
import { VisionClientService } from './vision/vision-client.service';

export const EXTRACTION_OPTIONS = Symbol('EXTRACTION_OPTIONS');

export interface ExtractionOptions {
  defaultMode: ExtractionMode;
}

export interface ExtractionInput {
  data: Uint8Array;
  filename?: string;
  mode?: ExtractionMode;
  password?: string;
}

@Injectable()
export class ExtractionService {
  private readonly logger = new Logger(ExtractionService.name);

  constructor(
    private readonly rasterizer: PdfRasterizerService,
    private readonly requestBuilder: ExtractionRequestBuilder,
    private readonly visionClient: VisionClientService,
    private readonly parser: ResponseParserService,
    @Inject(EXTRACTION_OPTIONS) private readonly options: ExtractionOptions,
  ) {}

  get defaultMode(): ExtractionMode {
    return this.options.defaultMode;
  }

  async extract(input: ExtractionInput): Promise<ExtractionResult> {
    const run = new ExtractionRun();
    const mode = input.mode ?? this.options.defaultMode;
    const filename = input.filename ?? null;
    const label = filename ? `${run.id} (${filename})` : run.id;

    this.logger.log(`📥 Run ${label} received ${input.data.byteLength} bytes in ${mode} mode`);

    try {
      const rasterized = await this.rasterizer.rasterize(input.data, input.password);
      if (rasterized.pages.length === 0) {
        throw new DocumentDecodeError('Document has no pages', 'empty');
      }
      run.transition('Rasterized');

      const request = this.requestBuilder.build(rasterized.pages, mode);
      run.transition('RequestBuilt');

      run.transition('Submitted');
      this.logger.log(`📤 Run ${label} sending ${request.pages.length} page(s) to ${this.visionClient.modelName}`);
      const response = await this.visionClient.extract(request);

      const { record, flags } = this.parser.parse(response.text, mode);
      run.transition('Succeeded');

      const warnings: string[] = [];
      if (rasterized.truncated) {
        warnings.push(
          `Only the first ${rasterized.pages.length} of ${rasterized.pageCount} pages were sent for extraction`,
        );
      }

      this.logger.log(
        `✅ Run ${label} succeeded after ${response.attempts} attempt(s) with ${flags.length} flagged field(s)`,
      );

      return {
        status: 'succeeded',
        runId: run.id,
        filename,
        mode,
        pageCount: rasterized.pageCount,
        attempts: response.attempts,
        model: response.model,
        record,
        data: toPlainPurchaseOrder(record),
        flags,
        warnings,
        history: run.history,
      };
    } catch (error) {
      if (!run.isTerminal) {
        run.transition('Failed');
      }

      if (!isExtractionError(error)) {
        this.logger.error(`❌ Run ${label} crashed`, error instanceof Error ? error.stack : String(error));
        throw error;
      }

      this.logger.error(`❌ Run ${label} failed with ${error.kind}: ${error.message}`);

      return {
        status: 'failed',
        runId: run.id,
        filename,
        mode,
        error: this.describeFailure(error),
        history: run.history,
      };
    }
  }

  private describeFailure(error: ExtractionError): ExtractionFailure {
    const failure: ExtractionFailure = { kind: error.kind, message: error.message };

    if (error.attempts !== undefined) failure.attempts = error.attempts;
    if (error instanceof ParseError) failure.rawText = error.rawText;
    if (error instanceof UpstreamError) failure.status = error.status;
    if (error instanceof AuthError && error.status !== undefined) failure.status = error.status;
    if (error instanceof DocumentDecodeError) failure.reason = error.reason;

    return failure;
  }
}
