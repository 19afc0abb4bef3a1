import { Module } from '@nestjs/common';

import { envs } from '../../config';
import { NatsModule } from '../../transports/nats.module';
import { ExtractionController } from './extraction.controller';
import { ExtractionRequestBuilder } from './extraction-request.builder';
import { EXTRACTION_OPTIONS, ExtractionService, type ExtractionOptions } from './extraction.service';
import { ResponseParserService } from './parsing';
import {
  PDF_RENDERER,
  PdfJsRenderer,
  PdfRasterizerService,
  RASTERIZER_OPTIONS,
  type RasterizerOptions,
} from './pdf';
import {
  createVisionModel,
  VISION_CLIENT_OPTIONS,
  VISION_MODEL,
  VisionClientService,
  type VisionClientOptions,
} from './vision';

@Module({
  imports: [NatsModule],
  controllers: [ExtractionController],
  providers: [
    ExtractionService,
    ExtractionRequestBuilder,
    ResponseParserService,
    PdfRasterizerService,
    VisionClientService,
    { provide: PDF_RENDERER, useClass: PdfJsRenderer },
    {
      provide: RASTERIZER_OPTIONS,
      useValue: { dpi: envs.rasterDpi, maxPages: envs.rasterMaxPages } satisfies RasterizerOptions,
    },
    {
      provide: VISION_MODEL,
      useFactory: () =>
        createVisionModel(envs.visionProvider, {
          apiKey: envs.visionApiKey,
          model: envs.visionModel,
          baseUrl: envs.visionBaseUrl,
          maxTokens: envs.visionMaxTokens,
          timeoutMs: envs.visionTimeoutMs,
        }),
    },
    {
      provide: VISION_CLIENT_OPTIONS,
      useValue: {
        maxRetries: envs.visionMaxRetries,
        backoffMs: envs.visionRetryBackoffMs,
        maxThrottleDelayMs: envs.visionMaxThrottleDelayMs,
        retryUpstream: envs.visionRetryUpstream,
      } satisfies VisionClientOptions,
    },
    {
      provide: EXTRACTION_OPTIONS,
      useValue: { defaultMode: envs.defaultMode } satisfies ExtractionOptions,
    },
  ],
})
export class ExtractionModule {}
