import { Controller, Inject, Logger } from '@nestjs/common';
import { ClientProxy, MessagePattern, Payload, RpcException } from '@nestjs/microservices';

import { ExtractorEvents, ExtractorSubjects, NATS_SERVICE } from '../../config';
import { SubmitExtractionDto } from './dto';
import { ExtractionService } from './extraction.service';
import type { ExtractionResult } from './interfaces';
import { VisionClientService } from './vision/vision-client.service';

@Controller()
export class ExtractionController {
  private readonly logger = new Logger(ExtractionController.name);

  constructor(
    private readonly extractionService: ExtractionService,
    private readonly visionClient: VisionClientService,
    @Inject(NATS_SERVICE) private readonly client: ClientProxy,
  ) {}

  @MessagePattern(ExtractorSubjects.extract)
  async extract(@Payload() payload: SubmitExtractionDto): Promise<ExtractionResult> {
    try {
      const result = await this.extractionService.extract({
        data: Buffer.from(payload.buffer, 'base64'),
        filename: payload.filename,
        mode: payload.mode,
        password: payload.password,
      });

      this.client.emit(ExtractorEvents.extracted, {
        runId: result.runId,
        filename: result.filename,
        mode: result.mode,
        status: result.status,
        ...(result.status === 'succeeded' ? { data: result.data } : { error: result.error }),
      });

      return result;
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @MessagePattern(ExtractorSubjects.health)
  health() {
    return {
      status: 'ok',
      model: this.visionClient.modelName,
      mode: this.extractionService.defaultMode,
    };
  }

  private handleError(error: unknown): RpcException {
    if (error instanceof RpcException) {
      return error;
    }

    this.logger.error(error);
    return new RpcException({ status: 500, message: 'Internal server error' });
  }
}
