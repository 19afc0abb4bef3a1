import { RpcException } from '@nestjs/microservices';
import { Test } from '@nestjs/testing';

import { NATS_SERVICE } from '../../config';
import { ExtractionController } from './extraction.controller';
import { ExtractionService, type ExtractionInput } from './extraction.service';
import type { ExtractionFailed, ExtractionResult } from './interfaces';
import { VisionClientService } from './vision/vision-client.service';

const failedRun: ExtractionFailed = {
  status: 'failed',
  runId: 'run-1',
  filename: 'po.pdf',
  mode: 'basic',
  error: { kind: 'ParseError', message: 'No JSON object found in the model response', rawText: 'no order here' },
  history: [
    { state: 'Received', at: '2024-01-05T10:00:00.000Z' },
    { state: 'Failed', at: '2024-01-05T10:00:01.000Z' },
  ],
};

describe('ExtractionController', () => {
  let controller: ExtractionController;
  const extract = jest.fn<Promise<ExtractionResult>, [ExtractionInput]>();
  const emit = jest.fn();

  beforeEach(async () => {
    extract.mockReset();
    emit.mockReset();

    const moduleRef = await Test.createTestingModule({
      controllers: [ExtractionController],
      providers: [
        { provide: ExtractionService, useValue: { extract, defaultMode: 'basic' } },
        { provide: VisionClientService, useValue: { modelName: 'anthropic:test-model' } },
        { provide: NATS_SERVICE, useValue: { emit } },
      ],
    }).compile();

    controller = moduleRef.get(ExtractionController);
  });

  it('decodes the payload, replies with the result and announces it', async () => {
    extract.mockResolvedValue(failedRun);

    const result = await controller.extract({
      buffer: Buffer.from('%PDF-1.7').toString('base64'),
      filename: 'po.pdf',
      mode: 'basic',
    });

    expect(result).toBe(failedRun);
    const input = extract.mock.calls[0]?.[0];
    expect(input?.filename).toBe('po.pdf');
    expect(input?.mode).toBe('basic');
    expect(input?.password).toBeUndefined();
    expect(Buffer.from(input?.data ?? []).toString()).toBe('%PDF-1.7');
    expect(emit).toHaveBeenCalledWith('po.extracted', {
      runId: 'run-1',
      filename: 'po.pdf',
      mode: 'basic',
      status: 'failed',
      error: failedRun.error,
    });
  });

  it('turns unexpected errors into an RPC error', async () => {
    extract.mockRejectedValue(new Error('renderer exploded'));

    await expect(
      controller.extract({ buffer: Buffer.from('%PDF').toString('base64'), filename: 'po.pdf' }),
    ).rejects.toBeInstanceOf(RpcException);
    expect(emit).not.toHaveBeenCalled();
  });

  it('reports health with the configured model and mode', () => {
    expect(controller.health()).toEqual({ status: 'ok', model: 'anthropic:test-model', mode: 'basic' });
  });
});
