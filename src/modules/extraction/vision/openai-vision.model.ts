import { Logger } from '@nestjs/common';
import OpenAI from 'openai';
import type {
  ResponseCreateParamsNonStreaming,
  ResponseInputContent,
} from 'openai/resources/responses/responses';

import {
  AuthError,
  ExtractionError,
  ThrottledError,
  TransportError,
  UpstreamError,
} from '../errors';
import type { ExtractionRequest } from '../interfaces';
import { parseRetryAfter } from './retry-after';
import type { VisionModel, VisionModelOptions } from './vision-model.interface';

export interface ResponseReply {
  output_text: string;
  status?: string;
  incomplete_details?: { reason?: string } | null;
}

export interface ResponsesClient {
  responses: {
    create(body: ResponseCreateParamsNonStreaming): PromiseLike<ResponseReply>;
  };
}

/** OpenAI Responses API through the official SDK, with SDK retries turned off. */
export class OpenAiVisionModel implements VisionModel {
  private readonly logger = new Logger(OpenAiVisionModel.name);
  readonly name: string;

  constructor(
    private readonly options: VisionModelOptions,
    private readonly client: ResponsesClient = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
    }),
  ) {
    this.name = `openai:${options.model}`;
  }

  async complete(request: ExtractionRequest): Promise<string> {
    const content: ResponseInputContent[] = request.pages.map((page): ResponseInputContent => ({
      type: 'input_image',
      image_url: `data:${page.mediaType};base64,${page.data.toString('base64')}`,
      detail: 'auto',
    }));
    content.push({ type: 'input_text', text: request.prompt });

    let reply: ResponseReply;
    try {
      reply = await this.client.responses.create({
        model: this.options.model,
        instructions: request.instruction,
        input: [{ role: 'user', content }],
        max_output_tokens: this.options.maxTokens,
        temperature: 0,
      });
    } catch (error) {
      throw toVisionError(error);
    }

    const text = reply.output_text;

    if (reply.status === 'incomplete' && reply.incomplete_details?.reason === 'max_output_tokens') {
      throw new UpstreamError(`Vision response truncated at ${this.options.maxTokens} tokens`, 200, text);
    }

    if (!text) {
      throw new UpstreamError('OpenAI returned an empty response', 200);
    }

    this.logger.debug(`Received ${text.length} characters from ${this.name}`);
    return text;
  }
}

export function toVisionError(error: unknown): ExtractionError {
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new TransportError('OpenAI request timed out', { cause: error });
  }

  if (error instanceof OpenAI.APIConnectionError) {
    return new TransportError(`OpenAI connection failed: ${error.message}`, { cause: error });
  }

  if (error instanceof OpenAI.AuthenticationError || error instanceof OpenAI.PermissionDeniedError) {
    return new AuthError(`OpenAI rejected the credential: ${error.message}`, error.status);
  }

  if (error instanceof OpenAI.RateLimitError) {
    const headers = error.headers ?? {};
    return new ThrottledError(
      `OpenAI is rate limiting requests: ${error.message}`,
      parseRetryAfter((name) => headers[name]),
    );
  }

  if (error instanceof OpenAI.APIError) {
    return new UpstreamError(`OpenAI request failed: ${error.message}`, error.status ?? null);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamError(`OpenAI request failed: ${message}`, null);
}
