import { Logger } from '@nestjs/common';
import Anthropic from '@anthropic-ai/sdk';

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

type ContentBlockParam = Anthropic.ImageBlockParam | Anthropic.TextBlockParam;

export interface MessageReply {
  content: Array<{ type: string; text?: string }>;
  stop_reason: string | null;
}

export interface MessagesClient {
  messages: {
    create(body: Anthropic.MessageCreateParamsNonStreaming): PromiseLike<MessageReply>;
  };
}

/** Claude Messages API through the official SDK, with SDK retries turned off. */
export class AnthropicVisionModel implements VisionModel {
  private readonly logger = new Logger(AnthropicVisionModel.name);
  readonly name: string;

  constructor(
    private readonly options: VisionModelOptions,
    private readonly client: MessagesClient = new Anthropic({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
    }),
  ) {
    this.name = `anthropic:${options.model}`;
  }

  async complete(request: ExtractionRequest): Promise<string> {
    const content: ContentBlockParam[] = request.pages.map(
      (page): ContentBlockParam => ({
        type: 'image',
        source: {
          type: 'base64',
          media_type: page.mediaType,
          data: page.data.toString('base64'),
        },
      }),
    );
    content.push({ type: 'text', text: request.prompt });

    let reply: MessageReply;
    try {
      reply = await this.client.messages.create({
        model: this.options.model,
        system: request.instruction,
        messages: [{ role: 'user', content }],
        max_tokens: this.options.maxTokens,
        temperature: 0,
      });
    } catch (error) {
      throw toAnthropicVisionError(error);
    }

    const text = reply.content.find((block) => block.type === 'text')?.text ?? '';

    if (reply.stop_reason === 'max_tokens') {
      throw new UpstreamError(`Vision response truncated at ${this.options.maxTokens} tokens`, 200, text);
    }

    if (!text) {
      throw new UpstreamError('Vision endpoint returned no text content', 200);
    }

    this.logger.debug(`Received ${text.length} characters from ${this.name}`);
    return text;
  }
}

export function toAnthropicVisionError(error: unknown): ExtractionError {
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new TransportError('Anthropic request timed out', { cause: error });
  }

  if (error instanceof Anthropic.APIConnectionError) {
    return new TransportError(`Anthropic connection failed: ${error.message}`, { cause: error });
  }

  if (error instanceof Anthropic.AuthenticationError || error instanceof Anthropic.PermissionDeniedError) {
    return new AuthError(`Anthropic rejected the credential: ${error.message}`, error.status);
  }

  if (error instanceof Anthropic.RateLimitError) {
    const headers = error.headers ?? {};
    return new ThrottledError(
      `Anthropic is rate limiting requests: ${error.message}`,
      parseRetryAfter((name) => headers[name]),
    );
  }

  if (error instanceof Anthropic.APIError) {
    return new UpstreamError(`Anthropic request failed: ${error.message}`, error.status ?? null);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamError(`Anthropic request failed: ${message}`, null);
}
