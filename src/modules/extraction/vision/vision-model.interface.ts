import type { ExtractionRequest } from '../interfaces';

export const VISION_MODEL = Symbol('VISION_MODEL');

/**
 * Sends one extraction request to a vision-language model and returns the raw text it produced.
 * Implementations throw `TransportError`, `AuthError`, `ThrottledError` or `UpstreamError`;
 * they never retry and never mutate the request.
 */
export interface VisionModel {
  readonly name: string;
  complete(request: ExtractionRequest): Promise<string>;
}

export interface VisionModelOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  maxTokens: number;
  timeoutMs: number;
}
