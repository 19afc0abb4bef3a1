import type { VisionProvider } from '../../../config';
import { AnthropicVisionModel } from './anthropic-vision.model';
import { OpenAiVisionModel } from './openai-vision.model';
import type { VisionModel, VisionModelOptions } from './vision-model.interface';

export function createVisionModel(provider: VisionProvider, options: VisionModelOptions): VisionModel {
  switch (provider) {
    case 'anthropic':
      return new AnthropicVisionModel(options);
    case 'openai':
      return new OpenAiVisionModel(options);
  }
}
