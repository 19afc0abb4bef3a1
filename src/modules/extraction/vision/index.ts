export * from './anthropic-vision.model';
export * from './openai-vision.model';
export * from './retry-after';
export * from './vision-client.service';
export * from './vision-model.interface';
export * from './vision-model.factory';
