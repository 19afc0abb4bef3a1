import 'dotenv/config';
import * as joi from 'joi';

export type VisionProvider = 'anthropic' | 'openai';
export type ExtractionModeEnv = 'basic' | 'advanced';

interface EnvVars {
  NATS_SERVERS: string[];
  NATS_MAX_PAYLOAD_MB: number;
  VISION_PROVIDER: VisionProvider;
  VISION_API_KEY: string;
  VISION_MODEL?: string;
  VISION_BASE_URL?: string;
  VISION_MAX_TOKENS: number;
  VISION_TIMEOUT_MS: number;
  VISION_MAX_RETRIES: number;
  VISION_RETRY_BACKOFF_MS: number;
  VISION_MAX_THROTTLE_DELAY_MS: number;
  VISION_RETRY_UPSTREAM: boolean;
  RASTER_DPI: number;
  RASTER_MAX_PAGES: number;
  EXTRACTION_DEFAULT_MODE: ExtractionModeEnv;
}

const defaultModels: Record<VisionProvider, string> = {
  anthropic: 'claude-3-7-sonnet-20250219',
  openai: 'gpt-4o-mini',
};

const defaultBaseUrls: Record<VisionProvider, string> = {
  anthropic: 'https://api.anthropic.com',
  openai: 'https://api.openai.com/v1',
};

const envSchema = joi
  .object<EnvVars>({
    NATS_SERVERS: joi.array().items(joi.string()).min(1).required(),
    NATS_MAX_PAYLOAD_MB: joi.number().integer().min(1).default(20),
    VISION_PROVIDER: joi.string().valid('anthropic', 'openai').default('anthropic'),
    VISION_API_KEY: joi.string().required(),
    VISION_MODEL: joi.string().optional(),
    VISION_BASE_URL: joi.string().uri().optional(),
    VISION_MAX_TOKENS: joi.number().integer().min(1).default(4000),
    VISION_TIMEOUT_MS: joi.number().integer().min(1).default(120_000),
    VISION_MAX_RETRIES: joi.number().integer().min(0).default(2),
    VISION_RETRY_BACKOFF_MS: joi.number().integer().min(0).default(300),
    VISION_MAX_THROTTLE_DELAY_MS: joi.number().integer().min(0).default(60_000),
    VISION_RETRY_UPSTREAM: joi.boolean().default(false),
    RASTER_DPI: joi.number().integer().min(36).max(600).default(144),
    RASTER_MAX_PAGES: joi.number().integer().min(0).default(0),
    EXTRACTION_DEFAULT_MODE: joi.string().valid('basic', 'advanced').default('basic'),
  })
  .unknown(true);

const { error, value } = envSchema.validate({
  ...process.env,
  NATS_SERVERS: process.env['NATS_SERVERS']?.split(',').map((item) => item.trim()),
});

if (error) {
  throw new Error(`Config validation error: ${error.message}`);
}

const envVars: EnvVars = value;

export const envs = {
  natsServers: envVars.NATS_SERVERS,
  natsMaxPayloadBytes: envVars.NATS_MAX_PAYLOAD_MB * 1024 * 1024,
  visionProvider: envVars.VISION_PROVIDER,
  visionApiKey: envVars.VISION_API_KEY,
  visionModel: envVars.VISION_MODEL ?? defaultModels[envVars.VISION_PROVIDER],
  visionBaseUrl: envVars.VISION_BASE_URL ?? defaultBaseUrls[envVars.VISION_PROVIDER],
  visionMaxTokens: envVars.VISION_MAX_TOKENS,
  visionTimeoutMs: envVars.VISION_TIMEOUT_MS,
  visionMaxRetries: envVars.VISION_MAX_RETRIES,
  visionRetryBackoffMs: envVars.VISION_RETRY_BACKOFF_MS,
  visionMaxThrottleDelayMs: envVars.VISION_MAX_THROTTLE_DELAY_MS,
  visionRetryUpstream: envVars.VISION_RETRY_UPSTREAM,
  rasterDpi: envVars.RASTER_DPI,
  rasterMaxPages: envVars.RASTER_MAX_PAGES,
  defaultMode: envVars.EXTRACTION_DEFAULT_MODE,
};
