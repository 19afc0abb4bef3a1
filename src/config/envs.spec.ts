describe('Extractor envs', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    jest.resetModules();
    process.env = { ...originalEnv };
    delete process.env['VISION_MODEL'];
    delete process.env['VISION_BASE_URL'];
    delete process.env['VISION_PROVIDER'];
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('parses environment variables', async () => {
    process.env['NATS_SERVERS'] = 'nats://localhost:4222, nats://localhost:4223';
    process.env['VISION_API_KEY'] = 'test-key';
    process.env['VISION_TIMEOUT_MS'] = '15000';
    process.env['VISION_MAX_RETRIES'] = '3';
    process.env['RASTER_DPI'] = '200';
    process.env['EXTRACTION_DEFAULT_MODE'] = 'advanced';

    const { envs } = await import('./envs');

    expect(envs.natsServers).toEqual(['nats://localhost:4222', 'nats://localhost:4223']);
    expect(envs.visionApiKey).toBe('test-key');
    expect(envs.visionTimeoutMs).toBe(15000);
    expect(envs.visionMaxRetries).toBe(3);
    expect(envs.rasterDpi).toBe(200);
    expect(envs.defaultMode).toBe('advanced');
  });

  it('falls back to provider defaults', async () => {
    process.env['NATS_SERVERS'] = 'nats://localhost:4222';
    process.env['VISION_API_KEY'] = 'test-key';
    process.env['VISION_PROVIDER'] = 'openai';

    const { envs } = await import('./envs');

    expect(envs.visionModel).toBe('gpt-4o-mini');
    expect(envs.visionBaseUrl).toBe('https://api.openai.com/v1');
    expect(envs.visionMaxRetries).toBe(2);
    expect(envs.visionTimeoutMs).toBe(120000);
    expect(envs.rasterMaxPages).toBe(0);
    expect(envs.natsMaxPayloadBytes).toBe(20 * 1024 * 1024);
  });

  it('rejects an unknown provider', async () => {
    process.env['NATS_SERVERS'] = 'nats://localhost:4222';
    process.env['VISION_API_KEY'] = 'test-key';
    process.env['VISION_PROVIDER'] = 'mystery';

    await expect(import('./envs')).rejects.toThrow(/^Config validation error/);
  });
});
