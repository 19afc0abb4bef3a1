process.env['NATS_SERVERS'] ??= 'nats://localhost:4222';
process.env['VISION_API_KEY'] ??= 'test-key';
