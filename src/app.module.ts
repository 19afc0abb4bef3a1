import { Module } from '@nestjs/common';

import { ExtractionModule } from './modules/extraction/extraction.module';
import { NatsModule } from './transports/nats.module';

@Module({
  imports: [NatsModule, ExtractionModule],
})
export class AppModule {}
