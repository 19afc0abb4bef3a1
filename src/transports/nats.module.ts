import { Module } from '@nestjs/common';
import { ClientsModule, Transport } from '@nestjs/microservices';

import { envs, NATS_SERVICE } from '../config';

const natsClients = ClientsModule.register([
  {
    name: NATS_SERVICE,
    transport: Transport.NATS,
    options: { servers: envs.natsServers },
  },
]);

@Module({
  imports: [natsClients],
  exports: [natsClients],
})
export class NatsModule {}
