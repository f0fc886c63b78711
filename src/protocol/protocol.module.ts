import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BrokerModule } from '../broker/broker.module';
import { brokerConfig } from '../config/broker.config';
import { TcpCommandServer } from './tcp-command.server';

@Module({
  imports: [ConfigModule.forFeature(brokerConfig), BrokerModule],
  providers: [TcpCommandServer],
})
export class ProtocolModule {}
