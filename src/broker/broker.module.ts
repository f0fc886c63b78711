import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { brokerConfig } from '../config/broker.config';
import { DispatcherModule } from '../dispatcher/dispatcher.module';
import { QueueModule } from '../queue/queue.module';
import { BrokerController } from './broker.controller';
import { BrokerService } from './broker.service';

@Module({
  imports: [ConfigModule.forFeature(brokerConfig), QueueModule, DispatcherModule],
  providers: [BrokerService],
  controllers: [BrokerController],
  exports: [BrokerService],
})
export class BrokerModule {}
