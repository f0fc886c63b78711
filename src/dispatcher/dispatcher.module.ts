import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { BusModule } from '../bus/bus.module';
import { brokerConfig } from '../config/broker.config';
import { QueueModule } from '../queue/queue.module';
import { CommandExecutor } from './command-executor';
import { DispatcherService } from './dispatcher.service';
import { WatchdogService } from './watchdog.service';

@Module({
  imports: [ConfigModule.forFeature(brokerConfig), BusModule, QueueModule],
  providers: [CommandExecutor, DispatcherService, WatchdogService],
  exports: [DispatcherService],
})
export class DispatcherModule {}
