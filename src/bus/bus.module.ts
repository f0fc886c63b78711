import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { brokerConfig } from '../config/broker.config';
import { BUS_DRIVER } from './bus-driver.interface';
import { SimulatedBusDriver } from './simulated-bus.driver';

@Module({
  imports: [ConfigModule.forFeature(brokerConfig)],
  providers: [
    {
      provide: BUS_DRIVER,
      useFactory: (config: ConfigType<typeof brokerConfig>) =>
        new SimulatedBusDriver({ boards: config.simulatedBoards }),
      inject: [brokerConfig.KEY],
    },
  ],
  exports: [BUS_DRIVER],
})
export class BusModule {}
