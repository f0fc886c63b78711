import { DynamicModule, Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { ScheduleModule } from '@nestjs/schedule';
import { Connection } from 'mongoose';
import { BoardConfigModule } from './board-config/board-config.module';
import { BrokerModule } from './broker/broker.module';
import { brokerConfig } from './config/broker.config';
import { ProtocolModule } from './protocol/protocol.module';

function directionMemoryImports(): DynamicModule[] {
  if (!process.env.MONGO_URI) {
    return [];
  }

  const logger = new Logger('MongoDB');
  return [
    MongooseModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: async (configService: ConfigService) => ({
        uri: configService.get<string>('MONGO_URI'),
        retryAttempts: 3,
        retryDelay: 1000,
        socketTimeoutMS: 30000,
        connectTimeoutMS: 30000,
        connectionFactory: (connection: Connection) => {
          connection.on('connected', () => logger.log('MongoDB is connected'));
          connection.on('error', (error: unknown) =>
            logger.error('MongoDB connection error:', error),
          );
          connection.on('disconnected', () =>
            logger.warn('MongoDB is disconnected'),
          );
          return connection;
        },
      }),
      inject: [ConfigService],
    }),
    { module: BoardConfigModule },
  ];
}

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [brokerConfig] }),
    ScheduleModule.forRoot(),
    ...directionMemoryImports(),
    BrokerModule,
    ProtocolModule,
  ],
})
export class AppModule {}
