import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { createClient } from 'redis';
import { brokerConfig } from '../config/broker.config';
import { CommandQueueStore, QueueLimits } from './command-queue.store';
import {
  QueueRedisClient,
  REDIS_CLIENT,
} from './interfaces/queue-redis-client.interface';
import { MemoryCommandQueueStore } from './memory-command-queue.store';
import { RedisCommandQueueStore } from './redis-command-queue.store';

@Module({
  imports: [ConfigModule.forFeature(brokerConfig)],
  providers: [
    {
      provide: REDIS_CLIENT,
      useFactory: async (
        config: ConfigType<typeof brokerConfig>,
      ): Promise<QueueRedisClient | null> => {
        if (config.queueBackend !== 'redis') {
          return null;
        }
        const logger = new Logger('RedisClient');
        const client = createClient({
          url: `redis://${config.redisHost}:${config.redisPort}`,
        });
        client.on('error', (error: unknown) => {
          logger.error('Redis connection error:', error);
        });
        await client.connect();
        logger.log(`Connected to ${config.redisHost}:${config.redisPort}`);
        return {
          set: (key, value, ttlMs) => client.set(key, value, { PX: ttlMs }),
          getDel: (key) => client.getDel(key),
          exists: (key) => client.exists(key),
          rPush: (key, element) => client.rPush(key, element),
          lPop: (key) => client.lPop(key),
          lRange: (key, start, stop) => client.lRange(key, start, stop),
          lRem: (key, count, element) => client.lRem(key, count, element),
          lLen: (key) => client.lLen(key),
          quit: () => client.quit(),
        };
      },
      inject: [brokerConfig.KEY],
    },
    {
      provide: CommandQueueStore,
      useFactory: (
        config: ConfigType<typeof brokerConfig>,
        redis: QueueRedisClient | null,
      ): CommandQueueStore => {
        const limits: QueueLimits = {
          commandTtlMs: config.commandTtlMs,
          resultTtlMs: config.resultTtlMs,
          maxQueueLength: config.maxQueueLength,
        };
        return redis
          ? new RedisCommandQueueStore(redis, limits)
          : new MemoryCommandQueueStore(limits);
      },
      inject: [brokerConfig.KEY, REDIS_CLIENT],
    },
  ],
  exports: [CommandQueueStore],
})
export class QueueModule {}
