import { Logger, OnApplicationShutdown } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { QueueFullException } from '../common/exceptions/broker.exceptions';
import { Clock, CommandQueueStore, QueueLimits } from './command-queue.store';
import { Command, CommandRequest } from './interfaces/command.interface';
import { FetchResult, PendingResult } from './interfaces/pending-result.interface';
import { QueueRedisClient } from './interfaces/queue-redis-client.interface';
import { storedCommandSchema, storedResultSchema } from './queue.schemas';

/**
 * Commands are written under their own key with a PX expiry, then their token
 * is appended to a list. RPUSH/LPOP keep FIFO order across processes; a token
 * whose command key has already expired is skipped.
 */
export class RedisCommandQueueStore
  extends CommandQueueStore
  implements OnApplicationShutdown
{
  private readonly logger = new Logger(RedisCommandQueueStore.name);

  constructor(
    private readonly redis: QueueRedisClient,
    private readonly limits: QueueLimits,
    private readonly prefix: string = 'broker',
    private readonly now: Clock = Date.now,
  ) {
    super();
  }

  private get queueKey(): string {
    return `${this.prefix}:queue`;
  }

  private commandKey(token: string): string {
    return `${this.prefix}:command:${token}`;
  }

  private resultKey(token: string): string {
    return `${this.prefix}:result:${token}`;
  }

  private ticketKey(token: string): string {
    return `${this.prefix}:ticket:${token}`;
  }

  async enqueue(
    request: CommandRequest,
    ttlMs: number = this.limits.commandTtlMs,
  ): Promise<string> {
    const queued = await this.countLive();
    if (queued >= this.limits.maxQueueLength) {
      throw new QueueFullException(queued, this.limits.maxQueueLength);
    }

    const command: Command = {
      ...request,
      token: randomUUID(),
      submittedAt: this.now(),
    };
    const { token } = command;

    await this.redis.set(this.commandKey(token), JSON.stringify(command), ttlMs);
    await this.redis.set(
      this.ticketKey(token),
      String(command.submittedAt),
      ttlMs + this.limits.resultTtlMs,
    );
    await this.redis.rPush(this.queueKey, token);

    return token;
  }

  async dequeueNext(): Promise<Command | null> {
    for (
      let token = await this.redis.lPop(this.queueKey);
      token !== null;
      token = await this.redis.lPop(this.queueKey)
    ) {
      const raw = await this.redis.getDel(this.commandKey(token));
      if (raw === null) {
        this.logger.debug(`Dropped expired command ${token}`);
        continue;
      }
      return storedCommandSchema.parse(JSON.parse(raw));
    }
    return null;
  }

  async publishResult(
    result: PendingResult,
    ttlMs: number = this.limits.resultTtlMs,
  ): Promise<void> {
    await this.redis.set(
      this.resultKey(result.token),
      JSON.stringify(result),
      ttlMs,
    );
    await this.redis.set(
      this.ticketKey(result.token),
      String(result.producedAt),
      ttlMs,
    );
  }

  async fetchResult(token: string): Promise<FetchResult> {
    const raw = await this.redis.getDel(this.resultKey(token));
    if (raw !== null) {
      await this.redis.getDel(this.ticketKey(token));
      return {
        status: 'ready',
        result: storedResultSchema.parse(JSON.parse(raw)),
      };
    }

    const pending = await this.redis.exists(this.ticketKey(token));
    return pending > 0 ? { status: 'notReady' } : { status: 'expired' };
  }

  async size(): Promise<number> {
    return this.redis.lLen(this.queueKey);
  }

  async onApplicationShutdown(): Promise<void> {
    await this.redis.quit();
  }

  /**
   * The list can still hold tokens of commands that expired while nobody was
   * dequeuing. Once it reaches the limit, every token whose command key is
   * gone is removed (by value, so a concurrent LPOP of the dispatcher is never
   * lost) and the live ones are counted.
   */
  private async countLive(): Promise<number> {
    const queued = await this.redis.lLen(this.queueKey);
    if (queued < this.limits.maxQueueLength) {
      return queued;
    }

    let live = 0;
    for (const token of await this.redis.lRange(this.queueKey, 0, -1)) {
      if ((await this.redis.exists(this.commandKey(token))) > 0) {
        live++;
      } else {
        await this.redis.lRem(this.queueKey, 1, token);
      }
    }
    return live;
  }
}
