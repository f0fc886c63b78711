import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Interval } from '@nestjs/schedule';
import { describeError } from '../common/utils/describe-error';
import { brokerConfig } from '../config/broker.config';
import { CommandQueueStore } from '../queue/command-queue.store';
import { DispatcherService } from './dispatcher.service';

@Injectable()
export class WatchdogService {
  private readonly logger = new Logger(WatchdogService.name);
  private stalled = false;

  constructor(
    private readonly dispatcher: DispatcherService,
    private readonly store: CommandQueueStore,
    @Inject(brokerConfig.KEY)
    private readonly config: ConfigType<typeof brokerConfig>,
  ) {}

  get isStalled(): boolean {
    return this.stalled;
  }

  @Interval(1000)
  async check(now: number = Date.now()): Promise<void> {
    if (!this.dispatcher.isRunning) {
      return;
    }

    const silentFor = now - this.dispatcher.heartbeat;
    if (silentFor > this.config.watchdogTimeoutMs) {
      if (!this.stalled) {
        this.logger.error(`Dispatcher has not turned for ${silentFor} ms`);
      }
      this.stalled = true;
    } else if (this.stalled) {
      this.logger.log('Dispatcher recovered');
      this.stalled = false;
    }

    try {
      this.logger.debug(`Queue depth: ${await this.store.size()}`);
    } catch (error) {
      this.logger.warn(`Could not read queue depth: ${describeError(error)}`);
    }
  }
}
