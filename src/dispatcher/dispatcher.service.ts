import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
  Optional,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';
import {
  DIRECTION_MEMORY,
  DirectionMemory,
} from '../board-config/interfaces/direction-memory.interface';
import { describeError } from '../common/utils/describe-error';
import { formatHex } from '../common/utils/hex';
import { brokerConfig } from '../config/broker.config';
import { CommandQueueStore } from '../queue/command-queue.store';
import { CommandExecutor } from './command-executor';

/**
 * The only component allowed to touch the bus. Holds at most one command at a
 * time: dequeue, execute, publish, repeat.
 */
@Injectable()
export class DispatcherService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(DispatcherService.name);
  private running = false;
  private loop: Promise<void> | null = null;
  private lastHeartbeat = 0;

  constructor(
    private readonly store: CommandQueueStore,
    private readonly executor: CommandExecutor,
    @Inject(brokerConfig.KEY)
    private readonly config: ConfigType<typeof brokerConfig>,
    @Optional()
    @Inject(DIRECTION_MEMORY)
    private readonly directionMemory?: DirectionMemory,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  get heartbeat(): number {
    return this.lastHeartbeat;
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.start();
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    await this.restoreDirections();
    this.running = true;
    this.lastHeartbeat = Date.now();
    this.loop = this.run();
    this.logger.log('Dispatcher started');
  }

  /** Resolves once the command in hand, if any, has been published. */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    const loop = this.loop;
    this.loop = null;
    await loop;
    this.logger.log('Dispatcher stopped');
  }

  /**
   * One turn of the loop. Returns false when nothing live was queued.
   */
  async processNext(): Promise<boolean> {
    const command = await this.store.dequeueNext();
    if (!command) {
      return false;
    }

    this.logger.debug(
      `Executing ${command.verb} on ${formatHex(command.boardAddress)} (${command.token})`,
    );
    const outcome = await this.executor.execute(command);
    await this.store.publishResult(
      {
        token: command.token,
        verb: command.verb,
        ...outcome,
        producedAt: Date.now(),
      },
      this.config.resultTtlMs,
    );
    return true;
  }

  private async run(): Promise<void> {
    while (this.running) {
      this.lastHeartbeat = Date.now();
      let worked = false;
      try {
        worked = await this.processNext();
      } catch (error) {
        this.logger.error(`Dispatcher turn failed: ${describeError(error)}`);
      }
      if (!worked && this.running) {
        await sleep(this.config.idleWaitMs);
      }
    }
  }

  private async restoreDirections(): Promise<void> {
    if (!this.directionMemory) {
      return;
    }
    try {
      const boards = await this.directionMemory.list();
      for (const board of boards) {
        if (await this.executor.restoreDirections(board)) {
          this.logger.log(
            `Restored directions of board ${formatHex(board.boardAddress)}`,
          );
        } else {
          await this.directionMemory.forget(board.boardAddress);
        }
      }
    } catch (error) {
      this.logger.error(`Could not restore directions: ${describeError(error)}`);
    }
  }
}
