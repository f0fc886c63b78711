import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';
import { formatHex } from '../common/utils/hex';
import { brokerConfig } from '../config/broker.config';
import { DispatcherService } from '../dispatcher/dispatcher.service';
import { CommandQueueStore } from '../queue/command-queue.store';
import {
  CommandRequest,
  CommandVerb,
  REGISTER_VERBS,
} from '../queue/interfaces/command.interface';
import { FetchResult } from '../queue/interfaces/pending-result.interface';
import { BOARD_ADDRESSES } from '../register/register.constants';
import { BrokerStatus, CommandReply } from './interfaces/command-reply.interface';

@Injectable()
export class BrokerService {
  private readonly logger = new Logger(BrokerService.name);

  constructor(
    private readonly store: CommandQueueStore,
    private readonly dispatcher: DispatcherService,
    @Inject(brokerConfig.KEY)
    private readonly config: ConfigType<typeof brokerConfig>,
  ) {}

  /**
   * Queues a command and returns its token without waiting. `target` is the
   * pin index for pin verbs and the register half for GETDIRREG/GETIOREG.
   */
  async submit(
    verb: CommandVerb,
    boardAddress: number,
    target?: number,
  ): Promise<string> {
    const token = await this.store.enqueue(
      this.toRequest(verb, boardAddress, target),
      this.config.commandTtlMs,
    );
    this.logger.debug(
      `Queued ${verb} ${formatHex(boardAddress)} ${target ?? '-'} as ${token}`,
    );
    return token;
  }

  /**
   * Queues a command and polls for its result. A timeout leaves the command
   * queued; if it still runs, its result expires unread.
   */
  async submitAndWait(
    verb: CommandVerb,
    boardAddress: number,
    target?: number,
    timeoutMs: number = this.config.commandTtlMs,
  ): Promise<CommandReply> {
    const startedAt = Date.now();
    const token = await this.submit(verb, boardAddress, target);

    for (;;) {
      const fetched = await this.store.fetchResult(token);
      if (fetched.status === 'ready') {
        return { status: 'completed', result: fetched.result };
      }

      const waitedMs = Date.now() - startedAt;
      if (fetched.status === 'expired' || waitedMs >= timeoutMs) {
        return { status: 'timeout', token, waitedMs };
      }
      await sleep(Math.min(this.config.pollIntervalMs, timeoutMs - waitedMs));
    }
  }

  fetchResult(token: string): Promise<FetchResult> {
    return this.store.fetchResult(token);
  }

  /** Addresses of every board that answers IDENTIFY. */
  async scanBoards(timeoutMs?: number): Promise<number[]> {
    const replies = await Promise.all(
      BOARD_ADDRESSES.map((address) =>
        this.submitAndWait(CommandVerb.IDENTIFY, address, undefined, timeoutMs),
      ),
    );
    return BOARD_ADDRESSES.filter((_, i) => {
      const reply = replies[i];
      return reply.status === 'completed' && reply.result.value === 1;
    });
  }

  async status(): Promise<BrokerStatus> {
    const heartbeat = this.dispatcher.heartbeat;
    return {
      queued: await this.store.size(),
      dispatcherRunning: this.dispatcher.isRunning,
      lastHeartbeat: heartbeat > 0 ? new Date(heartbeat).toISOString() : null,
    };
  }

  private toRequest(
    verb: CommandVerb,
    boardAddress: number,
    target?: number,
  ): CommandRequest {
    if (verb === CommandVerb.IDENTIFY || target === undefined) {
      return { verb, boardAddress };
    }
    return REGISTER_VERBS.has(verb)
      ? { verb, boardAddress, registerHalf: target }
      : { verb, boardAddress, pinIndex: target };
  }
}
