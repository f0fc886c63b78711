import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { QueueFullException } from '../common/exceptions/broker.exceptions';
import { Clock, CommandQueueStore, QueueLimits } from './command-queue.store';
import { Command, CommandRequest } from './interfaces/command.interface';
import { FetchResult, PendingResult } from './interfaces/pending-result.interface';

interface Expiring<T> {
  value: T;
  expiresAt: number;
}

/**
 * Single-process backend. Expiry is evaluated against the injected clock on
 * every access, so no timers are left running.
 */
export class MemoryCommandQueueStore extends CommandQueueStore {
  private readonly logger = new Logger(MemoryCommandQueueStore.name);
  private queue: Expiring<Command>[] = [];
  private readonly results = new Map<string, Expiring<PendingResult>>();
  // token -> instant after which no result can be picked up any more
  private readonly tickets = new Map<string, number>();

  constructor(
    private readonly limits: QueueLimits,
    private readonly now: Clock = Date.now,
  ) {
    super();
  }

  async enqueue(
    request: CommandRequest,
    ttlMs: number = this.limits.commandTtlMs,
  ): Promise<string> {
    this.purgeExpired();
    if (this.queue.length >= this.limits.maxQueueLength) {
      throw new QueueFullException(
        this.queue.length,
        this.limits.maxQueueLength,
      );
    }

    const submittedAt = this.now();
    const command: Command = { ...request, token: randomUUID(), submittedAt };
    this.queue.push({ value: command, expiresAt: submittedAt + ttlMs });
    this.tickets.set(
      command.token,
      submittedAt + ttlMs + this.limits.resultTtlMs,
    );
    return command.token;
  }

  async dequeueNext(): Promise<Command | null> {
    for (let entry = this.queue.shift(); entry; entry = this.queue.shift()) {
      if (entry.expiresAt > this.now()) {
        return entry.value;
      }
      this.logger.debug(`Dropped expired ${entry.value.verb} ${entry.value.token}`);
    }
    return null;
  }

  async publishResult(
    result: PendingResult,
    ttlMs: number = this.limits.resultTtlMs,
  ): Promise<void> {
    const expiresAt = this.now() + ttlMs;
    this.results.set(result.token, { value: result, expiresAt });
    this.tickets.set(result.token, expiresAt);
  }

  async fetchResult(token: string): Promise<FetchResult> {
    const now = this.now();
    const entry = this.results.get(token);
    if (entry && entry.expiresAt > now) {
      this.results.delete(token);
      this.tickets.delete(token);
      return { status: 'ready', result: entry.value };
    }

    const ticket = this.tickets.get(token);
    if (ticket !== undefined && ticket > now) {
      return { status: 'notReady' };
    }
    return { status: 'expired' };
  }

  async size(): Promise<number> {
    this.purgeExpired();
    return this.queue.length;
  }

  private purgeExpired(): void {
    const now = this.now();
    this.queue = this.queue.filter((entry) => entry.expiresAt > now);
    for (const [token, entry] of this.results) {
      if (entry.expiresAt <= now) {
        this.results.delete(token);
      }
    }
    for (const [token, expiresAt] of this.tickets) {
      if (expiresAt <= now) {
        this.tickets.delete(token);
      }
    }
  }
}
