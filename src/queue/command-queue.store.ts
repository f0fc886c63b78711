import { Command, CommandRequest } from './interfaces/command.interface';
import { FetchResult, PendingResult } from './interfaces/pending-result.interface';

export type Clock = () => number;

export interface QueueLimits {
  commandTtlMs: number;
  resultTtlMs: number;
  maxQueueLength: number;
}

/**
 * Shared expiring store for queued commands and their results. Commands are
 * served oldest first; entries past their lifetime disappear without trace.
 */
export abstract class CommandQueueStore {
  /** @throws QueueFullException when `maxQueueLength` live commands are queued */
  abstract enqueue(request: CommandRequest, ttlMs?: number): Promise<string>;

  abstract dequeueNext(): Promise<Command | null>;

  abstract publishResult(result: PendingResult, ttlMs?: number): Promise<void>;

  /** Non-blocking; a ready result is removed by the read. */
  abstract fetchResult(token: string): Promise<FetchResult>;

  abstract size(): Promise<number>;
}
