import { PendingResult } from '../../queue/interfaces/pending-result.interface';

export type CommandReply =
  | { status: 'completed'; result: PendingResult }
  | { status: 'timeout'; token: string; waitedMs: number };

export interface BrokerStatus {
  queued: number;
  dispatcherRunning: boolean;
  lastHeartbeat: string | null;
}
