import { CommandVerb } from './command.interface';

export type ResultValue = number | boolean;

export type ExecutionError = 'InvalidAddress' | 'BusTransactionFailure';

export interface PendingResult {
  token: string;
  verb: CommandVerb;
  value: ResultValue;
  ok: boolean;
  error?: ExecutionError;
  producedAt: number;
}

export type FetchResult =
  | { status: 'ready'; result: PendingResult }
  | { status: 'notReady' }
  | { status: 'expired' };
