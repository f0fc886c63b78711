import { formatHex } from '../common/utils/hex';

export class BusError extends Error {
  constructor(
    message: string,
    readonly boardAddress: number,
    readonly register?: number,
  ) {
    super(message);
    this.name = 'BusError';
  }
}

export class BusDeadlineError extends BusError {
  constructor(boardAddress: number, register: number, deadlineMs: number) {
    super(
      `Transaction on board ${formatHex(boardAddress)} register ${formatHex(register)} exceeded ${deadlineMs} ms`,
      boardAddress,
      register,
    );
    this.name = 'BusDeadlineError';
  }
}

export class BusBusyError extends BusError {
  constructor(boardAddress: number, register: number) {
    super(
      `Bus still held by an overdue transaction; refused board ${formatHex(boardAddress)} register ${formatHex(register)}`,
      boardAddress,
      register,
    );
    this.name = 'BusBusyError';
  }
}
