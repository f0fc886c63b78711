import { HttpException, HttpStatus } from '@nestjs/common';

export type BrokerErrorCode =
  | 'QUEUE_FULL'
  | 'COMMAND_TIMEOUT'
  | 'INVALID_COMMAND';

export class BrokerException extends HttpException {
  constructor(
    message: string,
    readonly code: BrokerErrorCode,
    details: Record<string, unknown> = {},
    status: number = HttpStatus.BAD_REQUEST,
  ) {
    super(
      {
        message,
        error: code,
        details,
        timestamp: new Date().toISOString(),
      },
      status,
    );
  }
}

export class QueueFullException extends BrokerException {
  constructor(queued: number, limit: number) {
    super(
      `Command queue is saturated (${queued}/${limit})`,
      'QUEUE_FULL',
      { queued, limit },
      HttpStatus.SERVICE_UNAVAILABLE,
    );
  }
}

export class CommandTimeoutException extends BrokerException {
  constructor(token: string, timeoutMs: number) {
    super(
      `No answer within ${timeoutMs} ms`,
      'COMMAND_TIMEOUT',
      { token, timeoutMs },
      HttpStatus.GATEWAY_TIMEOUT,
    );
  }
}

export class InvalidCommandException extends BrokerException {
  constructor(reason: string, details: Record<string, unknown> = {}) {
    super(reason, 'INVALID_COMMAND', details, HttpStatus.BAD_REQUEST);
  }
}
