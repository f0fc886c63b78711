import { ErrorDetails } from './interfaces/error-details.interface';

export class ErrorMessageMap {
  private static errorMessages = new Map<string, string>([
    [
      'BrokerException:QUEUE_FULL',
      'The command queue is full. Try again once the bus has caught up.',
    ],
    [
      'BrokerException:COMMAND_TIMEOUT',
      'No answer arrived from the bus in time. The command may still run.',
    ],
    ['BrokerException:INVALID_COMMAND', 'The command could not be understood.'],

    ['default:400', 'Bad request.'],
    ['default:404', 'Resource not found.'],
    ['default:429', 'Too many requests. Please slow down.'],
    ['default:500', 'Internal broker error.'],
    ['default:503', 'Service temporarily unavailable.'],
    ['default:504', 'Gateway timeout.'],
  ]);

  static getUserFriendlyMessage(errorDetails: ErrorDetails): string {
    const specific = this.errorMessages.get(
      `${errorDetails.type}:${errorDetails.error}`,
    );
    if (specific) {
      return specific;
    }

    return (
      this.errorMessages.get(`default:${errorDetails.status}`) ??
      'Something went wrong.'
    );
  }
}
