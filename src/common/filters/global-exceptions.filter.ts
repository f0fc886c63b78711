import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { Request } from 'express';
import { BrokerException } from '../exceptions/broker.exceptions';
import { ErrorMessageMap } from './error-message.map';
import { ErrorDetails } from './interfaces/error-details.interface';

export interface ErrorResponse {
  statusCode: number;
  timestamp: string;
  path: string;
  message: string;
  error: string;
  details?: unknown;
  stack?: string;
}

@Catch()
export class GlobalExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionsFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();

    const errorDetails = this.identifyError(exception);
    const errorResponse = this.createErrorResponse(
      httpAdapter.getRequestUrl(request),
      errorDetails,
      ErrorMessageMap.getUserFriendlyMessage(errorDetails),
    );

    this.logError(errorDetails);

    httpAdapter.reply(ctx.getResponse(), errorResponse, errorDetails.status);
  }

  private identifyError(exception: unknown): ErrorDetails {
    if (exception instanceof BrokerException) {
      return {
        type: 'BrokerException',
        error: exception.code,
        status: exception.getStatus(),
        details: exception.getResponse(),
        stack: exception.stack,
      };
    }

    if (exception instanceof HttpException) {
      return {
        type: 'HttpException',
        error: 'HTTP_ERROR',
        status: exception.getStatus(),
        details: exception.getResponse(),
        stack: exception.stack,
      };
    }

    return {
      type: 'UnknownException',
      error: 'INTERNAL_SERVER_ERROR',
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      details:
        exception instanceof Error ? exception.message : String(exception),
      stack: exception instanceof Error ? exception.stack : undefined,
    };
  }

  private createErrorResponse(
    path: string,
    errorDetails: ErrorDetails,
    userMessage: string,
  ): ErrorResponse {
    return {
      statusCode: errorDetails.status,
      timestamp: new Date().toISOString(),
      path,
      message: userMessage,
      error: errorDetails.error,
      ...(process.env.NODE_ENV !== 'production' && {
        details: errorDetails.details,
        stack: errorDetails.stack,
      }),
    };
  }

  private logError(errorDetails: ErrorDetails): void {
    const message = `[${errorDetails.type}] ${errorDetails.error}`;

    if (errorDetails.status >= 500) {
      this.logger.error(message, errorDetails.stack);
    } else if (errorDetails.status >= 400) {
      this.logger.warn(message);
    } else {
      this.logger.log(message);
    }
  }
}
