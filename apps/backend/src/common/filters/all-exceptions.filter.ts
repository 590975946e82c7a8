import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  ForbiddenException,
  HttpException,
  HttpStatus,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { AuthExceptionFilter } from './auth-exception.filter';
import { RbacExceptionFilter } from './rbac-exception.filter';

type ErrorMessage = string | string[];

const readMessage = (body: object, fallback: string): ErrorMessage => {
  const message: unknown = 'message' in body ? body.message : undefined;
  if (typeof message === 'string') return message;
  if (Array.isArray(message)) return message.map((item) => String(item));
  return fallback;
};

const readError = (body: object, fallback: string): string => {
  const error: unknown = 'error' in body ? body.error : undefined;
  return typeof error === 'string' ? error : fallback;
};

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);
  private readonly authExceptionFilter = new AuthExceptionFilter();
  private readonly rbacExceptionFilter = new RbacExceptionFilter();

  catch(exception: unknown, host: ArgumentsHost): void {
    // 401 and 403 have their own response shapes
    if (exception instanceof UnauthorizedException) {
      this.authExceptionFilter.catch(exception, host);
      return;
    }
    if (exception instanceof ForbiddenException) {
      this.rbacExceptionFilter.catch(exception, host);
      return;
    }

    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number;
    let message: ErrorMessage;
    let error: string;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const errorResponse = exception.getResponse();

      if (typeof errorResponse === 'object' && errorResponse !== null) {
        message = readMessage(errorResponse, exception.message);
        error = readError(errorResponse, 'Http Exception');
      } else {
        message = String(errorResponse);
        error = 'Http Exception';
      }
    } else {
      status = HttpStatus.INTERNAL_SERVER_ERROR;
      message = 'An unexpected error occurred';
      error = 'Internal Server Error';
    }

    const errorResponse = {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      error,
      message,
      ...(process.env.NODE_ENV === 'development' && {
        stack: exception instanceof Error ? exception.stack : undefined,
      }),
    };

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} - ${status} - ${
          exception instanceof Error ? exception.message : String(exception)
        }`,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(
        `${request.method} ${request.url} - ${status} - ${String(message)}`,
      );
    }

    response.status(status).json(errorResponse);
  }
}
