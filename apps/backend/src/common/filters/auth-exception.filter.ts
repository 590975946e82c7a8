import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request, Response } from 'express';

/**
 * 401 responses. The body carries only the exception's public message;
 * internal reasons on auth errors are never serialised.
 */
@Catch(UnauthorizedException)
export class AuthExceptionFilter implements ExceptionFilter {
  catch(exception: UnauthorizedException, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    // Ensure clients know authentication is required
    response.setHeader('WWW-Authenticate', 'Bearer');

    const status = exception.getStatus();

    response.status(status).json({
      statusCode: status,
      error: 'Unauthorized',
      message: exception.message,
      path: request.url,
      timestamp: new Date().toISOString(),
    });
  }
}
