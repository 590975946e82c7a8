import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import type { Response } from 'express';
import { randomUUID } from 'crypto';
import type { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';
import { AppLoggerService } from '../services/app-logger.service';
import { RequestContextService } from '../services/request-context.service';

export const CORRELATION_ID_HEADER = 'X-Correlation-Id';

/**
 * Tags every response with a correlation id (reusing the caller's when
 * present) and runs the handler inside a request context so log lines
 * written downstream carry it.
 */
@Injectable()
export class CorrelationIdInterceptor implements NestInterceptor {
  constructor(
    private readonly requestContext: RequestContextService,
    private readonly logger: AppLoggerService,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const req = http.getRequest<AuthenticatedRequest>();
    const res = http.getResponse<Response>();

    const existing = req.headers['x-correlation-id'];
    const correlationId =
      (Array.isArray(existing) ? existing[0] : existing) || randomUUID();

    res.setHeader(CORRELATION_ID_HEADER, correlationId);

    const startedAt = Date.now();
    const store = { correlationId, userId: req.user?.reference };

    return new Observable<unknown>((subscriber) =>
      this.requestContext.runWith(store, () =>
        next
          .handle()
          .pipe(
            tap(() =>
              this.logger.logResponse(
                req.method,
                req.originalUrl,
                res.statusCode,
                Date.now() - startedAt,
                { userId: store.userId },
              ),
            ),
          )
          .subscribe(subscriber),
      ),
    );
  }
}
