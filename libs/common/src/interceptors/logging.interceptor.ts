import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable, tap } from 'rxjs';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const startedAt = Date.now();

    // status is final only once the exception filter or the handler has written it
    response.once('finish', () => {
      this.logger.log(`${request.method} ${request.originalUrl} ${response.statusCode} - ${Date.now() - startedAt}ms`);
    });

    return next.handle().pipe(
      tap({
        error: (error: unknown) => {
          this.logger.warn(
            `${request.method} ${request.originalUrl} failed after ${Date.now() - startedAt}ms: ${
              error instanceof Error ? error.message : String(error)
            }`,
          );
        },
      }),
    );
  }
}
