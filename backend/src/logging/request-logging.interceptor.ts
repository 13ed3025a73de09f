import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Observable, throwError } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';

interface LoggedRequest {
  method?: string;
  originalUrl?: string;
  url?: string;
}

/**
 * Start/end/error logging around every handler of the controller it is
 * applied to. Errors are logged and rethrown unchanged so Nest's exception
 * layer still produces the response.
 */
@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<LoggedRequest>();
    const response = httpContext.getResponse<{ statusCode?: number }>();
    const method = (request.method ?? 'GET').toUpperCase();
    const path = request.originalUrl ?? request.url ?? '';
    const action = `${context.getClass().name}.${context.getHandler().name}`;
    const label = `${method} ${path} -> ${action}`;
    const start = Date.now();

    this.logger.debug(`${label} started`);
    return next.handle().pipe(
      tap({
        next: () => {
          const status = response.statusCode ?? 200;
          this.logger.log(`${label} ended (${status}) in ${Date.now() - start}ms`);
        },
      }),
      catchError((error: unknown) => {
        const status = error instanceof HttpException ? error.getStatus() : 500;
        const message = `${label} failed (${status}) in ${Date.now() - start}ms`;
        if (status >= 500) {
          this.logger.error(
            message,
            error instanceof Error ? error.stack : String(error),
          );
        } else {
          this.logger.warn(`${message}: ${this.describe(error)}`);
        }
        return throwError(() => error);
      }),
    );
  }

  private describe(error: unknown): string {
    if (error instanceof HttpException) {
      const body = error.getResponse();
      if (typeof body === 'object' && body !== null && 'message' in body) {
        return String(body.message);
      }
      return error.message;
    }
    return error instanceof Error ? error.message : String(error);
  }
}
