import { CallHandler, ExecutionContext, Inject, Injectable, NestInterceptor } from '@nestjs/common';
import { Observable, throwError } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { resolveHttpStatus } from '../common/error-status';
import { ILoggerPort, LOGGER_PORT } from './logger.port';

interface LoggedRequest {
  method: string;
  url: string;
}

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  constructor(@Inject(LOGGER_PORT) private readonly logger: ILoggerPort) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const { method, url } = http.getRequest<LoggedRequest>();
    const startTime = Date.now();

    this.logger.debug('Request received', LoggingInterceptor.name, { method, url });

    return next.handle().pipe(
      tap(() => {
        this.logger.info('Request completed', LoggingInterceptor.name, {
          method,
          url,
          statusCode: http.getResponse<{ statusCode: number }>().statusCode,
          duration: Date.now() - startTime,
        });
      }),
      catchError((error: unknown) => {
        const statusCode = resolveHttpStatus(error);
        const meta = { method, url, statusCode, duration: Date.now() - startTime };
        if (statusCode >= 500) {
          this.logger.error('Request failed', error, LoggingInterceptor.name, meta);
        } else {
          this.logger.warn('Request rejected', LoggingInterceptor.name, meta);
        }
        return throwError(() => error);
      }),
    );
  }
}
