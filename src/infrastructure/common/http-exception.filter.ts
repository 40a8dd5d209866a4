import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { IncomingHttpHeaders } from 'http';
import { getErrorInfo } from '@common/error-assertions';
import { resolveErrorMessage, resolveHttpStatus } from './error-status';

interface ErrorRequest {
  url: string;
  headers: IncomingHttpHeaders;
}

interface ErrorReply {
  sent: boolean;
  status(statusCode: number): ErrorReply;
  send(payload: unknown): unknown;
}

export interface ErrorPayload {
  statusCode: number;
  error: string;
  message: string;
  path: string;
  timestamp: string;
  correlationId?: string;
}

@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const reply = ctx.getResponse<ErrorReply>();
    const request = ctx.getRequest<ErrorRequest>();

    const status = resolveHttpStatus(exception);
    const correlationId = request.headers['x-correlation-id'];

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const { message, stack } = getErrorInfo(exception);
      this.logger.error(`${request.url} failed with ${status}: ${message}`, stack);
    }

    // A proxied stream may already be on its way to the client.
    if (reply.sent) return;

    const payload: ErrorPayload = {
      statusCode: status,
      error: HttpStatus[status] || 'Error',
      message: resolveErrorMessage(exception),
      path: request.url,
      timestamp: new Date().toISOString(),
      correlationId: Array.isArray(correlationId) ? correlationId[0] : correlationId,
    };

    reply.status(status).send(payload);
  }
}
