import { Injectable, NestMiddleware } from '@nestjs/common';
import { IncomingMessage, ServerResponse } from 'http';
import { randomUUID } from 'node:crypto';
import { RequestContextService } from './request-context.service';

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  constructor(private readonly requestContext: RequestContextService) {}

  use(req: IncomingMessage, res: ServerResponse, next: () => void): void {
    const requestId = firstHeader(req.headers['x-request-id']) || randomUUID();
    const correlationId = firstHeader(req.headers['x-correlation-id']) || requestId;
    res.setHeader('x-request-id', requestId);

    this.requestContext.runWith(
      { requestId, correlationId, serviceName: process.env.SERVICE_NAME || 'flink-lens' },
      () => next(),
    );
  }
}
