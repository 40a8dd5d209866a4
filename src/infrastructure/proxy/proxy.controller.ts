import { All, Controller, Param, Req, Res } from '@nestjs/common';
import { IncomingHttpHeaders } from 'http';
import { Readable } from 'stream';
import { AppMetricsService } from '../metrics/app-metrics.service';
import { ForwardedHeaders } from './proxy-headers';
import { ProxyDispatchError } from './proxy.errors';
import { ProxyService } from './proxy.service';

/** The parts of Fastify's request the proxy reads. */
export interface ProxyHttpRequest {
  method: string;
  url: string;
  headers: IncomingHttpHeaders;
  body?: unknown;
}

/** The parts of Fastify's reply the proxy writes to. */
export interface ProxyHttpReply {
  raw: {
    writableFinished: boolean;
    once(event: 'close', listener: () => void): unknown;
  };
  status(statusCode: number): unknown;
  headers(values: ForwardedHeaders): unknown;
  send(payload: Readable): unknown;
}

export function extractQuery(url: string): string {
  const index = url.indexOf('?');
  return index === -1 ? '' : url.slice(index + 1);
}

@Controller('proxy')
export class ProxyController {
  constructor(
    private readonly proxy: ProxyService,
    private readonly metrics: AppMetricsService,
  ) {}

  @All([':app', ':app/*'])
  async forward(
    @Param('app') app: string,
    @Param('*') path: string | undefined,
    @Req() req: ProxyHttpRequest,
    @Res() reply: ProxyHttpReply,
  ): Promise<void> {
    const abort = new AbortController();
    reply.raw.once('close', () => {
      if (!reply.raw.writableFinished) abort.abort();
    });

    try {
      const response = await this.proxy.forward(app, path ?? '', {
        method: req.method,
        headers: req.headers,
        query: extractQuery(req.url),
        body: req.body instanceof Readable ? req.body : undefined,
        signal: abort.signal,
      });

      this.metrics.recordProxyRequest(app, req.method, response.status);
      reply.status(response.status);
      reply.headers(response.headers);
      reply.send(response.body);
    } catch (error: unknown) {
      if (error instanceof ProxyDispatchError) {
        this.metrics.recordProxyDispatchError(app);
      }
      throw error;
    }
  }
}
