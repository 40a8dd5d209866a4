import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { IncomingHttpHeaders } from 'http';
import { Readable } from 'stream';
import { getErrorInfo } from '@common/error-assertions';
import { ProxyDispatchError } from './proxy.errors';
import { ForwardedHeaders, filterRequestHeaders, filterResponseHeaders } from './proxy-headers';
import { ProxyTargetResolver, buildTargetUrl } from './proxy-target.resolver';

export const PROXY_HTTP_CLIENT = 'ProxyHttpClient';

export interface ProxyRequest {
  method: string;
  headers: IncomingHttpHeaders;
  /** Raw query string, without the leading `?`. */
  query?: string;
  body?: Readable;
  signal?: AbortSignal;
}

export interface ProxyResponse {
  status: number;
  headers: ForwardedHeaders;
  body: Readable;
}

/**
 * Forwards requests to a job's REST endpoint and hands back the response
 * stream. Any status the backend answers with is returned as is.
 */
@Injectable()
export class ProxyService {
  private readonly logger = new Logger(ProxyService.name);

  constructor(
    private readonly targets: ProxyTargetResolver,
    @Inject(PROXY_HTTP_CLIENT) private readonly http: AxiosInstance,
  ) {}

  async forward(appName: string, path: string, request: ProxyRequest): Promise<ProxyResponse> {
    const url = buildTargetUrl(this.targets.resolve(appName), path, request.query);

    try {
      const response = await this.http.request<Readable>({
        url,
        method: request.method,
        headers: filterRequestHeaders(request.headers),
        data: request.body,
        responseType: 'stream',
        validateStatus: () => true,
        signal: request.signal,
      });

      return {
        status: response.status,
        headers: filterResponseHeaders(response.headers),
        body: response.data,
      };
    } catch (error: unknown) {
      const { message, stack } = getErrorInfo(error);
      this.logger.error(`Proxy ${request.method} ${url} for '${appName}' failed: ${message}`, stack);
      throw new ProxyDispatchError(appName, url, { cause: error });
    }
  }
}
