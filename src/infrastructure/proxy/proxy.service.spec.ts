import { Logger } from '@nestjs/common';
import axios, { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { Readable } from 'stream';
import { ProxyDispatchError } from './proxy.errors';
import { ProxyTargetResolver } from './proxy-target.resolver';
import { ProxyService } from './proxy.service';

describe('ProxyService', () => {
  let service: ProxyService;
  let adapter: jest.Mock<Promise<AxiosResponse>, [InternalAxiosRequestConfig]>;

  const respond = (
    config: InternalAxiosRequestConfig,
    status: number,
    headers: Record<string, string>,
    body: string,
  ): AxiosResponse => ({
    data: Readable.from([body]),
    status,
    statusText: '',
    headers,
    config,
  });

  const lastConfig = (): InternalAxiosRequestConfig => adapter.mock.calls[0][0];

  beforeEach(() => {
    adapter = jest.fn((config: InternalAxiosRequestConfig) =>
      Promise.resolve(respond(config, 200, { 'content-type': 'application/json' }, '{}')),
    );
    const resolver = new ProxyTargetResolver({
      targetMap: { legacy: 'http://legacy:8081/' },
      defaultTargetTemplate: 'http://{app}-rest:8081',
      timeoutMs: 0,
    });
    service = new ProxyService(resolver, axios.create({ adapter }));
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('forwards to the resolved target with path and query', async () => {
    await service.forward('orders', 'jobs/overview', {
      method: 'GET',
      headers: {},
      query: 'get=a&get=b',
    });

    expect(lastConfig().url).toBe('http://orders-rest:8081/jobs/overview?get=a&get=b');
    expect(lastConfig().method).toBe('get');
  });

  it('uses an explicit mapping and joins the path with one slash', async () => {
    await service.forward('legacy', '/config', { method: 'GET', headers: {} });
    expect(lastConfig().url).toBe('http://legacy:8081/config');
  });

  it('streams the request body and asks for a streamed response', async () => {
    const body = Readable.from(['{"savepoint":true}']);

    await service.forward('orders', 'jobs/abc/stop', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body,
    });

    expect(lastConfig().data).toBe(body);
    expect(lastConfig().responseType).toBe('stream');
    expect(lastConfig().method).toBe('post');
  });

  it('strips hop-by-hop request headers', async () => {
    await service.forward('orders', 'jobs', {
      method: 'GET',
      headers: {
        host: 'flink-lens.local',
        connection: 'keep-alive',
        upgrade: 'h2c',
        'x-request-id': 'req-1',
      },
    });

    const headers = lastConfig().headers;
    expect(headers.get('x-request-id')).toBe('req-1');
    expect(headers.has('host')).toBe(false);
    expect(headers.has('connection')).toBe(false);
    expect(headers.has('upgrade')).toBe(false);
  });

  it('passes backend errors through with their status and body', async () => {
    adapter.mockImplementationOnce((config) =>
      Promise.resolve(
        respond(
          config,
          404,
          {
            'content-type': 'application/json',
            'content-encoding': 'gzip',
            'content-length': '27',
            'transfer-encoding': 'chunked',
            connection: 'close',
          },
          '{"errors":["Not found."]}',
        ),
      ),
    );

    const response = await service.forward('orders', 'jobs/missing', {
      method: 'GET',
      headers: {},
    });

    expect(response.status).toBe(404);
    expect(response.headers).toEqual({ 'content-type': 'application/json' });

    const chunks: string[] = [];
    for await (const chunk of response.body) chunks.push(String(chunk));
    expect(chunks.join('')).toBe('{"errors":["Not found."]}');
  });

  it('wraps failures to reach the backend', async () => {
    const refused = new Error('connect ECONNREFUSED 10.0.0.7:8081');
    adapter.mockRejectedValueOnce(refused);

    const error = await service
      .forward('orders', 'jobs', { method: 'GET', headers: {} })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProxyDispatchError);
    expect(error).toMatchObject({ appName: 'orders', url: 'http://orders-rest:8081/jobs' });
    expect(error instanceof ProxyDispatchError && error.cause).toBe(refused);
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      "Proxy GET http://orders-rest:8081/jobs for 'orders' failed: connect ECONNREFUSED 10.0.0.7:8081",
      refused.stack,
    );
  });

  it('does not dispatch once the client has gone away', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      service.forward('orders', 'jobs', {
        method: 'GET',
        headers: {},
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(ProxyDispatchError);
    expect(adapter).not.toHaveBeenCalled();
  });

  it('rejects invalid application names before dispatching', async () => {
    await expect(
      service.forward('Not_Valid', 'jobs', { method: 'GET', headers: {} }),
    ).rejects.toThrow("'Not_Valid' is not a valid application name");
    expect(adapter).not.toHaveBeenCalled();
  });
});
