import { IncomingMessage, ServerResponse } from 'http';
import { Socket } from 'net';
import { RequestContextMiddleware } from './request-context.middleware';
import { RequestContextService } from './request-context.service';

describe('RequestContextMiddleware', () => {
  let requestContext: RequestContextService;
  let middleware: RequestContextMiddleware;

  const request = (headers: Record<string, string>): IncomingMessage => {
    const req = new IncomingMessage(new Socket());
    req.headers = headers;
    return req;
  };

  beforeEach(() => {
    requestContext = new RequestContextService();
    middleware = new RequestContextMiddleware(requestContext);
  });

  it('runs the rest of the chain inside the inbound ids', () => {
    const req = request({ 'x-request-id': 'req-1', 'x-correlation-id': 'corr-1' });
    const res = new ServerResponse(req);
    let seen: ReturnType<RequestContextService['getStore']>;

    middleware.use(req, res, () => {
      seen = requestContext.getStore();
    });

    expect(seen).toEqual({ requestId: 'req-1', correlationId: 'corr-1', serviceName: 'flink-lens' });
    expect(res.getHeader('x-request-id')).toBe('req-1');
    expect(requestContext.getStore()).toBeUndefined();
  });

  it('generates a request id and reuses it as the correlation id', () => {
    const req = request({});
    const res = new ServerResponse(req);
    const ids: Array<string | undefined> = [];

    middleware.use(req, res, () => {
      const store = requestContext.getStore();
      ids.push(store?.requestId, store?.correlationId);
    });

    expect(ids[0]).toMatch(/^[0-9a-f-]{36}$/);
    expect(ids[1]).toBe(ids[0]);
  });
});
