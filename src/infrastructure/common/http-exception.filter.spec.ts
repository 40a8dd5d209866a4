import { ArgumentsHost, BadRequestException, Logger, NotFoundException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { NoServedVersionError } from '@application/errors/flink-deployment.errors';
import { ProxyDispatchError } from '../proxy/proxy.errors';
import { HttpErrorFilter } from './http-exception.filter';

describe('HttpErrorFilter', () => {
  let filter: HttpErrorFilter;
  let reply: { sent: boolean; status: jest.Mock; send: jest.Mock };
  let request: { url: string; headers: Record<string, string> };
  let host: ArgumentsHost;

  beforeEach(() => {
    filter = new HttpErrorFilter();
    reply = { sent: false, status: jest.fn(), send: jest.fn() };
    reply.status.mockReturnValue(reply);
    request = { url: '/api/jobs', headers: { 'x-correlation-id': 'corr-1' } };
    host = new ExecutionContextHost([request, reply]);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('keeps the status and message of HTTP exceptions', () => {
    filter.catch(new NotFoundException('No such job'), host);

    expect(reply.status).toHaveBeenCalledWith(404);
    expect(reply.send).toHaveBeenCalledWith({
      statusCode: 404,
      error: 'NOT_FOUND',
      message: 'No such job',
      path: '/api/jobs',
      timestamp: expect.any(String),
      correlationId: 'corr-1',
    });
    expect(Logger.prototype.error).not.toHaveBeenCalled();
  });

  it('maps proxy dispatch failures to 502', () => {
    filter.catch(new ProxyDispatchError('orders', 'http://orders-rest:8081/jobs'), host);

    expect(reply.status).toHaveBeenCalledWith(502);
    expect(reply.send).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 502,
        error: 'BAD_GATEWAY',
        message: "Failed to reach 'orders' at http://orders-rest:8081/jobs",
      }),
    );
  });

  it('maps an unserved resource version to 503', () => {
    filter.catch(
      new NoServedVersionError('flink.apache.org', 'flinkdeployments', ['v1beta1', 'v1']),
      host,
    );
    expect(reply.status).toHaveBeenCalledWith(503);
  });

  it('hides the details of unexpected errors and logs them', () => {
    const error = new Error('connect ECONNREFUSED');
    filter.catch(error, host);

    expect(reply.status).toHaveBeenCalledWith(500);
    expect(reply.send).toHaveBeenCalledWith(
      expect.objectContaining({ statusCode: 500, message: 'Internal Server Error' }),
    );
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      '/api/jobs failed with 500: connect ECONNREFUSED',
      error.stack,
    );
  });

  it('does not answer twice', () => {
    reply.sent = true;
    filter.catch(new BadRequestException(), host);
    expect(reply.send).not.toHaveBeenCalled();
  });
});
