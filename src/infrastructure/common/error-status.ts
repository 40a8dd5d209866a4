import { HttpException, HttpStatus } from '@nestjs/common';
import { NoServedVersionError } from '@application/errors/flink-deployment.errors';
import { ProxyDispatchError } from '../proxy/proxy.errors';

export function resolveHttpStatus(exception: unknown): number {
  if (exception instanceof HttpException) return exception.getStatus();
  if (exception instanceof ProxyDispatchError) return HttpStatus.BAD_GATEWAY;
  if (exception instanceof NoServedVersionError) return HttpStatus.SERVICE_UNAVAILABLE;
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

export function resolveErrorMessage(exception: unknown): string {
  if (
    exception instanceof HttpException ||
    exception instanceof ProxyDispatchError ||
    exception instanceof NoServedVersionError
  ) {
    return exception.message;
  }
  return 'Internal Server Error';
}
