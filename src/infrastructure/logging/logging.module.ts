import { Global, Module } from '@nestjs/common';
import { LOGGER_PORT } from './logger.port';
import { LoggingInterceptor } from './logging.interceptor';
import { RequestContextMiddleware } from './request-context.middleware';
import { RequestContextService } from './request-context.service';
import { WinstonLoggerAdapter } from './winston-logger.adapter';

@Global()
@Module({
  providers: [
    RequestContextService,
    RequestContextMiddleware,
    WinstonLoggerAdapter,
    { provide: LOGGER_PORT, useExisting: WinstonLoggerAdapter },
    LoggingInterceptor,
  ],
  exports: [
    LOGGER_PORT,
    WinstonLoggerAdapter,
    RequestContextService,
    RequestContextMiddleware,
    LoggingInterceptor,
  ],
})
export class LoggingModule {}
