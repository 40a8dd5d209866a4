import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import appConfig from './infrastructure/config/app.config';
import jobLocatorConfig from './infrastructure/config/job-locator.config';
import proxyConfig from './infrastructure/config/proxy.config';
import { validateEnvironment } from './infrastructure/config/env.validation';
import { HttpErrorFilter } from './infrastructure/common/http-exception.filter';
import { HealthModule } from './infrastructure/health/health.module';
import { JobsModule } from './infrastructure/jobs/jobs.module';
import { LoggingInterceptor } from './infrastructure/logging/logging.interceptor';
import { LoggingModule } from './infrastructure/logging/logging.module';
import { RequestContextMiddleware } from './infrastructure/logging/request-context.middleware';
import { MetricsModule } from './infrastructure/metrics/metrics.module';
import { ProxyModule } from './infrastructure/proxy/proxy.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      load: [jobLocatorConfig, proxyConfig, appConfig],
      validate: validateEnvironment,
    }),
    MetricsModule,
    LoggingModule,
    HealthModule,
    JobsModule,
    ProxyModule,
  ],
  providers: [
    {
      provide: APP_INTERCEPTOR,
      useClass: LoggingInterceptor,
    },
    {
      provide: APP_FILTER,
      useClass: HttpErrorFilter,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestContextMiddleware).forRoutes('*');
  }
}
