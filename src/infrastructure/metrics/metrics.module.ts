import { Module, Global } from '@nestjs/common';
import { Registry, collectDefaultMetrics } from 'prom-client';
import { MetricsController } from './metrics.controller';
import { AppMetricsService, PROMETHEUS_REGISTRY } from './app-metrics.service';

/**
 * Global metrics module that provides a shared Prometheus registry,
 * exposed via the /metrics endpoint.
 */
@Global()
@Module({
  controllers: [MetricsController],
  providers: [
    {
      provide: PROMETHEUS_REGISTRY,
      useFactory: () => {
        const registry = new Registry();
        collectDefaultMetrics({ register: registry });
        return registry;
      },
    },
    AppMetricsService,
  ],
  exports: [PROMETHEUS_REGISTRY, AppMetricsService],
})
export class MetricsModule {}
