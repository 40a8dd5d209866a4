import { Inject, Injectable } from '@nestjs/common';
import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export const PROMETHEUS_REGISTRY = 'PrometheusRegistry';

export type JobListingSource = 'cache' | 'locator';

/**
 * Prometheus metrics for job listing and proxying.
 */
@Injectable()
export class AppMetricsService {
  private readonly jobListingsTotal: Counter<string>;
  private readonly jobListingDuration: Histogram<string>;
  private readonly jobsFound: Gauge<string>;
  private readonly proxyRequestsTotal: Counter<string>;
  private readonly proxyDispatchErrors: Counter<string>;

  constructor(@Inject(PROMETHEUS_REGISTRY) registry: Registry) {
    this.jobListingsTotal = new Counter({
      name: 'flink_lens_job_locator_requests_total',
      help: 'Job listings served, by source and outcome',
      labelNames: ['source', 'status'],
      registers: [registry],
    });

    this.jobListingDuration = new Histogram({
      name: 'flink_lens_job_locator_duration_seconds',
      help: 'Duration of job listings in seconds',
      labelNames: ['source'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
      registers: [registry],
    });

    this.jobsFound = new Gauge({
      name: 'flink_lens_jobs_found',
      help: 'Number of Flink jobs in the last successful listing',
      registers: [registry],
    });

    this.proxyRequestsTotal = new Counter({
      name: 'flink_lens_proxy_requests_total',
      help: 'Requests proxied to job REST endpoints, by backend status',
      labelNames: ['app', 'method', 'status'],
      registers: [registry],
    });

    this.proxyDispatchErrors = new Counter({
      name: 'flink_lens_proxy_dispatch_errors_total',
      help: 'Proxied requests that never reached the backend',
      labelNames: ['app'],
      registers: [registry],
    });
  }

  recordJobListing(
    source: JobListingSource,
    durationMs: number,
    success: boolean,
    jobCount?: number,
  ): void {
    this.jobListingsTotal.inc({ source, status: success ? 'success' : 'error' });
    this.jobListingDuration.observe({ source }, durationMs / 1000);
    if (success && jobCount !== undefined) {
      this.jobsFound.set(jobCount);
    }
  }

  recordProxyRequest(app: string, method: string, status: number): void {
    this.proxyRequestsTotal.inc({ app, method: method.toUpperCase(), status: String(status) });
  }

  recordProxyDispatchError(app: string): void {
    this.proxyDispatchErrors.inc({ app });
  }
}
