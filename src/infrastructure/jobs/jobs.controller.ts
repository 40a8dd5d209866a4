import { Controller, Get } from '@nestjs/common';
import { FlinkJob } from '@domain/entities/flink-job.entity';
import { ListFlinkJobsUseCase } from '@application/use-cases/list-flink-jobs.use-case';
import { AppMetricsService } from '../metrics/app-metrics.service';

@Controller('jobs')
export class JobsController {
  constructor(
    private readonly listFlinkJobs: ListFlinkJobsUseCase,
    private readonly metrics: AppMetricsService,
  ) {}

  @Get()
  async list(): Promise<readonly FlinkJob[]> {
    const startedAt = Date.now();
    try {
      const result = await this.listFlinkJobs.execute();
      this.metrics.recordJobListing(
        result.fromCache ? 'cache' : 'locator',
        Date.now() - startedAt,
        true,
        result.jobs.length,
      );
      return result.jobs;
    } catch (error: unknown) {
      this.metrics.recordJobListing('locator', Date.now() - startedAt, false);
      throw error;
    }
  }
}
