import { Inject, Injectable } from '@nestjs/common';
import { FlinkJob } from '@domain/entities/flink-job.entity';
import { FLINK_JOB_LOCATOR, IFlinkJobLocator } from '../ports/flink-job-locator.port';
import { SnapshotCache } from '../services/snapshot-cache';

export const FLINK_JOBS_CACHE = 'FlinkJobsCache';

export interface ListFlinkJobsResult {
  jobs: readonly FlinkJob[];
  fromCache: boolean;
  fetchedAt: number;
}

@Injectable()
export class ListFlinkJobsUseCase {
  constructor(
    @Inject(FLINK_JOB_LOCATOR)
    private readonly locator: IFlinkJobLocator,
    @Inject(FLINK_JOBS_CACHE)
    private readonly cache: SnapshotCache<readonly FlinkJob[]>,
  ) {}

  async execute(): Promise<ListFlinkJobsResult> {
    const cached = this.cache.get();
    if (cached) {
      return { jobs: cached.value, fromCache: true, fetchedAt: cached.storedAt };
    }

    // failures propagate and leave the previous snapshot in place
    const jobs = Object.freeze(await this.locator.findAll());
    const stored = this.cache.set(jobs);
    return { jobs, fromCache: false, fetchedAt: stored.storedAt };
  }
}
