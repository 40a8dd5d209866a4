import { FlinkJob } from '@domain/entities/flink-job.entity';

export const FLINK_JOB_LOCATOR = 'IFlinkJobLocator';

/**
 * Strategy for discovering Flink jobs. Only the Kubernetes operator strategy exists
 * today; others plug in through {@link selectFlinkJobLocator}.
 */
export interface IFlinkJobLocator {
  findAll(): Promise<FlinkJob[]>;
}
