import { Injectable, Logger } from '@nestjs/common';
import { FlinkJob } from '@domain/entities/flink-job.entity';
import { IFlinkJobLocator } from '../ports/flink-job-locator.port';

/**
 * Selected when no locator strategy is enabled; always reports an empty list.
 */
@Injectable()
export class DisabledFlinkJobLocator implements IFlinkJobLocator {
  private readonly logger = new Logger(DisabledFlinkJobLocator.name);
  private warned = false;

  async findAll(): Promise<FlinkJob[]> {
    if (!this.warned) {
      this.logger.warn('No job locator strategy is enabled, reporting no jobs');
      this.warned = true;
    }
    return [];
  }
}
