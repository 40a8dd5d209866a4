import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { FlinkJob } from '@domain/entities/flink-job.entity';
import { FlinkDeploymentNormalizer } from '@domain/services/flink-deployment-normalizer.service';
import { FLINK_JOB_LOCATOR } from '@application/ports/flink-job-locator.port';
import { DisabledFlinkJobLocator } from '@application/services/disabled-flink-job-locator.service';
import { selectFlinkJobLocator } from '@application/services/flink-job-locator.factory';
import { K8sOperatorFlinkJobLocator } from '@application/services/k8s-operator-flink-job-locator.service';
import { SnapshotCache } from '@application/services/snapshot-cache';
import {
  FLINK_JOBS_CACHE,
  ListFlinkJobsUseCase,
} from '@application/use-cases/list-flink-jobs.use-case';
import jobLocatorConfig from '../config/job-locator.config';
import { KubernetesModule } from '../kubernetes/kubernetes.module';
import { ConfigController } from './config.controller';
import { JobsController } from './jobs.controller';

@Module({
  imports: [KubernetesModule],
  controllers: [JobsController, ConfigController],
  providers: [
    FlinkDeploymentNormalizer,
    K8sOperatorFlinkJobLocator,
    DisabledFlinkJobLocator,
    {
      provide: FLINK_JOB_LOCATOR,
      inject: [jobLocatorConfig.KEY, K8sOperatorFlinkJobLocator, DisabledFlinkJobLocator],
      useFactory: (
        config: ConfigType<typeof jobLocatorConfig>,
        k8sOperator: K8sOperatorFlinkJobLocator,
        disabled: DisabledFlinkJobLocator,
      ) => selectFlinkJobLocator(config, { k8sOperator, disabled }),
    },
    {
      provide: FLINK_JOBS_CACHE,
      inject: [jobLocatorConfig.KEY],
      useFactory: (config: ConfigType<typeof jobLocatorConfig>) =>
        new SnapshotCache<readonly FlinkJob[]>(config.jobsCacheTtl),
    },
    ListFlinkJobsUseCase,
  ],
  exports: [ListFlinkJobsUseCase],
})
export class JobsModule {}
