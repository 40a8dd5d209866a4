import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { FlinkJob } from '@domain/entities/flink-job.entity';
import { FlinkDeploymentNormalizer } from '@domain/services/flink-deployment-normalizer.service';
import { getErrorInfo } from '@common/error-assertions';
import jobLocatorConfig from '@infrastructure/config/job-locator.config';
import appConfig from '@infrastructure/config/app.config';
import {
  FLINK_DEPLOYMENT_CLIENT,
  IFlinkDeploymentClient,
} from '../ports/flink-deployment-client.port';
import { IFlinkJobLocator } from '../ports/flink-job-locator.port';

/**
 * Locates jobs by listing the Flink Kubernetes operator's `FlinkDeployment` resources.
 */
@Injectable()
export class K8sOperatorFlinkJobLocator implements IFlinkJobLocator {
  private readonly logger = new Logger(K8sOperatorFlinkJobLocator.name);

  constructor(
    @Inject(FLINK_DEPLOYMENT_CLIENT)
    private readonly client: IFlinkDeploymentClient,
    private readonly normalizer: FlinkDeploymentNormalizer,
    @Inject(jobLocatorConfig.KEY)
    private readonly locatorConfig: ConfigType<typeof jobLocatorConfig>,
    @Inject(appConfig.KEY)
    private readonly app: ConfigType<typeof appConfig>,
  ) {}

  async findAll(): Promise<FlinkJob[]> {
    const { namespaceToWatch: namespace, labelSelector } = this.locatorConfig.k8sOperator;

    try {
      const deployments = await this.client.find(namespace, labelSelector);
      const jobs = deployments.map((deployment) => this.normalizer.normalize(deployment));
      if (this.app.debug) {
        this.logger.log(
          `Found ${deployments.length} FlinkDeployment(s) in namespace '${namespace}'`,
        );
      }
      return jobs;
    } catch (error: unknown) {
      const { message, stack } = getErrorInfo(error);
      this.logger.error(
        `Error listing FlinkDeployments in namespace '${namespace}'` +
          `${labelSelector ? ` with selector '${labelSelector}'` : ''}: ${message}`,
        stack,
      );
      throw error;
    }
  }
}
