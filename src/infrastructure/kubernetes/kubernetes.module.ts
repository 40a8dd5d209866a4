import { Module } from '@nestjs/common';
import { FLINK_DEPLOYMENT_CLIENT } from '@application/ports/flink-deployment-client.port';
import { KubernetesFlinkDeploymentClient } from './kubernetes-flink-deployment.client';

@Module({
  providers: [
    KubernetesFlinkDeploymentClient,
    {
      provide: FLINK_DEPLOYMENT_CLIENT,
      useExisting: KubernetesFlinkDeploymentClient,
    },
  ],
  exports: [FLINK_DEPLOYMENT_CLIENT, KubernetesFlinkDeploymentClient],
})
export class KubernetesModule {}
