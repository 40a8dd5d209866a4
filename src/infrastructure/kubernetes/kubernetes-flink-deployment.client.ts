import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { CustomObjectsApi, HttpError, KubeConfig } from '@kubernetes/client-node';
import * as fs from 'fs';
import { getPath, isRawDocument, RawDocument } from '@domain/value-objects/raw-document';
import {
  FLINK_DEPLOYMENT_GROUP,
  FLINK_DEPLOYMENT_PLURAL,
  FLINK_DEPLOYMENT_VERSIONS,
  IFlinkDeploymentClient,
  isAllNamespaces,
} from '@application/ports/flink-deployment-client.port';
import { NoServedVersionError } from '@application/errors/flink-deployment.errors';
import { getErrorInfo } from '@common/error-assertions';
import jobLocatorConfig from '../config/job-locator.config';

// Status codes that mean "this API version is not served here".
const UNSERVED_VERSION_STATUSES = new Set([400, 404]);

type CredentialSource = 'in-cluster' | 'kubeconfig';

/**
 * Lists `FlinkDeployment` custom resources through the Kubernetes API server.
 *
 * The API client is created on first use and kept for the life of the process.
 * Concurrent first calls share one initialization; a failed one is not cached.
 */
@Injectable()
export class KubernetesFlinkDeploymentClient implements IFlinkDeploymentClient {
  private readonly logger = new Logger(KubernetesFlinkDeploymentClient.name);
  private api: CustomObjectsApi | null = null;
  private connecting: Promise<CustomObjectsApi> | null = null;

  constructor(
    @Inject(jobLocatorConfig.KEY)
    private readonly config: ConfigType<typeof jobLocatorConfig>,
  ) {}

  async find(namespace: string, labelSelector?: string): Promise<RawDocument[]> {
    const api = await this.getApi();

    let lastUnservedError: unknown;
    for (const version of FLINK_DEPLOYMENT_VERSIONS) {
      try {
        const { body } = isAllNamespaces(namespace)
          ? await api.listClusterCustomObject(
              FLINK_DEPLOYMENT_GROUP,
              version,
              FLINK_DEPLOYMENT_PLURAL,
              undefined,
              undefined,
              undefined,
              undefined,
              labelSelector,
            )
          : await api.listNamespacedCustomObject(
              FLINK_DEPLOYMENT_GROUP,
              version,
              namespace,
              FLINK_DEPLOYMENT_PLURAL,
              undefined,
              undefined,
              undefined,
              undefined,
              labelSelector,
            );
        return this.extractItems(body);
      } catch (error: unknown) {
        const status = this.getStatusCode(error);
        if (status !== undefined && UNSERVED_VERSION_STATUSES.has(status)) {
          this.logger.debug(
            `${FLINK_DEPLOYMENT_PLURAL}.${FLINK_DEPLOYMENT_GROUP}/${version} not served (HTTP ${status}), trying next version`,
          );
          lastUnservedError = error;
          continue;
        }
        throw error;
      }
    }

    throw new NoServedVersionError(
      FLINK_DEPLOYMENT_GROUP,
      FLINK_DEPLOYMENT_PLURAL,
      FLINK_DEPLOYMENT_VERSIONS,
      { cause: lastUnservedError },
    );
  }

  private async getApi(): Promise<CustomObjectsApi> {
    if (this.api) return this.api;
    if (!this.connecting) {
      this.connecting = this.connect()
        .then((api) => {
          this.api = api;
          return api;
        })
        .finally(() => {
          this.connecting = null;
        });
    }
    return this.connecting;
  }

  private async connect(): Promise<CustomObjectsApi> {
    const kc = new KubeConfig();
    const source = this.loadCredentials(kc);
    const api = kc.makeApiClient(CustomObjectsApi);
    this.logger.log(`Kubernetes API client initialized from ${source} credentials`);
    return api;
  }

  private loadCredentials(kc: KubeConfig): CredentialSource {
    if (this.isInCluster()) {
      try {
        kc.loadFromCluster();
        return 'in-cluster';
      } catch (error: unknown) {
        this.logger.warn(
          `In-cluster credentials unavailable, falling back to kubeconfig: ${getErrorInfo(error).message}`,
        );
      }
    }
    kc.loadFromDefault();
    return 'kubeconfig';
  }

  private isInCluster(): boolean {
    return (
      Boolean(process.env.KUBERNETES_SERVICE_HOST) &&
      fs.existsSync(this.config.k8sOperator.serviceAccountTokenPath)
    );
  }

  private getStatusCode(error: unknown): number | undefined {
    if (error instanceof HttpError) {
      return error.statusCode ?? error.response?.statusCode;
    }
    const status = getPath(error, ['statusCode']) ?? getPath(error, ['code']);
    return typeof status === 'number' ? status : undefined;
  }

  private extractItems(body: unknown): RawDocument[] {
    const items = getPath(body, ['items']);
    if (!Array.isArray(items)) return [];
    return items.filter(isRawDocument);
  }
}
