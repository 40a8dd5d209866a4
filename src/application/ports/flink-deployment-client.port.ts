import { RawDocument } from '@domain/value-objects/raw-document';

export const FLINK_DEPLOYMENT_CLIENT = 'IFlinkDeploymentClient';

export const FLINK_DEPLOYMENT_GROUP = 'flink.apache.org';
export const FLINK_DEPLOYMENT_PLURAL = 'flinkdeployments';
/** Probed in order; the first one the API server serves wins. */
export const FLINK_DEPLOYMENT_VERSIONS: readonly string[] = ['v1beta1', 'v1'];

export const ALL_NAMESPACES_SENTINELS: readonly string[] = ['*', '_all_', 'ALL', 'all'];

export function isAllNamespaces(namespace: string): boolean {
  return ALL_NAMESPACES_SENTINELS.includes(namespace);
}

/**
 * Port for listing raw `FlinkDeployment` custom resources.
 */
export interface IFlinkDeploymentClient {
  /**
   * @param namespace Namespace to list, or one of {@link ALL_NAMESPACES_SENTINELS} for a cluster-wide list
   * @param labelSelector Kubernetes label selector, passed through as is
   * @returns Raw documents in the order the API server returned them
   */
  find(namespace: string, labelSelector?: string): Promise<RawDocument[]>;
}
