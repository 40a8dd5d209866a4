import { registerAs } from '@nestjs/config';
import { parseBoolean, parseInteger } from './env.utils';

export const DEFAULT_SERVICE_ACCOUNT_TOKEN_PATH =
  '/var/run/secrets/kubernetes.io/serviceaccount/token';

export interface K8sOperatorLocatorConfig {
  enabled: boolean;
  namespaceToWatch: string;
  labelSelector?: string;
  serviceAccountTokenPath: string;
}

export interface JobLocatorConfig {
  k8sOperator: K8sOperatorLocatorConfig;
  jobsCacheTtl: number;
}

export default registerAs('jobLocator', (): JobLocatorConfig => {
  const labelSelector = process.env.JOBLOCATOR_K8S_OPERATOR_LABEL_SELECTOR?.trim();

  return {
    k8sOperator: {
      enabled: parseBoolean(process.env.JOBLOCATOR_K8S_OPERATOR_ENABLED, true),
      namespaceToWatch: process.env.JOBLOCATOR_K8S_OPERATOR_NAMESPACE || 'default',
      labelSelector: labelSelector || undefined,
      serviceAccountTokenPath:
        process.env.KUBERNETES_SERVICE_ACCOUNT_TOKEN_PATH || DEFAULT_SERVICE_ACCOUNT_TOKEN_PATH,
    },
    jobsCacheTtl: parseInteger(process.env.JOBS_CACHE_TTL, 10),
  };
});
