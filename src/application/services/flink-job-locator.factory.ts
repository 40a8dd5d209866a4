import { JobLocatorConfig } from '@infrastructure/config/job-locator.config';
import { IFlinkJobLocator } from '../ports/flink-job-locator.port';

export interface FlinkJobLocatorStrategies {
  k8sOperator: IFlinkJobLocator;
  disabled: IFlinkJobLocator;
}

export function selectFlinkJobLocator(
  config: JobLocatorConfig,
  strategies: FlinkJobLocatorStrategies,
): IFlinkJobLocator {
  if (config.k8sOperator.enabled) {
    return strategies.k8sOperator;
  }
  return strategies.disabled;
}
