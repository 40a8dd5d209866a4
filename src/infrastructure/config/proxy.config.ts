import { registerAs } from '@nestjs/config';
import { parseInteger, parseStringMap } from './env.utils';

// The Flink operator exposes each deployment's REST API as the "<name>-rest" service.
export const DEFAULT_TARGET_TEMPLATE = 'http://{app}-rest:8081';

export interface ProxyConfig {
  targetMap: Record<string, string>;
  defaultTargetTemplate: string;
  timeoutMs: number;
}

export default registerAs(
  'proxy',
  (): ProxyConfig => ({
    targetMap: parseStringMap('PROXY_TARGET_MAP', process.env.PROXY_TARGET_MAP),
    defaultTargetTemplate: process.env.PROXY_DEFAULT_TARGET_TEMPLATE || DEFAULT_TARGET_TEMPLATE,
    timeoutMs: Math.max(0, parseInteger(process.env.PROXY_TIMEOUT_MS, 0)),
  }),
);
