import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import proxyConfig from '../config/proxy.config';

// DNS-1123 label, the shape of a Kubernetes resource name.
const APP_NAME_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const APP_NAME_MAX_LENGTH = 63;

/**
 * Turns an application name into the base URL of its REST endpoint. Explicit
 * mappings win; any other valid name goes through the default template.
 */
@Injectable()
export class ProxyTargetResolver {
  constructor(
    @Inject(proxyConfig.KEY)
    private readonly config: ConfigType<typeof proxyConfig>,
  ) {}

  resolve(appName: string): string {
    if (Object.hasOwn(this.config.targetMap, appName)) {
      return this.config.targetMap[appName];
    }
    if (appName.length > APP_NAME_MAX_LENGTH || !APP_NAME_PATTERN.test(appName)) {
      throw new BadRequestException(`'${appName}' is not a valid application name`);
    }
    return this.config.defaultTargetTemplate.replace(/\{app\}/g, appName);
  }
}

export function buildTargetUrl(baseUrl: string, path: string, query?: string): string {
  const url = `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
  return query ? `${url}?${query}` : url;
}
