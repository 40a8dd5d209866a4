import { registerAs } from '@nestjs/config';
import { VERSION } from '../../version';
import { parseBoolean, parseInteger, parseList, parseStringMap } from './env.utils';

export interface AppConfig {
  debug: boolean;
  appVersion: string;
  patterns: Record<string, string>;
  endpointPathPatterns: Record<string, string>;
  allowedOrigins: string[];
  port: number;
}

export default registerAs(
  'app',
  (): AppConfig => ({
    debug: parseBoolean(process.env.DEBUG, false),
    appVersion: process.env.APP_VERSION || VERSION,
    patterns: parseStringMap('UI_PATTERNS', process.env.UI_PATTERNS),
    endpointPathPatterns: parseStringMap(
      'UI_ENDPOINT_PATH_PATTERNS',
      process.env.UI_ENDPOINT_PATH_PATTERNS,
    ),
    allowedOrigins: parseList(process.env.ALLOWED_ORIGINS, ['*']),
    port: parseInteger(process.env.PORT, 8088),
  }),
);
