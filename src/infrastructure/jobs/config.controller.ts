import { Controller, Get, Inject } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import appConfig from '../config/app.config';

/** What the UI reads at startup. */
export interface UiConfig {
  appVersion: string;
  patterns: Record<string, string>;
  endpointPathPatterns: Record<string, string>;
}

@Controller('config')
export class ConfigController {
  constructor(
    @Inject(appConfig.KEY)
    private readonly app: ConfigType<typeof appConfig>,
  ) {}

  @Get()
  get(): UiConfig {
    return {
      appVersion: this.app.appVersion,
      patterns: this.app.patterns,
      endpointPathPatterns: this.app.endpointPathPatterns,
    };
  }
}
