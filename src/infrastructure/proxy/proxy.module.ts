import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import axios from 'axios';
import proxyConfig from '../config/proxy.config';
import { ProxyController } from './proxy.controller';
import { ProxyTargetResolver } from './proxy-target.resolver';
import { PROXY_HTTP_CLIENT, ProxyService } from './proxy.service';

@Module({
  controllers: [ProxyController],
  providers: [
    ProxyTargetResolver,
    ProxyService,
    {
      provide: PROXY_HTTP_CLIENT,
      inject: [proxyConfig.KEY],
      useFactory: (config: ConfigType<typeof proxyConfig>) =>
        axios.create({
          timeout: config.timeoutMs,
          maxRedirects: 0,
          maxBodyLength: Infinity,
          maxContentLength: Infinity,
          proxy: false,
        }),
    },
  ],
  exports: [ProxyService],
})
export class ProxyModule {}
