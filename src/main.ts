import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import appConfig from './infrastructure/config/app.config';
import { WinstonLoggerAdapter } from './infrastructure/logging/winston-logger.adapter';
import { registerRawBodyParser } from './infrastructure/proxy/raw-body.parser';
import { VERSION } from './version';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ trustProxy: true }),
    { bodyParser: false, bufferLogs: true },
  );
  app.useLogger(app.get(WinstonLoggerAdapter));

  registerRawBodyParser(app.getHttpAdapter().getInstance());

  const config = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);

  app.setGlobalPrefix('api', { exclude: ['healthz', 'metrics'] });
  app.enableCors({
    origin: config.allowedOrigins.includes('*') ? true : config.allowedOrigins,
  });
  app.enableShutdownHooks();

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('flink-lens')
      .setDescription('Flink job discovery and REST proxy')
      .setVersion(VERSION)
      .build(),
  );
  SwaggerModule.setup('api/docs', app, document, {
    jsonDocumentUrl: 'api/docs-json',
  });

  await app.listen({ port: config.port, host: '0.0.0.0' });
  Logger.log(`flink-lens ${config.appVersion} running on port ${config.port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start', error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
