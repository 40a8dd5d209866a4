import { Injectable, LoggerService, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as fs from 'fs';
import * as path from 'path';
import { ILoggerPort, LogContext } from './logger.port';
import { RequestContextService } from './request-context.service';
import { makeJsonFileFormat, makePrettyConsoleFormat } from './winston-logger.formatters';

/**
 * Winston-backed logger. Installed with `app.useLogger()`, so every Nest `Logger`
 * instance writes through it: `logger.error(message, stack)` arrives here as
 * `error(message, stack, className)`.
 */
@Injectable()
export class WinstonLoggerAdapter implements ILoggerPort, LoggerService {
  private readonly logger: winston.Logger;
  private static handlersInstalled = false;

  constructor(
    private readonly configService: ConfigService,
    @Optional() private readonly requestContext?: RequestContextService,
  ) {
    const logLevel = this.configService.get<string>('LOG_LEVEL', 'info');
    const logDir = this.configService.get<string>('LOG_DIR', 'logs');
    const enableConsole = this.configService.get<string>('LOG_ENABLE_CONSOLE', 'true') === 'true';
    let enableFiles = this.configService.get<string>('LOG_ENABLE_FILES', 'false') === 'true';

    if (enableFiles) {
      try {
        const absDir = path.isAbsolute(logDir) ? logDir : path.join(process.cwd(), logDir);
        if (!fs.existsSync(absDir)) {
          fs.mkdirSync(absDir, { recursive: true });
        }
      } catch (e: unknown) {
        process.stderr.write(`Log directory ${logDir} is not writable, file logging disabled: ${String(e)}\n`);
        enableFiles = false;
      }
    }

    const jsonFormat = makeJsonFileFormat(this.requestContext);
    const rotateFile = (filename: string, level?: string) =>
      new DailyRotateFile({
        dirname: logDir,
        filename: `flink-lens-%DATE%-${filename}.log`,
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: this.configService.get<string>('LOG_MAX_SIZE', '20m'),
        maxFiles: this.configService.get<string>('LOG_MAX_FILES', '14d'),
        level: level || logLevel,
        format: jsonFormat,
      });

    const transports: winston.transport[] = [
      new winston.transports.Console({
        level: logLevel,
        format: makePrettyConsoleFormat(this.requestContext),
        silent: !enableConsole,
      }),
    ];
    const installHandlers = enableFiles && !WinstonLoggerAdapter.handlersInstalled;
    if (enableFiles) {
      transports.push(rotateFile('combined'), rotateFile('error', 'error'));
    }

    this.logger = winston.createLogger({
      level: logLevel,
      transports,
      exceptionHandlers: installHandlers ? [rotateFile('exceptions', 'error')] : [],
      rejectionHandlers: installHandlers ? [rotateFile('rejections', 'error')] : [],
      exitOnError: false,
    });

    if (installHandlers) {
      WinstonLoggerAdapter.handlersInstalled = true;
    }
  }

  private buildWinstonMeta(
    error?: unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): Record<string, unknown> {
    const meta: Record<string, unknown> = {};
    if (typeof context === 'string') meta.context = context;
    else if (context) Object.assign(meta, context);
    Object.assign(meta, metadata);

    if (error instanceof Error) {
      meta.trace = error.stack;
      meta.error = { name: error.name, message: error.message };
    } else if (typeof error === 'string') {
      meta.trace = error;
    } else if (error !== undefined) {
      meta.error = error;
    }
    return meta;
  }

  log(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.info(message, this.buildWinstonMeta(undefined, context, metadata));
  }

  info(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.info(message, this.buildWinstonMeta(undefined, context, metadata));
  }

  debug(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.debug(message, this.buildWinstonMeta(undefined, context, metadata));
  }

  verbose(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.verbose(message, this.buildWinstonMeta(undefined, context, metadata));
  }

  warn(message: string, context?: string | LogContext, metadata?: Record<string, unknown>): void {
    this.logger.warn(message, this.buildWinstonMeta(undefined, context, metadata));
  }

  error(
    message: string,
    error?: unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.error(message, this.buildWinstonMeta(error, context, metadata));
  }
}
