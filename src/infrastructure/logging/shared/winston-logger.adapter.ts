import { Injectable, LoggerService, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as fs from 'fs';
import * as path from 'path';
import {
  ILoggerPort,
  LogContext,
  LogLevel,
} from '../../../application/ports/logger.port';
import { RenderContextService } from './render-context.service';
import { deepRedact } from './utils/redaction.util';
import {
  makeJsonFileFormat,
  makePrettyConsoleFormat,
} from './winston-logger.formatters';

@Injectable()
export class WinstonLoggerAdapter implements ILoggerPort, LoggerService {
  private readonly logger: winston.Logger;

  constructor(
    private readonly configService: ConfigService,
    @Optional() private readonly renderContext?: RenderContextService,
  ) {
    const logLevel = this.configService.get<string>('LOG_LEVEL', 'info');
    const logDir = this.configService.get<string>('LOG_DIR', 'logs');
    const appName = this.configService.get<string>('APP_NAME', 'resume-typesetter');
    const enableConsole =
      this.configService.get<string>('LOG_ENABLE_CONSOLE', 'true') === 'true';
    const enableFiles =
      this.configService.get<string>('LOG_ENABLE_FILES', 'false') === 'true' &&
      WinstonLoggerAdapter.ensureLogDir(logDir);

    const consoleTransport = new winston.transports.Console({
      level: logLevel,
      format: makePrettyConsoleFormat(this.renderContext),
      silent: !enableConsole,
    });

    const jsonFormat = makeJsonFileFormat(this.renderContext);

    const rotateFile = (filename: string, level?: string) =>
      new DailyRotateFile({
        dirname: logDir,
        filename: `${appName}-%DATE%-${filename}.log`,
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: this.configService.get<string>('LOG_MAX_SIZE', '20m'),
        maxFiles: this.configService.get<string>('LOG_MAX_FILES', '14d'),
        level: level ?? logLevel,
        format: jsonFormat,
      });

    this.logger = winston.createLogger({
      level: logLevel,
      transports: enableFiles
        ? [consoleTransport, rotateFile('combined'), rotateFile('error', 'error')]
        : [consoleTransport],
      exitOnError: false,
    });
  }

  private static ensureLogDir(logDir: string): boolean {
    const absDir = path.isAbsolute(logDir)
      ? logDir
      : path.join(process.cwd(), logDir);
    try {
      if (!fs.existsSync(absDir)) {
        fs.mkdirSync(absDir, { recursive: true });
      }
      return true;
    } catch (error) {
      process.stderr.write(
        `File logging disabled, cannot create ${absDir}: ${String(error)}\n`,
      );
      return false;
    }
  }

  // Contexts travel as JSON strings, out of reach of the format-level redaction.
  private serializeContext(context: LogContext): string {
    try {
      return JSON.stringify(deepRedact(context));
    } catch {
      return '[Unserializable Context]';
    }
  }

  private buildWinstonMeta(
    error?: unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): Record<string, unknown> {
    let logContext: LogContext = { ...this.renderContext?.getStore() };
    if (typeof context === 'object') logContext = { ...logContext, ...context };

    const meta: Record<string, unknown> = { ...metadata };
    if (Object.keys(logContext).length > 0) {
      if (typeof context === 'string') logContext.context = context;
      meta.context = this.serializeContext(logContext);
    } else if (typeof context === 'string') {
      meta.context = context;
    }

    if (error instanceof Error) {
      meta.trace = error.stack;
      meta.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    } else if (error !== undefined) {
      meta.error = error;
    }
    return meta;
  }

  log(
    message: string,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.info(message, this.buildWinstonMeta(undefined, context, metadata));
  }

  info(
    message: string,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.info(message, this.buildWinstonMeta(undefined, context, metadata));
  }

  debug(
    message: string,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.debug(message, this.buildWinstonMeta(undefined, context, metadata));
  }

  warn(
    message: string,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
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

  fatal(
    message: string,
    error?: unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.error(message, {
      ...this.buildWinstonMeta(error, context, metadata),
      fatal: true,
    });
  }

  verbose(
    message: string,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.verbose(message, this.buildWinstonMeta(undefined, context, metadata));
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level === 'fatal' ? 'error' : level;
  }

  getLevel(): string {
    return this.logger.level;
  }
}
