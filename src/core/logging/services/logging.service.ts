import { Injectable, LoggerService } from "@nestjs/common";
import { ClsService } from "nestjs-cls";
import pino from "pino";
import pretty from "pino-pretty";
import { baseConfig } from "../../../config/base.config";
import { ConfigLoggingInterface } from "../../../config/interfaces/config.logging.interface";
import { LogContext, LoggingServiceInterface, LogMetadata } from "../interfaces/logging.interface";

const LOG_CONTEXT_KEY = "logContext";

const formatMessage = (message: unknown): string =>
  typeof message === "string" ? message : JSON.stringify(message);

const withStack = (message: unknown, error?: Error): string =>
  error ? `${formatMessage(message)}\nStack: ${error.stack}` : formatMessage(message);

const LEVELS: pino.Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

const toLevel = (level: string): pino.Level => LEVELS.find((candidate) => candidate === level) ?? "info";

const errorMetadata = (error?: Error): LogMetadata =>
  error ? { error: error.message, errorName: error.name } : {};

@Injectable()
export class AppLoggingService implements LoggingServiceInterface, LoggerService {
  private readonly logger: pino.Logger;
  private readonly loggingConfig: ConfigLoggingInterface = baseConfig.logging;

  constructor(private readonly clsService: ClsService) {
    this.logger = this.initializeLogger();
  }

  private initializeLogger(): pino.Logger {
    const baseLevel = toLevel(this.loggingConfig.level);

    // Console output is the only sink, so disabling it leaves no stream
    const streams: pino.StreamEntry[] = this.loggingConfig.consoleEnabled
      ? [
          {
            level: baseLevel,
            stream: pretty({
              colorize: true,
              translateTime: false,
              ignore: "pid,hostname",
              messageFormat: "{msg}",
              hideObject: true,
            }),
          },
        ]
      : [];

    return pino(
      {
        level: baseLevel,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: {
          application: this.loggingConfig.labels.application,
          environment: this.loggingConfig.labels.environment,
        },
        formatters: {
          level: (label: string) => {
            return { level: label };
          },
        },
      },
      pino.multistream(streams),
    );
  }

  private getEnrichedContext(context?: string, metadata?: LogMetadata): LogMetadata {
    const requestContext = this.getRequestContext();

    return {
      context,
      ...metadata,
      ...requestContext,
    };
  }

  // NestJS LoggerService interface implementation
  log(message: unknown, context?: string, metadata?: LogMetadata) {
    this.logger.info(this.getEnrichedContext(context, metadata), formatMessage(message));
  }

  error(message: unknown, errorOrTrace?: Error | string, context?: string, metadata?: LogMetadata) {
    if (errorOrTrace instanceof Error) {
      this.logger.error(
        this.getEnrichedContext(context, { ...metadata, ...errorMetadata(errorOrTrace) }),
        withStack(message, errorOrTrace),
      );
      return;
    }

    // Nest's own signature passes a stack trace string
    this.logger.error(this.getEnrichedContext(context, { ...metadata, trace: errorOrTrace }), formatMessage(message));
  }

  warn(message: unknown, context?: string, metadata?: LogMetadata) {
    this.logger.warn(this.getEnrichedContext(context, metadata), formatMessage(message));
  }

  debug(message: unknown, context?: string, metadata?: LogMetadata) {
    this.logger.debug(this.getEnrichedContext(context, metadata), formatMessage(message));
  }

  verbose(message: unknown, context?: string, metadata?: LogMetadata) {
    this.logger.trace(this.getEnrichedContext(context, metadata), formatMessage(message));
  }

  fatal(message: unknown, error?: Error, context?: string, metadata?: LogMetadata) {
    this.logger.fatal(
      this.getEnrichedContext(context, { ...metadata, ...errorMetadata(error) }),
      withStack(message, error),
    );
  }

  trace(message: unknown, context?: string, metadata?: LogMetadata) {
    this.logger.trace(this.getEnrichedContext(context, metadata), formatMessage(message));
  }

  logWithContext(message: string, context?: string, metadata?: LogMetadata): void {
    this.logger.info(this.getEnrichedContext(context, metadata), message);
  }

  errorWithContext(message: string, error?: Error, context?: string, metadata?: LogMetadata): void {
    this.logger.error(
      this.getEnrichedContext(context, { ...metadata, ...errorMetadata(error) }),
      withStack(message, error),
    );
  }

  // Context management using ClsService
  setRequestContext(context: LogContext): void {
    if (this.clsService.isActive()) this.clsService.set(LOG_CONTEXT_KEY, context);
  }

  getRequestContext(): LogContext | undefined {
    if (!this.clsService.isActive()) return undefined;
    return this.clsService.get<LogContext | undefined>(LOG_CONTEXT_KEY);
  }

  clearRequestContext(): void {
    if (this.clsService.isActive()) this.clsService.set(LOG_CONTEXT_KEY, undefined);
  }

  logHttpRequest(method: string, url: string, statusCode: number, responseTime: number, ip?: string): void {
    this.logWithContext(`${method} ${url} - ${statusCode} (${responseTime}ms)`, "HTTP", {
      httpMethod: method,
      httpUrl: url,
      httpStatusCode: statusCode,
      responseTimeMs: responseTime,
      clientIp: ip,
    });
  }

  logHttpError(method: string, url: string, error: Error, responseTime: number, ip?: string): void {
    this.errorWithContext(`${method} ${url} - ERROR (${responseTime}ms): ${error.message}`, error, "HTTP", {
      httpMethod: method,
      httpUrl: url,
      responseTimeMs: responseTime,
      clientIp: ip,
    });
  }

  logBusinessEvent(event: string, data?: LogMetadata): void {
    this.logWithContext(`Business Event: ${event}`, "BUSINESS", data);
  }
}
