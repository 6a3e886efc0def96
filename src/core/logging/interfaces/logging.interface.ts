export interface LogContext {
  requestId?: string;
  ip?: string;
  userAgent?: string;
  method?: string;
  url?: string;
  [key: string]: unknown;
}

export type LogMetadata = Record<string, unknown>;

export interface LoggingServiceInterface {
  log(message: unknown, context?: string, metadata?: LogMetadata): void;
  error(message: unknown, error?: Error | string, context?: string, metadata?: LogMetadata): void;
  warn(message: unknown, context?: string, metadata?: LogMetadata): void;
  debug(message: unknown, context?: string, metadata?: LogMetadata): void;
  verbose(message: unknown, context?: string, metadata?: LogMetadata): void;
  fatal(message: unknown, error?: Error, context?: string, metadata?: LogMetadata): void;
  trace(message: unknown, context?: string, metadata?: LogMetadata): void;

  // Enhanced methods with automatic context enrichment
  logWithContext(message: string, context?: string, metadata?: LogMetadata): void;
  errorWithContext(message: string, error?: Error, context?: string, metadata?: LogMetadata): void;

  // Context management
  setRequestContext(context: LogContext): void;
  getRequestContext(): LogContext | undefined;
  clearRequestContext(): void;
}
