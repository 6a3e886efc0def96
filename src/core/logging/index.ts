/**
 * Logging Module
 *
 * Structured logging with pino, request context tracking through nestjs-cls,
 * and HTTP request/response logging.
 */

export * from "./logging.module";
export { AppLoggingService } from "./services/logging.service";
export * from "./interceptors/logging.interceptor";
export * from "./helpers/request.timing";
export type { LogContext, LogMetadata, LoggingServiceInterface } from "./interfaces/logging.interface";
