import { CallHandler, ExecutionContext, HttpException, Injectable, NestInterceptor } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { FastifyRequest } from "fastify";
import { ClsService } from "nestjs-cls";
import { catchError, Observable, throwError } from "rxjs";
import { BaseConfigInterface } from "../../../config/interfaces/base.config.interface";
import { REQUEST_URL_KEY } from "../../jsonapi/services/jsonapi.service";
import { markRequestStart } from "../helpers/request.timing";
import { LogContext } from "../interfaces/logging.interface";
import { AppLoggingService } from "../services/logging.service";

const isValidationError = (error: unknown): boolean => {
  if (!(error instanceof HttpException)) return false;
  const response = error.getResponse();
  return typeof response === "object" && "message" in response && Array.isArray(response.message);
};

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  constructor(
    private readonly loggingService: AppLoggingService,
    private readonly clsService: ClsService,
    private readonly configService: ConfigService<BaseConfigInterface, true>,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler<unknown>): Observable<unknown> {
    const startTime = Date.now();
    const request = context.switchToHttp().getRequest<FastifyRequest>();

    // Read back by the onSend hook for the request timing
    markRequestStart(request.raw, startTime);

    const requestIdHeader = request.headers["x-request-id"];
    const logContext: LogContext = {
      requestId: typeof requestIdHeader === "string" ? requestIdHeader : request.id,
      ip: request.ip,
      userAgent: request.headers["user-agent"],
      method: request.method,
      url: request.url,
    };

    this.loggingService.setRequestContext(logContext);

    // Full request URL for pagination links
    if (this.clsService.isActive()) {
      const apiUrl = this.configService.get("api", { infer: true }).url.replace(/\/$/, "");
      this.clsService.set(REQUEST_URL_KEY, `${apiUrl}${request.url}`);
    }

    return next.handle().pipe(
      catchError((error: unknown) => {
        const responseTime = Date.now() - startTime;

        // HttpExceptionFilter logs validation failures with their details
        if (!isValidationError(error)) {
          const failure = error instanceof Error ? error : new Error(String(error));
          const statusCode = error instanceof HttpException ? error.getStatus() : 500;

          this.loggingService.logHttpError(request.method, request.url, failure, responseTime, request.ip);
          this.loggingService.errorWithContext("Request failed", failure, "HTTP_ERROR", {
            responseTime,
            statusCode,
            errorType: failure.constructor.name,
          });
        }

        this.loggingService.clearRequestContext();

        return throwError(() => error);
      }),
    );
  }
}
