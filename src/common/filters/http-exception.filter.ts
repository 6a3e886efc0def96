import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Optional } from "@nestjs/common";
import { FastifyReply, FastifyRequest } from "fastify";
import { AppLoggingService } from "../../core/logging/services/logging.service";

export type JsonApiErrorResponse = {
  message: string;
  errors: {
    status: string;
    title: string;
    detail: string;
    source: { pointer: string };
    meta: { timestamp: string; path: string; method: string };
  }[];
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(@Optional() private readonly logger?: AppLoggingService) {}

  /**
   * Messages of a validation failure raised by the ValidationPipe or a form validator, or null
   */
  private extractValidationErrors(exception: HttpException): string[] | null {
    const response = exception.getResponse();
    if (typeof response !== "object" || !("message" in response) || !Array.isArray(response.message)) return null;

    return response.message.map((entry: unknown) => String(entry));
  }

  private extractDetail(exception: unknown): string {
    if (!(exception instanceof HttpException)) return "Internal server error";

    const validationErrors = this.extractValidationErrors(exception);
    if (validationErrors) return validationErrors.join(", ");

    const response = exception.getResponse();
    if (typeof response === "string") return response;
    if ("message" in response && typeof response.message === "string") return response.message;

    return "An error occurred";
  }

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<FastifyRequest>();

    const status = exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
    const stackTrace = exception instanceof Error ? exception.stack : String(exception);
    const validationErrors = exception instanceof HttpException ? this.extractValidationErrors(exception) : null;

    if (validationErrors) {
      const validationErrorsFormatted = validationErrors.map((e) => `  - ${e}`).join("\n");
      this.logger?.error(
        `Unhandled Exception: ${status} - ${request.method} ${request.url}\n\nValidation Errors:\n${validationErrorsFormatted}`,
        stackTrace,
        HttpExceptionFilter.name,
      );
    } else {
      this.logger?.error(
        `Unhandled Exception: ${status} - ${request.method} ${request.url}`,
        stackTrace,
        HttpExceptionFilter.name,
      );
    }

    const errorDetail = this.extractDetail(exception);

    const errorResponse: JsonApiErrorResponse = {
      message: errorDetail,
      errors: [
        {
          status: status.toString(),
          title: HttpStatus[status] || "Unknown Error",
          detail: errorDetail,
          source: {
            pointer: request.url,
          },
          meta: {
            timestamp: new Date().toISOString(),
            path: request.url,
            method: request.method,
          },
        },
      ],
    };

    response.status(status).send(errorResponse);
  }
}
