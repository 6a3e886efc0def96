import fastifyMultipart from "@fastify/multipart";
import { INestApplicationContext, ValidationPipe } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";

import { HttpExceptionFilter } from "../common/filters/http-exception.filter";
import { BaseConfigInterface } from "../config/interfaces/base.config.interface";
import { takeRequestStart } from "../core/logging/helpers/request.timing";
import { LoggingInterceptor } from "../core/logging/interceptors/logging.interceptor";
import { AppLoggingService } from "../core/logging/services/logging.service";

import { createAppModule } from "./app.module.factory";
import { BootstrapOptions } from "./bootstrap.options";
import { defaultFastifyOptions, multipartOptions } from "./defaults";

/**
 * Bootstrap the API.
 *
 * - Creates the Fastify application
 * - Registers multipart parsing, the exception filter, validation and request logging
 * - Serves the OpenAPI documentation when enabled
 * - Sets up graceful shutdown handlers
 *
 * @example
 * ```typescript
 * // main.ts
 * import * as dotenv from "dotenv";
 * dotenv.config();
 *
 * bootstrap();
 * ```
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<void> {
  try {
    await bootstrapAPI(options);
  } catch (error) {
    console.error("Failed to start application:", error);
    process.exit(1);
  }
}

async function bootstrapAPI(options: BootstrapOptions): Promise<void> {
  const app = await NestFactory.create<NestFastifyApplication>(
    createAppModule(options),
    new FastifyAdapter(defaultFastifyOptions),
    { logger: ["error", "warn"] },
  );

  const configService: ConfigService<BaseConfigInterface, true> = app.get(ConfigService);
  const loggingService = app.get(AppLoggingService);

  await app.register(fastifyMultipart, multipartOptions(configService.get("uploads", { infer: true })));

  // Setup logging
  app.useLogger(loggingService);
  setupFastifyLoggingHook(app, loggingService);

  app.useGlobalFilters(new HttpExceptionFilter(loggingService));

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      validateCustomDecorators: true,
    }),
  );

  app.useGlobalInterceptors(app.get(LoggingInterceptor));

  setupOpenApiDocs(app, configService, loggingService);

  const { host, port } = configService.get("api", { infer: true });
  await app.listen(port, host);

  loggingService.log(`API server started on ${host}:${port}`);

  setupGracefulShutdown(app);
}

/**
 * Setup Fastify hook to log HTTP requests with accurate timing
 */
function setupFastifyLoggingHook(app: NestFastifyApplication, loggingService: AppLoggingService): void {
  app
    .getHttpAdapter()
    .getInstance()
    .addHook("onSend", async (request, reply, payload) => {
      const startTime = takeRequestStart(request.raw);

      if (startTime !== undefined) {
        const responseTime = Date.now() - startTime;
        const statusCode = reply.statusCode || 200;
        const resultSize = typeof payload === "string" || Buffer.isBuffer(payload) ? payload.length : 0;

        loggingService.logHttpRequest(request.method, request.url, statusCode, responseTime, request.ip);

        loggingService.logWithContext(`Request completed`, "HTTP_SUCCESS", {
          responseTime,
          statusCode,
          resultSize,
        });

        loggingService.clearRequestContext();
      }
      return payload;
    });
}

function setupOpenApiDocs(
  app: NestFastifyApplication,
  configService: ConfigService<BaseConfigInterface, true>,
  loggingService: AppLoggingService,
): void {
  const openApi = configService.get("openApi", { infer: true });
  if (!openApi.enabled) return;

  const config = new DocumentBuilder()
    .setTitle(openApi.title)
    .setDescription(openApi.description)
    .setVersion(openApi.version)
    .build();

  const document = SwaggerModule.createDocument(app, config);

  SwaggerModule.setup(openApi.path, app, document, {
    swaggerOptions: {
      docExpansion: "list",
      filter: true,
      showRequestDuration: true,
    },
  });
  loggingService.log(`Swagger UI available at /${openApi.path}`);
}

/**
 * Setup graceful shutdown handlers for SIGTERM and SIGINT
 */
function setupGracefulShutdown(app: INestApplicationContext): void {
  const shutdown = async (signal: string) => {
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      console.error(`Error during ${signal} shutdown:`, error);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}
