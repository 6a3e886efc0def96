import { DynamicModule, Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { ClsModule } from "nestjs-cls";

import { baseConfig } from "../config/base.config";
import { BaseConfigInterface } from "../config/interfaces/base.config.interface";
import { CoreModule } from "../core/core.module";
import { FoundationsModule } from "../foundations/foundations.modules";
import { BootstrapOptions } from "./bootstrap.options";

@Module({})
class AppModule {}

/**
 * Creates the application module from bootstrap options.
 *
 * - Global configuration module
 * - Request context via CLS
 * - CoreModule and FoundationsModule
 * - Extra app-specific modules
 */
export function createAppModule(options: BootstrapOptions = {}): DynamicModule {
  const configLoader = (): BaseConfigInterface => ({ ...baseConfig, ...options.config?.() });

  return {
    module: AppModule,
    imports: [
      ConfigModule.forRoot({
        load: [configLoader],
        isGlobal: true,
        cache: true,
      }),

      ClsModule.forRoot({
        global: true,
        middleware: { mount: true },
      }),

      CoreModule,
      FoundationsModule,

      ...(options.appModules ?? []),
    ],
  };
}
