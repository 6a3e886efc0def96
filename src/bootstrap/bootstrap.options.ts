import { DynamicModule, Type } from "@nestjs/common";
import { BaseConfigInterface } from "../config/interfaces/base.config.interface";

/**
 * Options for the bootstrap function
 */
export interface BootstrapOptions {
  /**
   * Extra feature modules imported next to the shelter's own modules.
   */
  appModules?: (Type<unknown> | DynamicModule)[];

  /**
   * Configuration loader whose sections replace the ones of baseConfig.
   */
  config?: () => Partial<BaseConfigInterface>;
}
