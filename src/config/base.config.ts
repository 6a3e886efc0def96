import { BaseConfigInterface } from "./interfaces/base.config.interface";

/**
 * Options for createBaseConfig
 */
export interface BaseConfigOptions {
  /**
   * Application name used in logging labels and the API documentation title
   * @default 'animal-shelter'
   */
  appName?: string;

  /**
   * Environment variables to read from
   * @default process.env
   */
  env?: NodeJS.ProcessEnv;
}

const withTrailingSlash = (url: string): string => (url.endsWith("/") ? url : `${url}/`);

/**
 * Creates the base configuration object from environment variables.
 *
 * @example
 * ```typescript
 * ConfigModule.forRoot({
 *   isGlobal: true,
 *   load: [() => createBaseConfig({ appName: 'animal-shelter' })],
 * })
 * ```
 */
export function createBaseConfig(options?: BaseConfigOptions): BaseConfigInterface {
  const env = options?.env ?? process.env;
  const appName = env.LOG_APP_LABEL || options?.appName || "animal-shelter";

  const config = {
    api: {
      url: env.API_URL ? withTrailingSlash(env.API_URL) : "http://localhost:8000/",
      host: env.API_HOST || "127.0.0.1",
      port: parseInt(env.API_PORT || "8000"),
      env: env.ENV || "development",
    },
    neo4j: {
      uri: env.NEO4J_URI || "",
      username: env.NEO4J_USER || "",
      password: env.NEO4J_PASSWORD || "",
      database: env.NEO4J_DATABASE || "",
    },
    logging: {
      level: env.LOG_LEVEL || "info",
      consoleEnabled: env.CONSOLE_ENABLED !== "false",
      labels: {
        application: appName,
        environment: env.ENV || "development",
      },
    },
    googleDrive: {
      clientSecretPath: env.GOOGLE_CLIENT_SECRET_PATH || "client_secret.json",
      tokenPath: env.GOOGLE_TOKEN_PATH || "token.json",
      rootFolderName: env.GOOGLE_DRIVE_ROOT_FOLDER || "Photos of cats",
      redirectUri: env.GOOGLE_REDIRECT_URI || "",
    },
    uploads: {
      maxFileSize: parseInt(env.UPLOAD_MAX_FILE_SIZE || "10485760"),
      maxFiles: parseInt(env.UPLOAD_MAX_FILES || "10"),
    },
    openApi: {
      enabled: env.OPENAPI_ENABLED !== "false",
      path: env.OPENAPI_PATH || "docs",
      title: "Animal Shelter API",
      description: "Shelter cat records with photographs stored in Google Drive",
      version: "1.0.0",
    },
  };
  return config;
}

/**
 * Pre-configured base configuration instance built from `process.env` at import time.
 */
export const baseConfig = createBaseConfig();
