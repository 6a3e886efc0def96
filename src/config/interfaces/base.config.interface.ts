import { ConfigApiInterface } from "./config.api.interface";
import { ConfigGoogleDriveInterface } from "./config.google.drive.interface";
import { ConfigLoggingInterface } from "./config.logging.interface";
import { ConfigNeo4jInterface } from "./config.neo4j.interface";
import { ConfigOpenApiInterface } from "./config.openapi.interface";
import { ConfigUploadsInterface } from "./config.uploads.interface";

export interface BaseConfigInterface {
  api: ConfigApiInterface;
  neo4j: ConfigNeo4jInterface;
  logging: ConfigLoggingInterface;
  googleDrive: ConfigGoogleDriveInterface;
  uploads: ConfigUploadsInterface;
  openApi: ConfigOpenApiInterface;
}
