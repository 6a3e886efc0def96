import { Global, Module } from "@nestjs/common";
import { GoogleDriveModule } from "./google-drive/google-drive.module";
import { HealthModule } from "./health/health.module";
import { JsonApiModule } from "./jsonapi/jsonapi.module";
import { LoggingModule } from "./logging/logging.module";
import { Neo4JModule } from "./neo4j/neo4j.module";

/**
 * Order is important:
 * 1. Config-dependent modules with no external connections first
 * 2. External service connections (Neo4j, Google Drive) second
 * 3. Health checks over those connections last
 */
const CORE_MODULES = [LoggingModule, JsonApiModule, Neo4JModule, GoogleDriveModule, HealthModule];

/**
 * CoreModule - infrastructure shared by every domain module.
 *
 * All services read their settings through ConfigService.
 */
@Global()
@Module({
  imports: CORE_MODULES,
  exports: [LoggingModule, JsonApiModule, Neo4JModule, GoogleDriveModule],
})
export class CoreModule {}
