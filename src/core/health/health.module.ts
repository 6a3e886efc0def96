import { Module } from "@nestjs/common";
import { TerminusModule } from "@nestjs/terminus";
import { HealthController } from "./controllers/health.controller";
import { GoogleDriveHealthIndicator } from "./indicators/google-drive.health";
import { Neo4jHealthIndicator } from "./indicators/neo4j.health";

@Module({
  imports: [TerminusModule],
  controllers: [HealthController],
  providers: [Neo4jHealthIndicator, GoogleDriveHealthIndicator],
  exports: [Neo4jHealthIndicator, GoogleDriveHealthIndicator],
})
export class HealthModule {}
