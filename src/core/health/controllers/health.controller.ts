import { Controller, Get } from "@nestjs/common";
import { ApiTags } from "@nestjs/swagger";
import { HealthCheck, HealthCheckResult, HealthCheckService } from "@nestjs/terminus";
import { GoogleDriveHealthIndicator } from "../indicators/google-drive.health";
import { Neo4jHealthIndicator } from "../indicators/neo4j.health";

/**
 * Health Check Controller
 *
 * Endpoints:
 * - GET /health - Neo4j and Google Drive status
 * - GET /health/live - Liveness probe (process is running)
 * - GET /health/ready - Readiness probe (the database answers)
 */
@ApiTags("health")
@Controller("health")
export class HealthController {
  constructor(
    private health: HealthCheckService,
    private neo4jHealth: Neo4jHealthIndicator,
    private googleDriveHealth: GoogleDriveHealthIndicator,
  ) {}

  /**
   * Full health check endpoint
   *
   * @returns HealthCheckResult with status of all dependencies
   * - HTTP 200: All dependencies healthy
   * - HTTP 503: One or more dependencies unhealthy
   */
  @Get()
  @HealthCheck()
  async check(): Promise<HealthCheckResult> {
    return this.health.check([
      () => this.neo4jHealth.isHealthy("neo4j"),
      () => this.googleDriveHealth.isHealthy("googleDrive"),
    ]);
  }

  @Get("live")
  @HealthCheck()
  async liveness(): Promise<HealthCheckResult> {
    return this.health.check([]);
  }

  /**
   * Readiness probe endpoint
   *
   * Only Neo4j gates traffic; Drive status is reported by the full check.
   */
  @Get("ready")
  @HealthCheck()
  async readiness(): Promise<HealthCheckResult> {
    return this.health.check([() => this.neo4jHealth.isHealthy("neo4j")]);
  }
}
