import { Injectable } from "@nestjs/common";
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from "@nestjs/terminus";
import { GoogleCredentialsService } from "../../google-drive/services/google-credentials.service";

/**
 * Reports whether photos can be stored: a client credential is present and a user token was granted.
 * Drive itself is not called.
 */
@Injectable()
export class GoogleDriveHealthIndicator extends HealthIndicator {
  constructor(private readonly credentials: GoogleCredentialsService) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    let message: string;

    try {
      if (!(await this.credentials.isConfigured())) {
        message = "OAuth client credential is missing or invalid";
      } else if (!(await this.credentials.isAuthorised())) {
        message = "Access has not been authorised";
      } else {
        return this.getStatus(key, true, { message: "Google Drive credentials ready" });
      }
    } catch (error) {
      message = error instanceof Error ? error.message : "Unknown error";
    }

    throw new HealthCheckError("Google Drive health check failed", this.getStatus(key, false, { message }));
  }
}
