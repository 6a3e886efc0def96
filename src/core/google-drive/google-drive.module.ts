import { Global, Module } from "@nestjs/common";
import { GoogleDriveController } from "./controllers/google-drive.controller";
import { GoogleCredentialsService } from "./services/google-credentials.service";
import { GoogleDriveService } from "./services/google-drive.service";

@Global()
@Module({
  controllers: [GoogleDriveController],
  providers: [GoogleCredentialsService, GoogleDriveService],
  exports: [GoogleCredentialsService, GoogleDriveService],
})
export class GoogleDriveModule {}
