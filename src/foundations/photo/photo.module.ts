import { Module } from "@nestjs/common";
import { PhotoRepository } from "./repositories/photo.repository";
import { PhotoSerialiser } from "./serialisers/photo.serialiser";
import { PhotoService } from "./services/photo.service";

@Module({
  providers: [PhotoRepository, PhotoService, PhotoSerialiser],
  exports: [PhotoService, PhotoSerialiser],
})
export class PhotoModule {}
