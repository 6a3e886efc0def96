import { Module } from "@nestjs/common";
import { PhotoModule } from "../photo/photo.module";
import { CatController } from "./controllers/cat.controller";
import { CatRepository } from "./repositories/cat.repository";
import { CatSerialiser } from "./serialisers/cat.serialiser";
import { CatService } from "./services/cat.service";

@Module({
  imports: [PhotoModule],
  controllers: [CatController],
  providers: [CatRepository, CatService, CatSerialiser],
  exports: [CatService, CatSerialiser],
})
export class CatModule {}
