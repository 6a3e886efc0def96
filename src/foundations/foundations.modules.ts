import { Module } from "@nestjs/common";
import { CatModule } from "./cat/cat.module";
import { PhotoModule } from "./photo/photo.module";

const ALL_FOUNDATION_MODULES = [PhotoModule, CatModule];

/**
 * FoundationsModule - the shelter's domain modules: cats and their photos.
 */
@Module({
  imports: ALL_FOUNDATION_MODULES,
  exports: ALL_FOUNDATION_MODULES,
})
export class FoundationsModule {}
