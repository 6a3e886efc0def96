import { Global, Module } from "@nestjs/common";
import { JsonApiSerialiserFactory } from "./factories/jsonapi.serialiser.factory";
import { JsonApiService } from "./services/jsonapi.service";

const JSONAPI_SERVICES = [JsonApiService, JsonApiSerialiserFactory];

@Global()
@Module({
  providers: JSONAPI_SERVICES,
  exports: JSONAPI_SERVICES,
})
export class JsonApiModule {}
