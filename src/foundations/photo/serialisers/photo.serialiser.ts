import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { BaseConfigInterface } from "../../../config/interfaces/base.config.interface";
import { AbstractJsonApiSerialiser } from "../../../core/jsonapi/abstracts/abstract.jsonapi.serialiser";
import { JsonApiSerialiserFactory } from "../../../core/jsonapi/factories/jsonapi.serialiser.factory";
import { JsonApiDataInterface } from "../../../core/jsonapi/interfaces/jsonapi.data.interface";
import { Photo } from "../entities/photo.entity";
import { photoMeta } from "../entities/photo.meta";

@Injectable()
export class PhotoSerialiser extends AbstractJsonApiSerialiser<Photo> {
  constructor(serialiserFactory: JsonApiSerialiserFactory, configService: ConfigService<BaseConfigInterface, true>) {
    super(serialiserFactory, configService);
  }

  get type(): string {
    return photoMeta.endpoint;
  }

  create(): JsonApiDataInterface<Photo> {
    this.attributes = {
      url: "url",
      filename: "filename",
      googleFileId: "googleFileId",
    };

    return super.create();
  }
}
