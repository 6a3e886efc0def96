import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { BaseConfigInterface } from "../../../config/interfaces/base.config.interface";
import { AbstractJsonApiSerialiser } from "../../../core/jsonapi/abstracts/abstract.jsonapi.serialiser";
import { JsonApiSerialiserFactory } from "../../../core/jsonapi/factories/jsonapi.serialiser.factory";
import { JsonApiDataInterface } from "../../../core/jsonapi/interfaces/jsonapi.data.interface";
import { PhotoModel } from "../../photo/entities/photo.model";
import { Cat } from "../entities/cat.entity";
import { catMeta } from "../entities/cat.meta";

@Injectable()
export class CatSerialiser extends AbstractJsonApiSerialiser<Cat> {
  constructor(serialiserFactory: JsonApiSerialiserFactory, configService: ConfigService<BaseConfigInterface, true>) {
    super(serialiserFactory, configService);
  }

  get type(): string {
    return catMeta.endpoint;
  }

  create(): JsonApiDataInterface<Cat> {
    this.attributes = {
      name: "name",
      age: "age",
      gender: "gender",
      about: "about",
      sterilized: "sterilized",
      views: "views",
      googleFolderId: "googleFolderId",
      registeredAt: (data: Cat) => data.registeredAt.toISOString(),
    };

    this.relationships = {
      photos: this.relationship({
        data: (cat: Cat) => cat.photos,
        serialiser: this.serialiserFactory.create(PhotoModel),
      }),
    };

    return super.create();
  }
}
