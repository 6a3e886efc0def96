import { Injectable } from "@nestjs/common";
import { ModuleRef } from "@nestjs/core";
import { Entity } from "../../../common/abstracts/entity";
import { DataModelInterface } from "../../../common/interfaces/datamodel.interface";
import { AbstractJsonApiSerialiser } from "../abstracts/abstract.jsonapi.serialiser";

@Injectable()
export class JsonApiSerialiserFactory {
  constructor(private readonly moduleRef: ModuleRef) {}

  create<T extends Entity>(model: DataModelInterface<T>): AbstractJsonApiSerialiser<T> {
    if (!model.serialiser) {
      throw new Error(`Serialiser not found on model ${model.nodeName}`);
    }

    const serialiserService = this.moduleRef.get(model.serialiser, { strict: false });

    if (!serialiserService) {
      throw new Error(`Serialiser service for ${model.serialiser.name} not found in the container`);
    }

    return serialiserService;
  }
}
