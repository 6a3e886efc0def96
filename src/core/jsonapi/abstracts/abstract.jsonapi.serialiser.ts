import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Entity } from "../../../common/abstracts/entity";
import { BaseConfigInterface } from "../../../config/interfaces/base.config.interface";
import { JsonApiSerialiserFactory } from "../factories/jsonapi.serialiser.factory";
import {
  JsonApiDataInterface,
  JsonApiRelationshipInterface,
  JsonApiResource,
  JsonApiResourceIdentifier,
  JsonApiValueResolver,
} from "../interfaces/jsonapi.data.interface";
import { JsonApiServiceInterface } from "../interfaces/jsonapi.service.interface";
import { addToIncluded, serialiseResource } from "../serialisers/jsonapi.resource";

@Injectable()
export abstract class AbstractJsonApiSerialiser<T extends Entity> implements JsonApiServiceInterface<T> {
  private _attributes: Record<string, JsonApiValueResolver<T>> = {};

  private _meta: Record<string, JsonApiValueResolver<T>> = {
    createdAt: (data: T) => data.createdAt.toISOString(),
    updatedAt: (data: T) => data.updatedAt.toISOString(),
  };

  private _links: { self: (data: T) => string };

  private _relationships: Record<string, JsonApiRelationshipInterface<T>> = {};

  constructor(
    protected readonly serialiserFactory: JsonApiSerialiserFactory,
    protected readonly configService: ConfigService<BaseConfigInterface, true>,
  ) {
    this._links = {
      self: (data: T) => `${this.apiUrl}${this.endpoint}/${data.id}`,
    };
  }

  abstract get type(): string;

  get endpoint(): string {
    return this.type;
  }

  protected get apiUrl(): string {
    return this.configService.get("api", { infer: true }).url;
  }

  set attributes(attributes: Record<string, JsonApiValueResolver<T>>) {
    this._attributes = attributes;
  }

  set meta(meta: Record<string, JsonApiValueResolver<T>>) {
    this._meta = {
      ...this._meta,
      ...meta,
    };
  }

  get relationships(): Record<string, JsonApiRelationshipInterface<T>> {
    return this._relationships;
  }

  set relationships(relationships: Record<string, JsonApiRelationshipInterface<T>>) {
    this._relationships = relationships;
  }

  /**
   * Declares a relationship whose resources are serialised with another serialiser and included.
   */
  protected relationship<R extends Entity>(params: {
    data: (entity: T) => R | R[] | undefined;
    serialiser: JsonApiServiceInterface<R>;
    name?: string;
    excluded?: boolean;
  }): JsonApiRelationshipInterface<T> {
    return {
      name: params.name,
      resolve: (entity: T) => {
        const related = params.data(entity);
        if (related === undefined) return undefined;

        const builder = params.serialiser.create();
        const included: JsonApiResource[] = [];

        const serialise = (item: R): JsonApiResourceIdentifier => {
          const serialised = serialiseResource(item, builder);
          if (!params.excluded) addToIncluded(included, [...serialised.included, serialised.resource]);
          return { type: serialised.resource.type, id: serialised.resource.id };
        };

        return {
          relationship: { data: Array.isArray(related) ? related.map(serialise) : serialise(related) },
          included,
        };
      },
    };
  }

  create(): JsonApiDataInterface<T> {
    return {
      type: this.type,
      id: (data: T) => data.id,
      attributes: this._attributes,
      meta: this._meta,
      relationships: this._relationships,
      links: this._links,
    };
  }
}
