import { HttpException, HttpStatus, Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { ClsService } from "nestjs-cls";
import { Entity } from "../../../common/abstracts/entity";
import { DataModelInterface } from "../../../common/interfaces/datamodel.interface";
import { BaseConfigInterface } from "../../../config/interfaces/base.config.interface";
import { JsonApiSerialiserFactory } from "../factories/jsonapi.serialiser.factory";
import { JsonApiResource } from "../interfaces/jsonapi.data.interface";
import { JsonApiLinks, JsonApiListDocument, JsonApiSingleDocument } from "../interfaces/jsonapi.document.interface";
import { JsonApiPaginator } from "../serialisers/jsonapi.paginator";
import { addToIncluded, serialiseResource } from "../serialisers/jsonapi.resource";

export const REQUEST_URL_KEY = "requestUrl";

@Injectable()
export class JsonApiService {
  constructor(
    private readonly serialiserFactory: JsonApiSerialiserFactory,
    private readonly clsService: ClsService,
    private readonly configService: ConfigService<BaseConfigInterface, true>,
  ) {}

  private get apiUrl(): string {
    return this.configService.get("api", { infer: true }).url;
  }

  async buildSingle<T extends Entity>(
    model: DataModelInterface<T>,
    record: T | null | undefined,
  ): Promise<JsonApiSingleDocument> {
    const builder = this.serialiserFactory.create(model);
    if (!record) throw new HttpException(`not found`, HttpStatus.NOT_FOUND);

    const { resource, included } = serialiseResource(record, builder.create());

    const response: JsonApiSingleDocument = {
      links: {
        self: `${this.apiUrl}${builder.endpoint}/${record.id}`,
      },
      data: resource,
    };

    if (included.length > 0) response.included = included;

    return response;
  }

  async buildList<T extends Entity>(
    model: DataModelInterface<T>,
    records: T[],
    paginator?: JsonApiPaginator,
  ): Promise<JsonApiListDocument> {
    const builder = this.serialiserFactory.create(model);

    // The request URL keeps the route and query the client used
    const requestUrl: unknown = this.clsService.isActive() ? this.clsService.get(REQUEST_URL_KEY) : undefined;
    const url = typeof requestUrl === "string" ? requestUrl : `${this.apiUrl}${builder.endpoint}`;

    const links: JsonApiLinks = { self: url };

    if (paginator) {
      const generated = paginator.generateLinks(records, url);
      links.self = generated.self;
      if (generated.next) links.next = generated.next;
      if (generated.previous) links.prev = generated.previous;
    }

    const definition = builder.create();
    const included: JsonApiResource[] = [];
    const data = records.map((record) => {
      const serialised = serialiseResource(record, definition);
      addToIncluded(included, serialised.included);
      return serialised.resource;
    });

    const response: JsonApiListDocument = { links, data };
    if (included.length > 0) response.included = included;

    return response;
  }
}
