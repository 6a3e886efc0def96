import { JsonApiResource } from "./jsonapi.data.interface";

export type JsonApiLinks = {
  self: string;
  next?: string;
  prev?: string;
};

export type JsonApiSingleDocument = {
  links: JsonApiLinks;
  data: JsonApiResource;
  included?: JsonApiResource[];
};

export type JsonApiListDocument = {
  links: JsonApiLinks;
  data: JsonApiResource[];
  included?: JsonApiResource[];
};
