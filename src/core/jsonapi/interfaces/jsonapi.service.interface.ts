import { JsonApiDataInterface } from "./jsonapi.data.interface";

export type JsonApiServiceInterface<T> = {
  get type(): string;
  get endpoint(): string;

  create(): JsonApiDataInterface<T>;
};
