export type transformFunction<T, R = unknown> = (data: T) => R;

/**
 * Either the name of a property of the entity or a function computing the value from it.
 */
export type JsonApiValueResolver<T> = (keyof T & string) | transformFunction<T>;

export type JsonApiResourceIdentifier = {
  type: string;
  id: string;
};

export type JsonApiRelationshipObject = {
  data: JsonApiResourceIdentifier | JsonApiResourceIdentifier[] | null;
  links?: {
    related?: string;
  };
};

export type JsonApiResource = JsonApiResourceIdentifier & {
  attributes: Record<string, unknown>;
  meta?: Record<string, unknown>;
  links?: {
    self: string;
  };
  relationships?: Record<string, JsonApiRelationshipObject>;
};

export interface JsonApiRelationshipInterface<T> {
  /** Name of the relationship in the document, defaults to the key it is registered under */
  name?: string;
  /**
   * Builds the linkage for one entity together with the related resources to include.
   * Returns undefined when the entity was loaded without the relationship.
   */
  resolve(data: T): { relationship: JsonApiRelationshipObject; included: JsonApiResource[] } | undefined;
}

export interface JsonApiDataInterface<T> {
  type: string;
  id: transformFunction<T, string>;
  attributes: Record<string, JsonApiValueResolver<T>>;
  meta?: Record<string, JsonApiValueResolver<T>>;
  links?: {
    self: transformFunction<T, string>;
  };
  relationships?: Record<string, JsonApiRelationshipInterface<T>>;
}
