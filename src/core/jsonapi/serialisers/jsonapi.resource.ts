import { JsonApiDataInterface, JsonApiResource, JsonApiValueResolver } from "../interfaces/jsonapi.data.interface";

export const resolveValue = <T>(data: T, resolver: JsonApiValueResolver<T>): unknown =>
  typeof resolver === "string" ? data[resolver] : resolver(data);

/**
 * Adds the resources not yet present, identified by type and id.
 */
export const addToIncluded = (included: JsonApiResource[], elements: JsonApiResource[]): void => {
  const identifiers = new Set(included.map((element) => `${element.type}-${element.id}`));

  for (const element of elements) {
    const identifier = `${element.type}-${element.id}`;
    if (identifiers.has(identifier)) continue;

    included.push(element);
    identifiers.add(identifier);
  }
};

export const serialiseResource = <T>(
  data: T,
  builder: JsonApiDataInterface<T>,
): { resource: JsonApiResource; included: JsonApiResource[] } => {
  const included: JsonApiResource[] = [];

  const resource: JsonApiResource = {
    type: builder.type,
    id: builder.id(data),
    attributes: {},
  };

  if (builder.links) {
    resource.links = { self: builder.links.self(data) };
  }

  for (const [attribute, resolver] of Object.entries(builder.attributes)) {
    resource.attributes[attribute] = resolveValue(data, resolver);
  }

  if (builder.meta) {
    const meta: Record<string, unknown> = {};
    for (const [key, resolver] of Object.entries(builder.meta)) {
      meta[key] = resolveValue(data, resolver);
    }
    resource.meta = meta;
  }

  if (builder.relationships) {
    const relationships: JsonApiResource["relationships"] = {};

    for (const [key, relationship] of Object.entries(builder.relationships)) {
      const resolved = relationship.resolve(data);
      if (!resolved) continue;

      relationships[relationship.name ?? key] = resolved.relationship;
      addToIncluded(included, resolved.included);
    }

    if (Object.keys(relationships).length > 0) resource.relationships = relationships;
  }

  return { resource, included };
};
