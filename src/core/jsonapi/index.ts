/**
 * JSON:API Module
 *
 * Serialisers, the document builder and the page-based paginator.
 */

export * from "./jsonapi.module";
export * from "./services/jsonapi.service";
export * from "./factories/jsonapi.serialiser.factory";
export * from "./abstracts/abstract.jsonapi.serialiser";
export * from "./serialisers/jsonapi.paginator";
export * from "./serialisers/jsonapi.resource";
export * from "./interfaces/jsonapi.data.interface";
export * from "./interfaces/jsonapi.document.interface";
export * from "./interfaces/jsonapi.cursor.interface";
export * from "./interfaces/jsonapi.pagination.interface";
export * from "./interfaces/jsonapi.service.interface";
