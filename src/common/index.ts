/**
 * Common exports
 *
 * Entity base type, data model interfaces, the exception filter and request helpers.
 */

export * from "./abstracts/entity";
export * from "./interfaces/datamodel.interface";
export * from "./filters/http-exception.filter";
export * from "./helpers/form.validator";
export * from "./helpers/multipart.reader";
export * from "./helpers/node.properties";
