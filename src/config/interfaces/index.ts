/**
 * Configuration interface exports
 */

export * from "./base.config.interface";
export * from "./config.api.interface";
export * from "./config.google.drive.interface";
export * from "./config.logging.interface";
export * from "./config.neo4j.interface";
export * from "./config.openapi.interface";
export * from "./config.uploads.interface";
