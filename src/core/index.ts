/**
 * Core module exports
 *
 * Infrastructure modules: neo4j, jsonapi, logging, google-drive and health.
 */

export * from "./core.module";

export * from "./neo4j";
export * from "./jsonapi";
export * from "./logging";
export * from "./google-drive";
export * from "./health/health.module";
