/**
 * Animal Shelter API
 *
 * Shelter cat records on Neo4j, served as JSON:API, with photographs stored in Google Drive.
 */

// Common exports
export * from "./common";

// Config exports
export * from "./config";

// Core module exports
export * from "./core";

// Foundation module exports
export * from "./foundations";

// Bootstrap utilities
export * from "./bootstrap";
