export * from "./neo4j.module";
export * from "./services/neo4j.service";
export * from "./factories/entity.factory";
