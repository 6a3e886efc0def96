import { Global, Module } from "@nestjs/common";
import { EntityFactory } from "./factories/entity.factory";
import { Neo4jService } from "./services/neo4j.service";

@Global()
@Module({
  providers: [Neo4jService, EntityFactory],
  exports: [Neo4jService, EntityFactory],
})
export class Neo4JModule {}
