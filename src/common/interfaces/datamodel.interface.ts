import { Type } from "@nestjs/common";
import { Record as Neo4jRecord } from "neo4j-driver";
import { AbstractJsonApiSerialiser } from "../../core/jsonapi/abstracts/abstract.jsonapi.serialiser";
import { EntityFactory } from "../../core/neo4j/factories/entity.factory";
import { Entity } from "../abstracts/entity";

export type NodeProperties = Record<string, unknown>;

export type DataMeta = {
  type: string;
  endpoint: string;
  nodeName: string;
  labelName: string;
};

export type EntityMapperParams = {
  data: NodeProperties;
  record: Neo4jRecord;
  entityFactory: EntityFactory;
  /** Column the node was read from; children live in `<name>_<childNodeName>` */
  name: string;
};

export type DataModelInterface<T extends Entity> = DataMeta & {
  mapper: (params: EntityMapperParams) => T;
  serialiser?: Type<AbstractJsonApiSerialiser<T>>;
};
