import { Injectable } from "@nestjs/common";
import { isNode, Record as Neo4jRecord } from "neo4j-driver";
import { Entity } from "../../../common/abstracts/entity";
import { DataModelInterface, NodeProperties } from "../../../common/interfaces/datamodel.interface";

type CreateParams<T extends Entity> = {
  model: DataModelInterface<T>;
  record: Neo4jRecord;
  name: string;
};

@Injectable()
export class EntityFactory {
  /**
   * Maps the root column of every record, keeping the first entity seen for each id.
   */
  createGraphList<T extends Entity>(params: { model: DataModelInterface<T>; records: Neo4jRecord[] }): T[] {
    const entities = new Map<string, T>();

    for (const record of params.records) {
      const entity = this.createEntity({ model: params.model, record, name: params.model.nodeName });
      if (entity && !entities.has(entity.id)) entities.set(entity.id, entity);
    }

    return Array.from(entities.values());
  }

  createEntity<T extends Entity>(params: CreateParams<T>): T | undefined {
    if (!params.record.has(params.name)) return undefined;

    return this.mapNode({ ...params, value: params.record.get(params.name) });
  }

  /**
   * Maps a column holding a node or a collected list of nodes.
   * Returns undefined when the query did not return the column at all.
   */
  createChildren<T extends Entity>(params: CreateParams<T>): T[] | undefined {
    if (!params.record.has(params.name)) return undefined;

    const value: unknown = params.record.get(params.name);
    const values: unknown[] = Array.isArray(value) ? value : [value];

    const children = new Map<string, T>();
    for (const item of values) {
      const child = this.mapNode({ ...params, value: item });
      if (child && !children.has(child.id)) children.set(child.id, child);
    }

    return Array.from(children.values());
  }

  private mapNode<T extends Entity>(params: CreateParams<T> & { value: unknown }): T | undefined {
    if (!isNode(params.value)) return undefined;

    const data: NodeProperties = {
      ...params.value.properties,
      labels: params.value.labels,
    };
    if (typeof data.id !== "string") return undefined;

    return params.model.mapper({
      data,
      record: params.record,
      entityFactory: this,
      name: params.name,
    });
  }
}
