import { isDateTime } from "neo4j-driver";
import { NodeProperties } from "../interfaces/datamodel.interface";

export type Entity = {
  id: string;
  type: string;
  createdAt: Date;
  updatedAt: Date;

  labels?: string[];
};

/**
 * Converts a Neo4j temporal value, an ISO string or an epoch value into a Date.
 */
export const toDate = (value: unknown): Date => {
  if (isDateTime(value)) return value.toStandardDate();
  if (value instanceof Date) return value;
  if (typeof value === "string" || typeof value === "number") return new Date(value);
  return new Date();
};

export const mapEntity = (params: { record: NodeProperties }): Entity => {
  const labels = Array.isArray(params.record.labels)
    ? params.record.labels.filter((label): label is string => typeof label === "string")
    : undefined;

  return {
    id: typeof params.record.id === "string" ? params.record.id : "",
    type: labels && labels.length > 0 ? labels[0].toLowerCase() : "",
    createdAt: toDate(params.record.createdAt),
    updatedAt: toDate(params.record.updatedAt),

    labels,
  };
};
