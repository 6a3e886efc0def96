import { isInt } from "neo4j-driver";
import { NodeProperties } from "../interfaces/datamodel.interface";

export function readString(properties: NodeProperties, key: string, fallback: string = ""): string {
  const value = properties[key];
  return typeof value === "string" ? value : fallback;
}

export function readNullableString(properties: NodeProperties, key: string): string | null {
  const value = properties[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}

export function readNumber(properties: NodeProperties, key: string, fallback: number = 0): number {
  const value = properties[key];
  if (typeof value === "number") return value;
  if (isInt(value)) return value.toNumber();
  return fallback;
}

export function readBoolean(properties: NodeProperties, key: string, fallback: boolean = false): boolean {
  const value = properties[key];
  return typeof value === "boolean" ? value : fallback;
}
