import type { AttrValue, GraphNode } from "../graph/types";

export function isIntList(value: AttrValue | undefined): value is number[] {
  if (!Array.isArray(value)) {
    return false;
  }
  for (const item of value) {
    if (typeof item !== "number" || !Number.isInteger(item)) {
      return false;
    }
  }
  return true;
}

export function isIntMatrix(value: AttrValue | undefined): value is number[][] {
  if (!Array.isArray(value)) {
    return false;
  }
  for (const row of value) {
    if (!Array.isArray(row)) {
      return false;
    }
    for (const item of row) {
      if (!Number.isInteger(item)) {
        return false;
      }
    }
  }
  return true;
}

export function readIntList(node: GraphNode, key: string): number[] | undefined {
  const value = node.attrs[key];
  return isIntList(value) ? value.slice() : undefined;
}

/** A scalar integer, or the single entry of a one-element list. */
export function readInt(node: GraphNode, key: string): number | undefined {
  const value = node.attrs[key];
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  if (isIntList(value) && value.length === 1) {
    return value[0];
  }
  return undefined;
}

export function readString(node: GraphNode, key: string): string | undefined {
  const value = node.attrs[key];
  return typeof value === "string" ? value : undefined;
}

/** Flattened integer payload of a list or nested-list attribute. */
export function readFlatInts(node: GraphNode, key: string): number[] | undefined {
  const value = node.attrs[key];
  if (isIntList(value)) {
    return value.slice();
  }
  if (isIntMatrix(value)) {
    return value.flat();
  }
  return undefined;
}
