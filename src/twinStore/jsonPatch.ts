import { PatchTargetMissingError } from "../errors";
import type { TwinPatchOperation } from "../types/twin";

export type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// RFC 6901: "~1" is "/", "~0" is "~"
export function parsePointer(path: string): string[] {
  if (!path.startsWith("/")) {
    throw new PatchTargetMissingError(path);
  }
  return path
    .slice(1)
    .split("/")
    .map((token) => token.replace(/~1/g, "/").replace(/~0/g, "~"));
}

function applyOperation(document: JsonObject, operation: TwinPatchOperation): JsonObject {
  const tokens = parsePointer(operation.path);
  const root: JsonObject = { ...document };

  // copy each object on the way down so the input document stays untouched
  let parent = root;
  for (const token of tokens.slice(0, -1)) {
    const child = parent[token];
    if (!isObject(child)) {
      throw new PatchTargetMissingError(operation.path);
    }
    const copy = { ...child };
    parent[token] = copy;
    parent = copy;
  }

  const key = tokens[tokens.length - 1];
  switch (operation.op) {
    case "add":
      parent[key] = operation.value;
      break;
    case "replace":
      if (!(key in parent)) throw new PatchTargetMissingError(operation.path);
      parent[key] = operation.value;
      break;
    case "remove":
      if (!(key in parent)) throw new PatchTargetMissingError(operation.path);
      delete parent[key];
      break;
  }
  return root;
}

/** Apply object-member operations in order; the result is a new document. */
export function applyJsonPatch(document: JsonObject, operations: readonly TwinPatchOperation[]): JsonObject {
  return operations.reduce(applyOperation, document);
}
