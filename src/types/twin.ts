export type TwinValue = number | boolean;

export interface LastKnownValue {
  value: TwinValue;
  timestamp: string; // ISO-8601
}

export type TwinPatchOperation =
  | { op: "add" | "replace"; path: string; value: unknown }
  | { op: "remove"; path: string };

/** Create-or-replace body for a twin. */
export interface TwinDocument {
  $metadata: { $model: string };
  lastKnownValue: LastKnownValue;
}

export type Reading =
  | { kind: "numeric"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "unmapped"; reason: string };
