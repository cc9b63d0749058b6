import type { TwinDocument, TwinPatchOperation } from "../types/twin";

export type TwinStoreResult =
  | { kind: "applied" }
  | { kind: "notFound" }
  | { kind: "fieldNotInitialized" }
  | { kind: "failed"; detail: string };

export interface TwinStore {
  /** Apply a partial update to an existing twin. */
  updateTwin(twinId: string, patch: TwinPatchOperation[]): Promise<TwinStoreResult>;
  /** Create the twin, replacing it if it already exists. */
  createTwin(twinId: string, twin: TwinDocument): Promise<TwinStoreResult>;
  close?(): Promise<void>;
}

export const APPLIED: TwinStoreResult = { kind: "applied" };
