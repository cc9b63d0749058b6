import { DigitalTwinsClient } from "@azure/digital-twins-core";
import { DefaultAzureCredential } from "@azure/identity";
import type { TwinDocument, TwinPatchOperation } from "../types/twin";
import { APPLIED } from "./types";
import type { TwinStore, TwinStoreResult } from "./types";

/** The two Digital Twins calls the store makes. */
export interface DigitalTwinsApi {
  updateDigitalTwin(digitalTwinId: string, jsonPatch: TwinPatchOperation[]): Promise<unknown>;
  upsertDigitalTwin(digitalTwinId: string, digitalTwinJson: string): Promise<unknown>;
}

function statusCodeOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return undefined;
}

function toResult(err: unknown): TwinStoreResult {
  switch (statusCodeOf(err)) {
    case 404:
      return { kind: "notFound" };
    // the service answers 400 when a patch path has no parent (e.g. /lastKnownValue missing)
    case 400:
      return { kind: "fieldNotInitialized" };
    default:
      return { kind: "failed", detail: err instanceof Error ? err.message : String(err) };
  }
}

export class AzureTwinStore implements TwinStore {
  constructor(private readonly client: DigitalTwinsApi) {}

  async updateTwin(twinId: string, patch: TwinPatchOperation[]): Promise<TwinStoreResult> {
    try {
      await this.client.updateDigitalTwin(twinId, patch);
      return APPLIED;
    } catch (err) {
      return toResult(err);
    }
  }

  async createTwin(twinId: string, twin: TwinDocument): Promise<TwinStoreResult> {
    try {
      await this.client.upsertDigitalTwin(twinId, JSON.stringify(twin));
      return APPLIED;
    } catch (err) {
      const status = statusCodeOf(err);
      return { kind: "failed", detail: `${status ?? "error"}: ${err instanceof Error ? err.message : String(err)}` };
    }
  }
}

export function createAzureTwinStore(instanceUrl: string): AzureTwinStore {
  const client = new DigitalTwinsClient(instanceUrl, new DefaultAzureCredential());
  return new AzureTwinStore(client);
}
