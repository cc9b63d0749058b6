import { DEFAULT_DEVICE_CLASSES, lookupDeviceClass } from "./config/deviceClasses";
import type { DeviceClassTable } from "./config/deviceClasses";
import { MalformedEventError, MissingModelError, TwinStoreError } from "./errors";
import type { TwinStore, TwinStoreResult } from "./twinStore/types";
import type { StateEvent } from "./types/messages";
import type { LastKnownValue, Reading, TwinDocument, TwinPatchOperation, TwinValue } from "./types/twin";

export type Logger = Pick<Console, "log" | "warn" | "error">;

export type EventOutcome =
  | { index: number; status: "updated" | "created" | "initialized"; twinId: string }
  | { index: number; status: "skipped"; reason: string; twinId?: string }
  | { index: number; status: "failed"; error: Error; twinId?: string };

export interface BatchReport {
  outcomes: EventOutcome[];
  failures: Error[];
}

export interface ProcessorOptions {
  store: TwinStore;
  deviceClasses?: DeviceClassTable;
  logger?: Logger;
  debug?: boolean;
}

const REQUIRED_FIELDS = ["entity_id", "state", "attributes", "last_changed"] as const;
const NUMERIC_STATE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function parseJson(payload: string): unknown {
  try {
    return JSON.parse(payload);
  } catch (err) {
    throw new MalformedEventError(`Payload is not valid JSON: ${errorMessage(err)}`);
  }
}

/**
 * Parse a raw state payload. Returns null when one of the required fields is
 * absent (nothing to do); throws MalformedEventError when the payload itself is broken.
 */
export function parseStateEvent(payload: string): StateEvent | null {
  const parsed = parseJson(payload);
  if (!isRecord(parsed)) {
    throw new MalformedEventError("Payload is not a JSON object");
  }
  if (REQUIRED_FIELDS.some((field) => !(field in parsed))) {
    return null;
  }

  const { entity_id, state, attributes, last_changed } = parsed;
  if (typeof entity_id !== "string") throw new MalformedEventError("entity_id must be a string");
  if (typeof state !== "string") throw new MalformedEventError(`state of ${entity_id} must be a string`);
  if (!isRecord(attributes)) throw new MalformedEventError(`attributes of ${entity_id} must be an object`);
  if (typeof last_changed !== "string") throw new MalformedEventError(`last_changed of ${entity_id} must be a string`);

  return { entity_id, state, attributes, last_changed };
}

// "sensor.hue_motion_4_illuminance": the domain is fixed by Home Assistant, the
// entity name is user-settable and becomes the twin id. The domain is not checked.
export function splitEntityId(entityId: string): { domain: string; entityName: string } {
  const dot = entityId.indexOf(".");
  const domain = dot < 0 ? "" : entityId.slice(0, dot);
  const entityName = dot < 0 ? "" : entityId.slice(dot + 1);
  if (dot < 0 || !entityName) {
    throw new MalformedEventError(`entity_id "${entityId}" has no entity name after a "."`);
  }
  return { domain, entityName };
}

export function parseTimestamp(text: string): Date {
  const ms = Date.parse(text);
  if (Number.isNaN(ms)) {
    throw new MalformedEventError(`last_changed "${text}" is not a valid timestamp`);
  }
  return new Date(ms);
}

export function parseNumericState(state: string): number | null {
  const text = state.trim();
  if (!NUMERIC_STATE.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function classifyReading(deviceClass: string, state: string, table: DeviceClassTable = DEFAULT_DEVICE_CLASSES): Reading {
  const rule = lookupDeviceClass(table, deviceClass);
  if (!rule) {
    return { kind: "unmapped", reason: `unsupported device class "${deviceClass}"` };
  }
  if (rule.kind === "boolean") {
    return { kind: "boolean", value: state.toLowerCase() === "on" };
  }
  const value = parseNumericState(state);
  if (value === null) {
    return { kind: "unmapped", reason: `state "${state}" is not numeric` };
  }
  return { kind: "numeric", value };
}

function lastKnownValue(value: TwinValue, timestamp: Date): LastKnownValue {
  return { value, timestamp: timestamp.toISOString() };
}

export function buildTwinPatch(value: TwinValue, timestamp: Date): TwinPatchOperation[] {
  const record = lastKnownValue(value, timestamp);
  return [
    { op: "add", path: "/lastKnownValue/value", value: record.value },
    { op: "add", path: "/lastKnownValue/timestamp", value: record.timestamp },
  ];
}

/** Adds the whole lastKnownValue object, for twins created without one. */
export function buildInitializePatch(value: TwinValue, timestamp: Date): TwinPatchOperation[] {
  return [{ op: "add", path: "/lastKnownValue", value: lastKnownValue(value, timestamp) }];
}

export function buildInitialTwin(modelId: string, value: TwinValue, timestamp: Date): TwinDocument {
  return {
    $metadata: { $model: modelId },
    lastKnownValue: lastKnownValue(value, timestamp),
  };
}

function describeResult(result: TwinStoreResult): string {
  switch (result.kind) {
    case "applied":
      return "applied";
    case "notFound":
      return "twin not found";
    case "fieldNotInitialized":
      return "lastKnownValue is not initialized";
    case "failed":
      return result.detail;
  }
}

function expectApplied(twinId: string, result: TwinStoreResult): void {
  if (result.kind !== "applied") {
    throw new TwinStoreError(twinId, describeResult(result));
  }
}

/** Failure signal for a processed batch: nothing, the single error, or all of them. */
export function batchError(report: BatchReport): Error | null {
  const { failures, outcomes } = report;
  if (failures.length === 0) return null;
  if (failures.length === 1) return failures[0];
  return new AggregateError(failures, `${failures.length} of ${outcomes.length} events failed`);
}

export function summarizeBatch(report: BatchReport): Record<EventOutcome["status"], number> {
  const counts = { updated: 0, created: 0, initialized: 0, skipped: 0, failed: 0 };
  for (const outcome of report.outcomes) counts[outcome.status] += 1;
  return counts;
}

export class EventBatchProcessor {
  private readonly store: TwinStore;
  private readonly deviceClasses: DeviceClassTable;
  private readonly log: Logger;
  private readonly debug: boolean;

  constructor(options: ProcessorOptions) {
    this.store = options.store;
    this.deviceClasses = options.deviceClasses ?? DEFAULT_DEVICE_CLASSES;
    this.log = options.logger ?? console;
    this.debug = options.debug ?? false;
  }

  async processBatch(payloads: readonly string[]): Promise<BatchReport> {
    const outcomes: EventOutcome[] = [];
    const failures: Error[] = [];

    // one at a time, in input order
    for (const [index, payload] of payloads.entries()) {
      const outcome = await this.processEvent(payload, index);
      outcomes.push(outcome);
      if (outcome.status === "failed") failures.push(outcome.error);
    }

    return { outcomes, failures };
  }

  async processEvent(payload: string, index: number): Promise<EventOutcome> {
    let twinId: string | undefined;
    try {
      if (this.debug) {
        this.log.log(`📥 Processing message #${index}: ${payload}`);
      }

      const event = parseStateEvent(payload);
      if (!event) {
        return { index, status: "skipped", reason: "missing required fields" };
      }

      twinId = splitEntityId(event.entity_id).entityName;
      // TODO: last_updated also changes on attribute-only updates; decide whether it should drive the timestamp.
      const lastChanged = parseTimestamp(event.last_changed);

      // Only entities with a device class are ingested; it governs how the state is read.
      const deviceClass = event.attributes.device_class;
      if (deviceClass === undefined || deviceClass === null) {
        return { index, status: "skipped", reason: "no device class", twinId };
      }
      if (typeof deviceClass !== "string") {
        throw new MalformedEventError(`device_class of ${event.entity_id} must be a string`);
      }

      const reading = classifyReading(deviceClass, event.state, this.deviceClasses);
      if (reading.kind === "unmapped") {
        return { index, status: "skipped", reason: reading.reason, twinId };
      }

      return await this.applyReading(index, twinId, deviceClass, reading.value, lastChanged);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.log.error(`❌ Message #${index} failed:`, error.message);
      return twinId === undefined ? { index, status: "failed", error } : { index, status: "failed", error, twinId };
    }
  }

  private async applyReading(
    index: number,
    twinId: string,
    deviceClass: string,
    value: TwinValue,
    timestamp: Date,
  ): Promise<EventOutcome> {
    const patch = buildTwinPatch(value, timestamp);
    if (this.debug) {
      this.log.log(`➡️ Updating twin '${twinId}' with ${JSON.stringify(patch)}`);
    }

    const result = await this.store.updateTwin(twinId, patch);
    switch (result.kind) {
      case "applied":
        return { index, status: "updated", twinId };

      case "notFound": {
        const modelId = lookupDeviceClass(this.deviceClasses, deviceClass)?.modelId;
        if (!modelId) throw new MissingModelError(deviceClass);
        this.log.log(`🆕 Twin '${twinId}' not found, creating it with model ${modelId}`);
        expectApplied(twinId, await this.store.createTwin(twinId, buildInitialTwin(modelId, value, timestamp)));
        return { index, status: "created", twinId };
      }

      case "fieldNotInitialized":
        this.log.warn(`⚠️ Twin '${twinId}' has no lastKnownValue, initializing it`);
        expectApplied(twinId, await this.store.updateTwin(twinId, buildInitializePatch(value, timestamp)));
        return { index, status: "initialized", twinId };

      case "failed":
        throw new TwinStoreError(twinId, result.detail);
    }
  }
}
