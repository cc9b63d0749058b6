import { describe, it, expect, vi } from "vitest";
import { AzureTwinStore } from "../azureTwinStore";
import type { DigitalTwinsApi } from "../azureTwinStore";

class RestLikeError extends Error {
  constructor(
    message: string,
    public statusCode: number,
  ) {
    super(message);
  }
}

function createClient(overrides: Partial<DigitalTwinsApi> = {}) {
  return {
    updateDigitalTwin: vi.fn(async () => ({})),
    upsertDigitalTwin: vi.fn(async () => ({})),
    ...overrides,
  };
}

const PATCH = [{ op: "add" as const, path: "/lastKnownValue/value", value: 3 }];

describe("AzureTwinStore", () => {
  it("sends the patch to updateDigitalTwin", async () => {
    const client = createClient();
    const store = new AzureTwinStore(client);

    expect(await store.updateTwin("hall_illuminance", PATCH)).toEqual({ kind: "applied" });
    expect(client.updateDigitalTwin).toHaveBeenCalledWith("hall_illuminance", PATCH);
  });

  it.each([
    [404, { kind: "notFound" }],
    [400, { kind: "fieldNotInitialized" }],
    [503, { kind: "failed", detail: "Service Unavailable" }],
  ])("maps status %i", async (status, expected) => {
    const client = createClient({
      updateDigitalTwin: async () => {
        throw new RestLikeError(status === 503 ? "Service Unavailable" : "rejected", status);
      },
    });

    expect(await new AzureTwinStore(client).updateTwin("hall_illuminance", PATCH)).toEqual(expected);
  });

  it("treats errors without a status as failures", async () => {
    const client = createClient({
      updateDigitalTwin: async () => {
        throw new Error("getaddrinfo ENOTFOUND");
      },
    });

    expect(await new AzureTwinStore(client).updateTwin("x", PATCH)).toEqual({
      kind: "failed",
      detail: "getaddrinfo ENOTFOUND",
    });
  });

  it("upserts the serialized twin", async () => {
    const client = createClient();
    const twin = {
      $metadata: { $model: "dtmi:homeassistant:MotionSensor;1" },
      lastKnownValue: { value: true, timestamp: "2024-01-01T00:00:00.000Z" },
    };

    expect(await new AzureTwinStore(client).createTwin("hall_motion", twin)).toEqual({ kind: "applied" });
    expect(client.upsertDigitalTwin).toHaveBeenCalledWith("hall_motion", JSON.stringify(twin));
  });

  it("reports a rejected upsert with its status", async () => {
    const client = createClient({
      upsertDigitalTwin: async () => {
        throw new RestLikeError("Model not found", 400);
      },
    });
    const twin = {
      $metadata: { $model: "dtmi:homeassistant:MotionSensor;1" },
      lastKnownValue: { value: false, timestamp: "2024-01-01T00:00:00.000Z" },
    };

    expect(await new AzureTwinStore(client).createTwin("hall_motion", twin)).toEqual({
      kind: "failed",
      detail: "400: Model not found",
    });
  });
});
