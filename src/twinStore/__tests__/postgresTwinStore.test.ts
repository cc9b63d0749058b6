import { describe, it, expect, beforeEach } from "vitest";
import type { QueryResult, QueryResultRow } from "pg";
import { PostgresTwinStore } from "../postgresTwinStore";
import type { TwinDatabase, TwinDatabaseClient } from "../postgresTwinStore";
import type { TwinPatchOperation } from "../../types/twin";

// ---------- helpers ----------

type Handler = (text: string, values?: unknown[]) => QueryResultRow[];

function queryResult(rows: QueryResultRow[]): QueryResult<QueryResultRow> {
  return { command: "", rowCount: rows.length, oid: 0, fields: [], rows };
}

/** Records SQL and answers it from `handler`, standing in for a pg Pool. */
class FakeDatabase implements TwinDatabase {
  queries: Array<{ text: string; values?: unknown[] }> = [];
  released = 0;
  releasedWith: Array<Error | boolean | undefined> = [];
  ended = false;

  constructor(public handler: Handler = () => []) {}

  async query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>> {
    this.queries.push({ text, values });
    return queryResult(this.handler(text, values));
  }

  async connect(): Promise<TwinDatabaseClient> {
    return {
      query: (text, values) => this.query(text, values),
      release: (err) => {
        this.released += 1;
        this.releasedWith.push(err);
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  statements(): string[] {
    return this.queries.map((q) => q.text.trim().split(/\s+/)[0]);
  }
}

const PATCH: TwinPatchOperation[] = [
  { op: "add", path: "/lastKnownValue/value", value: 21.5 },
  { op: "add", path: "/lastKnownValue/timestamp", value: "2024-01-01T00:00:00.000Z" },
];

describe("PostgresTwinStore", () => {
  let db: FakeDatabase;
  let store: PostgresTwinStore;

  beforeEach(() => {
    db = new FakeDatabase();
    store = new PostgresTwinStore(db);
  });

  it("creates the table on init", async () => {
    await store.init();
    expect(db.queries[0].text).toContain("CREATE TABLE IF NOT EXISTS digital_twins");
  });

  describe("updateTwin", () => {
    it("patches the stored contents inside a transaction", async () => {
      db.handler = (text) =>
        text.startsWith("SELECT") ? [{ contents: { lastKnownValue: { value: 18, timestamp: "2023-12-31T00:00:00.000Z" } } }] : [];

      const result = await store.updateTwin("kitchen_temp", PATCH);

      expect(result).toEqual({ kind: "applied" });
      expect(db.statements()).toEqual(["BEGIN", "SELECT", "UPDATE", "COMMIT"]);
      expect(db.releasedWith).toEqual([undefined]);
      expect(db.queries[1].values).toEqual(["kitchen_temp"]);
      expect(db.queries[2].values).toEqual([
        "kitchen_temp",
        JSON.stringify({ lastKnownValue: { value: 21.5, timestamp: "2024-01-01T00:00:00.000Z" } }),
      ]);
      expect(db.released).toBe(1);
    });

    it("reports notFound when there is no row", async () => {
      const result = await store.updateTwin("kitchen_temp", PATCH);

      expect(result).toEqual({ kind: "notFound" });
      expect(db.statements()).toEqual(["BEGIN", "SELECT", "ROLLBACK"]);
      expect(db.released).toBe(1);
    });

    it("reports fieldNotInitialized when lastKnownValue is missing", async () => {
      db.handler = (text) => (text.startsWith("SELECT") ? [{ contents: { friendlyName: "Kitchen" } }] : []);

      const result = await store.updateTwin("kitchen_temp", PATCH);

      expect(result).toEqual({ kind: "fieldNotInitialized" });
      expect(db.statements()).toEqual(["BEGIN", "SELECT", "ROLLBACK"]);
    });

    it("rolls back and reports database errors", async () => {
      db.handler = (text) => {
        if (text.startsWith("UPDATE")) throw new Error("deadlock detected");
        return text.startsWith("SELECT") ? [{ contents: { lastKnownValue: {} } }] : [];
      };

      const result = await store.updateTwin("kitchen_temp", PATCH);

      expect(result).toEqual({ kind: "failed", detail: "deadlock detected" });
      expect(db.statements()).toEqual(["BEGIN", "SELECT", "UPDATE", "ROLLBACK"]);
      expect(db.releasedWith).toEqual([new Error("deadlock detected")]);
    });
  });

  describe("createTwin", () => {
    const twin = {
      $metadata: { $model: "dtmi:homeassistant:TemperatureSensor;1" },
      lastKnownValue: { value: 21.5, timestamp: "2024-01-01T00:00:00.000Z" },
    };

    it("upserts the model and contents", async () => {
      const result = await store.createTwin("kitchen_temp", twin);

      expect(result).toEqual({ kind: "applied" });
      expect(db.queries[0].text).toContain("ON CONFLICT (twin_id) DO UPDATE");
      expect(db.queries[0].values).toEqual([
        "kitchen_temp",
        "dtmi:homeassistant:TemperatureSensor;1",
        JSON.stringify({ lastKnownValue: { value: 21.5, timestamp: "2024-01-01T00:00:00.000Z" } }),
      ]);
    });

    it("reports insert errors", async () => {
      db.handler = () => {
        throw new Error("connection terminated");
      };

      expect(await store.createTwin("kitchen_temp", twin)).toEqual({ kind: "failed", detail: "connection terminated" });
    });
  });

  it("ends the pool on close", async () => {
    await store.close();
    expect(db.ended).toBe(true);
  });
});
