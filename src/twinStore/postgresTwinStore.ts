import type { QueryResult, QueryResultRow } from "pg";
import { PatchTargetMissingError } from "../errors";
import type { TwinDocument, TwinPatchOperation } from "../types/twin";
import { applyJsonPatch } from "./jsonPatch";
import type { JsonObject } from "./jsonPatch";
import { APPLIED } from "./types";
import type { TwinStore, TwinStoreResult } from "./types";

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>;
}

export interface TwinDatabaseClient extends Queryable {
  release(err?: Error | boolean): void;
}

/** The part of a pg Pool the store uses. */
export interface TwinDatabase extends Queryable {
  connect(): Promise<TwinDatabaseClient>;
  end(): Promise<void>;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS digital_twins (
    twin_id    TEXT PRIMARY KEY,
    model_id   TEXT NOT NULL,
    contents   JSONB NOT NULL DEFAULT '{}'::jsonb,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
  )`;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function failed(err: unknown): TwinStoreResult {
  return { kind: "failed", detail: err instanceof Error ? err.message : String(err) };
}

/**
 * Twin registry kept in a single PostgreSQL table. Twin properties live in a
 * JSONB column; patches are applied read-modify-write under a row lock.
 */
export class PostgresTwinStore implements TwinStore {
  constructor(private readonly db: TwinDatabase) {}

  async init(): Promise<void> {
    await this.db.query(SCHEMA);
  }

  async updateTwin(twinId: string, patch: TwinPatchOperation[]): Promise<TwinStoreResult> {
    const client = await this.db.connect();
    let releaseError: Error | undefined;
    try {
      await client.query("BEGIN");
      const { rows } = await client.query("SELECT contents FROM digital_twins WHERE twin_id = $1 FOR UPDATE", [twinId]);
      if (rows.length === 0) {
        await client.query("ROLLBACK");
        return { kind: "notFound" };
      }

      const contents: unknown = rows[0].contents;
      let next: JsonObject;
      try {
        next = applyJsonPatch(isObject(contents) ? contents : {}, patch);
      } catch (err) {
        if (!(err instanceof PatchTargetMissingError)) throw err;
        await client.query("ROLLBACK");
        return { kind: "fieldNotInitialized" };
      }

      await client.query("UPDATE digital_twins SET contents = $2::jsonb, updated_at = now() WHERE twin_id = $1", [
        twinId,
        JSON.stringify(next),
      ]);
      await client.query("COMMIT");
      return APPLIED;
    } catch (err) {
      await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
        console.warn(`⚠️ Rollback failed for twin '${twinId}':`, rollbackErr);
      });
      releaseError = err instanceof Error ? err : new Error(String(err));
      return failed(err);
    } finally {
      // an error makes pg discard the connection instead of pooling it
      client.release(releaseError);
    }
  }

  async createTwin(twinId: string, twin: TwinDocument): Promise<TwinStoreResult> {
    const { $metadata, ...contents } = twin;
    try {
      await this.db.query(
        `INSERT INTO digital_twins (twin_id, model_id, contents, updated_at)
         VALUES ($1, $2, $3::jsonb, now())
         ON CONFLICT (twin_id) DO UPDATE
         SET model_id = EXCLUDED.model_id, contents = EXCLUDED.contents, updated_at = EXCLUDED.updated_at`,
        [twinId, $metadata.$model, JSON.stringify(contents)],
      );
      return APPLIED;
    } catch (err) {
      return failed(err);
    }
  }

  async close(): Promise<void> {
    await this.db.end();
  }
}
