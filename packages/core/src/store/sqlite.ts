import path from "node:path";
import Database from "better-sqlite3";
import type { BlobRecord, ContentFingerprint, MetaRow } from "@chatsift/contracts";
import { StoreQueryError, StoreUnavailableError } from "../errors.js";
import type { BlobStore } from "./types.js";

export interface SqliteBlobStoreOptions {
  /** How long a statement waits on the writer's lock before failing. */
  busyTimeoutMs?: number;
}

type SqlRow = Record<string, unknown>;

function toBytes(value: unknown): Uint8Array | null {
  if (value instanceof Uint8Array) return value;
  if (typeof value === "string") return Buffer.from(value, "utf8");
  return null;
}

// Rows whose payload is NULL or numeric still occupy a position in the
// window, so they come back empty rather than being skipped.
function toBlobRecord(row: SqlRow): BlobRecord | null {
  const sequence = row.sequence;
  if (typeof sequence !== "number") return null;
  return { sequence, bytes: toBytes(row.data) ?? new Uint8Array() };
}

function toFiniteNumber(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

/**
 * `store.db` reader. Opens a fresh read-only connection for every call and
 * closes it afterwards, so the agent writing the file is never blocked for
 * longer than one statement.
 */
export class SqliteBlobStore implements BlobStore {
  readonly identity: string;
  readonly path: string;
  private readonly busyTimeoutMs: number;

  constructor(dbPath: string, options: SqliteBlobStoreOptions = {}) {
    this.path = path.resolve(dbPath);
    this.identity = this.path;
    this.busyTimeoutMs = options.busyTimeoutMs ?? 200;
  }

  private open(): Database.Database {
    let db: Database.Database | null = null;
    try {
      db = new Database(this.path, { readonly: true, fileMustExist: true, timeout: this.busyTimeoutMs });
      // Some builds accept the open and only fail on the first statement.
      db.prepare("SELECT name FROM sqlite_master WHERE type='table' LIMIT 1").all();
      return db;
    } catch (error) {
      db?.close();
      throw new StoreUnavailableError(this.path, { cause: error });
    }
  }

  private query<T>(label: string, run: (db: Database.Database) => T): T {
    const db = this.open();
    try {
      return run(db);
    } catch (error) {
      throw new StoreQueryError(this.path, label, { cause: error });
    } finally {
      db.close();
    }
  }

  private *iterateRows(order: "ASC" | "DESC", limit: number | null): Generator<BlobRecord> {
    const label = `blobs ${order.toLowerCase()}`;
    const base = `SELECT rowid AS sequence, data FROM blobs ORDER BY rowid ${order}`;
    const db = this.open();
    try {
      const rows =
        limit === null
          ? db.prepare<unknown[], SqlRow>(base).iterate()
          : db.prepare<unknown[], SqlRow>(`${base} LIMIT ?`).iterate(Math.max(0, Math.floor(limit)));
      for (const row of rows) {
        const record = toBlobRecord(row);
        if (record) yield record;
      }
    } catch (error) {
      throw new StoreQueryError(this.path, label, { cause: error });
    } finally {
      db.close();
    }
  }

  fetchRowsAscending(limit: number | null): Iterable<BlobRecord> {
    return this.iterateRows("ASC", limit);
  }

  fetchRowsDescending(limit: number | null): Iterable<BlobRecord> {
    return this.iterateRows("DESC", limit);
  }

  fetchFingerprint(): ContentFingerprint {
    return this.query("fingerprint", (db) => {
      const row = db
        .prepare<unknown[], SqlRow>(
          "SELECT COALESCE(MAX(rowid), 0) AS maxSequence, COALESCE(SUM(LENGTH(data)), 0) AS totalByteLength FROM blobs",
        )
        .get();
      return {
        maxSequence: toFiniteNumber(row?.maxSequence),
        totalByteLength: toFiniteNumber(row?.totalByteLength),
      };
    });
  }

  fetchMetaRows(): MetaRow[] {
    return this.query("meta", (db) =>
      db
        .prepare<unknown[], SqlRow>("SELECT key, value FROM meta")
        .all()
        .map((row) => ({ key: row.key, value: row.value })),
    );
  }

  fetchBlobById(id: string): Uint8Array | null {
    return this.query("blob by id", (db) => {
      const row = db.prepare<unknown[], SqlRow>("SELECT data FROM blobs WHERE id = ? LIMIT 1").get(id);
      return row ? toBytes(row.data) : null;
    });
  }
}
