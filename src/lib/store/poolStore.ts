/**
 * Pool stores
 * Persist the serialized pool snapshot. Every operation loads a fresh copy
 * and saves only after it succeeds.
 */

import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import { metrics } from "../monitoring/metrics.js";
import type { PoolState } from "../../types/pool.types.js";
import { deserializePoolState, serializePoolState } from "./poolSerializer.js";

export type StoreDriver = "memory" | "sqlite";

export interface PoolStore {
  readonly driver: StoreDriver;
  load(poolId: string): Promise<PoolState | null>;
  save(state: PoolState): Promise<void>;
  list(): Promise<string[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

function timed<T>(operation: string, driver: StoreDriver, fn: () => T): T {
  const end = metrics.storeOperationDuration.startTimer({ operation, driver });
  try {
    return fn();
  } finally {
    end();
  }
}

/**
 * Keeps the JSON document rather than the live object, so a loaded pool
 * never aliases the stored one
 */
export class InMemoryPoolStore implements PoolStore {
  readonly driver = "memory";
  private documents = new Map<string, string>();

  async load(poolId: string): Promise<PoolState | null> {
    return timed("load", this.driver, () => {
      const document = this.documents.get(poolId);
      return document === undefined ? null : deserializePoolState(document);
    });
  }

  async save(state: PoolState): Promise<void> {
    timed("save", this.driver, () => {
      this.documents.set(state.poolId, serializePoolState(state));
    });
  }

  async list(): Promise<string[]> {
    return [...this.documents.keys()].sort();
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    this.documents.clear();
  }
}

interface PoolRow {
  document: string;
}

interface PoolIdRow {
  pool_id: string;
}

export class SqlitePoolStore implements PoolStore {
  readonly driver = "sqlite";
  private db: Database.Database;

  constructor(filename: string) {
    if (filename !== ":memory:") {
      fs.mkdirSync(path.dirname(filename), { recursive: true });
    }
    this.db = new Database(filename);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS pools (
        pool_id TEXT PRIMARY KEY,
        document TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
    console.log("✅ SQLite pool store ready", { filename });
  }

  async load(poolId: string): Promise<PoolState | null> {
    return timed("load", this.driver, () => {
      const row = this.db
        .prepare<[string], PoolRow>("SELECT document FROM pools WHERE pool_id = ?")
        .get(poolId);
      return row ? deserializePoolState(row.document) : null;
    });
  }

  async save(state: PoolState): Promise<void> {
    timed("save", this.driver, () => {
      this.db
        .prepare<[string, string, string]>(
          `INSERT INTO pools (pool_id, document, updated_at) VALUES (?, ?, ?)
           ON CONFLICT(pool_id) DO UPDATE SET document = excluded.document, updated_at = excluded.updated_at`,
        )
        .run(state.poolId, serializePoolState(state), new Date().toISOString());
    });
  }

  async list(): Promise<string[]> {
    return this.db
      .prepare<[], PoolIdRow>("SELECT pool_id FROM pools ORDER BY pool_id")
      .all()
      .map((row) => row.pool_id);
  }

  async ping(): Promise<void> {
    this.db.prepare("SELECT 1").get();
  }

  async close(): Promise<void> {
    this.db.close();
    console.log("👋 SQLite pool store closed");
  }
}

export function createPoolStore(driver: StoreDriver, sqlitePath: string): PoolStore {
  return driver === "sqlite" ? new SqlitePoolStore(sqlitePath) : new InMemoryPoolStore();
}
