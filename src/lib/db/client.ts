import { mkdirSync } from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";
import type { RunResult } from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";

import { env } from "@/lib/env";

import { initSchema } from "./schema";
import * as schema from "./tables";

const DEFAULT_DB_PATH = "data/app.sqlite";

type DrizzleDb = BetterSQLite3Database<typeof schema>;

/**
 * Anything that can run queries: the shared connection or an open
 * transaction. Writes always take one so callers decide the unit of work.
 */
export type DbExecutor = BaseSQLiteDatabase<"sync", RunResult, typeof schema>;

type GlobalWithDb = typeof globalThis & {
  __appDb?: Database.Database;
  __drizzleDb?: DrizzleDb;
};

const globalForDb = globalThis as GlobalWithDb;

function resolveDbPath(): string {
  const dbPath = env.DB_PATH ?? DEFAULT_DB_PATH;
  if (dbPath === ":memory:") {
    return dbPath;
  }
  const resolved = path.isAbsolute(dbPath)
    ? dbPath
    : path.resolve(process.cwd(), dbPath);
  mkdirSync(path.dirname(resolved), { recursive: true });
  return resolved;
}

export function getDb(): Database.Database {
  if (!globalForDb.__appDb) {
    const dbFile = resolveDbPath();
    const db = new Database(dbFile);
    if (dbFile !== ":memory:") {
      db.pragma("journal_mode = WAL");
    }
    db.pragma("foreign_keys = ON");
    initSchema(db);

    globalForDb.__appDb = db;
  }
  return globalForDb.__appDb;
}

export function getDrizzleDb(): DrizzleDb {
  if (!globalForDb.__drizzleDb) {
    globalForDb.__drizzleDb = drizzle(getDb(), { schema });
  }
  return globalForDb.__drizzleDb;
}

/** Runs `work` in one transaction: committed on return, rolled back on throw. */
export function withTransaction<T>(work: (tx: DbExecutor) => T): T {
  return getDrizzleDb().transaction((tx) => work(tx));
}
