import pg from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import type { ExtractTablesWithRelations } from "drizzle-orm";
import type { PgDatabase, PgQueryResultHKT, PgTransaction } from "drizzle-orm/pg-core";
import * as schema from "@shared/schema";
import { env } from "./config/env";
import { createError } from "./errors";

export type Schema = typeof schema;
export type Database = PgDatabase<PgQueryResultHKT, Schema>;
export type Transaction = PgTransaction<PgQueryResultHKT, Schema, ExtractTablesWithRelations<Schema>>;

let pool: pg.Pool | null = null;
let database: Database | null = null;

export function getPool(): pg.Pool {
  if (pool) return pool;
  if (!env.DATABASE_URL) {
    throw createError("STORE_UNAVAILABLE", undefined, "DATABASE_URL must be set. Did you forget to provision a database?");
  }
  pool = new pg.Pool({ connectionString: env.DATABASE_URL });
  pool.on("error", (error) => {
    console.error("[db] Idle client error:", error.message);
  });
  return pool;
}

export function getDb(): Database {
  if (!database) {
    database = drizzle({ client: getPool(), schema });
  }
  return database;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
  }
  pool = null;
  database = null;
}
