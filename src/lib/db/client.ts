import postgres from "postgres";
import { drizzle } from "drizzle-orm/postgres-js";

import { requireEnv } from "@/lib/config";

import * as schema from "./schema";

export function getDatabaseUrl(): string {
  return requireEnv("DATABASE_URL");
}

const globalForDb = globalThis as unknown as {
  __postgres?: ReturnType<typeof postgres>;
  __drizzleDb?: ReturnType<typeof createDb>;
};

function createDb(sql: ReturnType<typeof postgres>) {
  return drizzle(sql, { schema });
}

export type Database = ReturnType<typeof createDb>;

export function getSql(url?: string) {
  if (globalForDb.__postgres) return globalForDb.__postgres;

  const sql = postgres(url ?? getDatabaseUrl(), {
    max: 5,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  // Reuse across hot reloads.
  if (process.env.NODE_ENV !== "production") {
    globalForDb.__postgres = sql;
  }

  return sql;
}

export function getDb(url?: string): Database {
  if (globalForDb.__drizzleDb) return globalForDb.__drizzleDb;
  const db = createDb(getSql(url));

  if (process.env.NODE_ENV !== "production") {
    globalForDb.__drizzleDb = db;
  }

  return db;
}

export async function closeDb(): Promise<void> {
  const sql = globalForDb.__postgres;
  globalForDb.__postgres = undefined;
  globalForDb.__drizzleDb = undefined;
  if (sql) await sql.end({ timeout: 5 });
}

export { schema };
