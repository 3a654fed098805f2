import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export type Database = PostgresJsDatabase<Record<string, never>>;

/**
 * Returns the raw client too so callers can close the pool on shutdown.
 */
export const createDb = (connectionString: string) => {
  const sql = postgres(connectionString, { max: 10 });
  const db: Database = drizzle(sql);
  return { db, sql };
};
