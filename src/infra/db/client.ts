import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export type Database = PostgresJsDatabase<Record<string, never>>;

/**
 * Builds the typed ORM over one postgres.js pool; `sql` is kept so entry points can close the pool.
 */
export const createDb = (connectionString: string, maxConnections = 10) => {
  const sql = postgres(connectionString, { max: maxConnections });
  const db: Database = drizzle(sql);
  return { db, sql };
};
