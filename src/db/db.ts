import { drizzle } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import * as schema from "./schema.js";

/**
 * Any drizzle Postgres database carrying our schema: node-postgres in
 * production, PGlite in tests. Transactions satisfy it too.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export type Transaction = Parameters<
  Parameters<Database["transaction"]>[0]
>[0];

export function createDb(databaseUrl: string) {
  return drizzle(databaseUrl, {
    schema,
  });
}
