import { fileURLToPath } from "node:url";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import type * as schema from "./schema.js";

/** drizzle-kit output, see drizzle.config.ts */
export const MIGRATIONS_FOLDER = fileURLToPath(
  new URL("./migrations", import.meta.url),
);

/**
 * Apply pending migrations. Applied ones are tracked by drizzle, so this
 * runs on every start-up.
 */
export async function runMigrations(
  db: NodePgDatabase<typeof schema>,
): Promise<void> {
  await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
}
