import { serve } from "@hono/node-server";
import { createAdminServer } from "./admin/server/index.js";
import { setupCommands } from "./bot/commands.js";
import { createBot } from "./bot/instance.js";
import { loadConfig } from "./config.js";
import { createDb } from "./db/db.js";
import { runMigrations } from "./db/migrate.js";
import { resumeBrackets } from "./services/tournamentStartService.js";

const config = loadConfig();
const db = createDb(config.DATABASE_URL);
await runMigrations(db);

const { bot, deps } = createBot(config.BOT_TOKEN, db);
await setupCommands(bot);

const resumed = await resumeBrackets(deps);
if (resumed > 0) {
  console.log(`Resumed ${resumed} bracket(s) left behind by the last run`);
}

const adminServer = config.ADMIN_JWT_SECRET
  ? serve(
      {
        fetch: createAdminServer(deps, {
          jwtSecret: config.ADMIN_JWT_SECRET,
          allowDevOrigin: config.NODE_ENV === "development",
        }).fetch,
        port: config.ADMIN_PORT,
      },
      (info) => console.log(`Admin API listening on port ${info.port}`),
    )
  : undefined;

if (!adminServer) {
  console.log("ADMIN_JWT_SECRET is not set, admin API disabled");
}

async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received, stopping`);
  adminServer?.close();
  await bot.stop();
  await db.$client.end();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error("Shutdown failed:", error);
      process.exitCode = 1;
    });
  });
}

await bot.start({
  onStart: (me) => console.log(`Bot @${me.username} started`),
});
