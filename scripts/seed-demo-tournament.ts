/**
 * Seed script: creates a demo tournament with ready test teams and starts its
 * bracket. Nothing is posted to Telegram; the bracket image is written next
 * to the working directory.
 * Run with: tsx --env-file=.env scripts/seed-demo-tournament.ts [chatId] [teams]
 */

import { writeFile } from "node:fs/promises";
import { createDb } from "../src/db/db.js";
import { runMigrations } from "../src/db/migrate.js";
import { renderBracket } from "../src/services/bracketRenderer.js";
import { getBracketProjection, startBracket } from "../src/services/matchService.js";
import { addBotTeams } from "../src/services/teamService.js";
import {
  createTournament,
  deleteTournament,
  getTournamentByChat,
} from "../src/services/tournamentService.js";
import { BRACKET_IMAGE_FILENAME } from "../src/utils/constants.js";

const DATABASE_URL = process.env.DATABASE_URL;
if (!DATABASE_URL) {
  console.error(
    "DATABASE_URL is not set. Run with: tsx --env-file=.env scripts/seed-demo-tournament.ts",
  );
  process.exit(1);
}

const chatId = process.argv[2] ?? "demo-chat";
const teamCount = Number(process.argv[3] ?? 8);

const db = createDb(DATABASE_URL);

async function main() {
  await runMigrations(db);

  const existing = await getTournamentByChat(db, chatId);
  if (existing) {
    await deleteTournament(db, existing.id);
    console.log(`Removed previous demo tournament ${existing.id}`);
  }

  const tournament = await createTournament(db, chatId, {
    name: "Demo Cup",
    maxTeams: 32,
  });
  const added = await addBotTeams(db, tournament.id, teamCount);
  console.log(`Tournament ${tournament.id}: ${added.length} test teams`);

  const { seeds, matchesCreated } = await startBracket(db, tournament.id);
  console.log(`Seeds: ${seeds.join(", ")}`);
  console.log(`Round 1: ${matchesCreated} matches`);

  const projection = await getBracketProjection(db, tournament.id);
  if (projection) {
    await writeFile(BRACKET_IMAGE_FILENAME, await renderBracket(projection));
    console.log(`Bracket image written to ${BRACKET_IMAGE_FILENAME}`);
  }
}

try {
  await main();
} catch (error) {
  console.error("Seeding failed:", error);
  process.exitCode = 1;
} finally {
  await db.$client.end();
}
