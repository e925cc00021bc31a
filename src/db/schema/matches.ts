import { sql } from "drizzle-orm";
import {
  check,
  integer,
  timestamp,
  unique,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import { botSchema, createdAt, updatedAt } from "../schemaHelpers.js";
import { tournaments } from "./tournaments.js";

export const matchStatus = ["pending", "completed"] as const;

export const matches = botSchema.table(
  "matches",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    tournamentId: uuid("tournament_id")
      .notNull()
      .references(() => tournaments.id, { onDelete: "cascade" }),
    round: integer().notNull(),
    position: integer().notNull(),
    teamA: varchar("team_a", { length: 64 }).notNull(),
    teamB: varchar("team_b", { length: 64 }).notNull(),
    winner: varchar({ length: 64 }),
    scoreA: integer("score_a"),
    scoreB: integer("score_b"),
    status: varchar({ enum: matchStatus }).notNull().default("pending"),
    channelRef: varchar("channel_ref", { length: 64 }),
    completedAt: timestamp("completed_at"),
    createdAt,
    updatedAt,
  },
  (table) => [
    unique("matches_slot_key").on(
      table.tournamentId,
      table.round,
      table.position,
    ),
    check(
      "matches_winner_check",
      sql`(${table.status} = 'completed') = (${table.winner} IS NOT NULL)
        AND (${table.winner} IS NULL OR ${table.winner} IN (${table.teamA}, ${table.teamB}))`,
    ),
  ],
);
