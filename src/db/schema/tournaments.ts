import { boolean, integer, uuid, varchar } from "drizzle-orm/pg-core";
import { botSchema, createdAt, updatedAt } from "../schemaHelpers.js";

export const tournamentStatus = ["waiting", "running", "finished"] as const;

export const bracketFormat = [
  "single_elimination",
  "double_elimination",
] as const;

export const joinStatus = ["open", "closed"] as const;

export const tournaments = botSchema.table("tournaments", {
  id: uuid("id").primaryKey().defaultRandom(),
  chatId: varchar("chat_id", { length: 64 }).notNull().unique(),
  name: varchar({ length: 100 }).notNull(),
  teamSize: integer("team_size").notNull().default(1),
  bestOf: integer("best_of").notNull().default(1),
  maxTeams: integer("max_teams").notNull().default(16),
  bracketFormat: varchar("bracket_format", { enum: bracketFormat })
    .notNull()
    .default("single_elimination"),
  captainScoring: boolean("captain_scoring").notNull().default(false),
  screenshotProof: boolean("screenshot_proof").notNull().default(false),
  joinStatus: varchar("join_status", { enum: joinStatus })
    .notNull()
    .default("open"),
  status: varchar({ enum: tournamentStatus }).notNull().default("waiting"),
  bracketTopicId: integer("bracket_topic_id"),
  bracketMessageId: integer("bracket_message_id"),
  createdAt,
  updatedAt,
});
