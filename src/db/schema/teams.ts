import {
  boolean,
  primaryKey,
  serial,
  unique,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import { botSchema, createdAt } from "../schemaHelpers.js";
import { tournaments } from "./tournaments.js";

export const teams = botSchema.table(
  "teams",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    tournamentId: uuid("tournament_id")
      .notNull()
      .references(() => tournaments.id, { onDelete: "cascade" }),
    name: varchar({ length: 64 }).notNull(),
    captainId: varchar("captain_id", { length: 64 }).notNull(),
    isReady: boolean("is_ready").notNull().default(false),
    isBot: boolean("is_bot").notNull().default(false),
    /** Registration order; the seeding input is read in this order */
    seq: serial(),
    createdAt,
  },
  (table) => [unique("teams_tournament_name_key").on(table.tournamentId, table.name)],
);

export const teamMembers = botSchema.table(
  "team_members",
  {
    teamId: uuid("team_id")
      .notNull()
      .references(() => teams.id, { onDelete: "cascade" }),
    tournamentId: uuid("tournament_id")
      .notNull()
      .references(() => tournaments.id, { onDelete: "cascade" }),
    userId: varchar("user_id", { length: 64 }).notNull(),
    displayName: varchar("display_name", { length: 255 }).notNull(),
    createdAt,
  },
  (table) => [
    primaryKey({ columns: [table.teamId, table.userId] }),
    unique("team_members_tournament_user_key").on(
      table.tournamentId,
      table.userId,
    ),
  ],
);
