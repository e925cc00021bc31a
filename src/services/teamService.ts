import { and, asc, count, eq, inArray } from "drizzle-orm";
import { z } from "zod";
import type { Database, Transaction } from "../db/db.js";
import { runInTransaction } from "../db/retry.js";
import { teamMembers, teams, tournaments } from "../db/schema.js";
import type {
  ReadyTeam,
  Team,
  TeamWithMembers,
  Tournament,
} from "../bot/@types/tournament.js";
import {
  InvalidTournamentStateError,
  TeamRegistrationError,
  TournamentNotFoundError,
} from "./errors.js";

export const BOT_TEAM_PREFIX = "Bot Team";

export const teamNameSchema = z
  .string()
  .trim()
  .min(1, "Team name cannot be empty")
  .max(64, "Team name is too long (64 characters max)");

export interface Player {
  userId: string;
  displayName: string;
}

function parseTeamName(name: string): string {
  const parsed = teamNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new TeamRegistrationError(
      parsed.error.issues[0]?.message ?? "Invalid team name",
    );
  }
  return parsed.data;
}

async function lockTournament(
  tx: Transaction,
  tournamentId: string,
): Promise<Tournament> {
  const [tournament] = await tx
    .select()
    .from(tournaments)
    .where(eq(tournaments.id, tournamentId))
    .for("update");
  if (!tournament) throw new TournamentNotFoundError(tournamentId);
  return tournament;
}

function assertRegistrationOpen(tournament: Tournament): void {
  if (tournament.status !== "waiting") {
    throw new InvalidTournamentStateError(
      "Registration is over, the bracket has already started.",
    );
  }
  if (tournament.joinStatus !== "open") {
    throw new TeamRegistrationError("Registration is closed.");
  }
}

function assertRosterEditable(tournament: Tournament): void {
  if (tournament.status === "running") {
    throw new InvalidTournamentStateError(
      "Teams cannot change while the bracket is running.",
    );
  }
}

async function memberCount(tx: Transaction, teamId: string): Promise<number> {
  const [row] = await tx
    .select({ value: count() })
    .from(teamMembers)
    .where(eq(teamMembers.teamId, teamId));
  return row?.value ?? 0;
}

async function findMembership(
  tx: Database,
  tournamentId: string,
  userId: string,
): Promise<Team | undefined> {
  const [row] = await tx
    .select({ team: teams })
    .from(teamMembers)
    .innerJoin(teams, eq(teamMembers.teamId, teams.id))
    .where(
      and(
        eq(teamMembers.tournamentId, tournamentId),
        eq(teamMembers.userId, userId),
      ),
    );
  return row?.team;
}

/**
 * Register a new team with the caller as captain and first member
 */
export async function createTeam(
  db: Database,
  tournamentId: string,
  teamName: string,
  captain: Player,
): Promise<Team> {
  const name = parseTeamName(teamName);

  return runInTransaction(db, async (tx) => {
    const tournament = await lockTournament(tx, tournamentId);
    assertRegistrationOpen(tournament);

    if (await findMembership(tx, tournamentId, captain.userId)) {
      throw new TeamRegistrationError(
        "You are already in a team. Leave it first.",
      );
    }

    const [registered] = await tx
      .select({ value: count() })
      .from(teams)
      .where(eq(teams.tournamentId, tournamentId));
    if ((registered?.value ?? 0) >= tournament.maxTeams) {
      throw new TeamRegistrationError(
        `The tournament is full (${tournament.maxTeams} teams).`,
      );
    }

    const [team] = await tx
      .insert(teams)
      .values({ tournamentId, name, captainId: captain.userId })
      .onConflictDoNothing({ target: [teams.tournamentId, teams.name] })
      .returning();
    if (!team) {
      throw new TeamRegistrationError(`Team name "${name}" is already taken.`);
    }

    await tx.insert(teamMembers).values({
      teamId: team.id,
      tournamentId,
      userId: captain.userId,
      displayName: captain.displayName,
    });

    return team;
  });
}

/**
 * Join an existing team by name
 */
export async function joinTeam(
  db: Database,
  tournamentId: string,
  teamName: string,
  player: Player,
): Promise<Team> {
  const name = parseTeamName(teamName);

  return runInTransaction(db, async (tx) => {
    const tournament = await lockTournament(tx, tournamentId);
    assertRegistrationOpen(tournament);

    const [team] = await tx
      .select()
      .from(teams)
      .where(and(eq(teams.tournamentId, tournamentId), eq(teams.name, name)))
      .for("update");
    if (!team) throw new TeamRegistrationError(`No team named "${name}".`);

    if ((await memberCount(tx, team.id)) >= tournament.teamSize) {
      throw new TeamRegistrationError(`Team "${name}" is full.`);
    }

    const [joined] = await tx
      .insert(teamMembers)
      .values({
        teamId: team.id,
        tournamentId,
        userId: player.userId,
        displayName: player.displayName,
      })
      .onConflictDoNothing({
        target: [teamMembers.tournamentId, teamMembers.userId],
      })
      .returning();
    if (!joined) {
      throw new TeamRegistrationError(
        "You are already in a team. Leave it first.",
      );
    }

    return team;
  });
}

/**
 * Leave the current team. Captains disband instead. The team loses its ready
 * flag since the roster is no longer full.
 */
export async function leaveTeam(
  db: Database,
  tournamentId: string,
  userId: string,
): Promise<Team> {
  return runInTransaction(db, async (tx) => {
    const tournament = await lockTournament(tx, tournamentId);
    assertRosterEditable(tournament);

    const team = await findMembership(tx, tournamentId, userId);
    if (!team) throw new TeamRegistrationError("You are not in a team.");
    if (team.captainId === userId) {
      throw new TeamRegistrationError(
        "Captains cannot leave their team. Use /disband instead.",
      );
    }

    await tx
      .delete(teamMembers)
      .where(
        and(eq(teamMembers.teamId, team.id), eq(teamMembers.userId, userId)),
      );
    await tx.update(teams).set({ isReady: false }).where(eq(teams.id, team.id));

    return team;
  });
}

/**
 * Mark the captain's team ready (roster must be full) or not ready
 */
export async function setTeamReady(
  db: Database,
  tournamentId: string,
  captainId: string,
  ready: boolean,
): Promise<Team> {
  return runInTransaction(db, async (tx) => {
    const tournament = await lockTournament(tx, tournamentId);
    if (ready) {
      if (tournament.status !== "waiting") {
        throw new InvalidTournamentStateError(
          "The bracket has already started.",
        );
      }
    } else {
      assertRosterEditable(tournament);
    }

    const [team] = await tx
      .select()
      .from(teams)
      .where(
        and(eq(teams.tournamentId, tournamentId), eq(teams.captainId, captainId)),
      );
    if (!team) {
      throw new TeamRegistrationError("Only a team captain can do that.");
    }

    if (ready) {
      const members = await memberCount(tx, team.id);
      if (members < tournament.teamSize) {
        throw new TeamRegistrationError(
          `Team "${team.name}" needs ${tournament.teamSize} players to be ready (has ${members}).`,
        );
      }
    }

    const [updated] = await tx
      .update(teams)
      .set({ isReady: ready })
      .where(eq(teams.id, team.id))
      .returning();
    return updated ?? team;
  });
}

/**
 * Delete the captain's team and its roster
 */
export async function disbandTeam(
  db: Database,
  tournamentId: string,
  captainId: string,
): Promise<Team> {
  return runInTransaction(db, async (tx) => {
    const tournament = await lockTournament(tx, tournamentId);
    assertRosterEditable(tournament);

    const [deleted] = await tx
      .delete(teams)
      .where(
        and(eq(teams.tournamentId, tournamentId), eq(teams.captainId, captainId)),
      )
      .returning();
    if (!deleted) {
      throw new TeamRegistrationError("Only a team captain can do that.");
    }
    return deleted;
  });
}

/**
 * Get all teams of a tournament with their roster size, in registration order
 */
export async function getTeams(
  db: Database,
  tournamentId: string,
): Promise<TeamWithMembers[]> {
  const rows = await db
    .select({ team: teams, memberCount: count(teamMembers.userId) })
    .from(teams)
    .leftJoin(teamMembers, eq(teamMembers.teamId, teams.id))
    .where(eq(teams.tournamentId, tournamentId))
    .groupBy(teams.id)
    .orderBy(asc(teams.seq));

  return rows.map((row) => ({ ...row.team, memberCount: row.memberCount }));
}

export async function getTeamByName(
  db: Database,
  tournamentId: string,
  name: string,
): Promise<Team | undefined> {
  return db.query.teams.findFirst({
    where: and(eq(teams.tournamentId, tournamentId), eq(teams.name, name)),
  });
}

export async function getTeamForUser(
  db: Database,
  tournamentId: string,
  userId: string,
): Promise<Team | undefined> {
  return findMembership(db, tournamentId, userId);
}

/**
 * Ready teams in registration order: the input to seeding
 */
export async function getReadyTeams(
  db: Database,
  tournamentId: string,
): Promise<ReadyTeam[]> {
  return db
    .select({
      name: teams.name,
      captainId: teams.captainId,
      isBot: teams.isBot,
    })
    .from(teams)
    .where(and(eq(teams.tournamentId, tournamentId), eq(teams.isReady, true)))
    .orderBy(asc(teams.seq));
}

/**
 * Fill the tournament with ready test teams ("Bot Team N"), up to maxTeams.
 * Returns the names that were added.
 */
export async function addBotTeams(
  db: Database,
  tournamentId: string,
  amount: number,
): Promise<string[]> {
  return runInTransaction(db, async (tx) => {
    const tournament = await lockTournament(tx, tournamentId);
    if (tournament.status !== "waiting") {
      throw new InvalidTournamentStateError("The bracket has already started.");
    }

    const existing = await tx
      .select({ name: teams.name })
      .from(teams)
      .where(eq(teams.tournamentId, tournamentId));
    const taken = new Set(existing.map((t) => t.name));
    const room = Math.max(0, tournament.maxTeams - existing.length);

    const names: string[] = [];
    for (let n = 1; names.length < Math.min(amount, room); n++) {
      const name = `${BOT_TEAM_PREFIX} ${n}`;
      if (!taken.has(name)) names.push(name);
    }
    if (names.length === 0) return [];

    const created = await tx
      .insert(teams)
      .values(
        names.map((name) => ({
          tournamentId,
          name,
          captainId: `bot:${name}`,
          isReady: true,
          isBot: true,
        })),
      )
      .returning({ id: teams.id, name: teams.name, captainId: teams.captainId });

    await tx.insert(teamMembers).values(
      created.map((team) => ({
        teamId: team.id,
        tournamentId,
        userId: team.captainId,
        displayName: team.name,
      })),
    );

    return names;
  });
}

/**
 * Remove every test team. Returns how many were deleted.
 */
export async function clearBotTeams(
  db: Database,
  tournamentId: string,
): Promise<number> {
  return runInTransaction(db, async (tx) => {
    const tournament = await lockTournament(tx, tournamentId);
    assertRosterEditable(tournament);

    const bots = await tx
      .select({ id: teams.id })
      .from(teams)
      .where(and(eq(teams.tournamentId, tournamentId), eq(teams.isBot, true)));
    if (bots.length === 0) return 0;

    await tx.delete(teams).where(
      inArray(
        teams.id,
        bots.map((b) => b.id),
      ),
    );
    return bots.length;
  });
}
