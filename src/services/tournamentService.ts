import { eq, isNotNull, and } from "drizzle-orm";
import { z } from "zod";
import type { Database } from "../db/db.js";
import { runInTransaction } from "../db/retry.js";
import { matches, tournaments } from "../db/schema.js";
import type { JoinStatus, Tournament } from "../bot/@types/tournament.js";
import {
  InvalidSettingsError,
  InvalidTournamentStateError,
  TournamentNotFoundError,
} from "./errors.js";

export const tournamentSettingsSchema = z.object({
  name: z.string().trim().min(1).max(100),
  teamSize: z.number().int().min(1).max(6),
  bestOf: z.number().int().min(1).max(9),
  maxTeams: z.number().int().min(2).max(32),
});

const uuidSchema = z.string().uuid();

export type TournamentSettings = z.infer<typeof tournamentSettingsSchema>;

export const DEFAULT_SETTINGS: Omit<TournamentSettings, "name"> = {
  teamSize: 1,
  bestOf: 1,
  maxTeams: 16,
};

function parseSettings<T>(schema: z.ZodType<T>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "settings";
    throw new InvalidSettingsError(
      `Invalid ${field}: ${issue?.message ?? "bad value"}`,
    );
  }
  return parsed.data;
}

/**
 * Create the tournament for a community chat (one per chat)
 */
export async function createTournament(
  db: Database,
  chatId: string,
  settings: { name: string } & Partial<TournamentSettings>,
): Promise<Tournament> {
  const values = parseSettings(tournamentSettingsSchema, {
    ...DEFAULT_SETTINGS,
    ...settings,
  });

  const [tournament] = await db
    .insert(tournaments)
    .values({ chatId, ...values })
    .onConflictDoNothing({ target: tournaments.chatId })
    .returning();

  if (!tournament) {
    throw new InvalidTournamentStateError(
      "This chat already has a tournament. Delete it first.",
    );
  }

  return tournament;
}

/**
 * Get tournament by ID
 */
export async function getTournament(
  db: Database,
  tournamentId: string,
): Promise<Tournament | undefined> {
  if (!uuidSchema.safeParse(tournamentId).success) return undefined;
  return db.query.tournaments.findFirst({
    where: eq(tournaments.id, tournamentId),
  });
}

export async function getTournamentByChat(
  db: Database,
  chatId: string,
): Promise<Tournament | undefined> {
  return db.query.tournaments.findFirst({
    where: eq(tournaments.chatId, chatId),
  });
}

export async function requireTournament(
  db: Database,
  tournamentId: string,
): Promise<Tournament> {
  const tournament = await getTournament(db, tournamentId);
  if (!tournament) throw new TournamentNotFoundError(tournamentId);
  return tournament;
}

async function updateTournament(
  db: Database,
  tournamentId: string,
  values: Partial<typeof tournaments.$inferInsert>,
): Promise<Tournament> {
  const [updated] = await db
    .update(tournaments)
    .set(values)
    .where(eq(tournaments.id, tournamentId))
    .returning();

  if (!updated) throw new TournamentNotFoundError(tournamentId);
  return updated;
}

/**
 * Change name / team size / best-of / max teams. Sizes are frozen once the
 * bracket has started.
 */
export async function updateTournamentSettings(
  db: Database,
  tournamentId: string,
  changes: Partial<TournamentSettings>,
): Promise<Tournament> {
  const values = parseSettings(tournamentSettingsSchema.partial(), changes);
  const tournament = await requireTournament(db, tournamentId);

  const touchesRoster =
    values.teamSize !== undefined || values.maxTeams !== undefined;
  if (touchesRoster && tournament.status !== "waiting") {
    throw new InvalidTournamentStateError(
      "Team size and max teams cannot change after the bracket has started.",
    );
  }

  return updateTournament(db, tournamentId, values);
}

/**
 * Flip single/double elimination. Only the single-elimination bracket is
 * implemented; the setting is stored and shown.
 */
export async function toggleBracketFormat(
  db: Database,
  tournamentId: string,
): Promise<Tournament> {
  const tournament = await requireTournament(db, tournamentId);
  return updateTournament(db, tournamentId, {
    bracketFormat:
      tournament.bracketFormat === "single_elimination"
        ? "double_elimination"
        : "single_elimination",
  });
}

export async function toggleCaptainScoring(
  db: Database,
  tournamentId: string,
): Promise<Tournament> {
  const tournament = await requireTournament(db, tournamentId);
  return updateTournament(db, tournamentId, {
    captainScoring: !tournament.captainScoring,
  });
}

/**
 * Require a screenshot of the final score in the match topic before a
 * result is reported
 */
export async function toggleScreenshotProof(
  db: Database,
  tournamentId: string,
): Promise<Tournament> {
  const tournament = await requireTournament(db, tournamentId);
  return updateTournament(db, tournamentId, {
    screenshotProof: !tournament.screenshotProof,
  });
}

export async function setJoinStatus(
  db: Database,
  tournamentId: string,
  joinStatus: JoinStatus,
): Promise<Tournament> {
  return updateTournament(db, tournamentId, { joinStatus });
}

export async function setBracketTopic(
  db: Database,
  tournamentId: string,
  bracketTopicId: number | null,
): Promise<void> {
  await updateTournament(db, tournamentId, { bracketTopicId });
}

/**
 * Store the id of the newest bracket image and return the one it replaces.
 * The row lock keeps concurrent publishes from handing out the same
 * previous id twice.
 */
export async function swapBracketMessage(
  db: Database,
  tournamentId: string,
  bracketMessageId: number,
): Promise<number | null> {
  return runInTransaction(db, async (tx) => {
    const [locked] = await tx
      .select({ bracketMessageId: tournaments.bracketMessageId })
      .from(tournaments)
      .where(eq(tournaments.id, tournamentId))
      .for("update");
    if (!locked) throw new TournamentNotFoundError(tournamentId);

    await tx
      .update(tournaments)
      .set({ bracketMessageId })
      .where(eq(tournaments.id, tournamentId));
    return locked.bracketMessageId;
  });
}

export async function getRunningTournaments(db: Database): Promise<Tournament[]> {
  return db.query.tournaments.findMany({
    where: eq(tournaments.status, "running"),
  });
}

/**
 * Drop every match row and put the tournament back to waiting. Returns the
 * match channel handles the caller should clean up.
 */
export async function resetBracket(
  db: Database,
  tournamentId: string,
): Promise<string[]> {
  return runInTransaction(db, async (tx) => {
    const [locked] = await tx
      .select({ id: tournaments.id })
      .from(tournaments)
      .where(eq(tournaments.id, tournamentId))
      .for("update");
    if (!locked) throw new TournamentNotFoundError(tournamentId);

    const removed = await tx
      .delete(matches)
      .where(eq(matches.tournamentId, tournamentId))
      .returning({ channelRef: matches.channelRef });

    await tx
      .update(tournaments)
      .set({ status: "waiting" })
      .where(eq(tournaments.id, tournamentId));

    return removed.flatMap((m) => (m.channelRef ? [m.channelRef] : []));
  });
}

/**
 * Delete tournament by ID (teams and matches cascade). Returns the match
 * channel handles that were still open.
 */
export async function deleteTournament(
  db: Database,
  tournamentId: string,
): Promise<string[]> {
  return runInTransaction(db, async (tx) => {
    const open = await tx
      .select({ channelRef: matches.channelRef })
      .from(matches)
      .where(
        and(
          eq(matches.tournamentId, tournamentId),
          eq(matches.status, "pending"),
          isNotNull(matches.channelRef),
        ),
      );

    const deleted = await tx
      .delete(tournaments)
      .where(eq(tournaments.id, tournamentId))
      .returning({ id: tournaments.id });
    if (deleted.length === 0) throw new TournamentNotFoundError(tournamentId);

    return open.flatMap((m) => (m.channelRef ? [m.channelRef] : []));
  });
}
