import { and, asc, desc, eq, max, or } from "drizzle-orm";
import { z } from "zod";
import type { Database, Transaction } from "../db/db.js";
import { runInTransaction } from "../db/retry.js";
import { matches, tournaments } from "../db/schema.js";
import type { Match } from "../bot/@types/match.js";
import type { Tournament } from "../bot/@types/tournament.js";
import {
  calculateRounds,
  isValidBracketSize,
  pairTeams,
  seedTeams,
} from "./bracketGenerator.js";
import {
  buildBracketProjection,
  type BracketProjection,
} from "./bracketProjection.js";
import {
  DuplicateResultError,
  InvalidBracketSizeError,
  InvalidScoreError,
  InvalidTournamentStateError,
  MatchNotFoundError,
  TiedScoreError,
  TournamentNotFoundError,
} from "./errors.js";
import { getReadyTeams } from "./teamService.js";

export const MAX_SCORE = 999;

/**
 * Side effects requested by a state transition. The transition itself only
 * touches the database; bracketEffects.ts carries these out afterwards.
 */
export type BracketEffect =
  | {
      type: "createMatchChannel";
      tournamentId: string;
      matchId: string;
      round: number;
      totalRounds: number;
      position: number;
      teamA: string;
      teamB: string;
    }
  | {
      type: "deleteMatchChannel";
      tournamentId: string;
      matchId: string;
      channelRef: string;
    }
  | { type: "publishBracket"; tournamentId: string }
  | {
      type: "announceResult";
      tournamentId: string;
      matchId: string;
      round: number;
      teamA: string;
      teamB: string;
      scoreA: number;
      scoreB: number;
      winner: string;
    }
  | { type: "announceChampion"; tournamentId: string; champion: string };

export interface StartBracketOptions {
  /** Replaces the fixed-seed shuffle, e.g. to start from a known order */
  seedOrder?: (teamNames: readonly string[]) => string[];
}

export interface StartBracketResult {
  matchesCreated: number;
  seeds: string[];
  effects: BracketEffect[];
}

export interface RecordResultOutcome {
  match: Match;
  effects: BracketEffect[];
}

export type AdvanceStatus = "idle" | "in_progress" | "next_round" | "finished";

export interface AdvanceOutcome {
  status: AdvanceStatus;
  round: number | null;
  champion: string | null;
  effects: BracketEffect[];
}

const uuidSchema = z.string().uuid();

function createChannelEffect(match: Match, totalRounds: number): BracketEffect {
  return {
    type: "createMatchChannel",
    tournamentId: match.tournamentId,
    matchId: match.id,
    round: match.round,
    totalRounds,
    position: match.position,
    teamA: match.teamA,
    teamB: match.teamB,
  };
}

async function lockTournament(
  tx: Transaction,
  tournamentId: string,
): Promise<Tournament> {
  if (!uuidSchema.safeParse(tournamentId).success) {
    throw new TournamentNotFoundError(tournamentId);
  }
  const [tournament] = await tx
    .select()
    .from(tournaments)
    .where(eq(tournaments.id, tournamentId))
    .for("update");
  if (!tournament) throw new TournamentNotFoundError(tournamentId);
  return tournament;
}

/**
 * Seed the ready teams and create round 1. Any previous match rows of the
 * tournament are dropped in the same transaction.
 */
export async function startBracket(
  db: Database,
  tournamentId: string,
  options: StartBracketOptions = {},
): Promise<StartBracketResult> {
  const seedOrder = options.seedOrder ?? ((names) => seedTeams(names));

  return runInTransaction(db, async (tx) => {
    const tournament = await lockTournament(tx, tournamentId);
    if (tournament.status === "running") {
      throw new InvalidTournamentStateError("The bracket is already running.");
    }
    if (tournament.status === "finished") {
      throw new InvalidTournamentStateError(
        "This tournament is finished. Reset the bracket to play again.",
      );
    }

    const readyTeams = await getReadyTeams(tx, tournamentId);
    if (!isValidBracketSize(readyTeams.length)) {
      throw new InvalidBracketSizeError(readyTeams.length);
    }

    if (tournament.bracketFormat === "double_elimination") {
      console.warn(
        `Tournament ${tournamentId}: double elimination is not supported, running single elimination`,
      );
    }

    const seeds = seedOrder(readyTeams.map((team) => team.name));
    if (seeds.length !== readyTeams.length) {
      throw new InvalidBracketSizeError(seeds.length);
    }

    const stale = await tx
      .delete(matches)
      .where(eq(matches.tournamentId, tournamentId))
      .returning({ id: matches.id, channelRef: matches.channelRef });

    const created = await tx
      .insert(matches)
      .values(
        pairTeams(seeds).map((pairing) => ({
          tournamentId,
          round: 1,
          position: pairing.position,
          teamA: pairing.teamA,
          teamB: pairing.teamB,
        })),
      )
      .returning();

    await tx
      .update(tournaments)
      .set({ status: "running" })
      .where(eq(tournaments.id, tournamentId));

    const totalRounds = calculateRounds(seeds.length);
    const effects: BracketEffect[] = [];
    for (const old of stale) {
      if (old.channelRef) {
        effects.push({
          type: "deleteMatchChannel",
          tournamentId,
          matchId: old.id,
          channelRef: old.channelRef,
        });
      }
    }
    created.sort((a, b) => a.position - b.position);
    for (const match of created) {
      effects.push(createChannelEffect(match, totalRounds));
    }
    effects.push({ type: "publishBracket", tournamentId });

    console.log(
      `Bracket started for tournament ${tournamentId}: ${seeds.length} teams, ${created.length} matches`,
    );

    return { matchesCreated: created.length, seeds, effects };
  });
}

function isValidScore(score: number): boolean {
  return Number.isInteger(score) && score >= 0 && score <= MAX_SCORE;
}

/**
 * Store the final score of a pending match. The higher score wins.
 */
export async function recordResult(
  db: Database,
  matchId: string,
  scoreA: number,
  scoreB: number,
): Promise<RecordResultOutcome> {
  if (!isValidScore(scoreA) || !isValidScore(scoreB)) {
    throw new InvalidScoreError();
  }
  if (scoreA === scoreB) throw new TiedScoreError();
  if (!uuidSchema.safeParse(matchId).success) {
    throw new MatchNotFoundError(matchId);
  }

  return runInTransaction(db, async (tx) => {
    const [match] = await tx
      .select()
      .from(matches)
      .where(eq(matches.id, matchId))
      .for("update");
    if (!match) throw new MatchNotFoundError(matchId);
    if (match.status === "completed") throw new DuplicateResultError(matchId);

    const winner = scoreA > scoreB ? match.teamA : match.teamB;

    const [updated] = await tx
      .update(matches)
      .set({
        winner,
        scoreA,
        scoreB,
        status: "completed",
        completedAt: new Date(),
      })
      .where(and(eq(matches.id, matchId), eq(matches.status, "pending")))
      .returning();
    if (!updated) throw new DuplicateResultError(matchId);

    const effects: BracketEffect[] = [];
    if (updated.channelRef) {
      effects.push({
        type: "deleteMatchChannel",
        tournamentId: updated.tournamentId,
        matchId,
        channelRef: updated.channelRef,
      });
    }
    effects.push({
      type: "announceResult",
      tournamentId: updated.tournamentId,
      matchId,
      round: updated.round,
      teamA: updated.teamA,
      teamB: updated.teamB,
      scoreA,
      scoreB,
      winner,
    });

    return { match: updated, effects };
  });
}

/**
 * Move the bracket forward once the latest round is fully scored: create the
 * next round, or crown the champion after the final. Safe to call any number
 * of times; the tournament row lock and the slot key make repeats a no-op.
 */
export async function advance(
  db: Database,
  tournamentId: string,
): Promise<AdvanceOutcome> {
  return runInTransaction(db, async (tx): Promise<AdvanceOutcome> => {
    const tournament = await lockTournament(tx, tournamentId);

    const [latest] = await tx
      .select({ round: max(matches.round) })
      .from(matches)
      .where(eq(matches.tournamentId, tournamentId));
    const round = latest?.round ?? null;
    if (round === null) {
      return { status: "idle", round: null, champion: null, effects: [] };
    }

    const current = await tx
      .select()
      .from(matches)
      .where(
        and(eq(matches.tournamentId, tournamentId), eq(matches.round, round)),
      )
      .orderBy(asc(matches.position));

    const publish: BracketEffect = { type: "publishBracket", tournamentId };
    const winners = current.flatMap((m) =>
      m.status === "completed" && m.winner ? [m.winner] : [],
    );
    if (winners.length !== current.length) {
      return { status: "in_progress", round, champion: null, effects: [publish] };
    }

    if (winners.length === 1) {
      const champion = winners[0] ?? null;
      const effects: BracketEffect[] = [publish];
      if (tournament.status !== "finished" && champion !== null) {
        await tx
          .update(tournaments)
          .set({ status: "finished" })
          .where(eq(tournaments.id, tournamentId));
        effects.push({ type: "announceChampion", tournamentId, champion });
        console.log(`Tournament ${tournamentId} finished, champion: ${champion}`);
      }
      return { status: "finished", round, champion, effects };
    }

    const inserted = await tx
      .insert(matches)
      .values(
        pairTeams(winners).map((pairing) => ({
          tournamentId,
          round: round + 1,
          position: pairing.position,
          teamA: pairing.teamA,
          teamB: pairing.teamB,
        })),
      )
      .onConflictDoNothing({
        target: [matches.tournamentId, matches.round, matches.position],
      })
      .returning();

    const totalRounds = round + calculateRounds(current.length);
    inserted.sort((a, b) => a.position - b.position);
    const effects: BracketEffect[] = inserted.map((match) =>
      createChannelEffect(match, totalRounds),
    );
    effects.push(publish);

    if (inserted.length > 0) {
      console.log(
        `Tournament ${tournamentId}: round ${round + 1} created with ${inserted.length} matches`,
      );
    }

    return { status: "next_round", round: round + 1, champion: null, effects };
  });
}

/**
 * Get all matches for a tournament
 */
export async function getTournamentMatches(
  db: Database,
  tournamentId: string,
): Promise<Match[]> {
  if (!uuidSchema.safeParse(tournamentId).success) return [];
  return db.query.matches.findMany({
    where: eq(matches.tournamentId, tournamentId),
    orderBy: [asc(matches.round), asc(matches.position)],
  });
}

/**
 * Per-round view of the bracket, rebuilt from the stored rows
 */
export async function getBracketProjection(
  db: Database,
  tournamentId: string,
): Promise<BracketProjection | null> {
  return buildBracketProjection(await getTournamentMatches(db, tournamentId));
}

/**
 * Get match by ID
 */
export async function getMatch(
  db: Database,
  matchId: string,
): Promise<Match | undefined> {
  if (!uuidSchema.safeParse(matchId).success) return undefined;
  return db.query.matches.findFirst({
    where: eq(matches.id, matchId),
  });
}

export async function getMatchByChannel(
  db: Database,
  tournamentId: string,
  channelRef: string,
): Promise<Match | undefined> {
  return db.query.matches.findFirst({
    where: and(
      eq(matches.tournamentId, tournamentId),
      eq(matches.channelRef, channelRef),
    ),
  });
}

/**
 * Latest pending match a team plays in
 */
export async function getTeamCurrentMatch(
  db: Database,
  tournamentId: string,
  teamName: string,
): Promise<Match | undefined> {
  return db.query.matches.findFirst({
    where: and(
      eq(matches.tournamentId, tournamentId),
      eq(matches.status, "pending"),
      or(eq(matches.teamA, teamName), eq(matches.teamB, teamName)),
    ),
    orderBy: [desc(matches.round)],
  });
}

export async function setMatchChannel(
  db: Database,
  matchId: string,
  channelRef: string | null,
): Promise<void> {
  await db
    .update(matches)
    .set({ channelRef })
    .where(eq(matches.id, matchId));
}
