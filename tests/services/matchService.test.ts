/**
 * Bracket state machine against an in-process Postgres: starting, recording
 * results and advancing rounds, including concurrent callers.
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestDb, type TestDb } from "../helpers/testDb.js";
import { seedReadyTeams, seedTournament, teamNames } from "../helpers/seed.js";
import {
  advance,
  getMatch,
  getTeamCurrentMatch,
  getTournamentMatches,
  recordResult,
  startBracket,
  type AdvanceOutcome,
} from "../../src/services/matchService.js";
import { addBotTeams, setTeamReady } from "../../src/services/teamService.js";
import {
  getTournament,
  resetBracket,
} from "../../src/services/tournamentService.js";
import {
  DuplicateResultError,
  InvalidBracketSizeError,
  InvalidScoreError,
  InvalidTournamentStateError,
  MatchNotFoundError,
  TiedScoreError,
  TournamentNotFoundError,
} from "../../src/services/errors.js";
import type { Database } from "../../src/db/db.js";

const keepOrder = (names: readonly string[]) => [...names];
const MISSING_ID = "00000000-0000-4000-8000-000000000000";

/** Team A wins every pending match 2-1, then the bracket is advanced */
async function playPending(db: Database, tournamentId: string): Promise<AdvanceOutcome> {
  const all = await getTournamentMatches(db, tournamentId);
  for (const match of all.filter((m) => m.status === "pending")) {
    await recordResult(db, match.id, 2, 1);
  }
  return advance(db, tournamentId);
}

describe("matchService", () => {
  let testDb: TestDb;
  let db: Database;

  beforeEach(async () => {
    testDb = await createTestDb();
    db = testDb.db;
  });

  afterEach(async () => {
    await testDb.close();
  });

  describe("startBracket", () => {
    it("creates round 1 from the ready teams and starts the tournament", async () => {
      const tournament = await seedTournament(db);
      await seedReadyTeams(db, tournament.id, ["Alpha", "Bravo", "Charlie", "Delta"]);

      const result = await startBracket(db, tournament.id, { seedOrder: keepOrder });

      expect(result.seeds).toEqual(["Alpha", "Bravo", "Charlie", "Delta"]);
      expect(result.matchesCreated).toBe(2);
      expect(result.effects.map((e) => e.type)).toEqual([
        "createMatchChannel",
        "createMatchChannel",
        "publishBracket",
      ]);

      const rows = await getTournamentMatches(db, tournament.id);
      expect(rows.map((m) => [m.round, m.position, m.teamA, m.teamB, m.status])).toEqual([
        [1, 0, "Alpha", "Bravo", "pending"],
        [1, 1, "Charlie", "Delta", "pending"],
      ]);
      expect((await getTournament(db, tournament.id))?.status).toBe("running");
    });

    it("uses the fixed-seed shuffle by default", async () => {
      const tournament = await seedTournament(db);
      await addBotTeams(db, tournament.id, 8);

      const result = await startBracket(db, tournament.id);

      expect(result.seeds).toHaveLength(8);
      expect([...result.seeds].sort()).toEqual(
        Array.from({ length: 8 }, (_, i) => `Bot Team ${i + 1}`).sort(),
      );
    });

    it("seeds only teams that are ready", async () => {
      const tournament = await seedTournament(db);
      await seedReadyTeams(db, tournament.id, ["Alpha", "Bravo", "Charlie"]);
      await setTeamReady(db, tournament.id, "captain-Charlie", false);

      const result = await startBracket(db, tournament.id, { seedOrder: keepOrder });

      expect(result.seeds).toEqual(["Alpha", "Bravo"]);
    });

    it("rejects an unsupported team count without touching anything", async () => {
      const tournament = await seedTournament(db);
      await seedReadyTeams(db, tournament.id, ["Alpha", "Bravo", "Charlie"]);

      await expect(startBracket(db, tournament.id)).rejects.toBeInstanceOf(
        InvalidBracketSizeError,
      );
      expect(await getTournamentMatches(db, tournament.id)).toEqual([]);
      expect((await getTournament(db, tournament.id))?.status).toBe("waiting");
    });

    it("refuses to start a running bracket twice", async () => {
      const tournament = await seedTournament(db);
      await seedReadyTeams(db, tournament.id, ["Alpha", "Bravo"]);
      await startBracket(db, tournament.id);

      await expect(startBracket(db, tournament.id)).rejects.toBeInstanceOf(
        InvalidTournamentStateError,
      );
    });

    it("reports unknown tournaments", async () => {
      await expect(startBracket(db, MISSING_ID)).rejects.toBeInstanceOf(
        TournamentNotFoundError,
      );
      await expect(startBracket(db, "not-a-uuid")).rejects.toBeInstanceOf(
        TournamentNotFoundError,
      );
    });

    it("can start again after a reset", async () => {
      const tournament = await seedTournament(db);
      await seedReadyTeams(db, tournament.id, ["Alpha", "Bravo"]);
      await startBracket(db, tournament.id, { seedOrder: keepOrder });
      await playPending(db, tournament.id);
      await resetBracket(db, tournament.id);

      const again = await startBracket(db, tournament.id, { seedOrder: keepOrder });

      expect(again.matchesCreated).toBe(1);
      const rows = await getTournamentMatches(db, tournament.id);
      expect(rows).toHaveLength(1);
      expect(rows[0]?.status).toBe("pending");
    });
  });

  describe("recordResult", () => {
    let matchId: string;

    beforeEach(async () => {
      const tournament = await seedTournament(db);
      await seedReadyTeams(db, tournament.id, ["Alpha", "Bravo"]);
      await startBracket(db, tournament.id, { seedOrder: keepOrder });
      const [match] = await getTournamentMatches(db, tournament.id);
      if (!match) throw new Error("round 1 was not created");
      matchId = match.id;
    });

    it("stores the score and picks the higher score as winner", async () => {
      const { match, effects } = await recordResult(db, matchId, 1, 3);

      expect(match.status).toBe("completed");
      expect(match.winner).toBe("Bravo");
      expect([match.scoreA, match.scoreB]).toEqual([1, 3]);
      expect(match.completedAt).toBeInstanceOf(Date);
      expect(effects).toEqual([
        {
          type: "announceResult",
          tournamentId: match.tournamentId,
          matchId,
          round: 1,
          teamA: "Alpha",
          teamB: "Bravo",
          scoreA: 1,
          scoreB: 3,
          winner: "Bravo",
        },
      ]);
    });

    it("rejects ties and leaves the match pending", async () => {
      await expect(recordResult(db, matchId, 2, 2)).rejects.toBeInstanceOf(TiedScoreError);

      expect(await getMatch(db, matchId)).toMatchObject({
        status: "pending",
        winner: null,
        scoreA: null,
        scoreB: null,
        completedAt: null,
      });
    });

    it("rejects negative, fractional and oversized scores", async () => {
      await expect(recordResult(db, matchId, -1, 2)).rejects.toBeInstanceOf(InvalidScoreError);
      await expect(recordResult(db, matchId, 1.5, 2)).rejects.toBeInstanceOf(InvalidScoreError);
      await expect(recordResult(db, matchId, 1000, 2)).rejects.toBeInstanceOf(InvalidScoreError);

      expect(await getMatch(db, matchId)).toMatchObject({
        status: "pending",
        winner: null,
        scoreA: null,
        scoreB: null,
      });
    });

    it("reports unknown matches", async () => {
      await expect(recordResult(db, MISSING_ID, 2, 1)).rejects.toBeInstanceOf(MatchNotFoundError);
      await expect(recordResult(db, "42", 2, 1)).rejects.toBeInstanceOf(MatchNotFoundError);
    });

    it("refuses a second result for the same match", async () => {
      await recordResult(db, matchId, 2, 1);
      await expect(recordResult(db, matchId, 0, 2)).rejects.toBeInstanceOf(
        DuplicateResultError,
      );
    });

    it("accepts exactly one of two simultaneous submissions", async () => {
      const outcomes = await Promise.allSettled([
        recordResult(db, matchId, 2, 1),
        recordResult(db, matchId, 0, 2),
      ]);

      const fulfilled = outcomes.filter((o) => o.status === "fulfilled");
      const rejected = outcomes.flatMap((o) => (o.status === "rejected" ? [o.reason] : []));
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]).toBeInstanceOf(DuplicateResultError);
    });
  });

  describe("advance", () => {
    it("is idle before the bracket starts", async () => {
      const tournament = await seedTournament(db);
      const outcome = await advance(db, tournament.id);
      expect(outcome).toEqual({ status: "idle", round: null, champion: null, effects: [] });
    });

    it("waits while the latest round has pending matches", async () => {
      const tournament = await seedTournament(db);
      await seedReadyTeams(db, tournament.id, ["Alpha", "Bravo", "Charlie", "Delta"]);
      await startBracket(db, tournament.id, { seedOrder: keepOrder });
      const [first] = await getTournamentMatches(db, tournament.id);
      if (!first) throw new Error("round 1 was not created");
      await recordResult(db, first.id, 2, 0);

      const outcome = await advance(db, tournament.id);

      expect(outcome.status).toBe("in_progress");
      expect(outcome.round).toBe(1);
      expect(outcome.effects).toEqual([{ type: "publishBracket", tournamentId: tournament.id }]);
      expect(await getTournamentMatches(db, tournament.id)).toHaveLength(2);
    });

    it("pairs the winners of a finished round by position", async () => {
      const tournament = await seedTournament(db);
      await seedReadyTeams(db, tournament.id, ["Alpha", "Bravo", "Charlie", "Delta"]);
      await startBracket(db, tournament.id, { seedOrder: keepOrder });
      const [first, second] = await getTournamentMatches(db, tournament.id);
      if (!first || !second) throw new Error("round 1 was not created");
      await recordResult(db, second.id, 0, 5);
      await recordResult(db, first.id, 1, 0);

      const outcome = await advance(db, tournament.id);

      expect(outcome.status).toBe("next_round");
      expect(outcome.round).toBe(2);
      expect(outcome.effects).toMatchObject([
        {
          type: "createMatchChannel",
          round: 2,
          totalRounds: 2,
          position: 0,
          teamA: "Alpha",
          teamB: "Delta",
        },
        { type: "publishBracket" },
      ]);
    });

    it("creates the next round only once when called repeatedly", async () => {
      const tournament = await seedTournament(db);
      await seedReadyTeams(db, tournament.id, ["Alpha", "Bravo", "Charlie", "Delta"]);
      await startBracket(db, tournament.id, { seedOrder: keepOrder });

      const first = await playPending(db, tournament.id);
      const second = await advance(db, tournament.id);

      expect(first.status).toBe("next_round");
      expect(second.status).toBe("in_progress");
      expect(second.effects.map((e) => e.type)).toEqual(["publishBracket"]);
      const finals = (await getTournamentMatches(db, tournament.id)).filter((m) => m.round === 2);
      expect(finals).toHaveLength(1);
    });

    it("creates the next round only once under concurrent callers", async () => {
      const tournament = await seedTournament(db);
      await seedReadyTeams(db, tournament.id, teamNames(8));
      await startBracket(db, tournament.id, { seedOrder: keepOrder });
      for (const match of await getTournamentMatches(db, tournament.id)) {
        await recordResult(db, match.id, 3, 1);
      }

      const outcomes = await Promise.all([
        advance(db, tournament.id),
        advance(db, tournament.id),
        advance(db, tournament.id),
      ]);

      const created = outcomes.flatMap((o) => o.effects).filter(
        (e) => e.type === "createMatchChannel",
      );
      expect(created).toHaveLength(2);
      const roundTwo = (await getTournamentMatches(db, tournament.id)).filter((m) => m.round === 2);
      expect(roundTwo.map((m) => [m.position, m.teamA, m.teamB])).toEqual([
        [0, "Team 1", "Team 3"],
        [1, "Team 5", "Team 7"],
      ]);
    });

    it("crowns the champion once and finishes the tournament", async () => {
      const tournament = await seedTournament(db);
      await seedReadyTeams(db, tournament.id, ["Alpha", "Bravo"]);
      await startBracket(db, tournament.id, { seedOrder: keepOrder });

      const final = await playPending(db, tournament.id);
      const repeat = await advance(db, tournament.id);

      expect(final).toEqual({
        status: "finished",
        round: 1,
        champion: "Alpha",
        effects: [
          { type: "publishBracket", tournamentId: tournament.id },
          { type: "announceChampion", tournamentId: tournament.id, champion: "Alpha" },
        ],
      });
      expect(repeat.status).toBe("finished");
      expect(repeat.champion).toBe("Alpha");
      expect(repeat.effects).toEqual([{ type: "publishBracket", tournamentId: tournament.id }]);
      expect((await getTournament(db, tournament.id))?.status).toBe("finished");
    });

    it.each([2, 4, 8, 16, 32])("plays a %i-team bracket to the end", async (size) => {
      const tournament = await seedTournament(db);
      await addBotTeams(db, tournament.id, size);
      await startBracket(db, tournament.id, { seedOrder: keepOrder });

      let outcome = await playPending(db, tournament.id);
      while (outcome.status === "next_round") {
        outcome = await playPending(db, tournament.id);
      }

      const rounds = Math.log2(size);
      expect(outcome.status).toBe("finished");
      expect(outcome.round).toBe(rounds);
      expect(outcome.champion).toBe("Bot Team 1");

      const rows = await getTournamentMatches(db, tournament.id);
      const perRound = Array.from(
        { length: rounds },
        (_, r) => rows.filter((m) => m.round === r + 1).length,
      );
      expect(perRound).toEqual(
        Array.from({ length: rounds }, (_, r) => size / 2 ** (r + 1)),
      );
      expect(rows.every((m) => m.status === "completed" && m.winner !== null)).toBe(true);
    });
  });

  describe("getTeamCurrentMatch", () => {
    it("finds the latest pending match of a team", async () => {
      const tournament = await seedTournament(db);
      await seedReadyTeams(db, tournament.id, ["Alpha", "Bravo", "Charlie", "Delta"]);
      await startBracket(db, tournament.id, { seedOrder: keepOrder });
      await playPending(db, tournament.id);

      const current = await getTeamCurrentMatch(db, tournament.id, "Charlie");
      const knockedOut = await getTeamCurrentMatch(db, tournament.id, "Bravo");

      expect([current?.round, current?.teamA, current?.teamB]).toEqual([2, "Alpha", "Charlie"]);
      expect(knockedOut).toBeUndefined();
    });
  });
});
