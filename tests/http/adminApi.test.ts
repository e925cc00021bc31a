/**
 * Admin HTTP API: JWT auth, validation, error mapping and the bracket
 * start / result flow. Requests go through app.request, no socket is opened.
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestDb, type TestDb } from "../helpers/testDb.js";
import { FakeChannels, FakeNotifier } from "../helpers/fakes.js";
import { seedReadyTeams, seedTournament } from "../helpers/seed.js";
import jwt from "jsonwebtoken";
import { createAdminServer, errorStatus } from "../../src/admin/server/index.js";
import { signAdminToken } from "../../src/admin/server/middleware.js";
import { getTournamentMatches, recordResult } from "../../src/services/matchService.js";
import { getTournament } from "../../src/services/tournamentService.js";
import {
  DuplicateResultError,
  InvalidSettingsError,
  StoreContentionError,
  TiedScoreError,
} from "../../src/services/errors.js";
import type { Match } from "../../src/bot/@types/match.js";
import type { Tournament } from "../../src/bot/@types/tournament.js";

const SECRET = "test-secret-0123456789";
const TOKEN = signAdminToken(SECRET, "tester");
const MISSING_ID = "00000000-0000-4000-8000-000000000000";

describe("admin API", () => {
  let testDb: TestDb;
  let app: ReturnType<typeof createAdminServer>;
  let tournament: Tournament;

  function call(path: string, init: RequestInit = {}, token: string | null = TOKEN) {
    const headers = new Headers(init.headers);
    if (token !== null) headers.set("Authorization", `Bearer ${token}`);
    return app.request(path, { ...init, headers });
  }

  function postJson(path: string, body: unknown) {
    return call(path, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  async function firstMatch(): Promise<Match> {
    const [match] = await getTournamentMatches(testDb.db, tournament.id);
    if (!match) throw new Error("no match");
    return match;
  }

  beforeEach(async () => {
    testDb = await createTestDb();
    app = createAdminServer(
      { db: testDb.db, channels: new FakeChannels(), notifier: new FakeNotifier() },
      { jwtSecret: SECRET },
    );
    tournament = await seedTournament(testDb.db);
  });

  afterEach(async () => {
    await testDb.close();
  });

  describe("auth", () => {
    it("leaves the health check open", async () => {
      const res = await app.request("/api/health");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ ok: true });
    });

    it("needs a bearer token", async () => {
      const res = await call(`/api/tournaments/${tournament.id}`, {}, null);
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "Unauthorized" });
    });

    it("rejects tokens signed with another secret", async () => {
      const forged = signAdminToken("another-secret-0123", "tester");
      const res = await call(`/api/tournaments/${tournament.id}`, {}, forged);
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "Invalid token" });
    });

    it("rejects expired tokens", async () => {
      const expired = jwt.sign(
        { role: "admin", exp: Math.floor(Date.now() / 1000) - 60 },
        SECRET,
        { subject: "tester" },
      );
      const res = await call(`/api/tournaments/${tournament.id}`, {}, expired);
      expect(res.status).toBe(401);
    });

    it("rejects tokens without a subject", async () => {
      const anonymous = jwt.sign({ role: "admin" }, SECRET);
      const res = await call(`/api/tournaments/${tournament.id}`, {}, anonymous);
      expect(res.status).toBe(401);
    });

    it("needs the admin role", async () => {
      const viewer = signAdminToken(SECRET, "tester", "viewer");
      const res = await call(`/api/tournaments/${tournament.id}`, {}, viewer);
      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({ error: "Forbidden" });
    });
  });

  describe("tournaments", () => {
    it("returns a tournament", async () => {
      const res = await call(`/api/tournaments/${tournament.id}`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { id: tournament.id, name: "Test Cup", status: "waiting" },
      });
    });

    it("validates the id", async () => {
      const res = await call("/api/tournaments/not-a-uuid");
      expect(res.status).toBe(400);
    });

    it("returns 404 for unknown tournaments", async () => {
      const res = await call(`/api/tournaments/${MISSING_ID}`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Tournament not found" });
    });

    it("lists teams in registration order", async () => {
      await seedReadyTeams(testDb.db, tournament.id, ["Zulu", "Alpha"]);
      const res = await call(`/api/tournaments/${tournament.id}/teams`);
      expect(await res.json()).toMatchObject({
        data: [{ name: "Zulu" }, { name: "Alpha" }],
      });
    });

    it("has no bracket before the start", async () => {
      const res = await call(`/api/tournaments/${tournament.id}/bracket`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Bracket not started" });
    });

    it("maps an invalid team count to 400", async () => {
      await seedReadyTeams(testDb.db, tournament.id, ["Alpha", "Bravo", "Charlie"]);

      const res = await call(`/api/tournaments/${tournament.id}/start`, { method: "POST" });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "Bracket size must be 2, 4, 8, 16 or 32 ready teams (found 3)",
        code: "InvalidBracketSize",
      });
    });

    it("starts, shows and resets the bracket", async () => {
      await seedReadyTeams(testDb.db, tournament.id, ["Alpha", "Bravo", "Charlie", "Delta"]);

      const start = await call(`/api/tournaments/${tournament.id}/start`, { method: "POST" });
      expect(start.status).toBe(201);
      const names = ["Alpha", "Bravo", "Charlie", "Delta"];
      expect(await start.json()).toMatchObject({
        data: { matchesCreated: 2, seeds: expect.arrayContaining(names) },
      });

      const bracket = await call(`/api/tournaments/${tournament.id}/bracket`);
      expect(await bracket.json()).toEqual({
        data: {
          seeds: expect.arrayContaining(names),
          columns: [expect.arrayContaining(names), [null, null], [null]],
          eliminatedSlots: [],
          lossRounds: {},
          champion: null,
        },
      });

      const image = await call(`/api/tournaments/${tournament.id}/bracket.png`);
      expect(image.status).toBe(200);
      expect(image.headers.get("Content-Type")).toBe("image/png");

      const again = await call(`/api/tournaments/${tournament.id}/start`, { method: "POST" });
      expect(again.status).toBe(409);
      expect(await again.json()).toMatchObject({ code: "InvalidTournamentState" });

      const reset = await call(`/api/tournaments/${tournament.id}/reset`, { method: "POST" });
      expect(await reset.json()).toEqual({ ok: true });
      const matches = await call(`/api/tournaments/${tournament.id}/matches`);
      expect(await matches.json()).toEqual({ data: [] });
    });
  });

  describe("match results", () => {
    beforeEach(async () => {
      await seedReadyTeams(testDb.db, tournament.id, ["Alpha", "Bravo"]);
      await call(`/api/tournaments/${tournament.id}/start`, { method: "POST" });
    });

    it("records the result and reports the bracket state", async () => {
      const match = await firstMatch();

      const res = await postJson(`/api/matches/${match.id}/result`, { scoreA: 1, scoreB: 4 });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: {
          match: { id: match.id, status: "completed", winner: match.teamB, scoreA: 1, scoreB: 4 },
          bracket: "finished",
          champion: match.teamB,
        },
      });
    });

    it("answers 409 for a second result", async () => {
      const { id } = await firstMatch();
      await postJson(`/api/matches/${id}/result`, { scoreA: 2, scoreB: 0 });

      const res = await postJson(`/api/matches/${id}/result`, { scoreA: 0, scoreB: 2 });

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: "This match already has a result",
        code: "DuplicateResult",
      });
    });

    it("answers 400 for a tie", async () => {
      const { id } = await firstMatch();
      const res = await postJson(`/api/matches/${id}/result`, { scoreA: 1, scoreB: 1 });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: "TiedScore" });
    });

    it("validates the score body", async () => {
      const { id } = await firstMatch();
      const res = await postJson(`/api/matches/${id}/result`, { scoreA: -1, scoreB: 2 });
      expect(res.status).toBe(400);
      expect((await firstMatch()).status).toBe("pending");
    });

    it("advances a bracket whose result was stored without advancing", async () => {
      const match = await firstMatch();
      await recordResult(testDb.db, match.id, 3, 1);

      const res = await call(`/api/tournaments/${tournament.id}/advance`, { method: "POST" });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: { status: "finished", round: 1, champion: match.teamA },
      });
      expect((await getTournament(testDb.db, tournament.id))?.status).toBe("finished");

      const missing = await call(`/api/tournaments/${MISSING_ID}/advance`, { method: "POST" });
      expect(missing.status).toBe(404);
    });

    it("returns 404 for unknown matches", async () => {
      const get = await call(`/api/matches/${MISSING_ID}`);
      expect(get.status).toBe(404);

      const post = await postJson(`/api/matches/${MISSING_ID}/result`, { scoreA: 2, scoreB: 1 });
      expect(post.status).toBe(404);
      expect(await post.json()).toMatchObject({ code: "MatchNotFound" });
    });
  });
});

describe("errorStatus", () => {
  it("maps domain errors and falls back to 500", () => {
    expect(errorStatus(new TiedScoreError())).toBe(400);
    expect(errorStatus(new DuplicateResultError("m1"))).toBe(409);
    expect(errorStatus(new InvalidSettingsError("Invalid bestOf"))).toBe(400);
    expect(errorStatus(new StoreContentionError(5, null))).toBe(503);
    expect(errorStatus(new Error("boom"))).toBe(500);
  });
});
