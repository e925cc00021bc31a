import { Hono, type MiddlewareHandler } from "hono";
import { zValidator } from "@hono/zod-validator";
import { z } from "zod";
import type { ApiBracket } from "../../../bot/@types/api.js";
import type { BracketDeps } from "../../../services/bracketEffects.js";
import { renderBracket } from "../../../services/bracketRenderer.js";
import {
  getBracketProjection,
  getTournamentMatches,
} from "../../../services/matchService.js";
import { getTeams } from "../../../services/teamService.js";
import { getTournament } from "../../../services/tournamentService.js";
import {
  advanceBracket,
  resetBracketFull,
  startBracketFull,
} from "../../../services/tournamentStartService.js";

const idParam = zValidator("param", z.object({ id: z.string().uuid() }));

export function createTournamentsRouter(
  deps: BracketDeps,
  requireAdmin: MiddlewareHandler,
) {
  const router = new Hono();

  router.use("/*", requireAdmin);

  // Get single tournament
  router.get("/:id", idParam, async (c) => {
    const tournament = await getTournament(deps.db, c.req.valid("param").id);
    if (!tournament) {
      return c.json({ error: "Tournament not found" }, 404);
    }
    return c.json({ data: tournament });
  });

  router.get("/:id/teams", idParam, async (c) => {
    const teams = await getTeams(deps.db, c.req.valid("param").id);
    return c.json({ data: teams });
  });

  // List all matches for a tournament
  router.get("/:id/matches", idParam, async (c) => {
    const matches = await getTournamentMatches(deps.db, c.req.valid("param").id);
    return c.json({ data: matches });
  });

  router.get("/:id/bracket", idParam, async (c) => {
    const projection = await getBracketProjection(deps.db, c.req.valid("param").id);
    if (!projection) {
      return c.json({ error: "Bracket not started" }, 404);
    }

    const bracket: ApiBracket = {
      seeds: projection.seeds,
      columns: projection.columns,
      eliminatedSlots: projection.eliminatedSlots,
      lossRounds: Object.fromEntries(projection.lossRounds),
      champion: projection.champion,
    };
    return c.json({ data: bracket });
  });

  router.get("/:id/bracket.png", idParam, async (c) => {
    const projection = await getBracketProjection(deps.db, c.req.valid("param").id);
    if (!projection) {
      return c.json({ error: "Bracket not started" }, 404);
    }

    const png = await renderBracket(projection);
    return c.body(new Uint8Array(png), 200, {
      "Content-Type": "image/png",
      "Cache-Control": "no-store",
    });
  });

  router.post("/:id/start", idParam, async (c) => {
    const { id } = c.req.valid("param");
    console.log(`Admin ${c.get("adminUser").name} starting bracket of ${id}`);
    const result = await startBracketFull(deps, id);
    return c.json({ data: result }, 201);
  });

  router.post("/:id/advance", idParam, async (c) => {
    const { id } = c.req.valid("param");
    console.log(`Admin ${c.get("adminUser").name} advancing bracket of ${id}`);
    const { status, round, champion } = await advanceBracket(deps, id);
    return c.json({ data: { status, round, champion } });
  });

  router.post("/:id/reset", idParam, async (c) => {
    const { id } = c.req.valid("param");
    console.log(`Admin ${c.get("adminUser").name} resetting bracket of ${id}`);
    await resetBracketFull(deps, id);
    return c.json({ ok: true });
  });

  return router;
}
