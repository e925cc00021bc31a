import { Hono, type MiddlewareHandler } from "hono";
import { zValidator } from "@hono/zod-validator";
import { z } from "zod";
import type { BracketDeps } from "../../../services/bracketEffects.js";
import { getMatch, MAX_SCORE } from "../../../services/matchService.js";
import { submitMatchResult } from "../../../services/tournamentStartService.js";

const idParam = zValidator("param", z.object({ id: z.string().uuid() }));

const score = z.number().int().min(0).max(MAX_SCORE);

export function createMatchesRouter(
  deps: BracketDeps,
  requireAdmin: MiddlewareHandler,
) {
  const router = new Hono();

  router.use("/*", requireAdmin);

  // Get single match
  router.get("/:id", idParam, async (c) => {
    const match = await getMatch(deps.db, c.req.valid("param").id);
    if (!match) return c.json({ error: "Match not found" }, 404);
    return c.json({ data: match });
  });

  // Record the final score and advance the bracket
  router.post(
    "/:id/result",
    idParam,
    zValidator("json", z.object({ scoreA: score, scoreB: score })),
    async (c) => {
      const { scoreA, scoreB } = c.req.valid("json");
      const { id } = c.req.valid("param");
      console.log(
        `Admin ${c.get("adminUser").name} reporting ${scoreA}-${scoreB} for match ${id}`,
      );
      const { match, advance } = await submitMatchResult(deps, id, scoreA, scoreB);
      return c.json({
        data: { match, bracket: advance.status, champion: advance.champion },
      });
    },
  );

  return router;
}
