import { Hono } from "hono";
import { cors } from "hono/cors";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { ApiError } from "../../bot/@types/api.js";
import type { BracketDeps } from "../../services/bracketEffects.js";
import { BracketError, describeError } from "../../services/errors.js";
import { createRequireAdmin } from "./middleware.js";
import { createMatchesRouter } from "./routes/matches.js";
import { createTournamentsRouter } from "./routes/tournaments.js";

export interface AdminServerOptions {
  /** HMAC secret the admin tokens are signed with */
  jwtSecret: string;
  /** Allow the local dev origin through CORS */
  allowDevOrigin?: boolean;
}

const STATUS_BY_CODE: Record<string, ContentfulStatusCode> = {
  InvalidBracketSize: 400,
  UnsupportedBracketSize: 400,
  TiedScore: 400,
  InvalidScore: 400,
  InvalidSettings: 400,
  TeamRegistration: 400,
  MatchNotFound: 404,
  TournamentNotFound: 404,
  DuplicateResult: 409,
  InvalidTournamentState: 409,
  StoreContention: 503,
};

export function errorStatus(error: unknown): ContentfulStatusCode {
  if (error instanceof BracketError) return STATUS_BY_CODE[error.code] ?? 500;
  return 500;
}

export function createAdminServer(deps: BracketDeps, options: AdminServerOptions) {
  const app = new Hono();
  const requireAdmin = createRequireAdmin(options.jwtSecret);

  if (options.allowDevOrigin) {
    app.use(
      "/api/*",
      cors({
        origin: "http://localhost:5173",
        credentials: true,
      }),
    );
  }

  // Health check
  app.get("/api/health", (c) => c.json({ ok: true }));

  app.route("/api/tournaments", createTournamentsRouter(deps, requireAdmin));
  app.route("/api/matches", createMatchesRouter(deps, requireAdmin));

  app.onError((error, c) => {
    const status = errorStatus(error);
    if (status >= 500) {
      console.error(`Admin API ${c.req.method} ${c.req.path} failed:`, error);
    }
    const body: ApiError = { error: describeError(error) };
    if (error instanceof BracketError) body.code = error.code;
    return c.json(body, status);
  });

  return app;
}
