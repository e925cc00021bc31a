import type { NextFunction } from "grammy";
import type { BracketDeps } from "../../services/bracketEffects.js";
import type { BotContext } from "../types.js";

/**
 * Expose the database and platform collaborators to every handler
 */
export function depsMiddleware(deps: BracketDeps) {
  return async (ctx: BotContext, next: NextFunction): Promise<void> => {
    ctx.deps = deps;
    return next();
  };
}
