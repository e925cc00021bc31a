import type { Context } from "grammy";
import type { BracketDeps } from "../services/bracketEffects.js";

export interface BotContext extends Context {
  deps: BracketDeps;
}
