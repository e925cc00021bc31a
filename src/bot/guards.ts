import type { NextFunction } from "grammy";
import type { Tournament } from "./@types/tournament.js";
import { describeError, isUserFacingError } from "../services/errors.js";
import { getTournamentByChat } from "../services/tournamentService.js";
import { isChatAdmin } from "./permissions.js";
import type { BotContext } from "./types.js";

async function deny(ctx: BotContext, text: string): Promise<void> {
  if (ctx.callbackQuery) {
    await ctx.answerCallbackQuery({ text, show_alert: true });
  } else {
    await ctx.reply(text);
  }
}

export function adminOnly(
  errorMessage = "Only chat admins can use this command.",
) {
  return async (ctx: BotContext, next: NextFunction): Promise<void> => {
    if (!(await isChatAdmin(ctx))) {
      await deny(ctx, errorMessage);
      return;
    }
    return next();
  };
}

export function groupOnly(
  errorMessage = "This command only works in a group chat.",
) {
  return async (ctx: BotContext, next: NextFunction): Promise<void> => {
    if (ctx.chat?.type !== "group" && ctx.chat?.type !== "supergroup") {
      await deny(ctx, errorMessage);
      return;
    }
    return next();
  };
}

/**
 * The tournament of the current chat, or a reply saying there is none
 */
export async function requireChatTournament(
  ctx: BotContext,
): Promise<Tournament | undefined> {
  if (!ctx.chat) return undefined;

  const tournament = await getTournamentByChat(ctx.deps.db, String(ctx.chat.id));
  if (!tournament) {
    await deny(
      ctx,
      "There is no tournament in this chat. An admin can start one with /create_tournament <name>.",
    );
  }
  return tournament;
}

/**
 * Report a failed operation to the user. Anything that is not a validation
 * error is logged.
 */
export async function replyWithError(
  ctx: BotContext,
  error: unknown,
): Promise<void> {
  if (!isUserFacingError(error)) {
    console.error(`Update ${ctx.update.update_id} failed:`, error);
  }
  await deny(ctx, describeError(error));
}
