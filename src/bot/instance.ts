import { Bot, GrammyError, HttpError } from "grammy";
import type { Database } from "../db/db.js";
import type { BracketDeps } from "../services/bracketEffects.js";
import { createTelegramChannelService } from "../services/channelService.js";
import { describeError } from "../services/errors.js";
import { createTelegramNotifier } from "../services/notificationService.js";
import { matchCommands } from "./handlers/matchCommands.js";
import { registrationCommands } from "./handlers/registrationCommands.js";
import { tournamentCommands } from "./handlers/tournamentCommands.js";
import { depsMiddleware } from "./middleware/deps.js";
import type { BotContext } from "./types.js";

export interface BotInstance {
  bot: Bot<BotContext>;
  deps: BracketDeps;
}

/**
 * Bot wired to the database and to Telegram-backed channel/notification
 * collaborators
 */
export function createBot(token: string, db: Database): BotInstance {
  const bot = new Bot<BotContext>(token);
  const deps: BracketDeps = {
    db,
    channels: createTelegramChannelService(bot.api),
    notifier: createTelegramNotifier(bot.api),
  };

  bot.use(depsMiddleware(deps));
  bot.use(tournamentCommands);
  bot.use(registrationCommands);
  bot.use(matchCommands);

  bot.catch(async (err) => {
    const { error, ctx } = err;
    console.error(`Error while handling update ${ctx.update.update_id}:`);
    if (error instanceof GrammyError) {
      console.error("Error in request:", error.description);
    } else if (error instanceof HttpError) {
      console.error("Could not contact Telegram:", error);
    } else {
      console.error("Unknown error:", error);
    }

    try {
      await ctx.reply(describeError(error));
    } catch (replyError) {
      console.error("Could not send the failure notice:", replyError);
    }
  });

  return { bot, deps };
}
