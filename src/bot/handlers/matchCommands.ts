import { Composer, InputFile } from "grammy";
import type { MaybeInaccessibleMessage } from "grammy/types";
import type { BotContext } from "../types.js";
import { groupOnly, replyWithError, requireChatTournament } from "../guards.js";
import { canUserScoreMatch } from "../permissions.js";
import { PendingScoreEntries, type ScoreEntryKey } from "../scoreEntries.js";
import {
  formatMatchCard,
  matchScoreKeyboard,
  parseScoreInput,
} from "../ui/matchUI.js";
import { formatBracketCaption } from "../ui/tournamentUI.js";
import { renderBracket } from "../../services/bracketRenderer.js";
import { calculateRounds } from "../../services/bracketGenerator.js";
import {
  getBracketProjection,
  getMatch,
  getMatchByChannel,
  getTeamCurrentMatch,
} from "../../services/matchService.js";
import { getTeamForUser } from "../../services/teamService.js";
import { getTournament } from "../../services/tournamentService.js";
import { submitMatchResult } from "../../services/tournamentStartService.js";
import { BRACKET_IMAGE_FILENAME } from "../../utils/constants.js";
import { escapeHtml } from "../../utils/messageHelpers.js";
import type { Match } from "../@types/match.js";
import type { Tournament } from "../@types/tournament.js";

export const matchCommands = new Composer<BotContext>();

const pendingScores = new PendingScoreEntries();

function scoreKey(
  ctx: BotContext,
  message: MaybeInaccessibleMessage | undefined,
): ScoreEntryKey | undefined {
  if (!ctx.chat || !ctx.from) return undefined;
  let threadId: number | undefined;
  if (message && "is_topic_message" in message && message.is_topic_message) {
    threadId = message.message_thread_id;
  }
  return { chatId: ctx.chat.id, threadId, userId: ctx.from.id };
}

async function showBracket(ctx: BotContext, tournamentId: string) {
  const tournament = await getTournament(ctx.deps.db, tournamentId);
  const projection = tournament
    ? await getBracketProjection(ctx.deps.db, tournament.id)
    : null;
  if (!tournament || !projection) {
    await ctx.reply("The bracket has not started yet.");
    return;
  }

  try {
    const png = await renderBracket(projection);
    await ctx.replyWithPhoto(new InputFile(png, BRACKET_IMAGE_FILENAME), {
      caption: formatBracketCaption(tournament, projection),
      parse_mode: "HTML",
    });
  } catch (error) {
    await replyWithError(ctx, error);
  }
}

async function scoreMatch(
  ctx: BotContext,
  tournament: Tournament,
  match: Match,
  scoreA: number,
  scoreB: number,
) {
  try {
    const { advance } = await submitMatchResult(ctx.deps, match.id, scoreA, scoreB);
    console.log(
      `Match ${match.id} scored ${scoreA}-${scoreB} by user ${ctx.from?.id}, bracket ${advance.status}`,
    );
    // The match topic is gone once the result is in; confirm in the main chat
    await ctx.api.sendMessage(
      tournament.chatId,
      `✅ Result saved: ${escapeHtml(match.teamA)} ${scoreA} : ${scoreB} ${escapeHtml(match.teamB)}`,
      { parse_mode: "HTML" },
    );
  } catch (error) {
    await replyWithError(ctx, error);
  }
}

matchCommands.command("bracket", groupOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;
  await showBracket(ctx, tournament.id);
});

matchCommands.callbackQuery(/^bracket:view:(.+)$/, async (ctx) => {
  await ctx.answerCallbackQuery();
  await showBracket(ctx, ctx.match[1] ?? "");
});

matchCommands.command("my_match", groupOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament || !ctx.from) return;

  const team = await getTeamForUser(ctx.deps.db, tournament.id, String(ctx.from.id));
  if (!team) {
    await ctx.reply("You are not in a team.");
    return;
  }

  const match = await getTeamCurrentMatch(ctx.deps.db, tournament.id, team.name);
  if (!match) {
    await ctx.reply(
      tournament.status === "running"
        ? `${team.name} has no match to play right now.`
        : "The bracket is not running.",
    );
    return;
  }

  const projection = await getBracketProjection(ctx.deps.db, tournament.id);
  const totalRounds = projection ? calculateRounds(projection.seeds.length) : match.round;
  await ctx.reply(formatMatchCard(match, totalRounds), {
    parse_mode: "HTML",
    reply_markup: matchScoreKeyboard(match.id),
  });
});

// /score A B inside a match topic, or in the main chat for the sender's team
matchCommands.command("score", groupOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;

  const threadId = scoreKey(ctx, ctx.msg)?.threadId;
  let match: Match | undefined;
  if (threadId !== undefined) {
    match = await getMatchByChannel(ctx.deps.db, tournament.id, String(threadId));
  } else if (ctx.from) {
    const team = await getTeamForUser(ctx.deps.db, tournament.id, String(ctx.from.id));
    match = team
      ? await getTeamCurrentMatch(ctx.deps.db, tournament.id, team.name)
      : undefined;
  }
  if (!match) {
    await ctx.reply("Use /score inside the match topic, or press 📊 Score match.");
    return;
  }

  const score = parseScoreInput(ctx.match);
  if (!score) {
    await ctx.reply(`Usage: /score <${match.teamA} score> <${match.teamB} score>`);
    return;
  }

  if (!(await canUserScoreMatch(ctx, tournament, match))) {
    await ctx.reply("You are not allowed to report this match.");
    return;
  }

  await scoreMatch(ctx, tournament, match, score.scoreA, score.scoreB);
});

matchCommands.callbackQuery(/^match:score:(.+)$/, async (ctx) => {
  const match = await getMatch(ctx.deps.db, ctx.match[1] ?? "");
  const tournament = match
    ? await getTournament(ctx.deps.db, match.tournamentId)
    : undefined;
  if (!match || !tournament) {
    await ctx.answerCallbackQuery({ text: "Match not found", show_alert: true });
    return;
  }
  if (match.status === "completed") {
    await ctx.answerCallbackQuery({ text: "This match already has a result", show_alert: true });
    return;
  }
  if (!(await canUserScoreMatch(ctx, tournament, match))) {
    await ctx.answerCallbackQuery({
      text: "You are not allowed to report this match",
      show_alert: true,
    });
    return;
  }

  const key = scoreKey(ctx, ctx.callbackQuery.message);
  if (!key) return;
  pendingScores.start(key, match.id);

  await ctx.answerCallbackQuery();
  await ctx.reply(
    `Send the final score as <code>A-B</code>: ${escapeHtml(match.teamA)} first, ${escapeHtml(match.teamB)} second. /cancel to stop.`,
    { parse_mode: "HTML" },
  );
});

matchCommands.command("cancel", async (ctx) => {
  const key = scoreKey(ctx, ctx.msg);
  if (key && pendingScores.cancel(key)) {
    await ctx.reply("Score entry cancelled.");
  }
});

// Score text after the button; anything else goes on to the next handler
matchCommands.on("message:text", async (ctx, next) => {
  if (ctx.msg.text.startsWith("/")) return next();
  const key = scoreKey(ctx, ctx.msg);
  const outcome = key ? pendingScores.resolve(key, ctx.msg.text) : { kind: "none" as const };
  if (outcome.kind === "none") return next();
  if (outcome.kind === "cancelled") {
    await ctx.reply("That is not a score, entry cancelled. Press 📊 Score match to try again.");
    return;
  }

  const { matchId, score } = outcome;
  const match = await getMatch(ctx.deps.db, matchId);
  const tournament = match
    ? await getTournament(ctx.deps.db, match.tournamentId)
    : undefined;
  if (!match || !tournament) {
    await ctx.reply("Match not found.");
    return;
  }

  await scoreMatch(ctx, tournament, match, score.scoreA, score.scoreB);
});
