import { Composer } from "grammy";
import type { BotContext } from "../types.js";
import { adminOnly, groupOnly, replyWithError, requireChatTournament } from "../guards.js";
import { isChatAdmin } from "../permissions.js";
import {
  buildDeleteConfirmKeyboard,
  buildTournamentKeyboard,
  buildTournamentMessage,
} from "../ui/tournamentUI.js";
import {
  createTournament,
  getTournament,
  setJoinStatus,
  toggleBracketFormat,
  toggleCaptainScoring,
  toggleScreenshotProof,
  updateTournamentSettings,
  type TournamentSettings,
} from "../../services/tournamentService.js";
import { addBotTeams, clearBotTeams, getTeams } from "../../services/teamService.js";
import {
  advanceBracket,
  deleteTournamentFull,
  resetBracketFull,
  startBracketFull,
} from "../../services/tournamentStartService.js";
import { DEFAULT_BOT_TEAMS, FORMAT_LABELS } from "../../utils/constants.js";
import { escapeHtml, safeEditMessageText } from "../../utils/messageHelpers.js";
import type { Tournament } from "../@types/tournament.js";

export const tournamentCommands = new Composer<BotContext>();

type SettingField = "name" | "team_size" | "best_of" | "max_teams";

const SETTING_FIELDS: readonly SettingField[] = [
  "name",
  "team_size",
  "best_of",
  "max_teams",
];

function isSettingField(value: string): value is SettingField {
  return SETTING_FIELDS.some((field) => field === value);
}

function settingChange(
  field: SettingField,
  raw: string,
): Partial<TournamentSettings> {
  switch (field) {
    case "name":
      return { name: raw };
    case "team_size":
      return { teamSize: Number(raw) };
    case "best_of":
      return { bestOf: Number(raw) };
    case "max_teams":
      return { maxTeams: Number(raw) };
  }
}

async function showTournament(ctx: BotContext, tournament: Tournament) {
  const [teams, isAdmin] = await Promise.all([
    getTeams(ctx.deps.db, tournament.id),
    isChatAdmin(ctx),
  ]);
  await ctx.reply(buildTournamentMessage(tournament, teams, isAdmin), {
    parse_mode: "HTML",
    reply_markup: buildTournamentKeyboard(tournament, isAdmin),
  });
}

async function refreshTournamentMessage(ctx: BotContext, tournament: Tournament) {
  const teams = await getTeams(ctx.deps.db, tournament.id);
  await safeEditMessageText(ctx, {
    text: buildTournamentMessage(tournament, teams, true),
    parse_mode: "HTML",
    reply_markup: buildTournamentKeyboard(tournament, true),
  });
}

async function startBracketAndReport(ctx: BotContext, tournament: Tournament) {
  const result = await startBracketFull(ctx.deps, tournament.id);
  await ctx.reply(
    `🚀 Bracket started: ${result.seeds.length} teams, ${result.matchesCreated} first-round matches.`,
  );
}

tournamentCommands.command("create_tournament", groupOnly(), adminOnly(), async (ctx) => {
  const name = ctx.match.trim();
  if (!name || !ctx.chat) {
    await ctx.reply("Usage: /create_tournament <name>");
    return;
  }

  try {
    const tournament = await createTournament(ctx.deps.db, String(ctx.chat.id), {
      name,
    });
    console.log(`Tournament ${tournament.id} created in chat ${tournament.chatId}`);
    await showTournament(ctx, tournament);
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

tournamentCommands.command("tournament", groupOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;
  await showTournament(ctx, tournament);
});

tournamentCommands.command("set", groupOnly(), adminOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;

  const [field = "", ...rest] = ctx.match.trim().split(/\s+/);
  const raw = rest.join(" ");
  if (!isSettingField(field) || !raw) {
    await ctx.reply(
      "Usage: /set <name|team_size|best_of|max_teams> <value>\nExample: /set best_of 3",
    );
    return;
  }

  try {
    await updateTournamentSettings(
      ctx.deps.db,
      tournament.id,
      settingChange(field, raw),
    );
    await ctx.reply(`✅ ${field} updated.`);
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

tournamentCommands.command("toggle_bracket", groupOnly(), adminOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;

  const updated = await toggleBracketFormat(ctx.deps.db, tournament.id);
  let text = `Format: ${FORMAT_LABELS[updated.bracketFormat]}`;
  if (updated.bracketFormat === "double_elimination") {
    text += "\nNote: brackets are still played as single elimination.";
  }
  await ctx.reply(text);
});

tournamentCommands.command("captain_scoring", groupOnly(), adminOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;

  const updated = await toggleCaptainScoring(ctx.deps.db, tournament.id);
  await ctx.reply(
    updated.captainScoring
      ? "Captains can now report their match scores."
      : "Only admins can report match scores now.",
  );
});

tournamentCommands.command("screenshot_proof", groupOnly(), adminOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;

  const updated = await toggleScreenshotProof(ctx.deps.db, tournament.id);
  await ctx.reply(
    updated.screenshotProof
      ? "📸 Teams must post a screenshot of the final score before reporting."
      : "Screenshot proof is off.",
  );
});

tournamentCommands.command("close_join", groupOnly(), adminOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;

  await setJoinStatus(ctx.deps.db, tournament.id, "closed");
  await ctx.reply("🔒 Registration closed.");
});

tournamentCommands.command("open_join", groupOnly(), adminOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;

  await setJoinStatus(ctx.deps.db, tournament.id, "open");
  await ctx.reply("🔓 Registration open.");
});

tournamentCommands.command("start_bracket", groupOnly(), adminOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;

  try {
    await startBracketAndReport(ctx, tournament);
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

tournamentCommands.command("advance_bracket", groupOnly(), adminOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;

  try {
    const outcome = await advanceBracket(ctx.deps, tournament.id);
    switch (outcome.status) {
      case "next_round":
        await ctx.reply(`⏭ Round ${outcome.round} is on.`);
        return;
      case "finished":
        await ctx.reply(`🏆 The bracket is decided: ${outcome.champion ?? "no champion"}.`);
        return;
      case "in_progress":
        await ctx.reply(`Round ${outcome.round} still has matches to play.`);
        return;
      case "idle":
        await ctx.reply("The bracket has not started yet.");
        return;
    }
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

tournamentCommands.command("reset_bracket", groupOnly(), adminOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;

  try {
    await resetBracketFull(ctx.deps, tournament.id);
    await ctx.reply("♻️ Bracket reset. Teams can register again.");
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

tournamentCommands.command("delete_tournament", groupOnly(), adminOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;

  await ctx.reply(
    `Delete <b>${escapeHtml(tournament.name)}</b> with all teams and matches?`,
    {
      parse_mode: "HTML",
      reply_markup: buildDeleteConfirmKeyboard(tournament.id),
    },
  );
});

tournamentCommands.command("bots_add", groupOnly(), adminOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;

  const amount = ctx.match.trim() ? Number(ctx.match.trim()) : DEFAULT_BOT_TEAMS;
  if (!Number.isInteger(amount) || amount < 1) {
    await ctx.reply("Usage: /bots_add [amount]");
    return;
  }

  try {
    const added = await addBotTeams(ctx.deps.db, tournament.id, amount);
    await ctx.reply(
      added.length > 0
        ? `🤖 Added ${added.length} test teams.`
        : "No room for more teams.",
    );
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

tournamentCommands.command("bots_clear", groupOnly(), adminOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;

  try {
    const removed = await clearBotTeams(ctx.deps.db, tournament.id);
    await ctx.reply(`🧹 Removed ${removed} test teams.`);
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

// Tournament card buttons

tournamentCommands.callbackQuery(/^t:join:(.+)$/, adminOnly(), async (ctx) => {
  const tournament = await getTournament(ctx.deps.db, ctx.match[1] ?? "");
  if (!tournament) {
    await ctx.answerCallbackQuery({ text: "Tournament not found", show_alert: true });
    return;
  }

  const updated = await setJoinStatus(
    ctx.deps.db,
    tournament.id,
    tournament.joinStatus === "open" ? "closed" : "open",
  );
  await ctx.answerCallbackQuery(
    updated.joinStatus === "open" ? "Registration open" : "Registration closed",
  );
  await refreshTournamentMessage(ctx, updated);
});

tournamentCommands.callbackQuery(/^t:format:(.+)$/, adminOnly(), async (ctx) => {
  try {
    const updated = await toggleBracketFormat(ctx.deps.db, ctx.match[1] ?? "");
    await ctx.answerCallbackQuery(FORMAT_LABELS[updated.bracketFormat]);
    await refreshTournamentMessage(ctx, updated);
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

tournamentCommands.callbackQuery(/^t:captains:(.+)$/, adminOnly(), async (ctx) => {
  try {
    const updated = await toggleCaptainScoring(ctx.deps.db, ctx.match[1] ?? "");
    await ctx.answerCallbackQuery(
      updated.captainScoring ? "Captain scoring on" : "Captain scoring off",
    );
    await refreshTournamentMessage(ctx, updated);
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

tournamentCommands.callbackQuery(/^t:proof:(.+)$/, adminOnly(), async (ctx) => {
  try {
    const updated = await toggleScreenshotProof(ctx.deps.db, ctx.match[1] ?? "");
    await ctx.answerCallbackQuery(
      updated.screenshotProof ? "Screenshot proof on" : "Screenshot proof off",
    );
    await refreshTournamentMessage(ctx, updated);
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

tournamentCommands.callbackQuery(/^t:start:(.+)$/, adminOnly(), async (ctx) => {
  const tournament = await getTournament(ctx.deps.db, ctx.match[1] ?? "");
  if (!tournament) {
    await ctx.answerCallbackQuery({ text: "Tournament not found", show_alert: true });
    return;
  }

  try {
    await startBracketAndReport(ctx, tournament);
    await ctx.answerCallbackQuery();
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

tournamentCommands.callbackQuery(/^t:delete:(.+)$/, adminOnly(), async (ctx) => {
  try {
    await deleteTournamentFull(ctx.deps, ctx.match[1] ?? "");
    await ctx.answerCallbackQuery("Deleted");
    await safeEditMessageText(ctx, { text: "🗑 Tournament deleted." });
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

tournamentCommands.callbackQuery("t:delete_cancel", async (ctx) => {
  await ctx.answerCallbackQuery("Cancelled");
  await safeEditMessageText(ctx, { text: "Deletion cancelled." });
});
