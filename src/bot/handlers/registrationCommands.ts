import { Composer } from "grammy";
import type { BotContext } from "../types.js";
import { groupOnly, replyWithError, requireChatTournament } from "../guards.js";
import { buildTeamsMessage } from "../ui/tournamentUI.js";
import {
  createTeam,
  disbandTeam,
  getTeams,
  joinTeam,
  leaveTeam,
  setTeamReady,
  type Player,
} from "../../services/teamService.js";
import { escapeHtml } from "../../utils/messageHelpers.js";

export const registrationCommands = new Composer<BotContext>();

function playerOf(ctx: BotContext): Player | undefined {
  if (!ctx.from) return undefined;
  const displayName =
    ctx.from.username !== undefined
      ? `@${ctx.from.username}`
      : [ctx.from.first_name, ctx.from.last_name].filter(Boolean).join(" ");
  return { userId: String(ctx.from.id), displayName };
}

registrationCommands.command("create_team", groupOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  const player = playerOf(ctx);
  if (!tournament || !player) return;

  const name = ctx.match.trim();
  if (!name) {
    await ctx.reply("Usage: /create_team <team name>");
    return;
  }

  try {
    const team = await createTeam(ctx.deps.db, tournament.id, name, player);
    let text = `✅ Team <b>${escapeHtml(team.name)}</b> registered. You are the captain.`;
    text +=
      tournament.teamSize > 1
        ? `\nTeammates join with /join_team ${escapeHtml(team.name)}, then send /ready.`
        : "\nSend /ready when you are set.";
    await ctx.reply(text, { parse_mode: "HTML" });
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

registrationCommands.command("join_team", groupOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  const player = playerOf(ctx);
  if (!tournament || !player) return;

  const name = ctx.match.trim();
  if (!name) {
    await ctx.reply("Usage: /join_team <team name>");
    return;
  }

  try {
    const team = await joinTeam(ctx.deps.db, tournament.id, name, player);
    await ctx.reply(`👋 ${escapeHtml(player.displayName)} joined <b>${escapeHtml(team.name)}</b>.`, {
      parse_mode: "HTML",
    });
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

registrationCommands.command("leave_team", groupOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  const player = playerOf(ctx);
  if (!tournament || !player) return;

  try {
    const team = await leaveTeam(ctx.deps.db, tournament.id, player.userId);
    await ctx.reply(`You left <b>${escapeHtml(team.name)}</b>.`, {
      parse_mode: "HTML",
    });
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

registrationCommands.command(["ready", "unready"], groupOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  const player = playerOf(ctx);
  if (!tournament || !player) return;

  const ready = !ctx.hasCommand("unready");
  try {
    const team = await setTeamReady(ctx.deps.db, tournament.id, player.userId, ready);
    await ctx.reply(
      ready
        ? `✅ <b>${escapeHtml(team.name)}</b> is ready.`
        : `⏳ <b>${escapeHtml(team.name)}</b> is no longer ready.`,
      { parse_mode: "HTML" },
    );
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

registrationCommands.command("disband", groupOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  const player = playerOf(ctx);
  if (!tournament || !player) return;

  try {
    const team = await disbandTeam(ctx.deps.db, tournament.id, player.userId);
    await ctx.reply(`Team <b>${escapeHtml(team.name)}</b> disbanded.`, {
      parse_mode: "HTML",
    });
  } catch (error) {
    await replyWithError(ctx, error);
  }
});

registrationCommands.command("teams", groupOnly(), async (ctx) => {
  const tournament = await requireChatTournament(ctx);
  if (!tournament) return;

  const teams = await getTeams(ctx.deps.db, tournament.id);
  await ctx.reply(buildTeamsMessage(tournament, teams), { parse_mode: "HTML" });
});
