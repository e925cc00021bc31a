import type { Match } from "./@types/match.js";
import type { Tournament } from "./@types/tournament.js";
import { getTeamByName } from "../services/teamService.js";
import type { BotContext } from "./types.js";

/**
 * Creator or administrator of the current group
 */
export async function isChatAdmin(ctx: BotContext): Promise<boolean> {
  if (!ctx.chat || !ctx.from || ctx.chat.type === "private") return false;

  const member = await ctx.getChatMember(ctx.from.id);
  return member.status === "creator" || member.status === "administrator";
}

export interface ScorePermission {
  isAdmin: boolean;
  captainScoring: boolean;
  userId: string;
  captainIds: readonly string[];
}

/**
 * Admins can always score; captains of the two teams only with captain
 * scoring switched on
 */
export function canScoreMatch(permission: ScorePermission): boolean {
  if (permission.isAdmin) return true;
  return (
    permission.captainScoring &&
    permission.captainIds.includes(permission.userId)
  );
}

export async function canUserScoreMatch(
  ctx: BotContext,
  tournament: Tournament,
  match: Match,
): Promise<boolean> {
  if (!ctx.from) return false;

  const captainIds: string[] = [];
  for (const teamName of [match.teamA, match.teamB]) {
    const team = await getTeamByName(ctx.deps.db, tournament.id, teamName);
    if (team) captainIds.push(team.captainId);
  }

  return canScoreMatch({
    isAdmin: await isChatAdmin(ctx),
    captainScoring: tournament.captainScoring,
    userId: String(ctx.from.id),
    captainIds,
  });
}
