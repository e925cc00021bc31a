import { InlineKeyboard } from "grammy";
import { getRoundName } from "../../services/bracketGenerator.js";
import type { MatchChannelContext } from "../../services/channelService.js";
import { escapeHtml, mentionUser } from "../../utils/messageHelpers.js";
import type { Match } from "../@types/match.js";

export interface ScoreInput {
  scoreA: number;
  scoreB: number;
}

/**
 * Get match status emoji
 */
export function getMatchStatusEmoji(status: Match["status"]): string {
  return status === "completed" ? "✅" : "⏳";
}

/**
 * First message of a match topic
 */
export function formatMatchIntro(context: MatchChannelContext): string {
  const roundName = getRoundName(context.round, context.totalRounds);
  const captains = context.captains.map((captain) =>
    mentionUser(captain.captainId, `${captain.teamName} captain`),
  );

  let text = `⚔️ <b>${escapeHtml(context.teamA)}</b> vs <b>${escapeHtml(context.teamB)}</b>\n`;
  text += `${escapeHtml(context.tournamentName)}, ${roundName}, best of ${context.bestOf}\n`;
  if (captains.length > 0) text += `\n${captains.join(", ")}\n`;
  if (context.screenshotProof) {
    text += `\n📸 Post a screenshot of the final score here before reporting it.\n`;
  }
  text += `\nWhen the match is over, press the button below or send /score A B.`;
  return text;
}

export function matchScoreKeyboard(matchId: string): InlineKeyboard {
  return new InlineKeyboard().text("📊 Score match", `match:score:${matchId}`);
}

/**
 * Format match card
 */
export function formatMatchCard(match: Match, totalRounds: number): string {
  let text = `${getMatchStatusEmoji(match.status)} <b>${getRoundName(match.round, totalRounds)}</b>, match ${match.position + 1}\n`;
  text += `${escapeHtml(match.teamA)} vs ${escapeHtml(match.teamB)}`;

  if (match.status === "completed") {
    text += `\nScore: ${match.scoreA ?? 0} : ${match.scoreB ?? 0}`;
    if (match.winner) text += `\nWinner: ${escapeHtml(match.winner)}`;
  }

  return text;
}

/**
 * Parse "3-1", "3:1" or "3 1". Range and tie checks are left to recordResult.
 */
export function parseScoreInput(text: string): ScoreInput | null {
  const match = /^\s*(\d{1,3})\s*(?:[-:]|\s)\s*(\d{1,3})\s*$/.exec(text);
  if (!match?.[1] || !match[2]) return null;
  return { scoreA: Number(match[1]), scoreB: Number(match[2]) };
}
