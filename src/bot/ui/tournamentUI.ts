import { InlineKeyboard } from "grammy";
import type { BracketProjection } from "../../services/bracketProjection.js";
import { getRoundName } from "../../services/bracketGenerator.js";
import {
  FORMAT_LABELS,
  JOIN_STATUS_LABELS,
  STATUS_LABELS,
} from "../../utils/constants.js";
import { escapeHtml } from "../../utils/messageHelpers.js";
import type { TeamWithMembers, Tournament } from "../@types/tournament.js";

export interface ResultSummary {
  teamA: string;
  teamB: string;
  scoreA: number;
  scoreB: number;
  winner: string;
}

/**
 * Build tournament details message
 */
export function buildTournamentMessage(
  tournament: Tournament,
  teams: TeamWithMembers[],
  isAdmin: boolean,
): string {
  const readyCount = teams.filter((team) => team.isReady).length;

  return (
    `🏆 <b>${escapeHtml(tournament.name)}</b>\n\n` +
    `Status: ${STATUS_LABELS[tournament.status]}\n` +
    `Format: ${FORMAT_LABELS[tournament.bracketFormat]}\n` +
    `Team size: ${tournament.teamSize}\n` +
    `Best of: ${tournament.bestOf}\n` +
    `Teams: ${teams.length}/${tournament.maxTeams} (${readyCount} ready)\n` +
    `Registration: ${JOIN_STATUS_LABELS[tournament.joinStatus]}\n` +
    `Captain scoring: ${tournament.captainScoring ? "on" : "off"}\n` +
    `Screenshot proof: ${tournament.screenshotProof ? "on" : "off"}` +
    (isAdmin ? `\n\nID: <code>${tournament.id}</code>` : "")
  );
}

/**
 * Build keyboard for tournament details view
 */
export function buildTournamentKeyboard(
  tournament: Tournament,
  isAdmin: boolean,
): InlineKeyboard {
  const keyboard = new InlineKeyboard();

  if (tournament.status !== "waiting") {
    keyboard.text("📊 Bracket", `bracket:view:${tournament.id}`).row();
  }

  if (isAdmin && tournament.status === "waiting") {
    keyboard
      .text(
        tournament.joinStatus === "open" ? "Close registration" : "Open registration",
        `t:join:${tournament.id}`,
      )
      .row();
    keyboard
      .text("Toggle format", `t:format:${tournament.id}`)
      .text("Captain scoring", `t:captains:${tournament.id}`)
      .row();
    keyboard.text("Screenshot proof", `t:proof:${tournament.id}`).row();
    keyboard.text("🚀 Start bracket", `t:start:${tournament.id}`).row();
  }

  return keyboard;
}

export function buildDeleteConfirmKeyboard(tournamentId: string): InlineKeyboard {
  return new InlineKeyboard()
    .text("🗑 Delete", `t:delete:${tournamentId}`)
    .text("Cancel", "t:delete_cancel");
}

/**
 * Roster listing, registration order
 */
export function buildTeamsMessage(
  tournament: Tournament,
  teams: TeamWithMembers[],
): string {
  if (teams.length === 0) {
    return "No teams yet. Register one with /create_team &lt;name&gt;.";
  }

  const lines = teams.map((team, i) => {
    const marker = team.isReady ? "✅" : "⏳";
    const bot = team.isBot ? " 🤖" : "";
    return `${i + 1}. ${marker} ${escapeHtml(team.name)}${bot} (${team.memberCount}/${tournament.teamSize})`;
  });

  return `<b>Teams (${teams.length}/${tournament.maxTeams})</b>\n\n${lines.join("\n")}`;
}

/** First round with an undecided slot, or the final once everything is decided */
export function currentRound(projection: BracketProjection): number {
  const totalRounds = projection.columns.length - 1;
  for (let round = 1; round <= totalRounds; round++) {
    if (projection.columns[round]?.some((slot) => slot === null)) return round;
  }
  return totalRounds;
}

export function formatBracketCaption(
  tournament: Tournament,
  projection: BracketProjection,
): string {
  const title = `🏆 <b>${escapeHtml(tournament.name)}</b>`;
  if (projection.champion) {
    return `${title}\nChampion: <b>${escapeHtml(projection.champion)}</b>`;
  }
  const totalRounds = projection.columns.length - 1;
  return `${title}\n${getRoundName(currentRound(projection), totalRounds)} in progress`;
}

export function formatResultAnnouncement(result: ResultSummary): string {
  return (
    `🎯 <b>${escapeHtml(result.teamA)}</b> ${result.scoreA} : ${result.scoreB} <b>${escapeHtml(result.teamB)}</b>\n` +
    `Winner: ${escapeHtml(result.winner)}`
  );
}

export function formatChampionAnnouncement(
  tournament: Tournament,
  champion: string,
): string {
  return `🏆 <b>${escapeHtml(champion)}</b> won ${escapeHtml(tournament.name)}!`;
}
