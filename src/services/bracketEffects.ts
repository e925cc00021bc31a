import type { Database } from "../db/db.js";
import type { Tournament } from "../bot/@types/tournament.js";
import {
  formatBracketCaption,
  formatChampionAnnouncement,
  formatResultAnnouncement,
} from "../bot/ui/tournamentUI.js";
import { renderBracket } from "./bracketRenderer.js";
import type { ChannelLifecycle, MatchCaptain } from "./channelService.js";
import {
  BracketChannelMissingError,
  MissingTeamError,
  RenderFailureError,
} from "./errors.js";
import {
  getBracketProjection,
  setMatchChannel,
  type BracketEffect,
} from "./matchService.js";
import type { BracketChannel, BracketNotifier } from "./notificationService.js";
import { getTeamByName } from "./teamService.js";
import {
  getTournament,
  setBracketTopic,
  swapBracketMessage,
} from "./tournamentService.js";

/** What the bracket needs from the outside world */
export interface BracketDeps {
  db: Database;
  channels: ChannelLifecycle;
  notifier: BracketNotifier;
}

type EffectOf<T extends BracketEffect["type"]> = Extract<
  BracketEffect,
  { type: T }
>;

async function resolveBracketChannel(
  deps: BracketDeps,
  tournament: Tournament,
  storedTopicId: number | null,
): Promise<BracketChannel> {
  const channel = await deps.notifier.findOrCreateBracketChannel(
    tournament.chatId,
    storedTopicId,
  );
  if (channel.threadId !== tournament.bracketTopicId) {
    await setBracketTopic(deps.db, tournament.id, channel.threadId);
  }
  return channel;
}

/**
 * Post to the bracket topic. A topic deleted by an admin is forgotten and
 * the post is retried once in a fresh one.
 */
async function postToBracketChannel<T>(
  deps: BracketDeps,
  tournament: Tournament,
  post: (channel: BracketChannel) => Promise<T>,
): Promise<{ channel: BracketChannel; result: T }> {
  const channel = await resolveBracketChannel(
    deps,
    tournament,
    tournament.bracketTopicId,
  );
  try {
    return { channel, result: await post(channel) };
  } catch (error) {
    if (!(error instanceof BracketChannelMissingError)) throw error;
    console.warn(
      `Tournament ${tournament.id}: ${error.message}, opening a new bracket topic`,
    );
    const fresh = await resolveBracketChannel(deps, tournament, null);
    return { channel: fresh, result: await post(fresh) };
  }
}

async function createMatchChannel(
  deps: BracketDeps,
  tournament: Tournament,
  effect: EffectOf<"createMatchChannel">,
): Promise<void> {
  const captains: MatchCaptain[] = [];
  for (const teamName of [effect.teamA, effect.teamB]) {
    const team = await getTeamByName(deps.db, tournament.id, teamName);
    if (!team) {
      console.warn(
        `Match ${effect.matchId}: ${new MissingTeamError(teamName).message}, creating the channel without it`,
      );
      continue;
    }
    captains.push({ teamName, captainId: team.captainId });
  }

  const channelRef = await deps.channels.createMatchChannel({
    chatId: tournament.chatId,
    tournamentName: tournament.name,
    matchId: effect.matchId,
    round: effect.round,
    totalRounds: effect.totalRounds,
    position: effect.position,
    teamA: effect.teamA,
    teamB: effect.teamB,
    bestOf: tournament.bestOf,
    screenshotProof: tournament.screenshotProof,
    captains,
  });
  if (channelRef !== null) {
    await setMatchChannel(deps.db, effect.matchId, channelRef);
  }
}

async function publishBracket(
  deps: BracketDeps,
  tournament: Tournament,
): Promise<void> {
  const projection = await getBracketProjection(deps.db, tournament.id);
  if (!projection) return;

  let png: Buffer;
  try {
    png = await renderBracket(projection);
  } catch (error) {
    const failure =
      error instanceof RenderFailureError ? error : new RenderFailureError(error);
    console.error(
      `Tournament ${tournament.id}: ${failure.message}, bracket not posted:`,
      failure.cause,
    );
    return;
  }

  const caption = formatBracketCaption(tournament, projection);
  const { channel, result: messageId } = await postToBracketChannel(
    deps,
    tournament,
    (target) => deps.notifier.postImage(target, png, caption),
  );

  const previous = await swapBracketMessage(deps.db, tournament.id, messageId);
  if (previous !== null && previous !== messageId) {
    try {
      await deps.notifier.deleteMessage(channel, previous);
    } catch (error) {
      console.warn(
        `Tournament ${tournament.id}: could not delete old bracket message ${previous}:`,
        error,
      );
    }
  }
}

async function runEffect(
  deps: BracketDeps,
  effect: BracketEffect,
): Promise<void> {
  const tournament = await getTournament(deps.db, effect.tournamentId);
  if (!tournament) {
    console.warn(
      `Skipping ${effect.type}: tournament ${effect.tournamentId} no longer exists`,
    );
    return;
  }

  switch (effect.type) {
    case "createMatchChannel":
      await createMatchChannel(deps, tournament, effect);
      return;
    case "deleteMatchChannel":
      await deps.channels.deleteChannel(tournament.chatId, effect.channelRef);
      await setMatchChannel(deps.db, effect.matchId, null);
      return;
    case "publishBracket":
      await publishBracket(deps, tournament);
      return;
    case "announceResult": {
      const text = formatResultAnnouncement(effect);
      await postToBracketChannel(deps, tournament, (channel) =>
        deps.notifier.postText(channel, text),
      );
      return;
    }
    case "announceChampion": {
      const text = formatChampionAnnouncement(tournament, effect.champion);
      await postToBracketChannel(deps, tournament, (channel) =>
        deps.notifier.postText(channel, text),
      );
      return;
    }
  }
}

/**
 * Carry out effects in order. A failing effect is logged and the rest still
 * run; match rows are never rolled back for a platform failure.
 */
export async function executeBracketEffects(
  deps: BracketDeps,
  effects: readonly BracketEffect[],
): Promise<void> {
  for (const effect of effects) {
    try {
      await runEffect(deps, effect);
    } catch (error) {
      console.error(
        `Bracket effect ${effect.type} failed for tournament ${effect.tournamentId}:`,
        error,
      );
    }
  }
}

/**
 * Best-effort removal of match channels outside a state transition
 * (bracket reset, tournament deletion)
 */
export async function retireChannels(
  deps: BracketDeps,
  chatId: string,
  channelRefs: readonly string[],
): Promise<void> {
  for (const channelRef of channelRefs) {
    try {
      await deps.channels.deleteChannel(chatId, channelRef);
    } catch (error) {
      console.error(`Failed to delete match channel ${channelRef}:`, error);
    }
  }
}
