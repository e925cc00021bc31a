import type { Api } from "grammy";
import { getRoundName } from "./bracketGenerator.js";
import {
  formatMatchIntro,
  matchScoreKeyboard,
} from "../bot/ui/matchUI.js";

/** Telegram caps forum topic names at 128 characters */
const TOPIC_NAME_LIMIT = 128;

export interface MatchCaptain {
  teamName: string;
  captainId: string;
}

export interface MatchChannelContext {
  chatId: string;
  tournamentName: string;
  matchId: string;
  round: number;
  totalRounds: number;
  position: number;
  teamA: string;
  teamB: string;
  bestOf: number;
  screenshotProof: boolean;
  /** Captains of the teams that are still registered */
  captains: MatchCaptain[];
}

/**
 * Private per-match channels. Returns an opaque handle that is stored on the
 * match row and handed back to deleteChannel, or null when the match is
 * played in the main chat.
 */
export interface ChannelLifecycle {
  createMatchChannel(context: MatchChannelContext): Promise<string | null>;
  deleteChannel(chatId: string, channelRef: string): Promise<void>;
}

export type ChannelApi = Pick<
  Api,
  "createForumTopic" | "deleteForumTopic" | "sendMessage"
>;

export function matchTopicName(context: MatchChannelContext): string {
  const name = `${getRoundName(context.round, context.totalRounds)} · ${context.teamA} vs ${context.teamB}`;
  return Array.from(name).slice(0, TOPIC_NAME_LIMIT).join("");
}

async function postMatchIntro(
  api: ChannelApi,
  context: MatchChannelContext,
  threadId?: number,
): Promise<void> {
  await api.sendMessage(context.chatId, formatMatchIntro(context), {
    ...(threadId === undefined ? {} : { message_thread_id: threadId }),
    parse_mode: "HTML",
    reply_markup: matchScoreKeyboard(context.matchId),
  });
}

/**
 * Match channels as forum topics of the tournament supergroup. The topic id
 * is the handle. Groups without topics get the intro in the main chat.
 */
export function createTelegramChannelService(api: ChannelApi): ChannelLifecycle {
  return {
    async createMatchChannel(context) {
      let threadId: number;
      try {
        const topic = await api.createForumTopic(
          context.chatId,
          matchTopicName(context),
        );
        threadId = topic.message_thread_id;
      } catch (error) {
        console.warn(
          `Match ${context.matchId}: could not create a topic in chat ${context.chatId}, posting to the main chat:`,
          error,
        );
        await postMatchIntro(api, context);
        return null;
      }

      // The topic exists from here on; keep its handle so it can be removed
      try {
        await postMatchIntro(api, context, threadId);
      } catch (error) {
        console.error(
          `Match ${context.matchId}: topic ${threadId} created but the intro was not posted:`,
          error,
        );
      }

      console.log(
        `Match ${context.matchId}: topic ${threadId} created in chat ${context.chatId}`,
      );
      return String(threadId);
    },

    async deleteChannel(chatId, channelRef) {
      const threadId = Number(channelRef);
      if (!Number.isInteger(threadId)) {
        console.warn(`Ignoring malformed topic reference "${channelRef}"`);
        return;
      }
      await api.deleteForumTopic(chatId, threadId);
    },
  };
}
