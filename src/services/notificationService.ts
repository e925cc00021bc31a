import { GrammyError, InputFile, type Api } from "grammy";
import { BRACKET_IMAGE_FILENAME, BRACKET_TOPIC_NAME } from "../utils/constants.js";
import { BracketChannelMissingError } from "./errors.js";

/** Where bracket images and announcements go: a topic, or the chat itself */
export interface BracketChannel {
  chatId: string;
  threadId: number | null;
}

export interface BracketNotifier {
  /** Reuse the stored bracket topic, or open a new one */
  findOrCreateBracketChannel(
    chatId: string,
    existingRef: number | null,
  ): Promise<BracketChannel>;
  /**
   * Post the bracket image; returns the message id. Throws
   * BracketChannelMissingError when the topic is gone.
   */
  postImage(channel: BracketChannel, png: Buffer, caption: string): Promise<number>;
  postText(channel: BracketChannel, text: string): Promise<void>;
  deleteMessage(channel: BracketChannel, messageId: number): Promise<void>;
}

export type NotifierApi = Pick<
  Api,
  "createForumTopic" | "sendPhoto" | "sendMessage" | "deleteMessage"
>;

function threadOptions(channel: BracketChannel) {
  return channel.threadId === null
    ? {}
    : { message_thread_id: channel.threadId };
}

function isThreadNotFound(error: unknown): boolean {
  return (
    error instanceof GrammyError &&
    error.error_code === 400 &&
    /message thread not found|topic_deleted|TOPIC_ID_INVALID/i.test(error.description)
  );
}

async function inChannel<T>(
  channel: BracketChannel,
  send: () => Promise<T>,
): Promise<T> {
  try {
    return await send();
  } catch (error) {
    if (channel.threadId !== null && isThreadNotFound(error)) {
      throw new BracketChannelMissingError(channel.threadId, error);
    }
    throw error;
  }
}

export function createTelegramNotifier(api: NotifierApi): BracketNotifier {
  return {
    async findOrCreateBracketChannel(chatId, existingRef) {
      if (existingRef !== null) return { chatId, threadId: existingRef };

      try {
        const topic = await api.createForumTopic(chatId, BRACKET_TOPIC_NAME);
        return { chatId, threadId: topic.message_thread_id };
      } catch (error) {
        console.warn(
          `Could not create bracket topic in chat ${chatId}, posting to the main chat:`,
          error,
        );
        return { chatId, threadId: null };
      }
    },

    async postImage(channel, png, caption) {
      const message = await inChannel(channel, () =>
        api.sendPhoto(channel.chatId, new InputFile(png, BRACKET_IMAGE_FILENAME), {
          caption,
          parse_mode: "HTML",
          ...threadOptions(channel),
        }),
      );
      return message.message_id;
    },

    async postText(channel, text) {
      await inChannel(channel, () =>
        api.sendMessage(channel.chatId, text, {
          parse_mode: "HTML",
          ...threadOptions(channel),
        }),
      );
    },

    async deleteMessage(channel, messageId) {
      await api.deleteMessage(channel.chatId, messageId);
    },
  };
}
