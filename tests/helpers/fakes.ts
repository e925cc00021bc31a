import type {
  ChannelLifecycle,
  MatchChannelContext,
} from "../../src/services/channelService.js";
import type {
  BracketChannel,
  BracketNotifier,
} from "../../src/services/notificationService.js";
import { BracketChannelMissingError } from "../../src/services/errors.js";

export class FakeChannels implements ChannelLifecycle {
  created: MatchChannelContext[] = [];
  deleted: { chatId: string; channelRef: string }[] = [];
  failCreate = false;
  failDelete = false;
  /** Group without topics: matches are played in the main chat */
  mainChatOnly = false;
  private nextRef = 100;

  async createMatchChannel(context: MatchChannelContext): Promise<string | null> {
    if (this.failCreate) throw new Error("topic creation refused");
    this.created.push(context);
    if (this.mainChatOnly) return null;
    const ref = String(this.nextRef);
    this.nextRef += 1;
    return ref;
  }

  async deleteChannel(chatId: string, channelRef: string): Promise<void> {
    if (this.failDelete) throw new Error("topic deletion refused");
    this.deleted.push({ chatId, channelRef });
  }
}

export const BRACKET_TOPIC_ID = 777;

export class FakeNotifier implements BracketNotifier {
  images: { channel: BracketChannel; png: Buffer; caption: string; messageId: number }[] = [];
  texts: { channel: BracketChannel; text: string }[] = [];
  deletedMessages: number[] = [];
  topicsCreated = 0;
  failImages = false;
  /** Topics deleted by hand in the chat */
  goneTopics = new Set<number>();
  private nextMessageId = 1;

  async findOrCreateBracketChannel(
    chatId: string,
    existingRef: number | null,
  ): Promise<BracketChannel> {
    if (existingRef !== null) return { chatId, threadId: existingRef };
    const threadId = BRACKET_TOPIC_ID + this.topicsCreated;
    this.topicsCreated += 1;
    return { chatId, threadId };
  }

  private ensureTopic(channel: BracketChannel): void {
    if (channel.threadId !== null && this.goneTopics.has(channel.threadId)) {
      throw new BracketChannelMissingError(
        channel.threadId,
        new Error("message thread not found"),
      );
    }
  }

  async postImage(
    channel: BracketChannel,
    png: Buffer,
    caption: string,
  ): Promise<number> {
    this.ensureTopic(channel);
    if (this.failImages) throw new Error("sendPhoto failed");
    const messageId = this.nextMessageId;
    this.nextMessageId += 1;
    this.images.push({ channel, png, caption, messageId });
    return messageId;
  }

  async postText(channel: BracketChannel, text: string): Promise<void> {
    this.ensureTopic(channel);
    this.texts.push({ channel, text });
  }

  async deleteMessage(_channel: BracketChannel, messageId: number): Promise<void> {
    this.deletedMessages.push(messageId);
  }
}
