import type { Context, InlineKeyboard } from "grammy";
import { GrammyError } from "grammy";

/**
 * Options for safe edit message text operation
 */
export interface SafeEditOptions {
  text: string;
  parse_mode?: "HTML";
  reply_markup?: InlineKeyboard;
}

/**
 * Safely edit message text with automatic fallback to sending new message
 *
 * Handles Telegram editMessageText errors:
 * - "message is not modified" - silently ignored
 * - "message can't be edited" (48h limit) - sends new message instead
 * - Other errors - propagated to caller
 */
export async function safeEditMessageText(
  ctx: Context,
  options: SafeEditOptions,
): Promise<void> {
  const { text, parse_mode, reply_markup } = options;

  try {
    await ctx.editMessageText(text, {
      ...(parse_mode && { parse_mode }),
      ...(reply_markup && { reply_markup }),
    });
  } catch (error) {
    if (error instanceof GrammyError) {
      if (
        error.error_code === 400 &&
        !error.description.includes("message is not modified")
      ) {
        await ctx.reply(text, {
          ...(parse_mode && { parse_mode }),
          ...(reply_markup && { reply_markup }),
        });
      }
      return;
    }

    throw error;
  }
}

/**
 * Escape user-provided text for parse_mode "HTML"
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/**
 * Inline mention by user id. Test teams have no Telegram user behind them.
 */
export function mentionUser(userId: string, label: string): string {
  if (!/^\d+$/.test(userId)) return escapeHtml(label);
  return `<a href="tg://user?id=${userId}">${escapeHtml(label)}</a>`;
}
