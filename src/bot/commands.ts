import type { BotCommand } from "grammy/types";
import type { Bot } from "grammy";
import type { BotContext } from "./types.js";

const userCommands: BotCommand[] = [
  { command: "tournament", description: "Tournament info" },
  { command: "teams", description: "Registered teams" },
  { command: "create_team", description: "Register a team: /create_team <name>" },
  { command: "join_team", description: "Join a team: /join_team <name>" },
  { command: "leave_team", description: "Leave your team" },
  { command: "ready", description: "Mark your team ready (captain)" },
  { command: "unready", description: "Mark your team not ready (captain)" },
  { command: "disband", description: "Disband your team (captain)" },
  { command: "bracket", description: "Show the bracket" },
  { command: "my_match", description: "Your current match" },
  { command: "score", description: "Report a score in a match topic: /score 2 1" },
  { command: "cancel", description: "Stop entering a score" },
];

const adminCommands: BotCommand[] = [
  ...userCommands,
  { command: "create_tournament", description: "Create a tournament" },
  { command: "set", description: "Change a setting: /set best_of 3" },
  { command: "toggle_bracket", description: "Switch single/double elimination" },
  { command: "captain_scoring", description: "Let captains report scores" },
  { command: "screenshot_proof", description: "Require score screenshots" },
  { command: "close_join", description: "Close registration" },
  { command: "open_join", description: "Open registration" },
  { command: "start_bracket", description: "Seed ready teams and start" },
  { command: "advance_bracket", description: "Create the next round if it is due" },
  { command: "reset_bracket", description: "Drop the bracket" },
  { command: "delete_tournament", description: "Delete the tournament" },
  { command: "bots_add", description: "Add ready test teams" },
  { command: "bots_clear", description: "Remove test teams" },
];

export async function setupCommands(bot: Bot<BotContext>): Promise<void> {
  try {
    await bot.api.setMyCommands(userCommands, {
      scope: { type: "all_group_chats" },
    });
    await bot.api.setMyCommands(adminCommands, {
      scope: { type: "all_chat_administrators" },
    });
  } catch (error) {
    console.error("Failed to register bot commands:", error);
  }
}

export { userCommands, adminCommands };
