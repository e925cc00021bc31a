import type {
  BracketFormat,
  JoinStatus,
  TournamentStatus,
} from "../bot/@types/tournament.js";

export const FORMAT_LABELS: Record<BracketFormat, string> = {
  single_elimination: "Single elimination",
  double_elimination: "Double elimination",
};

export const STATUS_LABELS: Record<TournamentStatus, string> = {
  waiting: "Registration",
  running: "Bracket running",
  finished: "Finished",
};

export const JOIN_STATUS_LABELS: Record<JoinStatus, string> = {
  open: "Open",
  closed: "Closed",
};

/** Name of the forum topic that holds the bracket image and announcements */
export const BRACKET_TOPIC_NAME = "🏆 Bracket";

export const BRACKET_IMAGE_FILENAME = "tournament_bracket.png";

/** Test teams added per /bots_add when no amount is given */
export const DEFAULT_BOT_TEAMS = 4;
