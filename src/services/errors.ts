/**
 * Domain errors raised by the bracket subsystem. `code` is stable and is what
 * the bot and the admin API switch on.
 */
export class BracketError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidBracketSizeError extends BracketError {
  constructor(readonly teamCount: number) {
    super(
      "InvalidBracketSize",
      `Bracket size must be 2, 4, 8, 16 or 32 ready teams (found ${teamCount})`,
    );
  }
}

export class UnsupportedBracketSizeError extends BracketError {
  constructor(readonly teamCount: number) {
    super(
      "UnsupportedBracketSize",
      `Cannot render a bracket for ${teamCount} teams`,
    );
  }
}

export class TiedScoreError extends BracketError {
  constructor() {
    super("TiedScore", "Scores cannot be tied, one team has to win");
  }
}

export class InvalidScoreError extends BracketError {
  constructor() {
    super("InvalidScore", "Scores must be whole numbers between 0 and 999");
  }
}

export class DuplicateResultError extends BracketError {
  constructor(readonly matchId: string) {
    super("DuplicateResult", "This match already has a result");
  }
}

export class MatchNotFoundError extends BracketError {
  constructor(readonly matchId: string) {
    super("MatchNotFound", "Match not found");
  }
}

export class TournamentNotFoundError extends BracketError {
  constructor(readonly tournamentId: string) {
    super("TournamentNotFound", "Tournament not found");
  }
}

export class InvalidTournamentStateError extends BracketError {
  constructor(message: string) {
    super("InvalidTournamentState", message);
  }
}

export class InvalidSettingsError extends BracketError {
  constructor(message: string) {
    super("InvalidSettings", message);
  }
}

export class TeamRegistrationError extends BracketError {
  constructor(message: string) {
    super("TeamRegistration", message);
  }
}

export class MissingTeamError extends BracketError {
  constructor(readonly teamName: string) {
    super("MissingTeam", `Team "${teamName}" is no longer registered`);
  }
}

export class StoreContentionError extends BracketError {
  constructor(attempts: number, cause: unknown) {
    super(
      "StoreContention",
      `Database stayed busy after ${attempts} attempts`,
      { cause },
    );
  }
}

/** The stored bracket topic was deleted on the platform side */
export class BracketChannelMissingError extends BracketError {
  constructor(readonly threadId: number, cause: unknown) {
    super("BracketChannelMissing", `Bracket topic ${threadId} no longer exists`, {
      cause,
    });
  }
}

export class RenderFailureError extends BracketError {
  constructor(cause: unknown) {
    super("RenderFailure", "Could not draw the bracket image", { cause });
  }
}

const USER_FACING_CODES = new Set([
  "InvalidBracketSize",
  "UnsupportedBracketSize",
  "TiedScore",
  "InvalidScore",
  "DuplicateResult",
  "MatchNotFound",
  "TournamentNotFound",
  "InvalidTournamentState",
  "InvalidSettings",
  "TeamRegistration",
]);

export function isUserFacingError(error: unknown): error is BracketError {
  return error instanceof BracketError && USER_FACING_CODES.has(error.code);
}

/**
 * Plain-language text for a failure. Validation errors carry their own
 * message; anything else becomes a generic notice.
 */
export function describeError(error: unknown): string {
  if (isUserFacingError(error)) {
    return error.message;
  }
  if (error instanceof StoreContentionError) {
    return "The tournament database is busy right now, please try again in a moment.";
  }
  return "Something went wrong, please try again later.";
}
