import type { StartBracketResponse } from "../bot/@types/api.js";
import {
  executeBracketEffects,
  retireChannels,
  type BracketDeps,
} from "./bracketEffects.js";
import { DuplicateResultError } from "./errors.js";
import {
  advance,
  getMatch,
  recordResult,
  startBracket,
  type AdvanceOutcome,
  type RecordResultOutcome,
  type StartBracketOptions,
} from "./matchService.js";
import type { Match } from "../bot/@types/match.js";
import {
  deleteTournament,
  getRunningTournaments,
  requireTournament,
  resetBracket,
} from "./tournamentService.js";

export interface SubmitResultOutcome {
  match: Match;
  advance: AdvanceOutcome;
}

/**
 * Full bracket start orchestration:
 * 1. Seed ready teams and create round 1 (one transaction)
 * 2. Remove channels of a previous bracket
 * 3. Open a channel per first-round match
 * 4. Publish the bracket image
 */
export async function startBracketFull(
  deps: BracketDeps,
  tournamentId: string,
  options?: StartBracketOptions,
): Promise<StartBracketResponse> {
  const { matchesCreated, seeds, effects } = await startBracket(
    deps.db,
    tournamentId,
    options,
  );
  await executeBracketEffects(deps, effects);
  return { matchesCreated, seeds };
}

/**
 * Advance outside a result submission, for a bracket whose last result of
 * a round was stored but never advanced. Effects run only when the
 * transition created matches or crowned the champion.
 */
export async function advanceBracket(
  deps: BracketDeps,
  tournamentId: string,
): Promise<AdvanceOutcome> {
  const advanced = await advance(deps.db, tournamentId);
  if (advanced.effects.some((effect) => effect.type !== "publishBracket")) {
    await executeBracketEffects(deps, advanced.effects);
  }
  return advanced;
}

/**
 * Catch up every running bracket, e.g. after a restart between a stored
 * result and its advance. Returns the number of brackets that moved.
 */
export async function resumeBrackets(deps: BracketDeps): Promise<number> {
  let resumed = 0;
  for (const tournament of await getRunningTournaments(deps.db)) {
    try {
      const outcome = await advanceBracket(deps, tournament.id);
      if (outcome.status === "next_round" || outcome.status === "finished") {
        console.log(
          `Tournament ${tournament.id}: bracket resumed, ${outcome.status} (round ${outcome.round})`,
        );
        resumed += 1;
      }
    } catch (error) {
      console.error(`Tournament ${tournament.id}: could not resume bracket:`, error);
    }
  }
  return resumed;
}

async function catchUpAfterDuplicate(
  deps: BracketDeps,
  matchId: string,
): Promise<void> {
  try {
    const match = await getMatch(deps.db, matchId);
    if (match) await advanceBracket(deps, match.tournamentId);
  } catch (error) {
    console.error(`Match ${matchId}: catching up the bracket failed:`, error);
  }
}

/**
 * Record a score and move the bracket on. If advancing fails, the effects
 * of the stored result still run before the error propagates. A repeated
 * submission still advances a bracket that was left behind.
 */
export async function submitMatchResult(
  deps: BracketDeps,
  matchId: string,
  scoreA: number,
  scoreB: number,
): Promise<SubmitResultOutcome> {
  let recorded: RecordResultOutcome;
  try {
    recorded = await recordResult(deps.db, matchId, scoreA, scoreB);
  } catch (error) {
    if (error instanceof DuplicateResultError) {
      await catchUpAfterDuplicate(deps, matchId);
    }
    throw error;
  }

  let advanced: AdvanceOutcome;
  try {
    advanced = await advance(deps.db, recorded.match.tournamentId);
  } catch (error) {
    await executeBracketEffects(deps, recorded.effects);
    throw error;
  }

  await executeBracketEffects(deps, [
    ...recorded.effects,
    ...advanced.effects,
  ]);
  return { match: recorded.match, advance: advanced };
}

/**
 * Drop the bracket and close its match channels
 */
export async function resetBracketFull(
  deps: BracketDeps,
  tournamentId: string,
): Promise<void> {
  const tournament = await requireTournament(deps.db, tournamentId);
  const channelRefs = await resetBracket(deps.db, tournamentId);
  await retireChannels(deps, tournament.chatId, channelRefs);
}

export async function deleteTournamentFull(
  deps: BracketDeps,
  tournamentId: string,
): Promise<void> {
  const tournament = await requireTournament(deps.db, tournamentId);
  const channelRefs = await deleteTournament(deps.db, tournamentId);
  await retireChannels(deps, tournament.chatId, channelRefs);
}
