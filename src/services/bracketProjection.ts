import type { Match } from "../bot/@types/match.js";
import { calculateRounds, isValidBracketSize } from "./bracketGenerator.js";
import { UnsupportedBracketSizeError } from "./errors.js";

/** A box in the drawn bracket: column index (0 = seeds) and slot within it */
export interface BracketSlot {
  round: number;
  slot: number;
}

export interface BracketProjection {
  /** Round-1 order, reconstructed from the round-1 match rows */
  seeds: string[];
  /**
   * columns[0] = seeds, columns[r] = winners of round r by match position,
   * null while undecided. Always log2(N) + 1 columns.
   */
  columns: (string | null)[][];
  /** Where each beaten team gets its X: the column it lost from */
  eliminatedSlots: BracketSlot[];
  /** Round number each beaten team lost in */
  lossRounds: Map<string, number>;
  champion: string | null;
}

export type ProjectionMatch = Pick<
  Match,
  "round" | "position" | "teamA" | "teamB" | "winner" | "status"
>;

function byRoundAndPosition(a: ProjectionMatch, b: ProjectionMatch): number {
  return a.round - b.round || a.position - b.position;
}

function decidedWinner(match: ProjectionMatch): string | null {
  if (match.status !== "completed" || !match.winner) return null;
  if (match.winner !== match.teamA && match.winner !== match.teamB) return null;
  return match.winner;
}

/**
 * Derive the per-round, per-slot view used for rendering. Depends only on the
 * persisted rows, so it can be rebuilt at any time (e.g. after a restart).
 * Returns null when the bracket has not been started.
 */
export function buildBracketProjection(
  rows: readonly ProjectionMatch[],
): BracketProjection | null {
  const ordered = [...rows].sort(byRoundAndPosition);
  const roundOne = ordered.filter((m) => m.round === 1);
  if (roundOne.length === 0) return null;

  const seeds = roundOne.flatMap((m) => [m.teamA, m.teamB]);
  if (!isValidBracketSize(seeds.length)) {
    throw new UnsupportedBracketSizeError(seeds.length);
  }

  const totalRounds = calculateRounds(seeds.length);
  const columns: (string | null)[][] = [seeds];
  for (let round = 1; round <= totalRounds; round++) {
    columns.push(new Array<string | null>(seeds.length >> round).fill(null));
  }

  const lossRounds = new Map<string, number>();
  const losers: string[] = [];

  for (const match of ordered) {
    const column = columns[match.round];
    const winner = decidedWinner(match);
    if (!column || winner === null) continue;
    if (match.position < 0 || match.position >= column.length) continue;

    column[match.position] = winner;

    const loser = winner === match.teamA ? match.teamB : match.teamA;
    const earlier = lossRounds.get(loser);
    if (earlier === undefined) {
      losers.push(loser);
      lossRounds.set(loser, match.round);
    } else if (match.round < earlier) {
      lossRounds.set(loser, match.round);
    }
  }

  const eliminatedSlots: BracketSlot[] = [];
  for (const loser of losers) {
    const round = lossRounds.get(loser);
    if (round === undefined) continue;
    const slot = columns[round - 1]?.indexOf(loser) ?? -1;
    if (slot >= 0) eliminatedSlots.push({ round: round - 1, slot });
  }

  const champion = columns[totalRounds]?.[0] ?? null;

  return { seeds, columns, eliminatedSlots, lossRounds, champion };
}
