export const VALID_BRACKET_SIZES = [2, 4, 8, 16, 32] as const;

/** Fixed shuffle seed: the same ready-team list always yields the same bracket */
export const BRACKET_SEED = 1;

export interface BracketPairing {
  position: number;
  teamA: string;
  teamB: string;
}

export function isValidBracketSize(teamCount: number): boolean {
  return VALID_BRACKET_SIZES.some((size) => size === teamCount);
}

/**
 * Calculate number of rounds needed for single elimination
 */
export function calculateRounds(bracketSize: number): number {
  return Math.log2(bracketSize);
}

/**
 * mulberry32: small deterministic PRNG returning floats in [0, 1)
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Shuffle array using Fisher-Yates algorithm
 */
export function shuffleArray<T>(array: readonly T[], random: () => number): T[] {
  const shuffled = [...array];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const current = shuffled[i];
    const swap = shuffled[j];
    if (current === undefined || swap === undefined) continue;
    shuffled[i] = swap;
    shuffled[j] = current;
  }
  return shuffled;
}

/**
 * Seed order for round 1. Pure: a fresh PRNG is created from `seed` on every
 * call, so equal input sequences give equal output sequences. The length is
 * not checked here; callers reject unsupported bracket sizes.
 */
export function seedTeams(
  teamNames: readonly string[],
  seed: number = BRACKET_SEED,
): string[] {
  return shuffleArray(teamNames, seededRandom(seed));
}

/**
 * Pair consecutive entries: [0] vs [1], [2] vs [3], ... An odd trailing entry
 * is left out; callers validate the size first.
 */
export function pairTeams(teamNames: readonly string[]): BracketPairing[] {
  const pairings: BracketPairing[] = [];
  for (let i = 0; i + 1 < teamNames.length; i += 2) {
    const teamA = teamNames[i];
    const teamB = teamNames[i + 1];
    if (teamA === undefined || teamB === undefined) continue;
    pairings.push({ position: i / 2, teamA, teamB });
  }
  return pairings;
}

/**
 * Get round name for display
 */
export function getRoundName(round: number, totalRounds: number): string {
  const roundsFromEnd = totalRounds - round;

  switch (roundsFromEnd) {
    case 0:
      return "Final";
    case 1:
      return "Semi-finals";
    case 2:
      return "Quarter-finals";
    case 3:
      return "Round of 16";
    case 4:
      return "Round of 32";
    default:
      return `Round ${round}`;
  }
}
