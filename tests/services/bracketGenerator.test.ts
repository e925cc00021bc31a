/**
 * Seeding and pairing: fixed-seed shuffle, consecutive pairing, round names.
 */
import { describe, it, expect } from "vitest";
import {
  BRACKET_SEED,
  calculateRounds,
  getRoundName,
  isValidBracketSize,
  pairTeams,
  seedTeams,
  seededRandom,
  shuffleArray,
} from "../../src/services/bracketGenerator.js";
import { teamNames } from "../helpers/seed.js";

describe("isValidBracketSize", () => {
  it("accepts powers of two from 2 to 32", () => {
    expect([2, 4, 8, 16, 32].every(isValidBracketSize)).toBe(true);
  });

  it("rejects everything else", () => {
    expect([0, 1, 3, 6, 12, 24, 64].some(isValidBracketSize)).toBe(false);
  });
});

describe("calculateRounds", () => {
  it("is log2 of the bracket size", () => {
    expect([2, 4, 8, 16, 32].map(calculateRounds)).toEqual([1, 2, 3, 4, 5]);
  });
});

describe("seededRandom", () => {
  it("repeats the same sequence for the same seed", () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    const first = [a(), a(), a(), a()];
    expect([b(), b(), b(), b()]).toEqual(first);
  });

  it("stays within [0, 1)", () => {
    const random = seededRandom(BRACKET_SEED);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe("shuffleArray", () => {
  it("swaps with the first element when random() is always 0", () => {
    expect(shuffleArray(["a", "b", "c", "d"], () => 0)).toEqual([
      "b",
      "c",
      "d",
      "a",
    ]);
  });

  it("keeps the order when random() picks the current index", () => {
    expect(shuffleArray(["a", "b", "c", "d"], () => 0.999)).toEqual([
      "a",
      "b",
      "c",
      "d",
    ]);
  });

  it("does not mutate its input", () => {
    const input = ["a", "b", "c"];
    shuffleArray(input, () => 0);
    expect(input).toEqual(["a", "b", "c"]);
  });
});

describe("seedTeams", () => {
  it("gives the same order for the same input on every call", () => {
    const names = teamNames(16);
    expect(seedTeams(names)).toEqual(seedTeams(names));
  });

  it("returns a permutation of the input", () => {
    const names = teamNames(32);
    const seeded = seedTeams(names);
    expect(seeded).toHaveLength(32);
    expect([...seeded].sort()).toEqual([...names].sort());
  });

  it("handles empty and single-entry lists", () => {
    expect(seedTeams([])).toEqual([]);
    expect(seedTeams(["Solo"])).toEqual(["Solo"]);
  });
});

describe("pairTeams", () => {
  it("pairs consecutive entries with 0-based positions", () => {
    expect(pairTeams(["A", "B", "C", "D"])).toEqual([
      { position: 0, teamA: "A", teamB: "B" },
      { position: 1, teamA: "C", teamB: "D" },
    ]);
  });

  it("leaves out an odd trailing entry", () => {
    expect(pairTeams(["A", "B", "C"])).toEqual([
      { position: 0, teamA: "A", teamB: "B" },
    ]);
  });
});

describe("getRoundName", () => {
  it("names rounds counted back from the final", () => {
    expect(getRoundName(5, 5)).toBe("Final");
    expect(getRoundName(4, 5)).toBe("Semi-finals");
    expect(getRoundName(3, 5)).toBe("Quarter-finals");
    expect(getRoundName(2, 5)).toBe("Round of 16");
    expect(getRoundName(1, 5)).toBe("Round of 32");
  });

  it("falls back to the round number", () => {
    expect(getRoundName(1, 6)).toBe("Round 1");
  });
});
