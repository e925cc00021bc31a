import { parseScoreInput, type ScoreInput } from "./ui/matchUI.js";

export const SCORE_ENTRY_TTL_MS = 5 * 60 * 1000;

/** Who is typing where: a topic thread, or the main chat when undefined */
export interface ScoreEntryKey {
  chatId: number;
  threadId: number | undefined;
  userId: number;
}

export type ScoreEntryOutcome =
  | { kind: "none" }
  | { kind: "score"; matchId: string; score: ScoreInput }
  | { kind: "cancelled" };

interface PendingEntry {
  matchId: string;
  expiresAt: number;
}

function keyOf(key: ScoreEntryKey): string {
  return `${key.chatId}:${key.threadId ?? "main"}:${key.userId}`;
}

/**
 * Score entries opened by the "Score match" button. The next message of the
 * user in the same thread ends the entry, score or not.
 */
export class PendingScoreEntries {
  private readonly entries = new Map<string, PendingEntry>();

  constructor(
    private readonly ttlMs: number = SCORE_ENTRY_TTL_MS,
    private readonly now: () => number = Date.now,
  ) {}

  get size(): number {
    return this.entries.size;
  }

  start(key: ScoreEntryKey, matchId: string): void {
    this.prune();
    this.entries.set(keyOf(key), { matchId, expiresAt: this.now() + this.ttlMs });
  }

  cancel(key: ScoreEntryKey): boolean {
    return this.entries.delete(keyOf(key));
  }

  resolve(key: ScoreEntryKey, text: string): ScoreEntryOutcome {
    const id = keyOf(key);
    const entry = this.entries.get(id);
    if (!entry) return { kind: "none" };

    this.entries.delete(id);
    if (entry.expiresAt <= this.now()) return { kind: "none" };

    const score = parseScoreInput(text);
    return score
      ? { kind: "score", matchId: entry.matchId, score }
      : { kind: "cancelled" };
  }

  private prune(): void {
    const now = this.now();
    for (const [id, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(id);
    }
  }
}
