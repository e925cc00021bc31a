import { setTimeout as sleep } from "node:timers/promises";
import { StoreContentionError } from "../services/errors.js";
import type { Database, Transaction } from "./db.js";

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  jitterMs: number;
}

const DEFAULT_RETRY: RetryOptions = {
  retries: 5,
  baseDelayMs: 120,
  jitterMs: 80,
};

// serialization_failure, deadlock_detected, lock_not_available
const CONTENTION_CODES = new Set(["40001", "40P01", "55P03"]);

/**
 * True when the error (or anything in its `cause` chain, drizzle wraps driver
 * errors) is a transient lock/serialization failure.
 */
export function isContentionError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current; depth++) {
    if (typeof current !== "object") return false;
    if ("code" in current && typeof current.code === "string") {
      if (CONTENTION_CODES.has(current.code)) return true;
    }
    current = "cause" in current ? current.cause : undefined;
  }
  return false;
}

/**
 * Run `fn`, retrying contention errors with linear backoff plus jitter.
 * Any other error propagates immediately.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const { retries, baseDelayMs, jitterMs } = { ...DEFAULT_RETRY, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isContentionError(error)) throw error;

      lastError = error;
      if (attempt === retries) break;

      console.warn(
        `Database contention (attempt ${attempt}/${retries}), retrying`,
      );
      await sleep(baseDelayMs * attempt + Math.random() * jitterMs);
    }
  }

  throw new StoreContentionError(retries, lastError);
}

/**
 * Short-lived transaction with contention retry. The callback may run more
 * than once, so it must not have side effects outside the transaction.
 */
export function runInTransaction<T>(
  db: Database,
  fn: (tx: Transaction) => Promise<T>,
  options?: Partial<RetryOptions>,
): Promise<T> {
  return withRetry(() => db.transaction(fn), options);
}
