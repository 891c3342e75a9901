import { setTimeout as delay } from "node:timers/promises";

import { errorMessage, type ForgeLogger } from "../logger.js";

export type RetryPolicy = {
  maxAttempts: number;
  delayMs: number;
};

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxAttempts: 3, delayMs: 15_000 };

/**
 * Runs `operation` up to `policy.maxAttempts` times with a fixed delay between
 * attempts. Failures are returned as an outcome; an aborted signal rejects.
 */
export async function runWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  opts: { description: string; log: ForgeLogger; signal?: AbortSignal },
): Promise<RetryOutcome<T>> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  const delayMs = Math.max(0, policy.delayMs);

  let lastError: unknown = null;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    opts.signal?.throwIfAborted();
    opts.log.info(`attempt ${attempt}/${maxAttempts}: ${opts.description}`);
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      lastError = err;
      if (attempt === maxAttempts) break;
      opts.log.warn(`${opts.description} failed, retrying in ${Math.round(delayMs / 1000)}s`, {
        attempt,
        err: errorMessage(err),
      });
      await delay(delayMs, undefined, { signal: opts.signal });
    }
  }

  opts.log.warn(`${opts.description} failed after ${maxAttempts} attempts`, { err: errorMessage(lastError) });
  return { ok: false, error: lastError, attempts: maxAttempts };
}
