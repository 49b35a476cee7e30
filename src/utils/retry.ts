import logger from "./logger";
import { errorMessage } from "./errors";

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  label?: string;
}

/** Runs `fn` up to `retries` times with a fixed pause in between; the last error is rethrown. */
export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const retries = Math.max(1, opts.retries ?? 3);
  const delayMs = opts.delayMs ?? 1000;
  const label   = opts.label ?? "operation";

  let lastError: unknown;
  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === retries) break;
      logger.warn(`${label}: attempt ${attempt}/${retries} failed (${errorMessage(err)}), retrying in ${delayMs} ms...`);
      await delay(delayMs);
    }
  }
  throw lastError;
}
