import yahooFinance from "yahoo-finance2";
import logger from "../utils/logger";
import { DataFetchError, errorMessage } from "../utils/errors";
import { withRetry } from "../utils/retry";
import { DailyValue, toIsoDate } from "./types";

// ── Yahoo Finance Daily Closes ───────────────────────────────────────────────

/**
 * Daily closes for `symbol` from `start` to today, oldest first.
 * Uses the split/dividend-adjusted close where Yahoo provides one.
 */
export async function fetchDailyCloses(symbol: string, start: string): Promise<DailyValue[]> {
  logger.info(`Downloading ${symbol} from Yahoo Finance...`);

  try {
    const result = await withRetry(
      () => yahooFinance.chart(symbol, { period1: start, interval: "1d" }),
      { label: `Yahoo ${symbol}` },
    );

    const byDate = new Map<string, number>();
    for (const q of result.quotes) {
      const close = q.adjclose ?? q.close;
      if (typeof close !== "number" || !(close > 0)) continue;
      byDate.set(toIsoDate(q.date), close); // strip intraday timestamp
    }

    if (byDate.size === 0) {
      throw new Error(`No data returned for ${symbol}. Check ticker and internet connection.`);
    }

    const rows = [...byDate.entries()]
      .map(([date, value]) => ({ date, value }))
      .sort((a, b) => a.date.localeCompare(b.date));

    logger.info(`${symbol}: ${rows.length} rows`);
    return rows;
  } catch (err) {
    const msg = errorMessage(err);
    logger.error(`Download of ${symbol} failed: ${msg}`);
    throw new DataFetchError("yahoo-finance", msg);
  }
}

export async function fetchVIXHistory(start: string): Promise<DailyValue[]> {
  return fetchDailyCloses("^VIX", start);
}

export async function fetchSPYHistory(start: string): Promise<DailyValue[]> {
  return fetchDailyCloses("SPY", start);
}
