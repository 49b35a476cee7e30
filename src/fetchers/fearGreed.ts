import axios from "axios";
import { z } from "zod";
import logger from "../utils/logger";
import { DataFetchError, errorMessage } from "../utils/errors";
import { withRetry } from "../utils/retry";
import { DailyValue, toIsoDate } from "./types";

const ALTERNATIVE_URL = "https://api.alternative.me/fng/";
const CNN_URL         = "https://production.dataviz.cnn.io/index/fearandgreed/graphdata";
const API_TIMEOUT     = 10_000;

const HEADERS = {
  "User-Agent": "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36",
  Accept: "application/json",
};

// ── Zod Schemas ──────────────────────────────────────────────────────────────

const AlternativeResponseSchema = z.object({
  data: z.array(
    z.object({
      value: z.union([z.string(), z.number()]),
      timestamp: z.string(),
      value_classification: z.string().optional(),
    }),
  ),
});

const CnnPointSchema = z.object({ x: z.number(), y: z.number() });

const CnnResponseSchema = z.object({
  fear_and_greed: z.object({ score: z.number() }).partial().optional(),
  fear_and_greed_historical: z.object({ data: z.array(CnnPointSchema).optional() }).optional(),
});

// ── Parsers ──────────────────────────────────────────────────────────────────

function sortedUnique(records: Map<string, number>): DailyValue[] {
  return [...records.entries()]
    .map(([date, value]) => ({ date, value }))
    .sort((a, b) => a.date.localeCompare(b.date));
}

/**
 * alternative.me with `date_format=world` returns DD-MM-YYYY timestamps.
 * Entries with an unparseable date or value are skipped.
 */
export function parseAlternativeMe(json: unknown): DailyValue[] {
  const parsed = AlternativeResponseSchema.parse(json);
  const records = new Map<string, number>();

  for (const item of parsed.data) {
    const m = /^(\d{2})-(\d{2})-(\d{4})$/.exec(item.timestamp.trim());
    const value = typeof item.value === "number" ? item.value : parseInt(item.value, 10);
    if (!m || !Number.isFinite(value)) {
      logger.warn(`Skipping invalid Fear & Greed entry: ${JSON.stringify(item)}`);
      continue;
    }
    const [, day, month, year] = m;
    records.set(`${year}-${month}-${day}`, value);
  }

  if (records.size === 0) throw new Error("No valid data records found");
  return sortedUnique(records);
}

/** CNN graph data: historical points keyed by epoch ms, else the current score only. */
export function parseCnn(json: unknown, now = new Date()): DailyValue[] {
  const parsed = CnnResponseSchema.parse(json);

  const history = parsed.fear_and_greed_historical?.data;
  if (history && history.length > 0) {
    const records = new Map<string, number>();
    for (const point of history) {
      records.set(toIsoDate(new Date(point.x)), point.y);
    }
    return sortedUnique(records);
  }

  const score = parsed.fear_and_greed?.score;
  if (score === undefined) throw new Error("Could not find fear_and_greed data");
  logger.warn("No historical CNN data found, using current score only");
  return [{ date: toIsoDate(now), value: score }];
}

// ── Fetchers ─────────────────────────────────────────────────────────────────

export async function fetchAlternativeFearGreed(): Promise<DailyValue[]> {
  logger.info("Fetching historical Fear & Greed Index from alternative.me...");
  const { data } = await withRetry(
    () => axios.get<unknown>(ALTERNATIVE_URL, {
      params: { limit: 0, format: "json", date_format: "world" },
      headers: HEADERS,
      timeout: API_TIMEOUT,
    }),
    { label: "alternative.me" },
  );
  const rows = parseAlternativeMe(data);
  logger.info(`alternative.me Fear & Greed: ${rows.length} rows`);
  return rows;
}

export async function fetchCnnFearGreed(): Promise<DailyValue[]> {
  logger.info("Fetching CNN Fear & Greed Index...");
  const { data } = await withRetry(
    () => axios.get<unknown>(CNN_URL, {
      headers: { ...HEADERS, Referer: "https://www.cnn.com/markets/fear-and-greed" },
      timeout: API_TIMEOUT,
    }),
    { label: "CNN" },
  );
  const rows = parseCnn(data);
  logger.info(`CNN Fear & Greed: ${rows.length} rows`);
  return rows;
}

export interface FearGreedSource {
  name: string;
  fetch: () => Promise<DailyValue[]>;
}

/** alternative.me first (longer history), CNN as the fallback. */
export const FEAR_GREED_SOURCES: readonly FearGreedSource[] = [
  { name: "alternative.me", fetch: fetchAlternativeFearGreed },
  { name: "CNN", fetch: fetchCnnFearGreed },
];

export async function fetchFearGreedHistory(
  sources: readonly FearGreedSource[] = FEAR_GREED_SOURCES,
): Promise<DailyValue[]> {
  let lastMessage = "no sources configured";
  for (const [i, source] of sources.entries()) {
    try {
      return await source.fetch();
    } catch (err) {
      lastMessage = errorMessage(err);
      logger.error(`Failed to fetch ${source.name} data: ${lastMessage}`);
      const next = sources[i + 1];
      if (next) logger.info(`Trying ${next.name} as fallback...`);
    }
  }
  throw new DataFetchError("fear-greed", lastMessage);
}
