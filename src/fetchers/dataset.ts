import logger from "../utils/logger";
import { ConfigurationError, DataQualityWarning } from "../utils/errors";
import { PriceRecord, SentimentRecord } from "../analyzers/types";
import { DailyValue } from "./types";

const MAX_GAP_DAYS = 5;

export interface RawSeries {
  spy: readonly DailyValue[];
  vix: readonly DailyValue[];
  fearGreed: readonly DailyValue[];
}

export interface Dataset {
  sentiment: SentimentRecord[];
  prices: PriceRecord[];
  warnings: DataQualityWarning[];
}

function indexByDate(rows: readonly DailyValue[]): Map<string, number> {
  const map = new Map<string, number>();
  for (const r of rows) map.set(r.date, r.value);
  return map;
}

function gapDays(from: string, to: string): number {
  return (Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / 86_400_000;
}

/**
 * Inner-joins SPY, VIX and Fear & Greed on calendar date and emits the two
 * aligned series the signal and backtest engines consume.
 *
 * Only dates present in all three series survive, so rows can never shift.
 * A negative VIX or a Fear & Greed score outside 0–100 aborts the build; a
 * NaN reading is kept (the signal engine turns it into HOLD).
 */
export function buildDataset(raw: RawSeries): Dataset {
  const vix = indexByDate(raw.vix);
  const fg  = indexByDate(raw.fearGreed);

  const dates = [...new Set(raw.spy.map((r) => r.date))]
    .filter((d) => vix.has(d) && fg.has(d))
    .sort();

  if (dates.length === 0) {
    throw new ConfigurationError("No overlapping dates between SPY, VIX and Fear & Greed series");
  }

  const spy = indexByDate(raw.spy);
  const sentiment: SentimentRecord[] = [];
  const prices: PriceRecord[] = [];
  const warnings: DataQualityWarning[] = [];

  for (const date of dates) {
    const close     = spy.get(date) ?? NaN;
    const vixLevel  = vix.get(date) ?? NaN;
    const fearGreed = fg.get(date) ?? NaN;

    if (vixLevel <= 0) {
      throw new ConfigurationError(`Invalid VIX on ${date}: ${vixLevel}`);
    }
    if (fearGreed < 0 || fearGreed > 100) {
      throw new ConfigurationError(`Fear & Greed out of range (0-100) on ${date}: ${fearGreed}`);
    }
    if (Number.isNaN(vixLevel) || Number.isNaN(fearGreed)) {
      warnings.push({ date, field: Number.isNaN(vixLevel) ? "vix" : "fearGreed", message: "missing value" });
    }

    sentiment.push({ date, vix: vixLevel, fearGreed });
    prices.push({ date, close });
  }

  for (let i = 1; i < dates.length; i++) {
    const gap = gapDays(dates[i - 1], dates[i]);
    if (gap > MAX_GAP_DAYS) {
      warnings.push({ date: dates[i], field: "date", message: `${gap}-day gap since ${dates[i - 1]}` });
    }
  }

  logger.info(`Merged dataset: ${dates.length} rows (${dates[0]} → ${dates[dates.length - 1]})`);
  if (warnings.length > 0) {
    logger.warn(`Dataset has ${warnings.length} data quality warning(s)`);
  }

  return { sentiment, prices, warnings };
}
