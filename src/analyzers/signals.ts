import { z } from "zod";
import { ConfigurationError, DataQualityWarning } from "../utils/errors";
import {
  DatedSignal,
  SentimentRecord,
  Signal,
  SignalDistribution,
  SignalThresholds,
} from "./types";

// ── Defaults ─────────────────────────────────────────────────────────────────
// Extreme fear (contrarian BUY):  Fear & Greed <= 20 and VIX >= 30
// Euphoria (risk-off SELL):       Fear & Greed >= 80 and VIX <= 15

export const DEFAULT_THRESHOLDS: Readonly<SignalThresholds> = Object.freeze({
  vixFearThreshold:  30,
  vixGreedThreshold: 15,
  fgiFearThreshold:  20,
  fgiGreedThreshold: 80,
});

// ── Zod Schemas ──────────────────────────────────────────────────────────────

const ThresholdsSchema = z
  .object({
    vixFearThreshold:  z.number().finite().positive().default(DEFAULT_THRESHOLDS.vixFearThreshold),
    vixGreedThreshold: z.number().finite().positive().default(DEFAULT_THRESHOLDS.vixGreedThreshold),
    fgiFearThreshold:  z.number().finite().min(0).max(100).default(DEFAULT_THRESHOLDS.fgiFearThreshold),
    fgiGreedThreshold: z.number().finite().min(0).max(100).default(DEFAULT_THRESHOLDS.fgiGreedThreshold),
  })
  .refine((t) => t.fgiFearThreshold < t.fgiGreedThreshold, {
    message: "fgiFearThreshold must be below fgiGreedThreshold",
  })
  .refine((t) => t.vixFearThreshold > t.vixGreedThreshold, {
    message: "vixFearThreshold must be above vixGreedThreshold",
  });

export function validateThresholds(input: Partial<SignalThresholds> = {}): SignalThresholds {
  const parsed = ThresholdsSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ConfigurationError(`Invalid signal thresholds: ${detail}`);
  }
  return parsed.data;
}

// ── Rule Table ───────────────────────────────────────────────────────────────

export interface SentimentConditions {
  valid: boolean;
  fear: boolean;
  greed: boolean;
}

function isVixReading(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function isFearGreedReading(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 100;
}

/** Stateless classification of a single day. Missing or out-of-range readings are neither fear nor greed. */
export function evaluateConditions(
  record: SentimentRecord,
  thresholds: SignalThresholds,
): SentimentConditions {
  if (!isVixReading(record.vix) || !isFearGreedReading(record.fearGreed)) {
    return { valid: false, fear: false, greed: false };
  }
  return {
    valid: true,
    fear:  record.vix >= thresholds.vixFearThreshold  && record.fearGreed <= thresholds.fgiFearThreshold,
    greed: record.vix <= thresholds.vixGreedThreshold && record.fearGreed >= thresholds.fgiGreedThreshold,
  };
}

// ── Signal Fold ──────────────────────────────────────────────────────────────

export interface SignalResult {
  signals: DatedSignal[];
  warnings: DataQualityWarning[];
}

interface FoldState {
  held: boolean;
  signals: DatedSignal[];
  warnings: DataQualityWarning[];
}

function step(state: FoldState, record: SentimentRecord, thresholds: SignalThresholds): FoldState {
  const cond = evaluateConditions(record, thresholds);

  let signal: Signal = "HOLD";
  if (!cond.valid) {
    const field = isVixReading(record.vix) ? "fearGreed" : "vix";
    state.warnings.push({
      date: record.date,
      field,
      message: Number.isFinite(record[field])
        ? "out-of-range sentiment reading: signal forced to HOLD"
        : "missing sentiment reading: signal forced to HOLD",
    });
  } else if (!state.held && cond.fear) {
    signal = "BUY";
  } else if (state.held && cond.greed) {
    signal = "SELL";
  }

  state.signals.push({ date: record.date, signal });

  let held = state.held;
  if (signal === "BUY") held = true;
  else if (signal === "SELL") held = false;

  return { ...state, held };
}

/**
 * Turns a sentiment series into one signal per day.
 *
 * The held flag is threaded through the fold: BUY is only emitted while flat,
 * SELL only while held, so the output never repeats an entry or an exit. Each
 * signal depends only on its own row and the rows before it.
 */
export function generateSignals(
  series: readonly SentimentRecord[],
  thresholds: SignalThresholds = DEFAULT_THRESHOLDS,
): SignalResult {
  const initial: FoldState = { held: false, signals: [], warnings: [] };
  const final = series.reduce((state, record) => step(state, record, thresholds), initial);
  return { signals: final.signals, warnings: final.warnings };
}

export function countSignals(signals: readonly DatedSignal[]): SignalDistribution {
  const counts: SignalDistribution = { HOLD: 0, BUY: 0, SELL: 0 };
  for (const s of signals) counts[s.signal]++;
  return counts;
}
