/**
 * Sentiment backtest pipeline
 * ─────────────────────────────────────────────────────────────────────────────
 * dataset → signals → position replay → metrics → summary.
 * `loadDataset` is the only step that touches the network or the disk cache.
 */

import { generateSignals } from "./analyzers/signals";
import { runBacktest } from "./analyzers/backtester";
import { buyAndHoldReturn, computeMetrics, PerformanceMetrics } from "./analyzers/metrics";
import {
  BacktestOptions,
  DatedSignal,
  OpenPosition,
  PositionState,
  SignalThresholds,
  Trade,
} from "./analyzers/types";
import { cached } from "./fetchers/cache";
import { buildDataset, Dataset } from "./fetchers/dataset";
import { fetchFearGreedHistory } from "./fetchers/fearGreed";
import { fetchSPYHistory, fetchVIXHistory } from "./fetchers/marketData";
import { DataQualityWarning } from "./utils/errors";
import logger from "./utils/logger";

// ── Types ────────────────────────────────────────────────────────────────────

export interface BacktestSummary {
  generatedAt: string;
  startDate: string;
  endDate: string;
  dataPoints: number;
  thresholds: SignalThresholds;
  options: BacktestOptions;
  metrics: PerformanceMetrics;
  buyAndHoldReturn: number;
  alphaVsBenchmark: number;
  finalPosition: PositionState;
  openPosition: OpenPosition | null;
  trades: Trade[];
  warnings: DataQualityWarning[];
}

export interface PipelineResult {
  summary: BacktestSummary;
  signals: DatedSignal[];
}

// ── Data ─────────────────────────────────────────────────────────────────────

export async function loadDataset(startDate: string, refresh = false): Promise<Dataset> {
  const spy       = await cached("spy", () => fetchSPYHistory(startDate), { refresh });
  const vix       = await cached("vix", () => fetchVIXHistory(startDate), { refresh });
  const fearGreed = await cached("fear_greed", () => fetchFearGreedHistory(), { refresh });
  return buildDataset({ spy, vix, fearGreed });
}

// ── Run ──────────────────────────────────────────────────────────────────────

export function runSentimentBacktest(
  dataset: Dataset,
  thresholds: SignalThresholds,
  options: BacktestOptions,
  now = new Date(),
): PipelineResult {
  const { signals, warnings: signalWarnings } = generateSignals(dataset.sentiment, thresholds);
  for (const w of signalWarnings) {
    logger.warn(`${w.date} ${w.field}: ${w.message}`);
  }

  const run = runBacktest(dataset.prices, signals, options);
  const metrics = computeMetrics(run.equityCurve, run.trades, signals);
  const benchmark = buyAndHoldReturn(dataset.prices);

  const summary: BacktestSummary = {
    generatedAt:      now.toISOString(),
    startDate:        dataset.prices[0].date,
    endDate:          dataset.prices[dataset.prices.length - 1].date,
    dataPoints:       dataset.prices.length,
    thresholds,
    options,
    metrics,
    buyAndHoldReturn: benchmark,
    alphaVsBenchmark: metrics.totalReturn - benchmark,
    finalPosition:    run.finalPosition,
    openPosition:     run.openPosition,
    trades:           run.trades,
    warnings:         [...dataset.warnings, ...signalWarnings],
  };

  return { summary, signals };
}
