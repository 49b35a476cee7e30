import { countSignals } from "./signals";
import { DatedSignal, EquityPoint, PriceRecord, SignalDistribution, Trade } from "./types";

export const TRADING_DAYS_PER_YEAR = 252;

// ── Types ────────────────────────────────────────────────────────────────────

/** `null` marks a metric that is undefined for the given curve (e.g. Sharpe at zero variance). */
export interface PerformanceMetrics {
  finalEquity: number;
  totalReturn: number;
  cagr: number | null;
  annualizedVolatility: number | null;
  sharpeRatio: number | null;
  maxDrawdown: number;
  exposure: number;
  tradeCount: number;
  winRate: number;
  avgHoldingDays: number;
  avgTradeReturn: number;
  bestTrade: number | null;
  worstTrade: number | null;
  signalDistribution: SignalDistribution;
}

// ── Series Helpers ───────────────────────────────────────────────────────────

export function dailyReturns(values: readonly number[]): number[] {
  const out: number[] = [];
  for (let t = 1; t < values.length; t++) {
    out.push(values[t] / values[t - 1] - 1);
  }
  return out;
}

// Relative to the mean return; rounding leaves a constant-return curve with a tiny non-zero sd.
const ZERO_VARIANCE_TOLERANCE = 1e-12;

function mean(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Sample standard deviation (n - 1); null below two observations. */
export function sampleStdDev(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const m = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

export function maxDrawdown(values: readonly number[]): number {
  let peak = values[0] ?? 0;
  let worst = 0;
  for (const v of values) {
    if (v > peak) peak = v;
    const dd = peak > 0 ? v / peak - 1 : 0;
    if (dd < worst) worst = dd;
  }
  return worst;
}

export function buyAndHoldReturn(prices: readonly PriceRecord[]): number {
  if (prices.length < 2) return 0;
  return prices[prices.length - 1].close / prices[0].close - 1;
}

// ── Metrics ──────────────────────────────────────────────────────────────────

export function computeMetrics(
  equityCurve: readonly EquityPoint[],
  trades: readonly Trade[],
  signals: readonly DatedSignal[],
): PerformanceMetrics {
  const values = equityCurve.map((p) => p.equity);
  const first = values[0] ?? 0;
  const last = values[values.length - 1] ?? 0;
  const growth = first > 0 ? last / first : 1;
  const elapsed = values.length - 1;

  const returns = dailyReturns(values);
  const meanReturn = returns.length > 0 ? mean(returns) : 0;
  const rawSd = sampleStdDev(returns);
  const sd = rawSd !== null && rawSd <= ZERO_VARIANCE_TOLERANCE * Math.max(1, Math.abs(meanReturn)) ? 0 : rawSd;
  const annualizer = Math.sqrt(TRADING_DAYS_PER_YEAR);

  const n = trades.length;
  const pnls = trades.map((t) => t.pnlPct);
  const wins = pnls.filter((p) => p > 0).length;
  const longDays = equityCurve.filter((p) => p.position === "LONG").length;

  return {
    finalEquity:          last,
    totalReturn:          growth - 1,
    cagr:                 elapsed > 0 ? growth ** (TRADING_DAYS_PER_YEAR / elapsed) - 1 : null,
    annualizedVolatility: sd === null ? null : sd * annualizer,
    sharpeRatio:          sd === null || sd === 0 ? null : (meanReturn / sd) * annualizer,
    maxDrawdown:          maxDrawdown(values),
    exposure:             equityCurve.length > 0 ? longDays / equityCurve.length : 0,
    tradeCount:           n,
    winRate:              n > 0 ? wins / n : 0,
    avgHoldingDays:       n > 0 ? trades.reduce((s, t) => s + t.holdingDays, 0) / n : 0,
    avgTradeReturn:       n > 0 ? mean(pnls) : 0,
    bestTrade:            n > 0 ? Math.max(...pnls) : null,
    worstTrade:           n > 0 ? Math.min(...pnls) : null,
    signalDistribution:   countSignals(signals),
  };
}
