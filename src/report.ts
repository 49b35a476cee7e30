import fs from "fs";
import path from "path";
import { BacktestSummary } from "./backtest";
import { DatedSignal, PriceRecord, SentimentRecord } from "./analyzers/types";
import logger from "./utils/logger";

// ── Formatting Helpers ───────────────────────────────────────────────────────

export function pct(value: number | null, digits = 2): string {
  if (value === null || !Number.isFinite(value)) return "N/A";
  const v = value * 100;
  return `${v >= 0 ? "+" : ""}${v.toFixed(digits)}%`;
}

export function num(value: number | null, digits = 2): string {
  return value === null || !Number.isFinite(value) ? "N/A" : value.toFixed(digits);
}

// ── Console Summary ──────────────────────────────────────────────────────────

export function formatSummaryLines(s: BacktestSummary): string[] {
  const m = s.metrics;
  const d = m.signalDistribution;
  const sep = "═".repeat(55);
  const rule = "─".repeat(55);

  const lines = [
    sep,
    `  SENTIMENT BACKTEST  ${s.startDate} → ${s.endDate}  (${s.dataPoints} days)`,
    rule,
    `  Signals          : HOLD ${d.HOLD} | BUY ${d.BUY} | SELL ${d.SELL}`,
    `  Trades           : ${m.tradeCount}`,
    `  Win Rate         : ${num(m.winRate * 100)}%`,
    `  Avg Holding      : ${num(m.avgHoldingDays, 1)} days`,
    `  Total Return     : ${pct(m.totalReturn)}`,
    `  CAGR             : ${pct(m.cagr)}`,
    `  Volatility (ann.): ${pct(m.annualizedVolatility)}`,
    `  Sharpe           : ${num(m.sharpeRatio)}`,
    `  Max Drawdown     : ${pct(m.maxDrawdown)}`,
    `  Exposure         : ${num(m.exposure * 100, 1)}%`,
    `  Buy & Hold       : ${pct(s.buyAndHoldReturn)}`,
    `  Alpha            : ${pct(s.alphaVsBenchmark)}`,
    rule,
    `  Final position   : ${s.finalPosition}`,
  ];

  if (s.openPosition) {
    const o = s.openPosition;
    lines.push(`  Open since       : ${o.entryDate} @ ${num(o.entryPrice)}  (unrealized ${pct(o.unrealizedPct)})`);
  }
  lines.push(sep);
  return lines;
}

// ── Signals CSV ──────────────────────────────────────────────────────────────

export function signalsCsv(
  prices: readonly PriceRecord[],
  sentiment: readonly SentimentRecord[],
  signals: readonly DatedSignal[],
): string {
  const rows = ["date,spy_price,vix,fear_greed,signal"];
  for (let i = 0; i < signals.length; i++) {
    const cell = (v: number) => (Number.isFinite(v) ? String(v) : "");
    rows.push([signals[i].date, cell(prices[i].close), cell(sentiment[i].vix), cell(sentiment[i].fearGreed), signals[i].signal].join(","));
  }
  return rows.join("\n") + "\n";
}

// ── Writers ──────────────────────────────────────────────────────────────────

export function writeJson(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
  logger.info(`Saved → ${filePath}`);
}

export function writeText(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf-8");
  logger.info(`Saved → ${filePath}`);
}
