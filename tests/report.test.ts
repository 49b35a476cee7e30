jest.mock("yahoo-finance2", () => ({ __esModule: true, default: { chart: jest.fn() } }));

import { runSentimentBacktest } from "../src/backtest";
import { DEFAULT_THRESHOLDS } from "../src/analyzers/signals";
import { formatSummaryLines, num, pct, signalsCsv } from "../src/report";
import { FEAR, NEUTRAL, priceSeries, sentimentSeries, signalSeries } from "./helpers";

describe("pct / num", () => {
  it("formats signed percentages", () => {
    expect(pct(0.0123)).toBe("+1.23%");
    expect(pct(-0.1)).toBe("-10.00%");
    expect(pct(0)).toBe("+0.00%");
  });

  it("prints N/A for undefined metrics", () => {
    expect(pct(null)).toBe("N/A");
    expect(num(null)).toBe("N/A");
    expect(num(NaN)).toBe("N/A");
    expect(num(1.236)).toBe("1.24");
  });
});

describe("signalsCsv", () => {
  it("writes one row per day and leaves missing readings empty", () => {
    const csv = signalsCsv(
      priceSeries([100, 101.5]),
      sentimentSeries([[35, 10], [NaN, 50]]),
      signalSeries(["BUY", "HOLD"]),
    );
    expect(csv).toBe(
      "date,spy_price,vix,fear_greed,signal\n" +
        "2024-01-01,100,35,10,BUY\n" +
        "2024-01-02,101.5,,50,HOLD\n",
    );
  });
});

describe("formatSummaryLines", () => {
  it("reports the signal counts, trades and final position", () => {
    const { summary } = runSentimentBacktest(
      { sentiment: sentimentSeries([NEUTRAL, FEAR, NEUTRAL]), prices: priceSeries([100, 101, 99]), warnings: [] },
      DEFAULT_THRESHOLDS,
      { initialCapital: 1, openPositionPolicy: "unrealized" },
    );
    const lines = formatSummaryLines(summary);

    expect(lines).toContain("  Signals          : HOLD 2 | BUY 1 | SELL 0");
    expect(lines).toContain("  Trades           : 0");
    expect(lines).toContain("  Win Rate         : 0.00%");
    expect(lines).toContain("  Final position   : LONG");
    expect(lines).toContain("  Open since       : 2024-01-02 @ 101.00  (unrealized -1.98%)");
  });
});
