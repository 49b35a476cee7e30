import {
  countSignals,
  DEFAULT_THRESHOLDS,
  evaluateConditions,
  generateSignals,
  validateThresholds,
} from "../src/analyzers/signals";
import { ConfigurationError } from "../src/utils/errors";
import { FEAR, GREED, NEUTRAL, isoDay, sentimentSeries } from "./helpers";

const signalsOf = (rows: Array<[number, number]>) =>
  generateSignals(sentimentSeries(rows)).signals.map((s) => s.signal);

describe("generateSignals", () => {
  it("returns one dated signal per input row", () => {
    const { signals } = generateSignals(sentimentSeries([NEUTRAL, FEAR, NEUTRAL]));
    expect(signals).toEqual([
      { date: isoDay(0), signal: "HOLD" },
      { date: isoDay(1), signal: "BUY" },
      { date: isoDay(2), signal: "HOLD" },
    ]);
  });

  it("returns an empty result for an empty series", () => {
    expect(generateSignals([])).toEqual({ signals: [], warnings: [] });
  });

  it("can BUY on the first day", () => {
    expect(signalsOf([FEAR])).toEqual(["BUY"]);
  });

  it("never SELLs while flat, including on the first day", () => {
    expect(signalsOf([GREED, GREED, NEUTRAL])).toEqual(["HOLD", "HOLD", "HOLD"]);
  });

  it("does not repeat BUY while held or SELL while flat", () => {
    expect(signalsOf([FEAR, FEAR, GREED, GREED, FEAR])).toEqual(["BUY", "HOLD", "SELL", "HOLD", "BUY"]);
  });

  it("treats thresholds as inclusive", () => {
    expect(signalsOf([[30, 20], [15, 80]])).toEqual(["BUY", "SELL"]);
  });

  it("requires both indicators to agree", () => {
    expect(signalsOf([[45, 25], [29.9, 5]])).toEqual(["HOLD", "HOLD"]);
  });

  it("degrades a missing VIX reading to HOLD with a warning", () => {
    const { signals, warnings } = generateSignals(sentimentSeries([[NaN, 5]]));
    expect(signals[0].signal).toBe("HOLD");
    expect(warnings).toEqual([
      { date: isoDay(0), field: "vix", message: "missing sentiment reading: signal forced to HOLD" },
    ]);
  });

  it("degrades a missing Fear & Greed reading to HOLD and keeps the held state", () => {
    const { signals, warnings } = generateSignals(sentimentSeries([FEAR, [12, NaN], GREED]));
    expect(signals.map((s) => s.signal)).toEqual(["BUY", "HOLD", "SELL"]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].field).toBe("fearGreed");
  });

  it("treats infinite readings as missing", () => {
    expect(signalsOf([[Infinity, 5]])).toEqual(["HOLD"]);
  });

  it("degrades out-of-range readings to HOLD instead of trading on them", () => {
    const { signals, warnings } = generateSignals(sentimentSeries([[40, -5], FEAR, [10, 150], [0, 50]]));
    expect(signals.map((s) => s.signal)).toEqual(["HOLD", "BUY", "HOLD", "HOLD"]);
    expect(warnings).toEqual([
      { date: isoDay(0), field: "fearGreed", message: "out-of-range sentiment reading: signal forced to HOLD" },
      { date: isoDay(2), field: "fearGreed", message: "out-of-range sentiment reading: signal forced to HOLD" },
      { date: isoDay(3), field: "vix", message: "out-of-range sentiment reading: signal forced to HOLD" },
    ]);
  });

  it("applies custom thresholds", () => {
    const thresholds = validateThresholds({ vixFearThreshold: 25, fgiFearThreshold: 30 });
    const { signals } = generateSignals(sentimentSeries([[26, 28]]), thresholds);
    expect(signals[0].signal).toBe("BUY");
    expect(signalsOf([[26, 28]])).toEqual(["HOLD"]);
  });

  it("is deterministic", () => {
    const series = sentimentSeries([NEUTRAL, FEAR, GREED, FEAR, NEUTRAL, GREED]);
    expect(generateSignals(series)).toEqual(generateSignals(series));
  });
});

describe("evaluateConditions", () => {
  it("classifies a single day without state", () => {
    const record = { date: isoDay(0), vix: 12, fearGreed: 90 };
    expect(evaluateConditions(record, DEFAULT_THRESHOLDS)).toEqual({ valid: true, fear: false, greed: true });
  });

  it("marks a zero VIX or a Fear & Greed score above 100 invalid", () => {
    expect(evaluateConditions({ date: isoDay(0), vix: 0, fearGreed: 10 }, DEFAULT_THRESHOLDS).valid).toBe(false);
    expect(evaluateConditions({ date: isoDay(0), vix: 12, fearGreed: 100.5 }, DEFAULT_THRESHOLDS).valid).toBe(false);
    expect(evaluateConditions({ date: isoDay(0), vix: 12, fearGreed: 100 }, DEFAULT_THRESHOLDS).valid).toBe(true);
  });

  it("marks NaN readings invalid", () => {
    const record = { date: isoDay(0), vix: NaN, fearGreed: NaN };
    expect(evaluateConditions(record, DEFAULT_THRESHOLDS)).toEqual({ valid: false, fear: false, greed: false });
  });
});

describe("validateThresholds", () => {
  it("fills in the defaults", () => {
    expect(validateThresholds()).toEqual({
      vixFearThreshold: 30,
      vixGreedThreshold: 15,
      fgiFearThreshold: 20,
      fgiGreedThreshold: 80,
    });
  });

  it("keeps each threshold independently tunable", () => {
    expect(validateThresholds({ fgiGreedThreshold: 70 })).toEqual({ ...DEFAULT_THRESHOLDS, fgiGreedThreshold: 70 });
  });

  it("rejects a Fear & Greed fear threshold at or above the greed threshold", () => {
    expect(() => validateThresholds({ fgiFearThreshold: 80, fgiGreedThreshold: 80 })).toThrow(ConfigurationError);
  });

  it("rejects a VIX fear threshold at or below the greed threshold", () => {
    expect(() => validateThresholds({ vixFearThreshold: 15 })).toThrow(/vixFearThreshold must be above vixGreedThreshold/);
  });

  it("rejects Fear & Greed thresholds outside 0-100", () => {
    expect(() => validateThresholds({ fgiGreedThreshold: 120 })).toThrow(ConfigurationError);
  });

  it("rejects NaN", () => {
    expect(() => validateThresholds({ vixFearThreshold: NaN })).toThrow(ConfigurationError);
  });
});

describe("countSignals", () => {
  it("counts every signal kind", () => {
    const { signals } = generateSignals(sentimentSeries([FEAR, NEUTRAL, GREED, NEUTRAL, FEAR]));
    expect(countSignals(signals)).toEqual({ HOLD: 2, BUY: 2, SELL: 1 });
  });

  it("returns zeros for no signals", () => {
    expect(countSignals([])).toEqual({ HOLD: 0, BUY: 0, SELL: 0 });
  });
});
