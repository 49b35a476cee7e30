import { ConfigurationError } from "../utils/errors";
import { countSignals } from "./signals";
import {
  BacktestOptions,
  BacktestRun,
  DatedSignal,
  EquityPoint,
  OPEN_POSITION_POLICIES,
  OpenPosition,
  OpenPositionPolicy,
  PositionState,
  PriceRecord,
  Signal,
  Trade,
} from "./types";

export const DEFAULT_BACKTEST_OPTIONS: Readonly<BacktestOptions> = Object.freeze({
  initialCapital:     1,
  openPositionPolicy: "mark-to-last",
});

export function isOpenPositionPolicy(value: string): value is OpenPositionPolicy {
  return OPEN_POSITION_POLICIES.some((p) => p === value);
}

const MS_PER_DAY = 86_400_000;

function calendarDaysBetween(from: string, to: string): number {
  return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / MS_PER_DAY);
}

// ── Preconditions ────────────────────────────────────────────────────────────
// Every fatal condition is detected here, so a run that starts always completes.

export function validateBacktestOptions(options: BacktestOptions): BacktestOptions {
  if (!Number.isFinite(options.initialCapital) || options.initialCapital <= 0) {
    throw new ConfigurationError(`initialCapital must be a positive number (got ${options.initialCapital})`);
  }
  if (!isOpenPositionPolicy(options.openPositionPolicy)) {
    throw new ConfigurationError(`Unknown open position policy "${String(options.openPositionPolicy)}"`);
  }
  return options;
}

function assertRunnable(
  prices: readonly PriceRecord[],
  signals: readonly DatedSignal[],
  options: BacktestOptions,
): void {
  validateBacktestOptions(options);
  if (prices.length === 0) {
    throw new ConfigurationError("Price series is empty");
  }
  if (prices.length !== signals.length) {
    throw new ConfigurationError(
      `Series length mismatch: ${prices.length} prices vs ${signals.length} signals`,
    );
  }

  for (let i = 0; i < prices.length; i++) {
    const { date, close } = prices[i];
    if (signals[i].date !== date) {
      throw new ConfigurationError(
        `Series misaligned at row ${i}: price ${date} vs signal ${signals[i].date}`,
      );
    }
    if (!Number.isFinite(close) || close <= 0) {
      throw new ConfigurationError(`Invalid close on ${date}: ${close}`);
    }
    if (Number.isNaN(Date.parse(`${date}T00:00:00Z`))) {
      throw new ConfigurationError(`Invalid date at row ${i}: "${date}"`);
    }
    if (i > 0 && date <= prices[i - 1].date) {
      throw new ConfigurationError(`Dates must be strictly increasing (${prices[i - 1].date} → ${date})`);
    }
  }
}

// ── Position State Machine ───────────────────────────────────────────────────

interface OpenLot {
  index: number;
  date: string;
  price: number;
}

interface Transition {
  next: PositionState;
  action: "OPEN" | "CLOSE" | null;
}

/** BUY while LONG and SELL while FLAT are treated as HOLD. */
export function transition(state: PositionState, signal: Signal): Transition {
  if (state === "FLAT" && signal === "BUY")  return { next: "LONG", action: "OPEN" };
  if (state === "LONG" && signal === "SELL") return { next: "FLAT", action: "CLOSE" };
  return { next: state, action: null };
}

function closeLot(lot: OpenLot, exitIndex: number, exit: PriceRecord, exitReason: Trade["exitReason"]): Trade {
  return Object.freeze({
    entryDate:   lot.date,
    entryPrice:  lot.price,
    exitDate:    exit.date,
    exitPrice:   exit.close,
    holdingDays: calendarDaysBetween(lot.date, exit.date),
    holdingBars: exitIndex - lot.index,
    pnlPct:      exit.close / lot.price - 1,
    exitReason,
  });
}

// ── Engine ───────────────────────────────────────────────────────────────────

/**
 * Replays the daily signals over the price series.
 *
 * A signal on day t is executed at day t's close, so it can only move equity
 * from day t+1 onwards: `positionHeldDuring[t]` is the state after signal t-1.
 */
export function runBacktest(
  prices: readonly PriceRecord[],
  signals: readonly DatedSignal[],
  overrides: Partial<BacktestOptions> = {},
): BacktestRun {
  const options: BacktestOptions = { ...DEFAULT_BACKTEST_OPTIONS, ...overrides };
  assertRunnable(prices, signals, options);

  const n = prices.length;

  // 1. Apply signals at each close → state after day t.
  const stateAfter: PositionState[] = new Array<PositionState>(n);
  const trades: Trade[] = [];
  let state: PositionState = "FLAT";
  let lot: OpenLot | null = null;

  for (let t = 0; t < n; t++) {
    const { next, action } = transition(state, signals[t].signal);
    if (action === "OPEN") {
      lot = { index: t, date: prices[t].date, price: prices[t].close };
    } else if (action === "CLOSE" && lot !== null) {
      trades.push(closeLot(lot, t, prices[t], "SIGNAL"));
      lot = null;
    }
    state = next;
    stateAfter[t] = state;
  }

  // 2. Execution lag: the position held during day t was decided at t-1's close.
  const positionHeldDuring = (t: number): PositionState => (t === 0 ? "FLAT" : stateAfter[t - 1]);

  // 3. Causal equity accrual.
  const equityCurve: EquityPoint[] = [];
  let equity = options.initialCapital;
  for (let t = 0; t < n; t++) {
    const held = positionHeldDuring(t);
    if (t > 0 && held === "LONG") {
      equity *= prices[t].close / prices[t - 1].close;
    }
    equityCurve.push({ date: prices[t].date, equity, position: held });
  }

  // 4. End of data.
  let openPosition: OpenPosition | null = null;
  if (lot !== null) {
    const lastIndex = n - 1;
    const last = prices[lastIndex];
    if (options.openPositionPolicy === "mark-to-last" && lot.index < lastIndex) {
      trades.push(closeLot(lot, lastIndex, last, "MARK_TO_LAST"));
    } else {
      openPosition = Object.freeze({
        entryDate:     lot.date,
        entryPrice:    lot.price,
        lastDate:      last.date,
        lastPrice:     last.close,
        holdingDays:   calendarDaysBetween(lot.date, last.date),
        holdingBars:   lastIndex - lot.index,
        unrealizedPct: last.close / lot.price - 1,
      });
    }
  }

  return {
    equityCurve,
    trades,
    finalPosition: state,
    openPosition,
    signalDistribution: countSignals(signals),
  };
}
