// ── Series Records ───────────────────────────────────────────────────────────

/** One trading day of sentiment. A missing reading is carried as NaN. */
export interface SentimentRecord {
  readonly date: string;      // YYYY-MM-DD
  readonly vix: number;
  readonly fearGreed: number; // 0–100
}

export interface PriceRecord {
  readonly date: string;
  readonly close: number;
}

// ── Signals ──────────────────────────────────────────────────────────────────

export type Signal = "HOLD" | "BUY" | "SELL";

export const SIGNALS: readonly Signal[] = ["HOLD", "BUY", "SELL"];

export interface DatedSignal {
  readonly date: string;
  readonly signal: Signal;
}

export type SignalDistribution = Record<Signal, number>;

export interface SignalThresholds {
  vixFearThreshold: number;  // BUY needs VIX at or above this
  vixGreedThreshold: number; // SELL needs VIX at or below this
  fgiFearThreshold: number;  // BUY needs Fear & Greed at or below this
  fgiGreedThreshold: number; // SELL needs Fear & Greed at or above this
}

// ── Positions & Trades ───────────────────────────────────────────────────────

export type PositionState = "FLAT" | "LONG";

export type ExitReason = "SIGNAL" | "MARK_TO_LAST";

export const OPEN_POSITION_POLICIES = ["mark-to-last", "unrealized"] as const;

export type OpenPositionPolicy = (typeof OPEN_POSITION_POLICIES)[number];

export interface Trade {
  readonly entryDate: string;
  readonly entryPrice: number;
  readonly exitDate: string;
  readonly exitPrice: number;
  readonly holdingDays: number; // calendar days
  readonly holdingBars: number; // trading sessions
  readonly pnlPct: number;      // exitPrice / entryPrice - 1
  readonly exitReason: ExitReason;
}

/** A LONG position still open when the data ran out. */
export interface OpenPosition {
  readonly entryDate: string;
  readonly entryPrice: number;
  readonly lastDate: string;
  readonly lastPrice: number;
  readonly holdingDays: number;
  readonly holdingBars: number;
  readonly unrealizedPct: number;
}

export interface EquityPoint {
  readonly date: string;
  readonly equity: number;
  readonly position: PositionState; // position held during this day
}

export interface BacktestOptions {
  initialCapital: number;
  openPositionPolicy: OpenPositionPolicy;
}

export interface BacktestRun {
  equityCurve: EquityPoint[];
  trades: Trade[];
  finalPosition: PositionState;
  openPosition: OpenPosition | null;
  signalDistribution: SignalDistribution;
}
