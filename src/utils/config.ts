import path from "path";
import { z } from "zod";
import { validateThresholds } from "../analyzers/signals";
import { DEFAULT_BACKTEST_OPTIONS } from "../analyzers/backtester";
import { BacktestOptions, OPEN_POSITION_POLICIES, SignalThresholds } from "../analyzers/types";
import { ConfigurationError } from "./errors";

// ── Paths ────────────────────────────────────────────────────────────────────

export const DATA_DIR      = path.resolve(process.cwd(), "data");
export const RAW_DIR       = path.resolve(DATA_DIR, "raw");
export const PROCESSED_DIR = path.resolve(DATA_DIR, "processed");
export const LOGS_DIR      = path.resolve(process.cwd(), "logs");

export const DEFAULT_START_DATE = "2000-01-01"; // earliest VIX/SPY history we ask for
export const CACHE_TTL_MS       = 24 * 60 * 60 * 1000;

// ── Environment ──────────────────────────────────────────────────────────────

const optionalNumber = z.coerce.number().finite().optional();

const StartDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
  .refine((s) => !Number.isNaN(Date.parse(`${s}T00:00:00Z`)), "not a calendar date");

const EnvSchema = z.object({
  BUY_VIX_THRESHOLD:    optionalNumber,
  SELL_VIX_THRESHOLD:   optionalNumber,
  BUY_FG_THRESHOLD:     optionalNumber,
  SELL_FG_THRESHOLD:    optionalNumber,
  INITIAL_CAPITAL:      z.coerce.number().finite().positive().default(DEFAULT_BACKTEST_OPTIONS.initialCapital),
  OPEN_POSITION_POLICY: z.enum(OPEN_POSITION_POLICIES).default(DEFAULT_BACKTEST_OPTIONS.openPositionPolicy),
  DATA_START_DATE:      StartDateSchema.default(DEFAULT_START_DATE),
  TELEGRAM_BOT_TOKEN:   z.string().default(""),
  TELEGRAM_CHAT_ID:     z.string().default(""),
});

export interface AppConfig {
  thresholds: SignalThresholds;
  backtest: BacktestOptions;
  startDate: string;
  telegram: { botToken: string; chatId: string };
}

/** Blank variables count as unset. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value.trim();
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid environment: ${detail}`);
  }
  const e = parsed.data;

  return {
    thresholds: validateThresholds({
      vixFearThreshold:  e.BUY_VIX_THRESHOLD,
      vixGreedThreshold: e.SELL_VIX_THRESHOLD,
      fgiFearThreshold:  e.BUY_FG_THRESHOLD,
      fgiGreedThreshold: e.SELL_FG_THRESHOLD,
    }),
    backtest: {
      initialCapital:     e.INITIAL_CAPITAL,
      openPositionPolicy: e.OPEN_POSITION_POLICY,
    },
    startDate: e.DATA_START_DATE,
    telegram: { botToken: e.TELEGRAM_BOT_TOKEN, chatId: e.TELEGRAM_CHAT_ID },
  };
}

export function validateStartDate(value: string): string {
  const parsed = StartDateSchema.safeParse(value.trim());
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid start date "${value}": ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data;
}
