import { Telegram } from "telegraf";
import logger from "./logger";
import { errorMessage } from "./errors";
import { BacktestSummary } from "../backtest";
import { num, pct } from "../report";

export interface TelegramSettings {
  botToken: string;
  chatId: string;
}

// ── Formatting Helpers ────────────────────────────────────────────────────────

export function formatTelegramSummary(s: BacktestSummary): string {
  const m = s.metrics;
  const d = m.signalDistribution;
  const t = s.thresholds;

  const lines = [
    `📊 *Sentiment Backtest*`,
    `_${s.startDate} → ${s.endDate}_`,
    "",
    `Rules: BUY VIX ≥ ${t.vixFearThreshold} & F&G ≤ ${t.fgiFearThreshold} · SELL VIX ≤ ${t.vixGreedThreshold} & F&G ≥ ${t.fgiGreedThreshold}`,
    `Signals: ${d.BUY} BUY / ${d.SELL} SELL / ${d.HOLD} HOLD`,
    "",
    `*Total Return:* ${pct(m.totalReturn)} (B&H ${pct(s.buyAndHoldReturn)})`,
    `*CAGR:* ${pct(m.cagr)}  *Sharpe:* ${num(m.sharpeRatio)}`,
    `*Max DD:* ${pct(m.maxDrawdown)}`,
    `*Trades:* ${m.tradeCount}  *Win Rate:* ${num(m.winRate * 100, 1)}%`,
    `*Position:* ${s.finalPosition}`,
  ];
  return lines.join("\n");
}

// ── Sender ────────────────────────────────────────────────────────────────────

/** Sends the summary; a missing token or a send failure is logged, never thrown. */
export async function sendSummary(summary: BacktestSummary, settings: TelegramSettings): Promise<boolean> {
  if (!settings.botToken || !settings.chatId) {
    logger.warn("Telegram not configured (missing TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID)");
    return false;
  }

  const tg = new Telegram(settings.botToken);
  const chatId = /^-?\d+$/.test(settings.chatId) ? Number(settings.chatId) : settings.chatId;

  logger.info(`Sending Telegram summary to chat ${settings.chatId}...`);
  try {
    await tg.sendMessage(chatId, formatTelegramSummary(summary), { parse_mode: "Markdown" });
    logger.info("Telegram summary sent successfully");
    return true;
  } catch (err) {
    logger.error(`Telegram send failed: ${errorMessage(err)}`);
    return false;
  }
}
