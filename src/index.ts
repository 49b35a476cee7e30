#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config();

import path from "path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadDataset, runSentimentBacktest } from "./backtest";
import { validateThresholds } from "./analyzers/signals";
import { isOpenPositionPolicy, validateBacktestOptions } from "./analyzers/backtester";
import { BacktestOptions, OPEN_POSITION_POLICIES } from "./analyzers/types";
import { formatSummaryLines, signalsCsv, writeJson, writeText } from "./report";
import { loadConfig, LOGS_DIR, PROCESSED_DIR, validateStartDate } from "./utils/config";
import { ConfigurationError, errorMessage } from "./utils/errors";
import logger from "./utils/logger";
import { sendSummary } from "./utils/telegram";

// ── CLI ──────────────────────────────────────────────────────────────────────

async function main() {
  const config = loadConfig();

  const argv = await yargs(hideBin(process.argv))
    .usage("Usage: $0 [options]")
    .option("start", {
      type: "string",
      default: config.startDate,
      describe: "First date of VIX/SPY history to download (YYYY-MM-DD)",
    })
    .option("capital", {
      type: "number",
      default: config.backtest.initialCapital,
      describe: "Initial capital of the equity curve",
    })
    .option("open-position", {
      type: "string",
      choices: OPEN_POSITION_POLICIES,
      default: config.backtest.openPositionPolicy,
      describe: "How a position still open at the end of the data is reported",
    })
    .option("buy-vix", { type: "number", default: config.thresholds.vixFearThreshold, describe: "BUY needs VIX ≥ this" })
    .option("sell-vix", { type: "number", default: config.thresholds.vixGreedThreshold, describe: "SELL needs VIX ≤ this" })
    .option("buy-fg", { type: "number", default: config.thresholds.fgiFearThreshold, describe: "BUY needs Fear & Greed ≤ this" })
    .option("sell-fg", { type: "number", default: config.thresholds.fgiGreedThreshold, describe: "SELL needs Fear & Greed ≥ this" })
    .option("refresh", {
      type: "boolean",
      default: false,
      describe: "Ignore the 24 h data cache and download again",
    })
    .option("notify", {
      type: "boolean",
      default: false,
      describe: "Send the summary to Telegram",
    })
    .option("out", {
      type: "string",
      default: path.join(LOGS_DIR, "backtest_results.json"),
      describe: "Where to write the JSON results",
    })
    .strict()
    .help().argv;

  const thresholds = validateThresholds({
    vixFearThreshold:  argv.buyVix,
    vixGreedThreshold: argv.sellVix,
    fgiFearThreshold:  argv.buyFg,
    fgiGreedThreshold: argv.sellFg,
  });
  const policy = argv.openPosition;
  if (!isOpenPositionPolicy(policy)) {
    throw new ConfigurationError(`Unknown open position policy "${policy}"`);
  }
  const options: BacktestOptions = validateBacktestOptions({
    initialCapital:     argv.capital,
    openPositionPolicy: policy,
  });
  const startDate = validateStartDate(argv.start);

  logger.info(`Sentiment Backtester`);
  logger.info(`History from ${startDate}  |  Capital: ${options.initialCapital}  |  Open position: ${options.openPositionPolicy}`);
  logger.info(`BUY  : VIX ≥ ${thresholds.vixFearThreshold}  AND  Fear & Greed ≤ ${thresholds.fgiFearThreshold}`);
  logger.info(`SELL : VIX ≤ ${thresholds.vixGreedThreshold}  AND  Fear & Greed ≥ ${thresholds.fgiGreedThreshold}`);

  // ── 1. Data ───────────────────────────────────────────────────────────────
  logger.info("── Loading data ─────────────────────────────────────────────");
  const dataset = await loadDataset(startDate, argv.refresh);

  // ── 2. Signals + backtest ─────────────────────────────────────────────────
  logger.info("── Simulating ───────────────────────────────────────────────");
  const { summary, signals } = runSentimentBacktest(dataset, thresholds, options);

  // ── 3. Output ─────────────────────────────────────────────────────────────
  writeJson(argv.out, summary);
  writeText(path.join(PROCESSED_DIR, "signals.csv"), signalsCsv(dataset.prices, dataset.sentiment, signals));

  for (const line of formatSummaryLines(summary)) logger.info(line);

  if (argv.notify) {
    await sendSummary(summary, config.telegram);
  }
}

// ── Run ──────────────────────────────────────────────────────────────────────

main().catch((err) => {
  logger.error(errorMessage(err));
  process.exit(1);
});
