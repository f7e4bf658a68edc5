#!/usr/bin/env node
import "../config/dotenv.js";
import { Command } from "commander";
import { allocate, toSheetRows } from "../allocation/engine.js";
import { formatAllocationReport, formatOutcomeLine } from "../allocation/report.js";
import type { ScreenerConfig } from "../config/config.js";
import { logger } from "../logging/logger.js";
import { loadScreenerValues } from "../sheets/google.js";
import { loadRowsFile } from "../sheets/rows-file.js";
import { createKrakenOrderExecutor, fetchKrakenFreeBalance } from "../trading/kraken.js";
import { loadCliConfig, type CliOptions } from "./options.js";

async function resolveFunds(cfg: ScreenerConfig): Promise<number> {
  const { kraken } = cfg;
  if (kraken.dryRun && kraken.dryRunFunds !== undefined) {
    return kraken.dryRunFunds;
  }
  if (!kraken.apiKey || !kraken.apiSecret) {
    throw new Error("dry run needs --funds or DRY_RUN_FUNDS when Kraken credentials are not set");
  }
  const free = await fetchKrakenFreeBalance({
    credentials: { apiKey: kraken.apiKey, apiSecret: kraken.apiSecret },
    currency: kraken.quoteCurrency,
  });
  if (free === null) {
    throw new Error(
      `Could not determine free balance for base currency '${kraken.quoteCurrency}'.`,
    );
  }
  return free;
}

async function main() {
  const program = new Command();
  program
    .name("buy_from_screener")
    .description("Size and place market buys from the drawdown screener")
    .option("--rows-file <path>", "Read rows from a JSON/NDJSON export instead of Google Sheets")
    .option("--dry-run", "Size orders without sending them to Kraken")
    .option("--funds <amount>", "Starting funds for a dry run instead of the Kraken balance")
    .option("--min-notional <amount>", "Minimum order notional in the quote currency")
    .option("--quote <currency>", "Quote currency to spend, e.g. USD");

  program.parse(process.argv);
  const opts = program.opts<CliOptions>();
  const cfg = loadCliConfig(opts);
  logger.level = cfg.logLevel;
  const quote = cfg.kraken.quoteCurrency;
  logger.info({ dryRun: cfg.kraken.dryRun, quote }, "starting screener buy run (one-shot)");

  const values = opts.rowsFile
    ? await loadRowsFile({ filePath: opts.rowsFile })
    : await loadScreenerValues(cfg.sheets);
  if (values.length < 2) {
    console.log("No data rows in sheet; exiting.");
    return;
  }
  logger.info({ header: values[0], rows: values.length - 1 }, "loaded screener rows");

  const funds = await resolveFunds(cfg);
  console.log(`Available funds (${quote}): ${funds}`);
  if (funds <= 0) {
    console.log("No available funds. Exiting without placing any orders.");
    return;
  }

  const executor = createKrakenOrderExecutor({
    dryRun: cfg.kraken.dryRun,
    credentials:
      cfg.kraken.apiKey && cfg.kraken.apiSecret
        ? { apiKey: cfg.kraken.apiKey, apiSecret: cfg.kraken.apiSecret }
        : undefined,
  });
  const result = await allocate({
    rows: toSheetRows(values),
    funds,
    config: {
      quoteCurrency: quote,
      minOrderNotional: cfg.allocation.minOrderNotional,
      layout: cfg.allocation.layout,
    },
    executor,
  });

  for (const outcome of result.outcomes) {
    console.log(formatOutcomeLine(outcome, quote));
  }
  console.log("");
  for (const line of formatAllocationReport(result, quote)) {
    console.log(line);
  }
}

main().catch((err) => {
  console.error(String(err));
  process.exitCode = 1;
});
