import { createChildLogger, type Logger } from "../logging/logger.js";
import { composeMultiplier } from "../screener/multiplier.js";
import { validateRow } from "../screener/row.js";
import { classifyTier } from "../screener/tiers.js";
import type {
  AllocationConfig,
  AllocationResult,
  AllocationSummary,
  OrderExecution,
  OrderExecutor,
  OrderIntent,
  OrderRequest,
  PlacedOrder,
  RowOutcome,
  SheetRow,
  SizingTrace,
} from "./types.js";

/** Numbers raw sheet values the way the spreadsheet does: header on row 1, data from row 2. */
export function toSheetRows(values: readonly (readonly string[])[]): SheetRow[] {
  return values.slice(1).map((cells, index) => ({ rowNumber: index + 2, cells }));
}

export function buildMarketSymbol(symbol: string, quoteCurrency: string): string {
  return `${symbol}/${quoteCurrency}`;
}

async function submitOrder(
  executor: OrderExecutor,
  request: OrderRequest,
): Promise<OrderExecution> {
  try {
    return await executor.placeMarketBuy(request);
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
}

function summarize(outcomes: RowOutcome[], placed: PlacedOrder[]): AllocationSummary {
  const count = (status: RowOutcome["status"]) =>
    outcomes.filter((outcome) => outcome.status === status).length;
  return {
    scanned: outcomes.length,
    placed: count("placed"),
    skipped: count("skipped"),
    failed: count("failed"),
    spent: placed.reduce((acc, order) => acc + order.notional, 0),
  };
}

/**
 * Walks the screener rows once, in order, sizing a market buy for each qualifying row from
 * whatever funds are left at that point. Earlier rows get first claim on the pool, so the
 * input order changes the result.
 *
 * Orders are submitted one at a time and awaited; funds are deducted only for confirmed
 * orders. Row and execution faults are recorded as outcomes and never thrown.
 */
export async function allocate(params: {
  rows: readonly SheetRow[];
  funds: number;
  config: AllocationConfig;
  executor: OrderExecutor;
  logger?: Logger;
}): Promise<AllocationResult> {
  const { config, executor } = params;
  const log = params.logger ?? createChildLogger("allocation");
  if (!Number.isFinite(params.funds)) {
    throw new Error(`starting funds must be a finite number, got ${params.funds}`);
  }

  let remainingFunds = params.funds;
  let exhausted = false;
  const outcomes: RowOutcome[] = [];
  const placed: PlacedOrder[] = [];

  const skip = (outcome: Extract<RowOutcome, { status: "skipped" }>) => {
    log.info(
      { row: outcome.rowNumber, symbol: outcome.symbol, reason: outcome.reason },
      `row ${outcome.rowNumber}: ${outcome.message}, skipping`,
    );
    outcomes.push(outcome);
  };

  for (const { rowNumber, cells } of params.rows) {
    if (remainingFunds <= 0) {
      exhausted = true;
      log.info({ row: rowNumber }, "no remaining funds; stopping further processing");
      break;
    }

    const validation = validateRow(cells, config.layout);
    if (!validation.ok) {
      skip({
        status: "skipped",
        rowNumber,
        symbol: validation.symbol,
        reason: validation.reason,
        message: validation.message,
      });
      continue;
    }
    const row = validation.row;

    const tierFraction = classifyTier(row.pctDown);
    if (tierFraction === undefined) {
      skip({
        status: "skipped",
        rowNumber,
        symbol: row.symbol,
        reason: "pct-down-out-of-range",
        message: `% down ${row.pctDown} not in any bracket`,
      });
      continue;
    }

    const multiplier = composeMultiplier({
      icon: row.icon,
      price: row.price,
      longMa: row.longMa,
      sentiment: row.sentiment,
    });
    if (!multiplier.ok) {
      skip({
        status: "skipped",
        rowNumber,
        symbol: row.symbol,
        reason: multiplier.reason,
        message: multiplier.message,
      });
      continue;
    }

    const baseNotional = remainingFunds * tierFraction;
    const rawNotional = baseNotional * multiplier.composite;
    const orderNotional = Math.min(rawNotional, remainingFunds);
    const sizing: SizingTrace = {
      price: row.price,
      pctDown: row.pctDown,
      tierFraction,
      icon: row.icon,
      iconMultiplier: multiplier.iconMultiplier,
      maRatio: multiplier.maRatio,
      sentimentMultiplier: multiplier.sentimentMultiplier,
      fundsBefore: remainingFunds,
      baseNotional,
      rawNotional,
      orderNotional,
      capped: rawNotional > remainingFunds,
    };

    if (orderNotional < config.minOrderNotional) {
      skip({
        status: "skipped",
        rowNumber,
        symbol: row.symbol,
        reason: "below-min-notional",
        message: `calculated order notional ${orderNotional.toFixed(4)} < minimum (${config.minOrderNotional})`,
        sizing,
      });
      continue;
    }

    const intent: OrderIntent = {
      marketSymbol: buildMarketSymbol(row.symbol, config.quoteCurrency),
      amount: orderNotional / row.price,
      notional: orderNotional,
    };
    log.info(
      { row: rowNumber, symbol: row.symbol, ...sizing, ...intent },
      `row ${rowNumber}: submitting order`,
    );

    const execution = await submitOrder(executor, {
      marketSymbol: intent.marketSymbol,
      amount: intent.amount,
    });
    if (!execution.ok) {
      log.warn(
        { row: rowNumber, marketSymbol: intent.marketSymbol, error: execution.message },
        `row ${rowNumber}: failed to place order`,
      );
      outcomes.push({
        status: "failed",
        rowNumber,
        symbol: row.symbol,
        reason: "execution-failed",
        message: execution.message,
        sizing,
        intent,
      });
      continue;
    }

    remainingFunds -= orderNotional;
    const order: PlacedOrder = {
      ...intent,
      rowNumber,
      symbol: row.symbol,
      orderId: execution.orderId,
    };
    placed.push(order);
    outcomes.push({ status: "placed", rowNumber, symbol: row.symbol, sizing, order });
    log.info(
      { row: rowNumber, orderId: order.orderId, spent: orderNotional, remainingFunds },
      `row ${rowNumber}: order placed`,
    );
  }

  return {
    outcomes,
    placed,
    startingFunds: params.funds,
    remainingFunds,
    exhausted,
    summary: summarize(outcomes, placed),
  };
}
