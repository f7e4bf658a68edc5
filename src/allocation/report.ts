import type { AllocationResult, OrderIntent, RowOutcome, SizingTrace } from "./types.js";

function describeRow(outcome: RowOutcome): string {
  if (!outcome.symbol) {
    return `Row ${outcome.rowNumber}`;
  }
  return `Row ${outcome.rowNumber} (${outcome.symbol})`;
}

function formatSizing(sizing: SizingTrace, quoteCurrency: string): string {
  return (
    `price=${sizing.price}, pct_down=${sizing.pctDown}, tier_fraction=${sizing.tierFraction}, ` +
    `icon=${sizing.icon}, icon_mult=${sizing.iconMultiplier}, ` +
    `ma_ratio=${sizing.maRatio.toFixed(4)}, sent_mult=${sizing.sentimentMultiplier}, ` +
    `order_notional=${sizing.orderNotional.toFixed(4)} ${quoteCurrency}`
  );
}

function formatIntent(intent: OrderIntent, symbol: string): string {
  return `amount=${intent.amount.toFixed(8)} ${symbol}, market_symbol=${intent.marketSymbol}`;
}

export function formatOutcomeLine(outcome: RowOutcome, quoteCurrency: string): string {
  const row = describeRow(outcome);
  switch (outcome.status) {
    case "skipped":
      if (!outcome.sizing) {
        return `${row}: ${outcome.message}, skipping.`;
      }
      return (
        `${row}: ${formatSizing(outcome.sizing, quoteCurrency)}; ` +
        `${outcome.message}, skipping.`
      );
    case "failed":
      return (
        `${row}: ${formatSizing(outcome.sizing, quoteCurrency)}, ` +
        `${formatIntent(outcome.intent, outcome.symbol)}; failed to place order: ${outcome.message}`
      );
    case "placed": {
      const { sizing, order } = outcome;
      const remaining = sizing.fundsBefore - order.notional;
      return (
        `${row}: ${formatSizing(sizing, quoteCurrency)}, ${formatIntent(order, order.symbol)}; ` +
        `order placed, id=${order.orderId ?? "unknown"}, ` +
        `spent=${order.notional.toFixed(4)} ${quoteCurrency}, ` +
        `remaining_funds=${remaining.toFixed(4)} ${quoteCurrency}`
      );
    }
  }
}

export function formatAllocationReport(result: AllocationResult, quoteCurrency: string): string[] {
  const lines = [
    "Run complete.",
    `Total orders placed: ${result.placed.length}`,
    ...result.placed.map(
      (order) =>
        `  Row ${order.rowNumber} ${order.marketSymbol}: amount=${order.amount.toFixed(8)}, ` +
        `notional=${order.notional.toFixed(4)} ${quoteCurrency}, id=${order.orderId ?? "unknown"}`,
    ),
    `Skipped: ${result.summary.skipped}, failed: ${result.summary.failed}, ` +
      `spent: ${result.summary.spent.toFixed(4)} ${quoteCurrency}, ` +
      `remaining: ${result.remainingFunds.toFixed(4)} ${quoteCurrency}`,
  ];
  if (result.exhausted) {
    lines.push("Stopped early: no remaining funds.");
  }
  return lines;
}
