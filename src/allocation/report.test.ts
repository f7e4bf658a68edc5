import { describe, expect, it } from "vitest";
import { formatAllocationReport, formatOutcomeLine } from "./report.js";
import type { AllocationResult, SizingTrace } from "./types.js";

const sizing: SizingTrace = {
  price: 100,
  pctDown: -10,
  tierFraction: 0.05,
  icon: "💎",
  iconMultiplier: 1,
  maRatio: 1.25,
  sentimentMultiplier: 1,
  fundsBefore: 1000,
  baseNotional: 50,
  rawNotional: 62.5,
  orderNotional: 62.5,
  capped: false,
};

const result: AllocationResult = {
  outcomes: [
    {
      status: "placed",
      rowNumber: 2,
      symbol: "ETH",
      sizing,
      order: {
        rowNumber: 2,
        symbol: "ETH",
        marketSymbol: "ETH/USD",
        notional: 62.5,
        amount: 0.625,
        orderId: "OABC-1",
      },
    },
    {
      status: "skipped",
      rowNumber: 3,
      reason: "not-enough-columns",
      message: "not enough columns (3 < 15)",
    },
  ],
  placed: [
    {
      rowNumber: 2,
      symbol: "ETH",
      marketSymbol: "ETH/USD",
      notional: 62.5,
      amount: 0.625,
      orderId: "OABC-1",
    },
  ],
  startingFunds: 1000,
  remainingFunds: 937.5,
  exhausted: false,
  summary: { scanned: 2, placed: 1, skipped: 1, failed: 0, spent: 62.5 },
};

describe("formatOutcomeLine", () => {
  it("formats placed rows with their sizing", () => {
    expect(formatOutcomeLine(result.outcomes[0], "USD")).toBe(
      "Row 2 (ETH): price=100, pct_down=-10, tier_fraction=0.05, icon=💎, icon_mult=1, " +
        "ma_ratio=1.2500, sent_mult=1, order_notional=62.5000 USD, " +
        "amount=0.62500000 ETH, market_symbol=ETH/USD; " +
        "order placed, id=OABC-1, spent=62.5000 USD, remaining_funds=937.5000 USD",
    );
  });

  it("formats failed rows with their sizing and intent", () => {
    const line = formatOutcomeLine(
      {
        status: "failed",
        rowNumber: 4,
        symbol: "SOL",
        reason: "execution-failed",
        message: "EOrder:Insufficient funds",
        sizing: { ...sizing, price: 20, maRatio: 1, rawNotional: 50, orderNotional: 50 },
        intent: { marketSymbol: "SOL/USD", amount: 2.5, notional: 50 },
      },
      "USD",
    );
    expect(line).toBe(
      "Row 4 (SOL): price=20, pct_down=-10, tier_fraction=0.05, icon=💎, icon_mult=1, " +
        "ma_ratio=1.0000, sent_mult=1, order_notional=50.0000 USD, " +
        "amount=2.50000000 SOL, market_symbol=SOL/USD; " +
        "failed to place order: EOrder:Insufficient funds",
    );
  });

  it("formats rows below the minimum notional with their sizing", () => {
    const line = formatOutcomeLine(
      {
        status: "skipped",
        rowNumber: 5,
        symbol: "DOT",
        reason: "below-min-notional",
        message: "calculated order notional 2.5000 < minimum (5)",
        sizing: { ...sizing, price: 5, maRatio: 1, fundsBefore: 50, orderNotional: 2.5 },
      },
      "USD",
    );
    expect(line).toBe(
      "Row 5 (DOT): price=5, pct_down=-10, tier_fraction=0.05, icon=💎, icon_mult=1, " +
        "ma_ratio=1.0000, sent_mult=1, order_notional=2.5000 USD; " +
        "calculated order notional 2.5000 < minimum (5), skipping.",
    );
  });

  it("formats skipped rows without a symbol", () => {
    expect(formatOutcomeLine(result.outcomes[1], "USD")).toBe(
      "Row 3: not enough columns (3 < 15), skipping.",
    );
  });
});

describe("formatAllocationReport", () => {
  it("lists placed orders and totals", () => {
    expect(formatAllocationReport(result, "USD")).toEqual([
      "Run complete.",
      "Total orders placed: 1",
      "  Row 2 ETH/USD: amount=0.62500000, notional=62.5000 USD, id=OABC-1",
      "Skipped: 1, failed: 0, spent: 62.5000 USD, remaining: 937.5000 USD",
    ]);
  });

  it("notes an early stop", () => {
    const lines = formatAllocationReport({ ...result, exhausted: true }, "USD");
    expect(lines[lines.length - 1]).toBe("Stopped early: no remaining funds.");
  });
});
