import type { ColumnLayout } from "../config/types.screener.js";
import type { MultiplierRejectReason, RankIcon } from "../screener/multiplier.js";
import type { RowRejectReason } from "../screener/row.js";
import type { TierFraction } from "../screener/tiers.js";

export type SheetRow = {
  /** 1-based spreadsheet row number, header included. */
  rowNumber: number;
  cells: readonly string[];
};

export type AllocationConfig = {
  quoteCurrency: string;
  minOrderNotional: number;
  layout: ColumnLayout;
};

export type OrderRequest = {
  marketSymbol: string;
  amount: number;
};

export type OrderExecution = { ok: true; orderId: string | null } | { ok: false; message: string };

export type OrderExecutor = {
  placeMarketBuy(request: OrderRequest): Promise<OrderExecution>;
};

export type OrderIntent = OrderRequest & {
  notional: number;
};

export type SizingTrace = {
  price: number;
  pctDown: number;
  tierFraction: TierFraction;
  icon: RankIcon;
  iconMultiplier: number;
  maRatio: number;
  sentimentMultiplier: number;
  fundsBefore: number;
  baseNotional: number;
  rawNotional: number;
  orderNotional: number;
  /** True when the multiplier product asked for more than the remaining funds. */
  capped: boolean;
};

export type SkipReason =
  | RowRejectReason
  | MultiplierRejectReason
  | "pct-down-out-of-range"
  | "below-min-notional";

export type PlacedOrder = OrderIntent & {
  rowNumber: number;
  symbol: string;
  orderId: string | null;
};

export type RowOutcome =
  | {
      status: "skipped";
      rowNumber: number;
      symbol?: string;
      reason: SkipReason;
      message: string;
      sizing?: SizingTrace;
    }
  | {
      status: "failed";
      rowNumber: number;
      symbol: string;
      reason: "execution-failed";
      message: string;
      sizing: SizingTrace;
      intent: OrderIntent;
    }
  | {
      status: "placed";
      rowNumber: number;
      symbol: string;
      sizing: SizingTrace;
      order: PlacedOrder;
    };

export type AllocationSummary = {
  scanned: number;
  placed: number;
  skipped: number;
  failed: number;
  spent: number;
};

export type AllocationResult = {
  outcomes: RowOutcome[];
  placed: PlacedOrder[];
  startingFunds: number;
  remainingFunds: number;
  /** The scan stopped early because no funds were left. */
  exhausted: boolean;
  summary: AllocationSummary;
};
