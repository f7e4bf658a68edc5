import type { ColumnLayout } from "../config/types.screener.js";
import { isRankIcon, type RankIcon } from "./multiplier.js";
import { parseNumber } from "./numbers.js";

export { parseNumber } from "./numbers.js";

export type CandidateRow = Readonly<{
  symbol: string;
  price: number;
  pctDown: number;
  longMa: number;
  icon: RankIcon;
  /** Raw sentiment cell; the multiplier composer decides whether it qualifies. */
  sentiment: string;
}>;

export type RowRejectReason =
  | "not-enough-columns"
  | "missing-required-field"
  | "icon-not-allowed"
  | "invalid-number"
  | "non-positive-price"
  | "non-positive-long-ma";

export type RowValidation =
  | { ok: true; row: CandidateRow }
  | { ok: false; reason: RowRejectReason; message: string; symbol?: string };

// Sentiment is optional and left out: spreadsheet APIs drop trailing empty cells.
function requiredColumnCount(layout: ColumnLayout): number {
  return Math.max(layout.symbol, layout.price, layout.pctDown, layout.longMa, layout.icon) + 1;
}

export function validateRow(cells: readonly string[], layout: ColumnLayout): RowValidation {
  const required = requiredColumnCount(layout);
  if (cells.length < required) {
    return {
      ok: false,
      reason: "not-enough-columns",
      message: `not enough columns (${cells.length} < ${required})`,
    };
  }
  const symbol = (cells[layout.symbol] ?? "").trim().toUpperCase();
  const priceRaw = (cells[layout.price] ?? "").trim();
  const pctDownRaw = (cells[layout.pctDown] ?? "").trim();
  const longMaRaw = (cells[layout.longMa] ?? "").trim();
  const icon = (cells[layout.icon] ?? "").trim();
  const sentiment = cells[layout.sentiment] ?? "";

  const missing = [
    ["symbol", symbol],
    ["price", priceRaw],
    ["pct_down", pctDownRaw],
    ["long_ma", longMaRaw],
    ["icon", icon],
  ]
    .filter(([, value]) => !value)
    .map(([name]) => name);
  if (missing.length > 0) {
    return {
      ok: false,
      reason: "missing-required-field",
      message: `missing required data: ${missing.join(", ")}`,
      symbol: symbol || undefined,
    };
  }
  if (!isRankIcon(icon)) {
    return {
      ok: false,
      reason: "icon-not-allowed",
      message: `icon '${icon}' not in allowed set`,
      symbol,
    };
  }
  const price = parseNumber(priceRaw);
  const pctDown = parseNumber(pctDownRaw);
  const longMa = parseNumber(longMaRaw);
  if (price === undefined || pctDown === undefined || longMa === undefined) {
    return { ok: false, reason: "invalid-number", message: "invalid numeric data", symbol };
  }
  if (price <= 0) {
    return { ok: false, reason: "non-positive-price", message: "non-positive price", symbol };
  }
  if (longMa <= 0) {
    return { ok: false, reason: "non-positive-long-ma", message: "non-positive long MA", symbol };
  }
  return { ok: true, row: { symbol, price, pctDown, longMa, icon, sentiment } };
}
