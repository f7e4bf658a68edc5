export { allocate, buildMarketSymbol, toSheetRows } from "./allocation/engine.js";
export { formatAllocationReport, formatOutcomeLine } from "./allocation/report.js";
export type {
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
  SkipReason,
} from "./allocation/types.js";
export { DEFAULT_COLUMN_LAYOUT, loadConfig } from "./config/config.js";
export type { ColumnLayout, ScreenerConfig } from "./config/config.js";
export {
  ICON_MULTIPLIERS,
  RANK_ICONS,
  composeMultiplier,
  isRankIcon,
  parseSentiment,
  type MultiplierComposition,
  type RankIcon,
} from "./screener/multiplier.js";
export { parseNumber, validateRow, type CandidateRow, type RowValidation } from "./screener/row.js";
export { TIER_BRACKETS, classifyTier, type TierFraction } from "./screener/tiers.js";
export { loadScreenerValues } from "./sheets/google.js";
export { loadRowsFile } from "./sheets/rows-file.js";
export {
  createKrakenOrderExecutor,
  fetchKrakenFreeBalance,
  placeKrakenMarketBuy,
} from "./trading/kraken.js";
