export type ColumnLayout = {
  symbol: number;
  price: number;
  pctDown: number;
  longMa: number;
  icon: number;
  /** Optional column; a row may end before it. */
  sentiment: number;
};

export type KrakenCredentials = {
  apiKey: string;
  apiSecret: string;
};

export type KrakenConfig = {
  apiKey?: string;
  apiSecret?: string;
  /** Quote currency funds are held and spent in, e.g. "USD". */
  quoteCurrency: string;
  /** Skip order submission; orders are sized and reported only. */
  dryRun: boolean;
  /** Starting balance used instead of a balance query when dry-running. */
  dryRunFunds?: number;
};

export type SheetsConfig = {
  /** Raw service-account JSON. */
  credentialsJson?: string;
  spreadsheetName: string;
  /** Skips the Drive lookup by name when set. */
  spreadsheetId?: string;
  worksheetName: string;
};

export type AllocationSettings = {
  /** Smallest quote-currency amount worth placing as an order. */
  minOrderNotional: number;
  layout: ColumnLayout;
};

export type ScreenerConfig = {
  kraken: KrakenConfig;
  sheets: SheetsConfig;
  allocation: AllocationSettings;
  logLevel: "silent" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";
};
