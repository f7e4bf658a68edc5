import type { ColumnLayout, ScreenerConfig } from "./types.screener.js";
import { ScreenerConfigSchema } from "./zod-schema.screener.js";

export type { ColumnLayout, ScreenerConfig } from "./types.screener.js";

/** Screener columns A, B, C, I, O and P. */
export const DEFAULT_COLUMN_LAYOUT: ColumnLayout = {
  symbol: 0,
  price: 1,
  pctDown: 2,
  longMa: 8,
  icon: 14,
  sentiment: 15,
};

export const DEFAULT_QUOTE_CURRENCY = "USD";
export const DEFAULT_MIN_ORDER_NOTIONAL = 5;
export const DEFAULT_SPREADSHEET_NAME = "Active-Investing";
export const DEFAULT_WORKSHEET_NAME = "Kraken-Screener";

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = readString(env, key);
  if (raw === undefined) {
    return undefined;
  }
  return Number(raw);
}

function readBoolean(env: NodeJS.ProcessEnv, key: string): boolean {
  const raw = readString(env, key)?.toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ScreenerConfig {
  const candidate = {
    kraken: {
      apiKey: readString(env, "KRAKEN_API_KEY"),
      apiSecret: readString(env, "KRAKEN_API_SECRET"),
      quoteCurrency: readString(env, "KRAKEN_BASE_CURRENCY") ?? DEFAULT_QUOTE_CURRENCY,
      dryRun: readBoolean(env, "DRY_RUN"),
      dryRunFunds: readNumber(env, "DRY_RUN_FUNDS"),
    },
    sheets: {
      credentialsJson: readString(env, "GOOGLE_CREDS_JSON"),
      spreadsheetName: readString(env, "SHEET_NAME") ?? DEFAULT_SPREADSHEET_NAME,
      spreadsheetId: readString(env, "SHEET_ID"),
      worksheetName: readString(env, "WORKSHEET_NAME") ?? DEFAULT_WORKSHEET_NAME,
    },
    allocation: {
      minOrderNotional: readNumber(env, "MIN_ORDER_NOTIONAL") ?? DEFAULT_MIN_ORDER_NOTIONAL,
      layout: DEFAULT_COLUMN_LAYOUT,
    },
    logLevel: readString(env, "LOG_LEVEL") ?? "info",
  };
  const parsed = ScreenerConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new Error(`invalid configuration: ${issues}`);
  }
  return parsed.data;
}
