import { z } from "zod";

const ColumnIndexSchema = z.number().int().nonnegative();

export const ColumnLayoutSchema = z
  .object({
    symbol: ColumnIndexSchema,
    price: ColumnIndexSchema,
    pctDown: ColumnIndexSchema,
    longMa: ColumnIndexSchema,
    icon: ColumnIndexSchema,
    sentiment: ColumnIndexSchema,
  })
  .strict();

const KrakenConfigSchema = z
  .object({
    apiKey: z.string().min(1).optional(),
    apiSecret: z.string().min(1).optional(),
    quoteCurrency: z
      .string()
      .trim()
      .regex(/^[A-Za-z0-9]{2,10}$/, "Quote currency must be an asset code like USD")
      .transform((value) => value.toUpperCase()),
    dryRun: z.boolean(),
    dryRunFunds: z.number().nonnegative().optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (!value.dryRun && (!value.apiKey || !value.apiSecret)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "KRAKEN_API_KEY and KRAKEN_API_SECRET are required unless dry-running",
        path: ["apiKey"],
      });
    }
  });

const SheetsConfigSchema = z
  .object({
    credentialsJson: z.string().min(1).optional(),
    spreadsheetName: z.string().trim().min(1),
    spreadsheetId: z.string().trim().min(1).optional(),
    worksheetName: z.string().trim().min(1),
  })
  .strict();

const AllocationSettingsSchema = z
  .object({
    minOrderNotional: z.number().finite().nonnegative(),
    layout: ColumnLayoutSchema,
  })
  .strict();

export const ScreenerConfigSchema = z
  .object({
    kraken: KrakenConfigSchema,
    sheets: SheetsConfigSchema,
    allocation: AllocationSettingsSchema,
    logLevel: z.enum(["silent", "trace", "debug", "info", "warn", "error", "fatal"]),
  })
  .strict();
