import crypto from "node:crypto";
import { z } from "zod";
import type { OrderExecution, OrderExecutor, OrderRequest } from "../allocation/types.js";
import type { KrakenCredentials } from "../config/types.screener.js";
import { createChildLogger } from "../logging/logger.js";

const KRAKEN_API_URL = "https://api.kraken.com";

const log = createChildLogger("kraken");

/** Kraken's legacy codes for fiat balances; crypto and stablecoins use their plain code. */
const KRAKEN_BALANCE_CODES: Record<string, string> = {
  USD: "ZUSD",
  EUR: "ZEUR",
  GBP: "ZGBP",
  CAD: "ZCAD",
  JPY: "ZJPY",
  AUD: "ZAUD",
};

const KRAKEN_PAIR_ALIASES: Record<string, string> = {
  BTC: "XBT",
  DOGE: "XDG",
};

const KrakenEnvelopeSchema = z.object({
  error: z.array(z.string()).default([]),
  result: z.unknown().optional(),
});

const BalanceExSchema = z.record(
  z.string(),
  z
    .object({
      balance: z.string(),
      hold_trade: z.string().optional(),
    })
    .passthrough(),
);

const AddOrderSchema = z
  .object({
    txid: z.array(z.string()).optional(),
    descr: z.object({ order: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export type KrakenOrderValidation = { ok: true } | { ok: false; reason: string };

let lastNonce = 0;

function nextNonce(): string {
  lastNonce = Math.max(Date.now() * 1000, lastNonce + 1);
  return String(lastNonce);
}

export function buildKrakenSignature(params: {
  path: string;
  postData: string;
  nonce: string;
  secret: string;
}): string {
  const hash = crypto
    .createHash("sha256")
    .update(params.nonce + params.postData)
    .digest();
  return crypto
    .createHmac("sha512", Buffer.from(params.secret, "base64"))
    .update(params.path)
    .update(hash)
    .digest("base64");
}

function parseMarketSymbol(marketSymbol: string): { base: string; quote: string } | null {
  const [base, quote, ...rest] = marketSymbol.split("/");
  if (!base || !quote || rest.length > 0) {
    return null;
  }
  return { base, quote };
}

export function toKrakenPair(marketSymbol: string): string {
  const parsed = parseMarketSymbol(marketSymbol);
  if (!parsed) {
    return marketSymbol;
  }
  const alias = (code: string) => (code in KRAKEN_PAIR_ALIASES ? KRAKEN_PAIR_ALIASES[code] : code);
  const base = alias(parsed.base);
  const quote = alias(parsed.quote);
  return `${base}${quote}`;
}

export function validateKrakenOrderRequest(request: OrderRequest): KrakenOrderValidation {
  if (!parseMarketSymbol(request.marketSymbol)) {
    return { ok: false, reason: "market-symbol-invalid" };
  }
  if (!Number.isFinite(request.amount) || request.amount <= 0) {
    return { ok: false, reason: "amount-invalid" };
  }
  return { ok: true };
}

async function krakenPrivateRequest(params: {
  credentials: KrakenCredentials;
  path: string;
  fields?: Record<string, string>;
}): Promise<unknown> {
  const nonce = nextNonce();
  const body = new URLSearchParams({ nonce, ...params.fields });
  const postData = body.toString();
  const signature = buildKrakenSignature({
    path: params.path,
    postData,
    nonce,
    secret: params.credentials.apiSecret,
  });
  log.debug({ path: params.path }, "kraken private request");
  const response = await fetch(`${KRAKEN_API_URL}${params.path}`, {
    method: "POST",
    headers: {
      "API-Key": params.credentials.apiKey,
      "API-Sign": signature,
      "Content-Type": "application/x-www-form-urlencoded",
    },
    body: postData,
  });
  const json: unknown = await response.json();
  const envelope = KrakenEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new Error(`kraken ${params.path}: unexpected response (HTTP ${response.status})`);
  }
  if (!response.ok || envelope.data.error.length > 0) {
    const error = envelope.data.error.join(", ") || response.statusText;
    throw new Error(`kraken ${params.path}: ${error || `HTTP ${response.status}`}`);
  }
  return envelope.data.result;
}

/**
 * Free balance of one currency: total minus what open orders hold. Null when the account holds
 * none of it. Transport and API errors throw.
 */
export async function fetchKrakenFreeBalance(params: {
  credentials: KrakenCredentials;
  currency: string;
}): Promise<number | null> {
  const result = await krakenPrivateRequest({
    credentials: params.credentials,
    path: "/0/private/BalanceEx",
  });
  const balances = BalanceExSchema.safeParse(result);
  if (!balances.success) {
    throw new Error("kraken BalanceEx: unexpected result shape");
  }
  const currency = params.currency.toUpperCase();
  const codes =
    currency in KRAKEN_BALANCE_CODES ? [KRAKEN_BALANCE_CODES[currency], currency] : [currency];
  for (const code of codes) {
    const entry = balances.data[code];
    if (!entry) {
      continue;
    }
    const total = Number.parseFloat(entry.balance);
    const held = Number.parseFloat(entry.hold_trade ?? "0");
    if (!Number.isFinite(total)) {
      return null;
    }
    return Math.max(0, total - (Number.isFinite(held) ? held : 0));
  }
  return null;
}

export async function placeKrakenMarketBuy(params: {
  credentials: KrakenCredentials;
  request: OrderRequest;
}): Promise<OrderExecution> {
  const validation = validateKrakenOrderRequest(params.request);
  if (!validation.ok) {
    return { ok: false, message: validation.reason };
  }
  try {
    const result = await krakenPrivateRequest({
      credentials: params.credentials,
      path: "/0/private/AddOrder",
      fields: {
        pair: toKrakenPair(params.request.marketSymbol),
        type: "buy",
        ordertype: "market",
        volume: params.request.amount.toFixed(8),
      },
    });
    const parsed = AddOrderSchema.safeParse(result);
    const orderId = parsed.success ? (parsed.data.txid?.[0] ?? null) : null;
    return { ok: true, orderId };
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
}

export function createKrakenOrderExecutor(params: {
  credentials?: KrakenCredentials;
  dryRun: boolean;
}): OrderExecutor {
  if (params.dryRun) {
    let sequence = 0;
    return {
      placeMarketBuy: async (request) => {
        const validation = validateKrakenOrderRequest(request);
        if (!validation.ok) {
          return { ok: false, message: validation.reason };
        }
        sequence += 1;
        log.info(
          { ...request, pair: toKrakenPair(request.marketSymbol) },
          "dry run; order not sent",
        );
        return { ok: true, orderId: `dry-run-${sequence}` };
      },
    };
  }
  const credentials = params.credentials;
  if (!credentials) {
    throw new Error("kraken credentials missing");
  }
  return {
    placeMarketBuy: (request) => placeKrakenMarketBuy({ credentials, request }),
  };
}
