import crypto from "node:crypto";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  buildKrakenSignature,
  createKrakenOrderExecutor,
  fetchKrakenFreeBalance,
  placeKrakenMarketBuy,
  toKrakenPair,
  validateKrakenOrderRequest,
} from "./kraken.js";

const credentials = {
  apiKey: "test-key",
  apiSecret: Buffer.from("test-secret").toString("base64"),
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("kraken signing", () => {
  it("signs the path and hashed nonce plus body", () => {
    const signature = buildKrakenSignature({
      path: "/0/private/AddOrder",
      postData: "nonce=1&pair=XBTUSD",
      nonce: "1",
      secret: credentials.apiSecret,
    });
    const hash = crypto.createHash("sha256").update("1nonce=1&pair=XBTUSD").digest();
    const expected = crypto
      .createHmac("sha512", Buffer.from("test-secret"))
      .update("/0/private/AddOrder")
      .update(hash)
      .digest("base64");
    expect(signature).toBe(expected);
    expect(signature).toHaveLength(88);
  });
});

describe("kraken pairs", () => {
  it("maps market symbols to kraken pair names", () => {
    expect(toKrakenPair("BTC/USD")).toBe("XBTUSD");
    expect(toKrakenPair("DOGE/EUR")).toBe("XDGEUR");
    expect(toKrakenPair("ETH/USD")).toBe("ETHUSD");
  });

  it("validates order requests", () => {
    expect(validateKrakenOrderRequest({ marketSymbol: "ETH/USD", amount: 0.5 }).ok).toBe(true);
    expect(validateKrakenOrderRequest({ marketSymbol: "ETHUSD", amount: 0.5 })).toEqual({
      ok: false,
      reason: "market-symbol-invalid",
    });
    expect(validateKrakenOrderRequest({ marketSymbol: "ETH/USD", amount: 0 })).toEqual({
      ok: false,
      reason: "amount-invalid",
    });
  });
});

describe("fetchKrakenFreeBalance", () => {
  it("subtracts held funds from the fiat balance", async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse({
        error: [],
        result: {
          ZUSD: { balance: "1200.50", hold_trade: "200.25" },
          XXBT: { balance: "0.1" },
        },
      }),
    );
    vi.stubGlobal("fetch", fetchMock);
    const free = await fetchKrakenFreeBalance({ credentials, currency: "usd" });
    expect(free).toBeCloseTo(1000.25, 9);
    expect(fetchMock).toHaveBeenCalledWith(
      "https://api.kraken.com/0/private/BalanceEx",
      expect.objectContaining({ method: "POST" }),
    );
  });

  it("reads plain asset codes", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ error: [], result: { USDT: { balance: "50" } } })),
    );
    expect(await fetchKrakenFreeBalance({ credentials, currency: "USDT" })).toBe(50);
  });

  it("returns null when the currency is absent", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ error: [], result: {} })));
    expect(await fetchKrakenFreeBalance({ credentials, currency: "EUR" })).toBeNull();
  });

  it("throws on api errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ error: ["EAPI:Invalid key"] })),
    );
    await expect(fetchKrakenFreeBalance({ credentials, currency: "USD" })).rejects.toThrow(
      "kraken /0/private/BalanceEx: EAPI:Invalid key",
    );
  });
});

describe("placeKrakenMarketBuy", () => {
  it("posts a signed market buy and returns the txid", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({ error: [], result: { txid: ["OABC12-XYZ"], descr: { order: "buy" } } }),
    );
    vi.stubGlobal("fetch", fetchMock);
    const result = await placeKrakenMarketBuy({
      credentials,
      request: { marketSymbol: "BTC/USD", amount: 0.000123456789 },
    });
    expect(result).toEqual({ ok: true, orderId: "OABC12-XYZ" });
    const [, init] = fetchMock.mock.calls[0];
    const body = new URLSearchParams(String(init.body));
    expect(body.get("pair")).toBe("XBTUSD");
    expect(body.get("type")).toBe("buy");
    expect(body.get("ordertype")).toBe("market");
    expect(body.get("volume")).toBe("0.00012346");
    expect(body.get("nonce")).toMatch(/^\d+$/);
  });

  it("reports exchange errors as failed executions", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ error: ["EOrder:Insufficient funds"] })),
    );
    const result = await placeKrakenMarketBuy({
      credentials,
      request: { marketSymbol: "ETH/USD", amount: 1 },
    });
    expect(result).toEqual({
      ok: false,
      message: "kraken /0/private/AddOrder: EOrder:Insufficient funds",
    });
  });

  it("reports network failures as failed executions", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new Error("fetch failed");
      }),
    );
    const result = await placeKrakenMarketBuy({
      credentials,
      request: { marketSymbol: "ETH/USD", amount: 1 },
    });
    expect(result).toEqual({ ok: false, message: "fetch failed" });
  });
});

describe("createKrakenOrderExecutor", () => {
  it("does not send orders in dry-run mode", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const executor = createKrakenOrderExecutor({ dryRun: true });
    const first = await executor.placeMarketBuy({ marketSymbol: "ETH/USD", amount: 1 });
    const second = await executor.placeMarketBuy({ marketSymbol: "SOL/USD", amount: 2 });
    expect(first).toEqual({ ok: true, orderId: "dry-run-1" });
    expect(second).toEqual({ ok: true, orderId: "dry-run-2" });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("requires credentials for live orders", () => {
    expect(() => createKrakenOrderExecutor({ dryRun: false })).toThrow(
      "kraken credentials missing",
    );
  });
});
