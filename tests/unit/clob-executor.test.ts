import assert from "node:assert";
import { test, describe } from "node:test";
import { Chain } from "@polymarket/clob-client";
import { SignatureType } from "@polymarket/order-utils";
import {
  ClobExecutor,
  parseOrderResponse,
  resolveChain,
  resolveSignatureType,
  type OrderGateway,
} from "../../src/execution/clob-executor";
import { ExecutionFailedError } from "../../src/errors/app.errors";
import type { OrderIntent, SellIntent } from "../../src/core/types";
import type { Logger } from "../../src/utils/logger.util";

const mockLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

const order: OrderIntent = {
  marketId: "m1",
  tokenId: "tok-m1-yes",
  side: "YES",
  sizeUsd: 25,
  price: 0.4,
};

/** Gateway stand-in recording what the executor submits */
function createGateway(response: unknown, balance = "0"): OrderGateway & {
  submitted: Array<{ tokenId: string; amountUsd: number; price: number }>;
  sold: Array<{ tokenId: string; shares: number; price: number }>;
} {
  const submitted: Array<{ tokenId: string; amountUsd: number; price: number }> = [];
  const sold: Array<{ tokenId: string; shares: number; price: number }> = [];
  return {
    submitted,
    sold,
    async submitMarketBuy(tokenId, amountUsd, price) {
      submitted.push({ tokenId, amountUsd, price });
      return response;
    },
    async submitMarketSell(tokenId, shares, price) {
      sold.push({ tokenId, shares, price });
      return response;
    },
    async collateralBalance() {
      return balance;
    },
  };
}

describe("parseOrderResponse", () => {
  test("derives the fill price from making / taking amounts", () => {
    const result = parseOrderResponse(
      { success: true, orderID: "0xabc", makingAmount: "25", takingAmount: "50" },
      0.4,
    );
    assert.deepStrictEqual(result, { success: true, fillPrice: 0.5, orderId: "0xabc" });
  });

  test("a sell's fill price is USDC taken per share given", () => {
    const result = parseOrderResponse(
      { success: true, orderID: "0xabc", makingAmount: "100", takingAmount: "75" },
      0.7,
      "SELL",
    );
    assert.deepStrictEqual(result, { success: true, fillPrice: 0.75, orderId: "0xabc" });
  });

  test("falls back to the requested price without amounts", () => {
    const result = parseOrderResponse({ success: true, orderID: "0xabc" }, 0.4);
    assert.deepStrictEqual(result, { success: true, fillPrice: 0.4, orderId: "0xabc" });
  });

  test("reports client-side errors", () => {
    assert.deepStrictEqual(parseOrderResponse({ error: "not enough balance" }, 0.4), {
      success: false,
      fillPrice: 0,
      error: "not enough balance",
    });
  });

  test("reports venue rejections", () => {
    assert.strictEqual(
      parseOrderResponse({ success: false, errorMsg: "FOK not filled" }, 0.4).error,
      "FOK not filled",
    );
    assert.strictEqual(parseOrderResponse({ success: false }, 0.4).error, "ORDER_REJECTED");
  });

  test("rejects empty responses and missing order ids", () => {
    assert.strictEqual(parseOrderResponse(undefined, 0.4).error, "EMPTY_RESPONSE");
    assert.strictEqual(parseOrderResponse("ok", 0.4).error, "EMPTY_RESPONSE");
    assert.strictEqual(parseOrderResponse({ success: true }, 0.4).error, "NO_ORDER_ID");
  });
});

describe("ClobExecutor", () => {
  test("submits a market buy for the token and parses the response", async () => {
    const gateway = createGateway({ success: true, orderID: "0xdef" });
    const executor = new ClobExecutor(gateway, mockLogger);

    const result = await executor.execute(order);

    assert.deepStrictEqual(gateway.submitted, [
      { tokenId: "tok-m1-yes", amountUsd: 25, price: 0.4 },
    ]);
    assert.deepStrictEqual(result, { success: true, fillPrice: 0.4, orderId: "0xdef" });
    assert.strictEqual(executor.name, "clob");
  });

  test("returns the venue's rejection as a failed result", async () => {
    const executor = new ClobExecutor(
      createGateway({ success: false, errorMsg: "market closed" }),
      mockLogger,
    );
    const result = await executor.execute(order);
    assert.strictEqual(result.success, false);
    assert.strictEqual(result.error, "market closed");
  });

  test("fetchBalance converts 6-decimal collateral units to dollars", async () => {
    const executor = new ClobExecutor(createGateway({}, "1250500000"), mockLogger);
    assert.strictEqual(await executor.fetchBalance(), 1250.5);
  });

  test("fetchBalance rejects an unreadable balance", async () => {
    const executor = new ClobExecutor(createGateway({}, "n/a"), mockLogger);
    await assert.rejects(executor.fetchBalance(), ExecutionFailedError);
  });

  test("sells the position's shares and books the venue's fill price", async () => {
    const gateway = createGateway({
      success: true,
      orderID: "0xsell",
      makingAmount: "100",
      takingAmount: "60",
    });
    const executor = new ClobExecutor(gateway, mockLogger);
    const sell: SellIntent = {
      positionId: "pos-1",
      marketId: "m1",
      tokenId: "tok-m1-yes",
      side: "YES",
      shares: 100,
      price: 0.62,
    };

    const result = await executor.sell(sell);

    assert.deepStrictEqual(gateway.sold, [{ tokenId: "tok-m1-yes", shares: 100, price: 0.62 }]);
    assert.deepStrictEqual(gateway.submitted, []);
    assert.deepStrictEqual(result, { success: true, fillPrice: 0.6, orderId: "0xsell" });
  });
});

describe("client settings", () => {
  test("maps supported chain ids", () => {
    assert.strictEqual(resolveChain(137), Chain.POLYGON);
    assert.strictEqual(resolveChain(80002), Chain.AMOY);
    assert.throws(() => resolveChain(1), ExecutionFailedError);
  });

  test("maps signature types 0, 1 and 2", () => {
    assert.deepStrictEqual(
      [0, 1, 2].map(resolveSignatureType),
      [SignatureType.EOA, SignatureType.POLY_PROXY, SignatureType.POLY_GNOSIS_SAFE],
    );
    assert.throws(() => resolveSignatureType(3), ExecutionFailedError);
  });
});
