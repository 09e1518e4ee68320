import assert from "node:assert";
import axios from "axios";
import { test, describe, afterEach, mock } from "node:test";
import {
  GammaMarketScanner,
  MarketPriceEstimator,
  buildOpportunities,
  parseGammaMarket,
} from "../../src/scanner/gamma-scanner";
import type { BinaryMarket, ProbabilityEstimator } from "../../src/scanner/types";
import { AppError } from "../../src/errors/app.errors";
import type { Logger } from "../../src/utils/logger.util";

const mockLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

const assertClose = (actual: number, expected: number): void => {
  assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${actual} ≈ ${expected}`);
};

function rawMarket(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    conditionId: "0xcond1",
    question: "Will it rain tomorrow?",
    outcomes: '["Yes", "No"]',
    clobTokenIds: '["tok-yes", "tok-no"]',
    outcomePrices: '["0.4", "0.6"]',
    liquidityNum: 25_000,
    active: true,
    closed: false,
    ...overrides,
  };
}

function market(overrides: Partial<BinaryMarket> = {}): BinaryMarket {
  return {
    marketId: "m1",
    question: "Q?",
    yesTokenId: "m1-yes",
    noTokenId: "m1-no",
    yesPrice: 0.4,
    noPrice: 0.6,
    liquidity: 25_000,
    ...overrides,
  };
}

/** Fixed YES estimate per market id */
const tableEstimator = (table: Record<string, number>): ProbabilityEstimator => ({
  estimateYes: (m) => table[m.marketId] ?? m.yesPrice,
});

describe("parseGammaMarket", () => {
  test("decodes string-encoded arrays and numbers", () => {
    assert.deepStrictEqual(parseGammaMarket(rawMarket()), {
      ok: true,
      market: {
        marketId: "0xcond1",
        question: "Will it rain tomorrow?",
        yesTokenId: "tok-yes",
        noTokenId: "tok-no",
        yesPrice: 0.4,
        noPrice: 0.6,
        liquidity: 25_000,
      },
    });
  });

  test("accepts native arrays and a string liquidity field", () => {
    const result = parseGammaMarket(
      rawMarket({
        outcomes: ["Yes", "No"],
        clobTokenIds: ["a", "b"],
        outcomePrices: [0.25, 0.75],
        liquidityNum: undefined,
        liquidity: "12000.5",
      }),
    );
    assert.strictEqual(result.ok, true);
    if (result.ok) {
      assert.strictEqual(result.market.yesTokenId, "a");
      assert.strictEqual(result.market.noPrice, 0.75);
      assert.strictEqual(result.market.liquidity, 12000.5);
    }
  });

  test("rejects malformed markets with a reason", () => {
    const cases: Array<[unknown, string]> = [
      ["not a market", "NOT_AN_OBJECT"],
      [rawMarket({ closed: true }), "CLOSED"],
      [rawMarket({ active: false }), "INACTIVE"],
      [rawMarket({ conditionId: "" }), "MISSING_ID"],
      [rawMarket({ outcomes: '["Up", "Down"]' }), "NOT_BINARY"],
      [rawMarket({ clobTokenIds: '["only-one"]' }), "BAD_TOKEN_IDS"],
      [rawMarket({ clobTokenIds: "not json" }), "BAD_TOKEN_IDS"],
      [rawMarket({ outcomePrices: '["1", "0"]' }), "BAD_PRICES"],
      [rawMarket({ outcomePrices: '["abc", "0.5"]' }), "BAD_PRICES"],
      [rawMarket({ liquidityNum: undefined }), "BAD_LIQUIDITY"],
      [rawMarket({ liquidityNum: -5 }), "BAD_LIQUIDITY"],
    ];

    for (const [raw, reason] of cases) {
      assert.deepStrictEqual(parseGammaMarket(raw), { ok: false, reason });
    }
  });
});

describe("buildOpportunities", () => {
  const filter = { minEdge: 0.1, minLiquidity: 1000 };

  test("takes the side with edge and ranks by expected value", () => {
    const markets = [
      market({ marketId: "a", yesTokenId: "a-yes", noTokenId: "a-no", yesPrice: 0.4, noPrice: 0.6 }),
      market({ marketId: "b", yesTokenId: "b-yes", noTokenId: "b-no", yesPrice: 0.7, noPrice: 0.3 }),
      market({ marketId: "c", yesPrice: 0.5, noPrice: 0.5 }),
      market({ marketId: "d", liquidity: 500 }),
    ];
    const estimator = tableEstimator({ a: 0.6, b: 0.45, c: 0.55, d: 0.9 });

    const opportunities = buildOpportunities(markets, estimator, filter);

    assert.deepStrictEqual(
      opportunities.map((o) => [o.marketId, o.side, o.tokenId]),
      [
        ["b", "NO", "b-no"],
        ["a", "YES", "a-yes"],
      ],
    );

    const [b, a] = opportunities;
    assert.ok(a && b);
    assertClose(b.edge, 0.25);
    assertClose(b.currentPrice, 0.3);
    assertClose(b.expectedValue, 0.25 / 0.3);
    assertClose(b.confidence, 0.5);
    assertClose(a.edge, 0.2);
    assertClose(a.expectedValue, 0.5);
    assertClose(a.confidence, 0.4);
  });

  test("caps confidence at 1", () => {
    const [opportunity] = buildOpportunities(
      [market({ yesPrice: 0.2, noPrice: 0.8 })],
      tableEstimator({ m1: 0.9 }),
      filter,
    );
    assert.strictEqual(opportunity?.confidence, 1);
  });

  test("skips markets whose forecast is not a finite number", () => {
    const broken: ProbabilityEstimator = { estimateYes: () => NaN };
    const unbounded: ProbabilityEstimator = { estimateYes: () => Infinity };

    assert.deepStrictEqual(buildOpportunities([market()], broken, filter), []);
    assert.deepStrictEqual(buildOpportunities([market()], unbounded, filter), []);
  });

  test("the market-price estimator finds no edge", () => {
    assert.deepStrictEqual(
      buildOpportunities([market()], new MarketPriceEstimator(), filter),
      [],
    );
  });
});

describe("GammaMarketScanner", () => {
  afterEach(() => {
    mock.restoreAll();
  });

  const config = {
    baseUrl: "https://gamma.test",
    limit: 50,
    minEdge: 0.1,
    minLiquidity: 1000,
    timeoutMs: 5000,
  };

  test("fetches active markets and keeps the last price per token", async () => {
    const get = mock.method(axios, "get", async () => ({
      data: [rawMarket(), rawMarket({ closed: true }), 42],
    }));
    const scanner = new GammaMarketScanner(
      config,
      tableEstimator({ "0xcond1": 0.6 }),
      mockLogger,
    );

    const result = await scanner.scan();

    assert.strictEqual(get.mock.callCount(), 1);
    assert.deepStrictEqual(get.mock.calls[0]?.arguments, [
      "https://gamma.test/markets",
      { params: { active: true, closed: false, limit: 50 }, timeout: 5000 },
    ]);
    assert.strictEqual(result.marketsScanned, 3);
    assert.deepStrictEqual(
      result.opportunities.map((o) => [o.marketId, o.side]),
      [["0xcond1", "YES"]],
    );
    assert.strictEqual(scanner.lastPrice("tok-yes"), 0.4);
    assert.strictEqual(scanner.lastPrice("tok-no"), 0.6);
    assert.strictEqual(scanner.lastPrice("unknown"), undefined);
  });

  test("rejects a response that is not a market list", async () => {
    mock.method(axios, "get", async () => ({ data: { error: "maintenance" } }));
    const scanner = new GammaMarketScanner(config, new MarketPriceEstimator(), mockLogger);

    await assert.rejects(scanner.scan(), AppError);
  });

  test("propagates HTTP failures to the caller", async () => {
    mock.method(axios, "get", async () => {
      throw new Error("socket hang up");
    });
    const scanner = new GammaMarketScanner(config, new MarketPriceEstimator(), mockLogger);

    await assert.rejects(scanner.scan(), /socket hang up/);
  });

  test("retries a rate-limited request and then succeeds", async () => {
    let calls = 0;
    const get = mock.method(axios, "get", async () => {
      calls++;
      if (calls === 1) {
        throw Object.assign(new Error("Request failed with status code 429"), {
          response: { status: 429 },
        });
      }
      return { data: [rawMarket()] };
    });
    const scanner = new GammaMarketScanner(
      { ...config, retry: { maxRetries: 2, baseDelayMs: 0, jitterFactor: 0 } },
      new MarketPriceEstimator(),
      mockLogger,
    );

    const result = await scanner.scan();

    assert.strictEqual(get.mock.callCount(), 2);
    assert.strictEqual(result.marketsScanned, 1);
  });

  test("gives up after the configured retries and rethrows the last error", async () => {
    const get = mock.method(axios, "get", async () => {
      throw Object.assign(new Error("Service Unavailable"), { response: { status: 503 } });
    });
    const scanner = new GammaMarketScanner(
      { ...config, retry: { maxRetries: 2, baseDelayMs: 0, jitterFactor: 0 } },
      new MarketPriceEstimator(),
      mockLogger,
    );

    await assert.rejects(scanner.scan(), /Service Unavailable/);
    assert.strictEqual(get.mock.callCount(), 3);
  });

  test("does not retry a client error", async () => {
    const get = mock.method(axios, "get", async () => {
      throw Object.assign(new Error("Not Found"), { response: { status: 404 } });
    });
    const scanner = new GammaMarketScanner(
      { ...config, retry: { maxRetries: 2, baseDelayMs: 0 } },
      new MarketPriceEstimator(),
      mockLogger,
    );

    await assert.rejects(scanner.scan(), /Not Found/);
    assert.strictEqual(get.mock.callCount(), 1);
  });
});
