import assert from "node:assert";
import { test, describe, beforeEach } from "node:test";
import { PositionLedger } from "../../src/core/position-ledger";
import { ManualClock } from "../../src/core/clock";
import {
  InvalidValueError,
  LimitExceededError,
  PositionNotFoundError,
} from "../../src/errors/app.errors";
import type { RiskLimits } from "../../src/core/types";
import type { Logger } from "../../src/utils/logger.util";

const mockLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

const baseLimits: RiskLimits = {
  dailyLossLimit: 500,
  weeklyLossLimit: 2000,
  maxDrawdownPct: 0.2,
  minSize: 10,
  maxSize: 100,
  maxPositionsTotal: 3,
  maxPositionsPerMarket: 1,
  maxConcentrationPct: 0.3,
  kellyFraction: 0.25,
};

// Monday 2024-03-11 12:00 UTC
const START = Date.UTC(2024, 2, 11, 12);
const DAY_MS = 86_400_000;

const isLimit =
  (limit: LimitExceededError["limit"]) =>
  (err: unknown): boolean =>
    err instanceof LimitExceededError && err.limit === limit;

describe("PositionLedger", () => {
  let clock: ManualClock;
  let ledger: PositionLedger;

  const createLedger = (overrides: Partial<RiskLimits> = {}): PositionLedger =>
    new PositionLedger({
      limits: { ...baseLimits, ...overrides },
      initialBalance: 1000,
      clock,
      logger: mockLogger,
    });

  beforeEach(() => {
    clock = new ManualClock(START);
    ledger = createLedger();
  });

  describe("open", () => {
    test("assigns sequential ids and tracks exposure", () => {
      const first = ledger.open("m1", "YES", 100, 0.5);
      const second = ledger.open("m2", "NO", 40, 0.3, "tok-m2-no");

      assert.strictEqual(first, "pos-1");
      assert.strictEqual(second, "pos-2");
      assert.strictEqual(ledger.exposure("m1"), 100);
      assert.strictEqual(ledger.totalExposure(), 140);
      assert.strictEqual(ledger.openCount(), 2);
      assert.strictEqual(ledger.getPosition(second)?.tokenId, "tok-m2-no");
      assert.strictEqual(ledger.getPosition(first)?.tokenId, "m1");
    });

    test("refuses a position beyond the total cap", () => {
      ledger.open("m1", "YES", 100, 0.5);
      ledger.open("m2", "YES", 100, 0.5);
      ledger.open("m3", "YES", 100, 0.5);

      assert.throws(() => ledger.open("m4", "YES", 100, 0.5), isLimit("MAX_POSITIONS"));
      assert.strictEqual(ledger.openCount(), 3);
    });

    test("refuses a second position in the same market", () => {
      ledger.open("m1", "YES", 50, 0.5);
      assert.throws(() => ledger.open("m1", "NO", 50, 0.5), isLimit("PER_MARKET_LIMIT"));
    });

    test("refuses a position that would break the concentration cap", () => {
      ledger = createLedger({ maxPositionsPerMarket: 2 });
      ledger.open("m1", "YES", 200, 0.5);

      // cap is 0.3 * 1000 = 300
      assert.throws(() => ledger.open("m1", "YES", 150, 0.5), isLimit("CONCENTRATION"));
      assert.strictEqual(ledger.exposure("m1"), 200);
    });

    test("refuses non-positive sizes and prices outside (0, 1)", () => {
      assert.throws(() => ledger.open("m1", "YES", 0, 0.5), isLimit("INVALID_ORDER"));
      assert.throws(() => ledger.open("m1", "YES", 10, 1), isLimit("INVALID_ORDER"));
      assert.throws(() => ledger.open("m1", "YES", 10, 0), isLimit("INVALID_ORDER"));
      assert.throws(() => ledger.open("m1", "YES", Infinity, 0.5), isLimit("INVALID_ORDER"));
      assert.throws(() => ledger.open("m1", "YES", NaN, 0.5), isLimit("INVALID_ORDER"));
    });
  });

  describe("close", () => {
    test("realizes a win into balance, peak and period P&L", () => {
      const id = ledger.open("m1", "YES", 100, 0.5);
      const trade = ledger.close(id, 0.75);

      assert.strictEqual(trade.id, id);
      assert.strictEqual(trade.realizedPnl, 50);
      assert.strictEqual(trade.outcome, "WIN");
      assert.strictEqual(trade.price, 0.75);
      assert.ok(Object.isFrozen(trade));

      const state = ledger.portfolioSummary();
      assert.strictEqual(state.balance, 1050);
      assert.strictEqual(state.peakBalance, 1050);
      assert.strictEqual(state.realizedPnlTotal, 50);
      assert.strictEqual(state.dailyPnl, 50);
      assert.strictEqual(state.weeklyPnl, 50);
      assert.strictEqual(state.openPositions, 0);
      assert.strictEqual(state.closedTrades, 1);
    });

    test("a loss lowers balance but never the peak", () => {
      const id = ledger.open("m1", "YES", 100, 0.5);
      const trade = ledger.close(id, 0.25);

      assert.strictEqual(trade.realizedPnl, -50);
      assert.strictEqual(trade.outcome, "LOSS");

      const state = ledger.portfolioSummary();
      assert.strictEqual(state.balance, 950);
      assert.strictEqual(state.peakBalance, 1000);
      assert.strictEqual(state.drawdown, 0.05);
      assert.strictEqual(state.consecutiveLosses, 1);
    });

    test("exiting at entry is breakeven", () => {
      const id = ledger.open("m1", "YES", 100, 0.4);
      assert.strictEqual(ledger.close(id, 0.4).outcome, "BREAKEVEN");
    });

    test("peak balance is non-decreasing across closes", () => {
      ledger = createLedger({ maxPositionsPerMarket: 5, maxPositionsTotal: 10 });
      const exits = [0.75, 0.25, 0.9, 0.1, 0.6];
      let lastPeak = ledger.portfolioSummary().peakBalance;

      for (const exit of exits) {
        const id = ledger.open("m1", "YES", 50, 0.5);
        ledger.close(id, exit);
        const { peakBalance, balance } = ledger.portfolioSummary();
        assert.ok(peakBalance >= lastPeak);
        assert.ok(peakBalance >= balance);
        lastPeak = peakBalance;
      }
    });

    test("throws for an unknown or already closed position", () => {
      assert.throws(() => ledger.close("pos-99", 0.5), PositionNotFoundError);

      const id = ledger.open("m1", "YES", 100, 0.5);
      ledger.close(id, 0.5);
      assert.throws(() => ledger.close(id, 0.5), PositionNotFoundError);
    });

    test("refuses an exit price that is not in [0, 1] and changes nothing", () => {
      const id = ledger.open("m1", "YES", 100, 0.5);
      const before = ledger.portfolioSummary();

      for (const exitPrice of [NaN, Infinity, -0.1, 1.5]) {
        assert.throws(
          () => ledger.close(id, exitPrice),
          (err: unknown) => err instanceof InvalidValueError && err.field === "exitPrice",
        );
      }

      assert.deepStrictEqual(ledger.portfolioSummary(), before);
      assert.strictEqual(ledger.getPosition(id)?.status, "OPEN");
      assert.deepStrictEqual(ledger.trades(), []);
    });

    test("accepts exits at exactly 0 and 1", () => {
      ledger = createLedger({ maxPositionsPerMarket: 2, maxConcentrationPct: 1 });
      const lost = ledger.open("m1", "YES", 100, 0.5);
      const won = ledger.open("m1", "YES", 100, 0.5);

      assert.strictEqual(ledger.close(lost, 0).realizedPnl, -100);
      assert.strictEqual(ledger.close(won, 1).realizedPnl, 100);
    });

    test("keeps the closed position with its exit price and close time", () => {
      const id = ledger.open("m1", "YES", 100, 0.5);
      clock.advance(1000);
      ledger.close(id, 0.75);

      const closed = ledger.getPosition(id);
      assert.strictEqual(closed?.status, "CLOSED");
      assert.strictEqual(closed?.exitPrice, 0.75);
      assert.strictEqual(closed?.closedAt, START + 1000);
      assert.strictEqual(closed?.unrealizedPnl, 0);
      assert.deepStrictEqual(ledger.openPositions(), []);
      assert.strictEqual(ledger.exposure("m1"), 0);
    });

    test("trades() lists closed trades oldest first", () => {
      ledger = createLedger({ maxPositionsPerMarket: 2 });
      const first = ledger.open("m1", "YES", 100, 0.5);
      const second = ledger.open("m2", "YES", 100, 0.5);
      ledger.close(second, 0.25);
      ledger.close(first, 0.75);

      assert.deepStrictEqual(
        ledger.trades().map((t) => [t.id, t.realizedPnl]),
        [
          [second, -50],
          [first, 50],
        ],
      );
    });

    test("frees the market for a new position", () => {
      const id = ledger.open("m1", "YES", 100, 0.5);
      ledger.close(id, 0.5);
      assert.strictEqual(ledger.open("m1", "YES", 100, 0.5), "pos-2");
    });
  });

  describe("period rollover", () => {
    test("daily P&L restarts at the next UTC day, weekly P&L at the next ISO week", () => {
      const id = ledger.open("m1", "YES", 100, 0.5);
      ledger.close(id, 0.25);
      assert.strictEqual(ledger.portfolioSummary().dailyPnl, -50);

      clock.advance(DAY_MS);
      let state = ledger.portfolioSummary();
      assert.strictEqual(state.dailyPnl, 0);
      assert.strictEqual(state.weeklyPnl, -50);

      clock.advance(7 * DAY_MS);
      state = ledger.portfolioSummary();
      assert.strictEqual(state.weeklyPnl, 0);
      assert.strictEqual(state.realizedPnlTotal, -50);
    });
  });

  describe("balance sync and mark-to-market", () => {
    test("syncBalance raises the peak but a lower sync keeps it", () => {
      ledger.syncBalance(1200);
      assert.strictEqual(ledger.portfolioSummary().peakBalance, 1200);

      ledger.syncBalance(900);
      const state = ledger.portfolioSummary();
      assert.strictEqual(state.balance, 900);
      assert.strictEqual(state.peakBalance, 1200);
      assert.strictEqual(state.drawdown, 0.25);
    });

    test("syncBalance refuses a non-finite balance", () => {
      assert.throws(() => ledger.syncBalance(NaN), InvalidValueError);
      assert.strictEqual(ledger.portfolioSummary().balance, 1000);
    });

    test("markToMarket ignores prices outside [0, 1]", () => {
      const id = ledger.open("m1", "YES", 100, 0.5, "tok-1");
      ledger.markToMarket(new Map([["tok-1", NaN]]));
      assert.strictEqual(ledger.getPosition(id)?.unrealizedPnl, 0);
    });

    test("markToMarket updates unrealized P&L of quoted tokens only", () => {
      const quoted = ledger.open("m1", "YES", 100, 0.5, "tok-1");
      const unquoted = ledger.open("m2", "YES", 100, 0.5, "tok-2");

      ledger.markToMarket(new Map([["tok-1", 0.75]]));

      assert.strictEqual(ledger.getPosition(quoted)?.unrealizedPnl, 50);
      assert.strictEqual(ledger.getPosition(unquoted)?.unrealizedPnl, 0);
    });

    test("reads are frozen copies", () => {
      const id = ledger.open("m1", "YES", 100, 0.5);
      assert.ok(Object.isFrozen(ledger.getPosition(id)));
      assert.ok(Object.isFrozen(ledger.openPositions()[0]));
      assert.ok(Object.isFrozen(ledger.portfolioSummary()));
    });
  });
});
