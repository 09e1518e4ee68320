import assert from "node:assert";
import { test, describe } from "node:test";
import { ThresholdExitPolicy } from "../../src/core/exit-policy";
import type { Position } from "../../src/core/types";

function createPosition(id: string, tokenId: string, entryPrice = 0.5): Position {
  return {
    id,
    marketId: `market-${id}`,
    tokenId,
    side: "YES",
    size: 50,
    entryPrice,
    openedAt: 0,
    status: "OPEN",
    unrealizedPnl: 0,
  };
}

const quotes = new Map<string, number>([
  ["tok-a", 0.75],
  ["tok-b", 0.35],
  ["tok-c", 0.55],
]);
const quote = (tokenId: string): number | undefined => quotes.get(tokenId);

const positions = [
  createPosition("pos-1", "tok-a"),
  createPosition("pos-2", "tok-b"),
  createPosition("pos-3", "tok-c"),
  createPosition("pos-4", "tok-unquoted"),
];

describe("ThresholdExitPolicy", () => {
  test("takes profit and stops out on the move since entry", () => {
    const policy = new ThresholdExitPolicy(quote, { takeProfitPct: 0.2, stopLossPct: 0.25 });

    assert.deepStrictEqual(policy.exitsFor(positions), [
      { positionId: "pos-1", exitPrice: 0.75, reason: "TAKE_PROFIT" },
      { positionId: "pos-2", exitPrice: 0.35, reason: "STOP_LOSS" },
    ]);
  });

  test("zero thresholds disable exits", () => {
    const policy = new ThresholdExitPolicy(quote, { takeProfitPct: 0, stopLossPct: 0 });
    assert.deepStrictEqual(policy.exitsFor(positions), []);
  });

  test("each threshold works alone", () => {
    const stopOnly = new ThresholdExitPolicy(quote, { takeProfitPct: 0, stopLossPct: 0.25 });
    assert.deepStrictEqual(
      stopOnly.exitsFor(positions).map((s) => s.positionId),
      ["pos-2"],
    );
  });
});
