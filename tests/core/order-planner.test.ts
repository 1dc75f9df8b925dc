import { describe, test } from "node:test";
import assert from "node:assert/strict";
import {
  computeOrderAmount,
  planOrder,
  toPositionIntent,
  type PlanRequest,
} from "../../src/core/order-planner";
import { FakeExchangeGateway } from "../helpers/fakes";

const request = (overrides: Partial<PlanRequest> = {}): PlanRequest => ({
  intent: "OPEN_LONG",
  symbol: "BTC/USDC:USDC",
  leverage: 5,
  quoteCurrency: "USDC",
  minBalance: 0,
  ...overrides,
});

describe("toPositionIntent", () => {
  test("maps each action to one intent", () => {
    assert.equal(toPositionIntent("BUY"), "OPEN_LONG");
    assert.equal(toPositionIntent("SELL"), "OPEN_SHORT");
    assert.equal(toPositionIntent("FLAT"), "CLOSE_ALL");
  });
});

describe("computeOrderAmount", () => {
  test("is balance × leverage / mark price", () => {
    assert.equal(computeOrderAmount(1000, 5, 50000), 0.1);
    assert.equal(computeOrderAmount(200, 2, 4), 100);
  });

  test("refuses a non-positive mark price", () => {
    assert.throws(() => computeOrderAmount(1000, 5, 0), RangeError);
    assert.throws(() => computeOrderAmount(1000, 5, Number.NaN), RangeError);
  });
});

describe("planOrder", () => {
  test("sizes a long from the free balance", async () => {
    const gateway = new FakeExchangeGateway({ balance: 1000, markPrice: 50000 });

    const outcome = await planOrder(request(), gateway);

    assert.deepEqual(outcome, {
      kind: "ORDER",
      plan: {
        intent: "OPEN_LONG",
        symbol: "BTC/USDC:USDC",
        side: "buy",
        amount: 0.1,
        leverage: 5,
        referencePrice: 50000,
        reduceOnly: false,
      },
    });
    assert.ok(gateway.calls.includes("fetchAvailableBalance:USDC"));
  });

  test("sizes a short with the sell side", async () => {
    const gateway = new FakeExchangeGateway({ balance: 300, markPrice: 2000 });

    const outcome = await planOrder(request({ intent: "OPEN_SHORT", leverage: 2 }), gateway);

    assert.equal(outcome.kind, "ORDER");
    if (outcome.kind !== "ORDER") return;
    assert.equal(outcome.plan.side, "sell");
    assert.equal(outcome.plan.amount, 0.3);
  });

  test("truncates the amount to the market step", async () => {
    const gateway = new FakeExchangeGateway({ balance: 1000, markPrice: 30000, step: 0.001 });

    const outcome = await planOrder(request(), gateway);

    assert.equal(outcome.kind, "ORDER");
    if (outcome.kind !== "ORDER") return;
    // 5000 / 30000 = 0.1666.. -> 0.166
    assert.ok(Math.abs(outcome.plan.amount - 0.166) < 1e-12);
    assert.ok(outcome.plan.amount * outcome.plan.referencePrice <= 1000 * 5);
  });

  test("reports insufficient balance at or below the minimum", async () => {
    for (const [balance, minBalance] of [
      [0, 0],
      [-3, 0],
      [10, 10],
    ]) {
      const gateway = new FakeExchangeGateway({ balance });
      const outcome = await planOrder(request({ minBalance }), gateway);
      assert.deepEqual(outcome, {
        kind: "INSUFFICIENT_BALANCE",
        symbol: "BTC/USDC:USDC",
        available: balance,
        minimum: minBalance,
      });
    }
  });

  test("reports insufficient balance when the size truncates to nothing", async () => {
    const gateway = new FakeExchangeGateway({
      balance: 1,
      markPrice: 50000,
      step: 0.001,
    });

    const outcome = await planOrder(request(), gateway);

    assert.equal(outcome.kind, "INSUFFICIENT_BALANCE");
  });

  test("closes a long with a reduce-only sell of the full size", async () => {
    const gateway = new FakeExchangeGateway({ positionSize: 0.25, markPrice: 51000 });

    const outcome = await planOrder(request({ intent: "CLOSE_ALL" }), gateway);

    assert.deepEqual(outcome, {
      kind: "ORDER",
      plan: {
        intent: "CLOSE_ALL",
        symbol: "BTC/USDC:USDC",
        side: "sell",
        amount: 0.25,
        leverage: 5,
        referencePrice: 51000,
        reduceOnly: true,
      },
    });
    assert.ok(!gateway.calls.includes("fetchAvailableBalance:USDC"));
  });

  test("closes a short with a buy", async () => {
    const gateway = new FakeExchangeGateway({ positionSize: -1.5 });

    const outcome = await planOrder(request({ intent: "CLOSE_ALL" }), gateway);

    assert.equal(outcome.kind, "ORDER");
    if (outcome.kind !== "ORDER") return;
    assert.equal(outcome.plan.side, "buy");
    assert.equal(outcome.plan.amount, 1.5);
  });

  test("has nothing to close when flat", async () => {
    const gateway = new FakeExchangeGateway({ positionSize: 0, markPrice: 49000 });

    const outcome = await planOrder(request({ intent: "CLOSE_ALL" }), gateway);

    assert.deepEqual(outcome, {
      kind: "NOTHING_TO_CLOSE",
      symbol: "BTC/USDC:USDC",
      markPrice: 49000,
    });
  });

  test("propagates exchange read failures", async () => {
    const gateway = new FakeExchangeGateway({ readError: new Error("rate limited") });

    await assert.rejects(planOrder(request(), gateway), /rate limited/);
  });
});
