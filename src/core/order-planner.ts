/**
 * Order Planner
 *
 * Sizing is always derived from the balance available right now, never from
 * earlier orders, so repeated BUY alerts without a FLAT in between cannot push
 * exposure beyond balance × leverage.
 *
 *   amount = (available balance × leverage) / mark price
 *
 * truncated to the market's step by the exchange's precision rules.
 */

import type {
  AlertAction,
  OrderPlan,
  PlanOutcome,
  PositionIntent,
} from "../domain/alert.types";
import type { ExchangeGateway } from "../services/interfaces";

export interface PlanRequest {
  intent: PositionIntent;
  symbol: string;
  leverage: number;
  quoteCurrency: string;
  /** Balance at or below this is treated as nothing to trade with */
  minBalance: number;
}

export function toPositionIntent(action: AlertAction): PositionIntent {
  switch (action) {
    case "BUY":
      return "OPEN_LONG";
    case "SELL":
      return "OPEN_SHORT";
    case "FLAT":
      return "CLOSE_ALL";
  }
}

/**
 * Raw (untruncated) order size in base units
 */
export function computeOrderAmount(
  balance: number,
  leverage: number,
  markPrice: number,
): number {
  if (!Number.isFinite(markPrice) || markPrice <= 0) {
    throw new RangeError(`Invalid mark price: ${markPrice}`);
  }
  return (balance * leverage) / markPrice;
}

export async function planOrder(
  request: PlanRequest,
  gateway: ExchangeGateway,
): Promise<PlanOutcome> {
  if (request.intent === "CLOSE_ALL") {
    return planClose(request, gateway);
  }

  const [available, markPrice] = await Promise.all([
    gateway.fetchAvailableBalance(request.quoteCurrency),
    gateway.fetchMarkPrice(request.symbol),
  ]);

  const insufficient: PlanOutcome = {
    kind: "INSUFFICIENT_BALANCE",
    symbol: request.symbol,
    available,
    minimum: request.minBalance,
  };

  if (available <= request.minBalance) {
    return insufficient;
  }

  const rawAmount = computeOrderAmount(available, request.leverage, markPrice);
  const amount = gateway.amountToPrecision(request.symbol, rawAmount);
  // Balance too small for even one step of the market
  if (amount <= 0) {
    return insufficient;
  }

  const plan: OrderPlan = {
    intent: request.intent,
    symbol: request.symbol,
    side: request.intent === "OPEN_LONG" ? "buy" : "sell",
    amount,
    leverage: request.leverage,
    referencePrice: markPrice,
    reduceOnly: false,
  };
  return { kind: "ORDER", plan };
}

async function planClose(
  request: PlanRequest,
  gateway: ExchangeGateway,
): Promise<PlanOutcome> {
  const [positionSize, markPrice] = await Promise.all([
    gateway.fetchPositionSize(request.symbol),
    gateway.fetchMarkPrice(request.symbol),
  ]);

  if (positionSize === 0) {
    return { kind: "NOTHING_TO_CLOSE", symbol: request.symbol, markPrice };
  }

  return {
    kind: "ORDER",
    plan: {
      intent: "CLOSE_ALL",
      symbol: request.symbol,
      side: positionSize > 0 ? "sell" : "buy",
      amount: Math.abs(positionSize),
      leverage: request.leverage,
      referencePrice: markPrice,
      reduceOnly: true,
    },
  };
}
