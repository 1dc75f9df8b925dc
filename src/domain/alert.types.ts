import type { ALERT_ACTIONS } from "../constants/relay.constants";

export type AlertAction = (typeof ALERT_ACTIONS)[number];

/**
 * A validated inbound alert. Lives for one request.
 */
export type Alert = {
  secret: string;
  action: AlertAction;
  symbol: string;
};

export type PositionIntent = "OPEN_LONG" | "OPEN_SHORT" | "CLOSE_ALL";

export type OrderSide = "buy" | "sell";

export type OrderPlan = {
  intent: PositionIntent;
  symbol: string;
  side: OrderSide;
  /** Base-asset units, already truncated to the market's step */
  amount: number;
  leverage: number;
  /** Mark price the amount was derived from; bounds market-order slippage */
  referencePrice: number;
  reduceOnly: boolean;
};

export type OrderFill = {
  orderId: string;
  symbol: string;
  side: OrderSide;
  amount: number;
  price: number;
};

export type PlanOutcome =
  | { kind: "ORDER"; plan: OrderPlan }
  | { kind: "NOTHING_TO_CLOSE"; symbol: string; markPrice: number }
  | {
      kind: "INSUFFICIENT_BALANCE";
      symbol: string;
      available: number;
      minimum: number;
    };
