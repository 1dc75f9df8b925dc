import type { AlertAction, OrderSide } from "./alert.types";

/**
 * Everything the relay reports to chat. Rendered to text and sent, never stored.
 */
export type NotificationEvent =
  | { type: "SERVICE_STARTED"; symbol: string; leverage: number }
  | { type: "SERVICE_STOPPED"; reason: string }
  | {
      type: "ORDER_EXECUTED";
      action: AlertAction;
      symbol: string;
      side: OrderSide;
      amount: number;
      price: number;
      orderId: string;
    }
  | { type: "NOTHING_TO_CLOSE"; symbol: string; price: number }
  | {
      type: "INSUFFICIENT_BALANCE";
      action: AlertAction;
      symbol: string;
      available: number;
      minimum: number;
    }
  | { type: "ORDER_FAILED"; action: AlertAction; symbol: string; message: string }
  | { type: "UNHANDLED_ERROR"; message: string }
  | { type: "CONFIG_INVALID"; message: string }
  | { type: "STARTUP_FAILED"; message: string };
