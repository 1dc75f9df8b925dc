/**
 * Service Interfaces
 *
 * Defines interfaces for external services and side effects, so the relay's
 * request handling stays testable without an exchange or a chat server.
 *
 * Key services:
 * - ExchangeGateway: Authenticated session against the perpetuals exchange
 * - NotificationService: Sends status messages to chat
 */

import type { OrderFill, OrderPlan } from "../domain/alert.types";
import type { NotificationEvent } from "../domain/notification.types";

// ═══════════════════════════════════════════════════════════════════════════
// Exchange Gateway
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Every method may reject with ExchangeError.
 */
export interface ExchangeGateway {
  /**
   * Authenticate and prepare the session (markets, credentials check).
   * Must succeed before any other call.
   */
  open(): Promise<void>;

  /**
   * Free (not held as margin) balance of a quote currency
   */
  fetchAvailableBalance(currency: string): Promise<number>;

  /**
   * Signed position size in base units: long > 0, short < 0, flat 0
   */
  fetchPositionSize(symbol: string): Promise<number>;

  fetchMarkPrice(symbol: string): Promise<number>;

  /**
   * Truncate an amount to the market's step. Returns 0 when the result is
   * below the market's minimum order size.
   */
  amountToPrecision(symbol: string, amount: number): number;

  placeMarketOrder(plan: OrderPlan): Promise<OrderFill>;

  /**
   * Release the session. Safe to call more than once.
   */
  close(): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════════════════
// Notification Service
// ═══════════════════════════════════════════════════════════════════════════

export interface NotificationService {
  /**
   * Send and wait for delivery. Resolves false on any failure; never rejects.
   */
  send(event: NotificationEvent): Promise<boolean>;

  /**
   * Fire-and-forget send
   */
  notify(event: NotificationEvent): void;

  /**
   * Wait for every fire-and-forget send still in flight
   */
  flush(): Promise<void>;

  isEnabled(): boolean;
}
