/**
 * Webhook Relay Service
 *
 * Per-request flow, nothing kept between requests:
 *
 *   Received → Validated → Planned → Submitted → Notified → Responded
 *
 * Every stage reports a result value; this service alone turns them into an
 * HTTP status and body. Validation failures never notify; every outcome past
 * validation sends exactly one notification. Nothing is retried.
 */

import { validateAlert, type ValidationFailureKind } from "../core/alert-validator";
import { planOrder, toPositionIntent } from "../core/order-planner";
import type { Alert, OrderFill, OrderPlan, PlanOutcome } from "../domain/alert.types";
import { SymbolLock } from "../lib/symbol-lock";
import type { Logger } from "../utils/logger.util";
import { describeError } from "../utils/sanitize-error.util";
import type { ExchangeGateway, NotificationService } from "./interfaces";

export interface RelaySettings {
  webhookSecret: string;
  defaultSymbol: string;
  leverage: number;
  quoteCurrency: string;
  minBalance: number;
  serializeOrders: boolean;
  /** Values scrubbed from any error text that leaves the process */
  secrets: readonly string[];
}

export type RelayResponseBody = {
  status: "ok" | "closed" | "no_position" | "no_trade" | "error";
  [field: string]: string | number;
};

export type RelayResponse = {
  httpStatus: 200 | 400 | 401 | 500;
  body: RelayResponseBody;
};

type ExchangeStage =
  | { kind: "FAILED"; error: unknown }
  | { kind: "SKIPPED"; outcome: Exclude<PlanOutcome, { kind: "ORDER" }> }
  | { kind: "FILLED"; plan: OrderPlan; fill: OrderFill };

function rejection(kind: ValidationFailureKind): RelayResponse {
  switch (kind) {
    case "UNAUTHORIZED":
      return { httpStatus: 401, body: { status: "error", error: "unauthorized" } };
    case "INVALID_ACTION":
      return { httpStatus: 400, body: { status: "error", error: "invalid_action" } };
    case "INVALID_PAYLOAD":
      return { httpStatus: 400, body: { status: "error", error: "invalid_payload" } };
  }
}

export class WebhookRelayService {
  private readonly lock = new SymbolLock();

  constructor(
    private readonly settings: RelaySettings,
    private readonly gateway: ExchangeGateway,
    private readonly notifier: NotificationService,
    private readonly logger: Logger,
  ) {}

  async handleAlert(payload: unknown): Promise<RelayResponse> {
    const validation = validateAlert(payload, {
      secret: this.settings.webhookSecret,
      defaultSymbol: this.settings.defaultSymbol,
    });

    if (!validation.ok) {
      this.logger.warn(`[Relay] Rejected alert: ${validation.message}`);
      return rejection(validation.kind);
    }

    const { alert } = validation;
    this.logger.info(`[Relay] 📨 ${alert.action} ${alert.symbol}`);

    const stage = await this.withSymbolLock(alert.symbol, () => this.runExchangeStage(alert));

    if (stage.kind === "FAILED") {
      const message = describeError(stage.error, this.settings.secrets);
      this.logger.error(
        `[Relay] ❌ ${alert.action} ${alert.symbol} failed: ${message}`,
        stage.error instanceof Error ? stage.error : undefined,
      );
      this.notifier.notify({
        type: "ORDER_FAILED",
        action: alert.action,
        symbol: alert.symbol,
        message,
      });
      return { httpStatus: 500, body: { status: "error", error: "order_failed" } };
    }

    if (stage.kind === "SKIPPED") {
      return this.reportSkipped(alert, stage.outcome);
    }

    const { plan, fill } = stage;
    this.logger.info(
      `[Relay] ✅ ${alert.action} ${fill.symbol}: ${fill.side} ${fill.amount} @ ${fill.price} (order ${fill.orderId})`,
    );
    this.notifier.notify({
      type: "ORDER_EXECUTED",
      action: alert.action,
      symbol: fill.symbol,
      side: fill.side,
      amount: fill.amount,
      price: fill.price,
      orderId: fill.orderId,
    });
    return {
      httpStatus: 200,
      body: {
        status: plan.reduceOnly ? "closed" : "ok",
        action: alert.action,
        symbol: fill.symbol,
        side: fill.side,
        amount: fill.amount,
        price: fill.price,
        orderId: fill.orderId,
      },
    };
  }

  private reportSkipped(
    alert: Alert,
    outcome: Exclude<PlanOutcome, { kind: "ORDER" }>,
  ): RelayResponse {
    if (outcome.kind === "INSUFFICIENT_BALANCE") {
      this.logger.warn(
        `[Relay] ⚠️ ${alert.action} ${alert.symbol} skipped: free balance ${outcome.available} ≤ minimum ${outcome.minimum}`,
      );
      this.notifier.notify({
        type: "INSUFFICIENT_BALANCE",
        action: alert.action,
        symbol: alert.symbol,
        available: outcome.available,
        minimum: outcome.minimum,
      });
      return {
        httpStatus: 200,
        body: {
          status: "no_trade",
          reason: "insufficient_balance",
          symbol: alert.symbol,
          available: outcome.available,
        },
      };
    }

    this.logger.info(`[Relay] ${alert.symbol} FLAT: no open position`);
    this.notifier.notify({
      type: "NOTHING_TO_CLOSE",
      symbol: outcome.symbol,
      price: outcome.markPrice,
    });
    return { httpStatus: 200, body: { status: "no_position", symbol: alert.symbol } };
  }

  /**
   * Plan and submit. Every failure in here came from talking to the exchange
   * (or from the numbers it returned) and is reported as an order failure.
   */
  private async runExchangeStage(alert: Alert): Promise<ExchangeStage> {
    try {
      const outcome = await planOrder(
        {
          intent: toPositionIntent(alert.action),
          symbol: alert.symbol,
          leverage: this.settings.leverage,
          quoteCurrency: this.settings.quoteCurrency,
          minBalance: this.settings.minBalance,
        },
        this.gateway,
      );
      if (outcome.kind !== "ORDER") {
        return { kind: "SKIPPED", outcome };
      }
      const fill = await this.gateway.placeMarketOrder(outcome.plan);
      return { kind: "FILLED", plan: outcome.plan, fill };
    } catch (error) {
      return { kind: "FAILED", error };
    }
  }

  private withSymbolLock<T>(symbol: string, task: () => Promise<T>): Promise<T> {
    if (!this.settings.serializeOrders) {
      return task();
    }
    return this.lock.runExclusive(symbol, task);
  }
}
